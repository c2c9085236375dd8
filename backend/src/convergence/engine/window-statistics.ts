import { RollingWindow, WindowSet, WindowSpan, WindowStatistics } from './convergence.types';

export interface WindowExtremes {
  best: RollingWindow;
  worst: RollingWindow;
}

function toSpan(window: RollingWindow): WindowSpan {
  return { startYear: window.startYear, endYear: window.endYear };
}

/**
 * Best and worst windows of a non-empty set. Ties keep the earliest window,
 * so results follow endYear order.
 */
export function findExtremes(windows: readonly RollingWindow[]): WindowExtremes | null {
  if (windows.length === 0) return null;

  let best = windows[0];
  let worst = windows[0];
  for (let i = 1; i < windows.length; i++) {
    const window = windows[i];
    if (window.cagr > best.cagr) best = window;
    if (window.cagr < worst.cagr) worst = window;
  }
  return { best, worst };
}

export function averageCagr(windows: readonly RollingWindow[]): number | null {
  if (windows.length === 0) return null;
  return windows.reduce((sum, w) => sum + w.cagr, 0) / windows.length;
}

export function summarizeWindows(windowSet: WindowSet): WindowStatistics {
  const extremes = findExtremes(windowSet.windows);

  if (!extremes) {
    return {
      windowSize: windowSet.windowSize,
      bestWindow: null,
      bestCagr: null,
      worstWindow: null,
      worstCagr: null,
      averageCagr: null,
      sampleCount: 0,
    };
  }

  return {
    windowSize: windowSet.windowSize,
    bestWindow: toSpan(extremes.best),
    bestCagr: extremes.best.cagr,
    worstWindow: toSpan(extremes.worst),
    worstCagr: extremes.worst.cagr,
    averageCagr: averageCagr(windowSet.windows),
    sampleCount: windowSet.windows.length,
  };
}
