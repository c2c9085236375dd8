import { InvalidParameterError } from './convergence.errors';
import { HorizonStatus, NoLossResult, SpreadResult, WindowSet } from './convergence.types';
import { ReturnSeries } from './return-series';
import {
  generateRollingWindows,
  maxFeasibleWindow,
  unknownBaselineNote,
} from './rolling-windows';
import { findExtremes, summarizeWindows, WindowExtremes } from './window-statistics';

export const NO_LOSS_EXHAUSTED_NOTE = 'Condition not met - max feasible horizon used';
export const SPREAD_EXHAUSTED_NOTE = 'Threshold not met - max feasible horizon used';

interface HorizonOutcome {
  status: HorizonStatus;
  windowSet: WindowSet | null;
  extremes: WindowExtremes | null;
}

/**
 * Walks window lengths 1..maxFeasible and stops at the first length whose
 * (non-empty) window set satisfies `accept`. When none does, the last feasible
 * length is reported as exhausted.
 */
function searchHorizon(
  series: ReturnSeries,
  baselineYear: number,
  accept: (extremes: WindowExtremes) => boolean,
): HorizonOutcome {
  const maxFeasible = maxFeasibleWindow(series, baselineYear);
  let last: { windowSet: WindowSet; extremes: WindowExtremes } | null = null;

  for (let n = 1; n <= maxFeasible; n++) {
    const windowSet = generateRollingWindows(series, baselineYear, n);
    const extremes = findExtremes(windowSet.windows);
    if (!extremes) continue;

    if (accept(extremes)) {
      return { status: 'found', windowSet, extremes };
    }
    last = { windowSet, extremes };
  }

  if (!last) {
    return { status: 'no-data', windowSet: null, extremes: null };
  }
  return { status: 'exhausted', ...last };
}

function spreadOf(extremes: WindowExtremes): number {
  return extremes.best.cagr - extremes.worst.cagr;
}

/** Shortest holding period after which no window of that length lost money. */
export function findNoLossHorizon(series: ReturnSeries, baselineYear: number): NoLossResult {
  const outcome = searchHorizon(series, baselineYear, extremes => extremes.worst.cagr >= 0);

  if (outcome.status === 'no-data' || !outcome.windowSet) {
    return {
      baselineYear,
      minHoldingYears: null,
      worstWindow: null,
      worstCagr: null,
      bestWindow: null,
      bestCagr: null,
      averageCagr: null,
      windowsChecked: 0,
      metCondition: false,
      status: 'no-data',
      note: unknownBaselineNote(baselineYear),
    };
  }

  const stats = summarizeWindows(outcome.windowSet);
  const found = outcome.status === 'found';
  return {
    baselineYear,
    minHoldingYears: outcome.windowSet.windowSize,
    worstWindow: stats.worstWindow,
    worstCagr: stats.worstCagr,
    bestWindow: stats.bestWindow,
    bestCagr: stats.bestCagr,
    averageCagr: stats.averageCagr,
    windowsChecked: stats.sampleCount,
    metCondition: found,
    status: outcome.status,
    note: found ? null : NO_LOSS_EXHAUSTED_NOTE,
  };
}

export function assertThreshold(threshold: number): void {
  if (!Number.isFinite(threshold) || threshold < 0) {
    throw new InvalidParameterError(`Threshold must be a non-negative number, got ${threshold}`);
  }
}

/**
 * Shortest holding period after which best and worst windows of that length
 * differ by at most `threshold`. The realized spread is reported as computed.
 */
export function findSpreadHorizon(
  series: ReturnSeries,
  baselineYear: number,
  threshold: number,
): SpreadResult {
  assertThreshold(threshold);

  const outcome = searchHorizon(series, baselineYear, extremes => spreadOf(extremes) <= threshold);

  if (outcome.status === 'no-data' || !outcome.windowSet || !outcome.extremes) {
    return {
      baselineYear,
      threshold,
      minHoldingYears: null,
      bestWindow: null,
      bestCagr: null,
      worstWindow: null,
      worstCagr: null,
      spread: null,
      metCondition: false,
      status: 'no-data',
      note: unknownBaselineNote(baselineYear),
    };
  }

  const stats = summarizeWindows(outcome.windowSet);
  const found = outcome.status === 'found';
  return {
    baselineYear,
    threshold,
    minHoldingYears: outcome.windowSet.windowSize,
    bestWindow: stats.bestWindow,
    bestCagr: stats.bestCagr,
    worstWindow: stats.worstWindow,
    worstCagr: stats.worstCagr,
    spread: spreadOf(outcome.extremes),
    metCondition: found,
    status: outcome.status,
    note: found ? null : SPREAD_EXHAUSTED_NOTE,
  };
}
