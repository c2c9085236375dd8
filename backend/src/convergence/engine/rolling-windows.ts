import { compoundAnnualGrowthRate } from './compounding';
import { InvalidParameterError, InvalidReturnError } from './convergence.errors';
import { RollingWindow, WindowSet, WindowSpan } from './convergence.types';
import { ReturnSeries } from './return-series';

export function assertWindowSize(windowSize: number): void {
  if (!Number.isInteger(windowSize) || windowSize < 1) {
    throw new InvalidParameterError(`Window size must be an integer >= 1, got ${windowSize}`);
  }
}

export function unknownBaselineNote(baselineYear: number): string {
  return `Baseline year ${baselineYear} not present in series`;
}

/**
 * Number of years from the baseline to the end of the series, i.e. the longest
 * window that still fits. 0 when the baseline is not in the series.
 */
export function maxFeasibleWindow(series: ReturnSeries, baselineYear: number): number {
  const startIndex = series.indexOf(baselineYear);
  return startIndex < 0 ? 0 : series.length - startIndex;
}

/**
 * All overlapping windows of `windowSize` years starting at or after the
 * baseline, in endYear order. Missing baselines and series too short for a
 * single window give an empty set with a note rather than an error.
 */
export function generateRollingWindows(
  series: ReturnSeries,
  baselineYear: number,
  windowSize: number,
): WindowSet {
  assertWindowSize(windowSize);

  const startIndex = series.indexOf(baselineYear);
  if (startIndex < 0) {
    return {
      baselineYear,
      windowSize,
      coverage: 'unknown-baseline',
      windows: [],
      note: unknownBaselineNote(baselineYear),
    };
  }

  if (startIndex + windowSize > series.length) {
    return {
      baselineYear,
      windowSize,
      coverage: 'insufficient-data',
      windows: [],
      note: `Only ${series.length - startIndex} year(s) from ${baselineYear}; ${windowSize}-year window needs more data`,
    };
  }

  const windows: RollingWindow[] = [];
  for (let i = startIndex; i <= series.length - windowSize; i++) {
    let cagr: number;
    try {
      cagr = compoundAnnualGrowthRate(series.returnsBetween(i, i + windowSize));
    } catch (error) {
      if (error instanceof InvalidReturnError) {
        throw error.atYear(series.yearAt(i + error.offset));
      }
      throw error;
    }

    windows.push({
      startYear: series.yearAt(i),
      endYear: series.yearAt(i + windowSize - 1),
      cagr,
    });
  }

  return { baselineYear, windowSize, coverage: 'complete', windows, note: null };
}

export function formatWindowLabel(span: WindowSpan | null): string {
  return span ? `${span.startYear}-${span.endYear}` : 'N/A';
}
