import { ConvergenceError, InvalidParameterError } from './convergence.errors';
import {
  BaselineAnalysis,
  BatchAnalysisOptions,
  BatchAnalysisResult,
  BaselineRiskAnalysis,
  BatchFailure,
  NoLossResult,
  RiskProfile,
  RollingRiskSet,
  RollingCagrRow,
  SpreadResult,
  WindowSet,
  WindowStatistics,
} from './convergence.types';
import { findNoLossHorizon, findSpreadHorizon } from './horizon-search';
import { ReturnSeries } from './return-series';
import { riskProfile, rollingRiskMetrics } from './risk-metrics';
import { generateRollingWindows } from './rolling-windows';
import { summarizeWindows } from './window-statistics';

export const MIN_RECOMMENDED_YEARS = 30;
export const LIMITED_DATA_WARNING = 'Limited data available. Some analyses may not be possible.';

/**
 * `steps` evenly spaced thresholds from min to max inclusive, rounded to six
 * decimals.
 */
export function thresholdRange(min: number, max: number, steps: number): number[] {
  if (!Number.isInteger(steps) || steps < 1) {
    throw new InvalidParameterError(`Threshold steps must be an integer >= 1, got ${steps}`);
  }
  if (!Number.isFinite(min) || !Number.isFinite(max) || min < 0 || min > max) {
    throw new InvalidParameterError(`Invalid threshold range ${min}..${max}`);
  }
  if (steps === 1) return [round6(min)];

  const step = (max - min) / (steps - 1);
  return Array.from({ length: steps }, (_, i) => round6(i === steps - 1 ? max : min + i * step));
}

function round6(value: number): number {
  return Math.round(value * 1e6) / 1e6;
}

/**
 * One row per end year reached by any of the window sizes, ascending, with the
 * CAGR of each window size ending that year (null where that size has none).
 */
export function buildRollingTable(windowSets: readonly WindowSet[]): RollingCagrRow[] {
  const byEndYear = new Map<number, Map<number, number>>();

  for (const windowSet of windowSets) {
    for (const window of windowSet.windows) {
      let row = byEndYear.get(window.endYear);
      if (!row) {
        row = new Map();
        byEndYear.set(window.endYear, row);
      }
      row.set(windowSet.windowSize, window.cagr);
    }
  }

  return [...byEndYear.keys()]
    .sort((a, b) => a - b)
    .map(endYear => {
      const cagrByWindow: Record<number, number | null> = {};
      for (const windowSet of windowSets) {
        cagrByWindow[windowSet.windowSize] = byEndYear.get(endYear)?.get(windowSet.windowSize) ?? null;
      }
      return { endYear, cagrByWindow };
    });
}

function toFailure(
  error: unknown,
  context: Omit<BatchFailure, 'code' | 'message'>,
): BatchFailure {
  // Only engine errors are isolated; anything else is a bug and propagates.
  if (!(error instanceof ConvergenceError)) throw error;
  return { ...context, code: error.code, message: error.message };
}

function analyzeBaselineRisk(
  series: ReturnSeries,
  baselineYear: number,
  windowSizes: readonly number[],
  riskFreeRate: number,
  failures: BatchFailure[],
): BaselineRiskAnalysis {
  let profile: RiskProfile | null = null;
  try {
    profile = riskProfile(series, baselineYear, riskFreeRate);
  } catch (error) {
    failures.push(toFailure(error, { query: 'risk', baselineYear }));
  }

  const rolling: RollingRiskSet[] = [];
  for (const windowSize of windowSizes) {
    try {
      rolling.push(rollingRiskMetrics(series, baselineYear, windowSize, riskFreeRate));
    } catch (error) {
      failures.push(toFailure(error, { query: 'risk', baselineYear, windowSize }));
    }
  }

  return { baselineYear, profile, rolling };
}

/**
 * Rolling tables, per-size statistics, no-loss horizons and the spread grid for
 * every requested baseline, plus risk metrics when a risk-free rate is set.
 * Each query is independent: an engine error is recorded as a failure for that
 * combination and the rest still run.
 */
export function runBatchAnalysis(
  series: ReturnSeries,
  options: BatchAnalysisOptions,
): BatchAnalysisResult {
  const { baselineYears, windowSizes, thresholds, riskFreeRate } = options;
  const failures: BatchFailure[] = [];
  const baselines: BaselineAnalysis[] = [];
  const noLoss: NoLossResult[] = [];
  const spreadGrid: SpreadResult[] = [];
  const risk: BaselineRiskAnalysis[] = [];

  for (const baselineYear of baselineYears) {
    const windowSets: WindowSet[] = [];
    const statistics: WindowStatistics[] = [];

    for (const windowSize of windowSizes) {
      try {
        const windowSet = generateRollingWindows(series, baselineYear, windowSize);
        windowSets.push(windowSet);
        statistics.push(summarizeWindows(windowSet));
      } catch (error) {
        failures.push(toFailure(error, { query: 'window-statistics', baselineYear, windowSize }));
      }
    }

    baselines.push({
      baselineYear,
      rollingTable: buildRollingTable(windowSets),
      statistics,
    });

    try {
      noLoss.push(findNoLossHorizon(series, baselineYear));
    } catch (error) {
      failures.push(toFailure(error, { query: 'no-loss', baselineYear }));
    }

    for (const threshold of thresholds) {
      try {
        spreadGrid.push(findSpreadHorizon(series, baselineYear, threshold));
      } catch (error) {
        failures.push(toFailure(error, { query: 'spread', baselineYear, threshold }));
      }
    }

    if (riskFreeRate !== undefined) {
      risk.push(analyzeBaselineRisk(series, baselineYear, windowSizes, riskFreeRate, failures));
    }
  }

  const span = series.span();
  return {
    series: span,
    baselineYears: [...baselineYears],
    windowSizes: [...windowSizes],
    thresholds: [...thresholds],
    baselines,
    noLoss,
    spreadGrid,
    ...(riskFreeRate !== undefined ? { riskFreeRate, risk } : {}),
    failures,
    warnings: span.yearCount < MIN_RECOMMENDED_YEARS ? [LIMITED_DATA_WARNING] : [],
  };
}
