import { compoundAnnualGrowthRate } from './compounding';
import { InvalidParameterError, InvalidReturnError } from './convergence.errors';
import {
  DrawdownAnalysis,
  RiskMetrics,
  RiskProfile,
  RollingRiskSet,
} from './convergence.types';
import { ReturnSeries } from './return-series';
import { generateRollingWindows, unknownBaselineNote } from './rolling-windows';

export const RISK_FREE_RATE_DEFAULT = 0.02;
export const MIN_RISK_SAMPLES = 2;
export const MIN_TAIL_SAMPLES = 10;

export function assertRiskFreeRate(riskFreeRate: number): void {
  if (!Number.isFinite(riskFreeRate)) {
    throw new InvalidParameterError(`Risk-free rate must be a finite number, got ${riskFreeRate}`);
  }
}

function mean(values: readonly number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Sample standard deviation (n - 1 denominator). */
function sampleStdDev(values: readonly number[]): number {
  const m = mean(values);
  const squares = values.reduce((sum, v) => sum + (v - m) ** 2, 0);
  return Math.sqrt(squares / (values.length - 1));
}

/** Linear-interpolated quantile, q in [0, 1]. */
function quantile(values: readonly number[], q: number): number {
  const sorted = [...values].sort((a, b) => a - b);
  const position = q * (sorted.length - 1);
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (position - lower);
}

function assertCompoundable(returns: readonly number[]): void {
  for (let i = 0; i < returns.length; i++) {
    if (!(returns[i] > -1)) {
      throw new InvalidReturnError(returns[i], i);
    }
  }
}

export function sharpeRatio(returns: readonly number[], riskFreeRate: number): number | null {
  if (returns.length < MIN_RISK_SAMPLES) return null;

  const excess = returns.map(r => r - riskFreeRate);
  const deviation = sampleStdDev(excess);
  return deviation === 0 ? null : mean(excess) / deviation;
}

/**
 * Mean excess return over downside deviation. Infinity when no year falls
 * below the risk-free rate.
 */
export function sortinoRatio(returns: readonly number[], riskFreeRate: number): number | null {
  if (returns.length < MIN_RISK_SAMPLES) return null;

  const excess = returns.map(r => r - riskFreeRate);
  const downside = excess.filter(r => r < 0);
  if (downside.length === 0) return Infinity;

  const downsideDeviation = Math.sqrt(mean(downside.map(r => r * r)));
  return downsideDeviation === 0 ? null : mean(excess) / downsideDeviation;
}

/**
 * Largest peak-to-trough fall of the growth of 1 invested, measured on
 * year-end values. Indices are positions in `returns`.
 */
export function maximumDrawdown(returns: readonly number[]): DrawdownAnalysis {
  if (returns.length < MIN_RISK_SAMPLES) {
    return { maxDrawdown: null, peakIndex: null, troughIndex: null, recoveryIndex: null };
  }
  assertCompoundable(returns);

  const cumulative: number[] = [];
  const runningMax: number[] = [];
  let growth = 1;
  let peak = 0;
  for (const r of returns) {
    growth *= 1 + r;
    peak = Math.max(peak, growth);
    cumulative.push(growth);
    runningMax.push(peak);
  }

  let troughIndex = 0;
  let worst = 0;
  for (let i = 0; i < cumulative.length; i++) {
    const drawdown = (cumulative[i] - runningMax[i]) / runningMax[i];
    if (drawdown < worst) {
      worst = drawdown;
      troughIndex = i;
    }
  }

  const peakIndex = runningMax.indexOf(runningMax[troughIndex]);
  let recoveryIndex: number | null = null;
  for (let i = troughIndex + 1; i < cumulative.length; i++) {
    if (cumulative[i] >= runningMax[troughIndex]) {
      recoveryIndex = i;
      break;
    }
  }

  return { maxDrawdown: Math.abs(worst), peakIndex, troughIndex, recoveryIndex };
}

export function calmarRatio(returns: readonly number[]): number | null {
  if (returns.length < MIN_RISK_SAMPLES) return null;

  const { maxDrawdown } = maximumDrawdown(returns);
  if (maxDrawdown === null || maxDrawdown === 0) return null;
  return compoundAnnualGrowthRate(returns) / maxDrawdown;
}

export function volatility(returns: readonly number[]): number | null {
  return returns.length < MIN_RISK_SAMPLES ? null : sampleStdDev(returns);
}

/** Historical value at risk as a positive loss; `tail` is 0.05 for 95%. */
export function historicalVaR(returns: readonly number[], tail: number): number | null {
  if (returns.length < MIN_TAIL_SAMPLES) return null;
  return -quantile(returns, tail);
}

/** Mean loss of the years at or below the VaR cut-off. */
export function historicalCVaR(returns: readonly number[], tail: number): number | null {
  if (returns.length < MIN_TAIL_SAMPLES) return null;

  const cutoff = quantile(returns, tail);
  const losses = returns.filter(r => r <= cutoff);
  return losses.length === 0 ? null : -mean(losses);
}

export function calculateRiskMetrics(
  returns: readonly number[],
  riskFreeRate: number = RISK_FREE_RATE_DEFAULT,
): RiskMetrics {
  assertRiskFreeRate(riskFreeRate);
  assertCompoundable(returns);

  return {
    sampleCount: returns.length,
    sharpeRatio: sharpeRatio(returns, riskFreeRate),
    sortinoRatio: sortinoRatio(returns, riskFreeRate),
    calmarRatio: calmarRatio(returns),
    volatility: volatility(returns),
    maxDrawdown: maximumDrawdown(returns).maxDrawdown,
    var95: historicalVaR(returns, 0.05),
    cvar95: historicalCVaR(returns, 0.05),
    var99: historicalVaR(returns, 0.01),
    cvar99: historicalCVaR(returns, 0.01),
  };
}

/** Risk metrics over every year from the baseline to the end of the series. */
export function riskProfile(
  series: ReturnSeries,
  baselineYear: number,
  riskFreeRate: number = RISK_FREE_RATE_DEFAULT,
): RiskProfile {
  assertRiskFreeRate(riskFreeRate);

  const startIndex = series.indexOf(baselineYear);
  if (startIndex < 0) {
    return {
      baselineYear,
      riskFreeRate,
      span: null,
      metrics: null,
      drawdown: null,
      note: unknownBaselineNote(baselineYear),
    };
  }

  const returns = series.returnsBetween(startIndex, series.length);
  let metrics: RiskMetrics;
  let drawdown: DrawdownAnalysis;
  try {
    metrics = calculateRiskMetrics(returns, riskFreeRate);
    drawdown = maximumDrawdown(returns);
  } catch (error) {
    if (error instanceof InvalidReturnError) {
      throw error.atYear(series.yearAt(startIndex + error.offset));
    }
    throw error;
  }

  const { peakIndex, troughIndex, recoveryIndex } = drawdown;

  return {
    baselineYear,
    riskFreeRate,
    span: { startYear: baselineYear, endYear: series.yearAt(series.length - 1) },
    metrics,
    drawdown:
      peakIndex === null || troughIndex === null
        ? null
        : {
            peakYear: series.yearAt(startIndex + peakIndex),
            troughYear: series.yearAt(startIndex + troughIndex),
            recoveryYear: recoveryIndex === null ? null : series.yearAt(startIndex + recoveryIndex),
          },
    note: returns.length < MIN_RISK_SAMPLES ? `Risk metrics need at least ${MIN_RISK_SAMPLES} years` : null,
  };
}

/**
 * Risk metrics for each rolling window of `windowSize` years from the
 * baseline. Windows and coverage match `generateRollingWindows`.
 */
export function rollingRiskMetrics(
  series: ReturnSeries,
  baselineYear: number,
  windowSize: number,
  riskFreeRate: number = RISK_FREE_RATE_DEFAULT,
): RollingRiskSet {
  assertRiskFreeRate(riskFreeRate);

  const windowSet = generateRollingWindows(series, baselineYear, windowSize);
  const startIndex = series.indexOf(baselineYear);

  return {
    baselineYear,
    windowSize,
    riskFreeRate,
    coverage: windowSet.coverage,
    windows: windowSet.windows.map((window, offset) => ({
      startYear: window.startYear,
      endYear: window.endYear,
      metrics: calculateRiskMetrics(
        series.returnsBetween(startIndex + offset, startIndex + offset + windowSize),
        riskFreeRate,
      ),
    })),
    note: windowSet.note,
  };
}
