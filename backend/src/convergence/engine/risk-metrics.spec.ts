import { InvalidParameterError, InvalidReturnError } from './convergence.errors';
import { ReturnSeries } from './return-series';
import {
  calculateRiskMetrics,
  historicalCVaR,
  historicalVaR,
  maximumDrawdown,
  RISK_FREE_RATE_DEFAULT,
  riskProfile,
  rollingRiskMetrics,
  sortinoRatio,
} from './risk-metrics';

const choppySeries = ReturnSeries.fromPoints([
  { year: 2000, return: 0.2 },
  { year: 2001, return: -0.1 },
  { year: 2002, return: 0.15 },
  { year: 2003, return: -0.05 },
  { year: 2004, return: 0.1 },
]);

// Ten distinct years, deliberately unsorted
const tenYears = [0.1, -0.3, 0.25, 0, -0.1, 0.3, 0.05, -0.2, 0.15, 0.2];

describe('calculateRiskMetrics', () => {
  it('should compute ratios for a short run of returns', () => {
    const metrics = calculateRiskMetrics([0.1, -0.05, 0.2], 0.02);

    expect(metrics.sampleCount).toBe(3);
    expect(metrics.sharpeRatio).toBeCloseTo(0.503322, 6);
    expect(metrics.sortinoRatio).toBeCloseTo(0.904762, 6);
    expect(metrics.volatility).toBeCloseTo(0.125831, 6);
    expect(metrics.maxDrawdown).toBeCloseTo(0.05, 12);
    expect(metrics.calmarRatio).toBeCloseTo(1.567303, 5);
  });

  it('should leave tail measures empty below ten years', () => {
    const metrics = calculateRiskMetrics(tenYears.slice(0, 9), 0.02);

    expect(metrics.var95).toBeNull();
    expect(metrics.cvar95).toBeNull();
    expect(metrics.var99).toBeNull();
    expect(metrics.cvar99).toBeNull();
  });

  it('should report every ratio as null for a single year', () => {
    expect(calculateRiskMetrics([0.1], 0.02)).toEqual({
      sampleCount: 1,
      sharpeRatio: null,
      sortinoRatio: null,
      calmarRatio: null,
      volatility: null,
      maxDrawdown: null,
      var95: null,
      cvar95: null,
      var99: null,
      cvar99: null,
    });
  });

  it('should report null ratios when there is no variation or drawdown', () => {
    const metrics = calculateRiskMetrics([0.05, 0.05], 0.02);

    expect(metrics.sharpeRatio).toBeNull();
    expect(metrics.volatility).toBe(0);
    expect(metrics.maxDrawdown).toBe(0);
    expect(metrics.calmarRatio).toBeNull();
  });

  it('should use the default risk-free rate', () => {
    expect(calculateRiskMetrics([0.1, -0.05, 0.2])).toEqual(
      calculateRiskMetrics([0.1, -0.05, 0.2], RISK_FREE_RATE_DEFAULT),
    );
  });

  it('should reject a non-finite risk-free rate', () => {
    expect(() => calculateRiskMetrics([0.1, 0.2], NaN)).toThrow(InvalidParameterError);
  });

  it('should reject returns at or below -100%', () => {
    expect(() => calculateRiskMetrics([0.1, -1], 0.02)).toThrow(
      'Return -1 at window offset 1 is at or below -100%',
    );
  });
});

describe('sortinoRatio', () => {
  it('should be infinite when no year falls below the risk-free rate', () => {
    expect(sortinoRatio([0.05, 0.1], 0.02)).toBe(Infinity);
  });

  it('should count years equal to the risk-free rate as no downside', () => {
    expect(sortinoRatio([0.02, 0.03], 0.02)).toBe(Infinity);
  });
});

describe('maximumDrawdown', () => {
  it('should find the peak, trough and recovery', () => {
    const drawdown = maximumDrawdown([0.1, -0.05, 0.2]);

    expect(drawdown.maxDrawdown).toBeCloseTo(0.05, 12);
    expect(drawdown.peakIndex).toBe(0);
    expect(drawdown.troughIndex).toBe(1);
    expect(drawdown.recoveryIndex).toBe(2);
  });

  it('should leave recovery empty when the peak is never regained', () => {
    const drawdown = maximumDrawdown([0.2, -0.5, 0.1]);

    expect(drawdown.maxDrawdown).toBeCloseTo(0.5, 12);
    expect(drawdown.troughIndex).toBe(1);
    expect(drawdown.recoveryIndex).toBeNull();
  });

  it('should be zero for a series that only rises', () => {
    expect(maximumDrawdown([0.1, 0.2, 0.3])).toEqual({
      maxDrawdown: 0,
      peakIndex: 0,
      troughIndex: 0,
      recoveryIndex: 1,
    });
  });
});

describe('historical VaR and CVaR', () => {
  it('should interpolate the loss quantile', () => {
    expect(historicalVaR(tenYears, 0.05)).toBeCloseTo(0.255, 12);
    expect(historicalVaR(tenYears, 0.01)).toBeCloseTo(0.291, 12);
  });

  it('should average the years at or below the cut-off', () => {
    expect(historicalCVaR(tenYears, 0.05)).toBeCloseTo(0.3, 12);
    expect(historicalCVaR(tenYears, 0.01)).toBeCloseTo(0.3, 12);
  });

  it('should not reorder the input', () => {
    const input = [...tenYears];
    historicalVaR(input, 0.05);
    expect(input).toEqual(tenYears);
  });
});

describe('riskProfile', () => {
  it('should measure every year from the baseline', () => {
    const profile = riskProfile(choppySeries, 2001, 0.02);

    expect(profile.span).toEqual({ startYear: 2001, endYear: 2004 });
    expect(profile.metrics).toEqual(calculateRiskMetrics([-0.1, 0.15, -0.05, 0.1], 0.02));
    expect(profile.drawdown).toEqual({ peakYear: 2002, troughYear: 2003, recoveryYear: 2004 });
    expect(profile.note).toBeNull();
  });

  it('should note an unknown baseline', () => {
    const profile = riskProfile(choppySeries, 1990, 0.02);

    expect(profile.metrics).toBeNull();
    expect(profile.span).toBeNull();
    expect(profile.note).toBe('Baseline year 1990 not present in series');
  });

  it('should note when only one year follows the baseline', () => {
    const profile = riskProfile(choppySeries, 2004, 0.02);

    expect(profile.metrics?.sampleCount).toBe(1);
    expect(profile.drawdown).toBeNull();
    expect(profile.note).toBe('Risk metrics need at least 2 years');
  });

  it('should report the year of an invalid return', () => {
    const series = ReturnSeries.fromPoints([
      { year: 2000, return: 0.1 },
      { year: 2001, return: -1.5 },
    ]);

    expect(() => riskProfile(series, 2000, 0.02)).toThrow(InvalidReturnError);
    expect(() => riskProfile(series, 2000, 0.02)).toThrow(
      'Return -1.5 for year 2001 is at or below -100%',
    );
  });
});

describe('rollingRiskMetrics', () => {
  it('should compute metrics for each rolling window', () => {
    const rolling = rollingRiskMetrics(choppySeries, 2001, 3, 0.02);

    expect(rolling.coverage).toBe('complete');
    expect(rolling.windows.map(w => [w.startYear, w.endYear])).toEqual([
      [2001, 2003],
      [2002, 2004],
    ]);
    expect(rolling.windows[0].metrics).toEqual(calculateRiskMetrics([-0.1, 0.15, -0.05], 0.02));
    expect(rolling.windows[1].metrics).toEqual(calculateRiskMetrics([0.15, -0.05, 0.1], 0.02));
  });

  it('should follow the window coverage rules', () => {
    expect(rollingRiskMetrics(choppySeries, 1990, 2).coverage).toBe('unknown-baseline');

    const short = rollingRiskMetrics(choppySeries, 2003, 5);
    expect(short.coverage).toBe('insufficient-data');
    expect(short.windows).toEqual([]);
  });

  it('should reject an invalid window size', () => {
    expect(() => rollingRiskMetrics(choppySeries, 2000, 0)).toThrow(InvalidParameterError);
  });

  it('should report the year of an invalid return', () => {
    const series = ReturnSeries.fromPoints([
      { year: 2000, return: 0.2 },
      { year: 2001, return: -0.1 },
      { year: 2002, return: 0.15 },
      { year: 2003, return: -1.2 },
    ]);

    expect(() => rollingRiskMetrics(series, 2000, 2, 0.02)).toThrow(
      'Return -1.2 for year 2003 is at or below -100%',
    );
  });
});
