import { InvalidParameterError, InvalidReturnError } from './convergence.errors';
import {
  findNoLossHorizon,
  findSpreadHorizon,
  NO_LOSS_EXHAUSTED_NOTE,
} from './horizon-search';
import { ReturnSeries } from './return-series';
import { generateRollingWindows } from './rolling-windows';
import { summarizeWindows } from './window-statistics';

// N=1 has losses, every 2-year window is positive
const choppySeries = ReturnSeries.fromPoints([
  { year: 2000, return: 0.2 },
  { year: 2001, return: -0.1 },
  { year: 2002, return: 0.15 },
  { year: 2003, return: -0.05 },
  { year: 2004, return: 0.1 },
]);

describe('findNoLossHorizon', () => {
  it('should stop at one year when every annual return is non-negative', () => {
    const series = ReturnSeries.fromPoints([
      { year: 1990, return: 0.1 },
      { year: 1991, return: 0 },
      { year: 1992, return: 0.05 },
    ]);

    const result = findNoLossHorizon(series, 1990);

    expect(result.status).toBe('found');
    expect(result.metCondition).toBe(true);
    expect(result.minHoldingYears).toBe(1);
    expect(result.windowsChecked).toBe(3);
    expect(result.worstWindow).toEqual({ startYear: 1991, endYear: 1991 });
    expect(result.worstCagr).toBe(0);
    expect(result.bestWindow).toEqual({ startYear: 1990, endYear: 1990 });
    expect(result.bestCagr).toBeCloseTo(0.1, 12);
    expect(result.averageCagr).toBeCloseTo(0.05, 12);
    expect(result.note).toBeNull();
  });

  it('should find the shortest loss-free holding period', () => {
    const result = findNoLossHorizon(choppySeries, 2000);

    expect(result.status).toBe('found');
    expect(result.minHoldingYears).toBe(2);
    expect(result.windowsChecked).toBe(4);
    expect(result.worstWindow).toEqual({ startYear: 2001, endYear: 2002 });
    expect(result.worstCagr).toBeCloseTo(Math.sqrt(0.9 * 1.15) - 1, 12);
    expect(result.bestWindow).toEqual({ startYear: 2002, endYear: 2003 });
    expect(result.bestCagr).toBeCloseTo(Math.sqrt(1.15 * 0.95) - 1, 12);
  });

  it('should be minimal: every shorter length has a losing window', () => {
    const result = findNoLossHorizon(choppySeries, 2000);
    const minHoldingYears = result.minHoldingYears ?? 0;

    for (let n = 1; n < minHoldingYears; n++) {
      const stats = summarizeWindows(generateRollingWindows(choppySeries, 2000, n));
      expect(stats.worstCagr).toBeLessThan(0);
    }
  });

  it('should only consider windows from the baseline onward', () => {
    const result = findNoLossHorizon(choppySeries, 2001);

    expect(result.minHoldingYears).toBe(2);
    expect(result.windowsChecked).toBe(3);
    expect(result.bestWindow).toEqual({ startYear: 2002, endYear: 2003 });
  });

  it('should fall back to the max feasible horizon when the condition is never met', () => {
    const series = ReturnSeries.fromPoints([
      { year: 2000, return: -0.1 },
      { year: 2001, return: 0.05 },
      { year: 2002, return: -0.1 },
    ]);

    const result = findNoLossHorizon(series, 2000);

    expect(result.status).toBe('exhausted');
    expect(result.metCondition).toBe(false);
    expect(result.minHoldingYears).toBe(3);
    expect(result.windowsChecked).toBe(1);
    expect(result.worstWindow).toEqual({ startYear: 2000, endYear: 2002 });
    expect(result.bestWindow).toEqual({ startYear: 2000, endYear: 2002 });
    expect(result.worstCagr).toBeCloseTo(Math.cbrt(0.9 * 1.05 * 0.9) - 1, 12);
    expect(result.note).toBe(NO_LOSS_EXHAUSTED_NOTE);
  });

  it('should report no data for a baseline outside the series', () => {
    expect(findNoLossHorizon(choppySeries, 1990)).toEqual({
      baselineYear: 1990,
      minHoldingYears: null,
      worstWindow: null,
      worstCagr: null,
      bestWindow: null,
      bestCagr: null,
      averageCagr: null,
      windowsChecked: 0,
      metCondition: false,
      status: 'no-data',
      note: 'Baseline year 1990 not present in series',
    });
  });

  it('should propagate InvalidReturnError', () => {
    const series = ReturnSeries.fromPoints([
      { year: 2000, return: 0.1 },
      { year: 2001, return: -1 },
    ]);

    expect(() => findNoLossHorizon(series, 2000)).toThrow(InvalidReturnError);
  });

  it('should be deterministic', () => {
    expect(findNoLossHorizon(choppySeries, 2000)).toEqual(findNoLossHorizon(choppySeries, 2000));
  });
});

describe('findSpreadHorizon', () => {
  it('should stop at one year when the threshold exceeds the one-year spread', () => {
    const series = ReturnSeries.fromPoints([
      { year: 1926, return: 0.1 },
      { year: 1927, return: 0.2 },
      { year: 1928, return: -0.1 },
    ]);

    const result = findSpreadHorizon(series, 1926, 1);

    expect(result.status).toBe('found');
    expect(result.metCondition).toBe(true);
    expect(result.minHoldingYears).toBe(1);
    expect(result.spread).toBeCloseTo(0.3, 12);
    expect(result.bestWindow).toEqual({ startYear: 1927, endYear: 1927 });
    expect(result.worstWindow).toEqual({ startYear: 1928, endYear: 1928 });
  });

  it('should report the realized spread at the first converging length', () => {
    const result = findSpreadHorizon(choppySeries, 2000, 0.03);
    const best = Math.sqrt(1.15 * 0.95) - 1;
    const worst = Math.sqrt(0.9 * 1.15) - 1;

    expect(result.status).toBe('found');
    expect(result.minHoldingYears).toBe(2);
    expect(result.threshold).toBe(0.03);
    expect(result.spread).toBeCloseTo(best - worst, 12);
    expect(result.spread).toBeLessThan(0.03);
    expect(result.bestWindow).toEqual({ startYear: 2002, endYear: 2003 });
    expect(result.bestCagr).toBeCloseTo(best, 12);
    expect(result.worstWindow).toEqual({ startYear: 2001, endYear: 2002 });
    expect(result.worstCagr).toBeCloseTo(worst, 12);
    expect(result.note).toBeNull();
  });

  it('should exceed the threshold one year before the reported horizon', () => {
    const result = findSpreadHorizon(choppySeries, 2000, 0.03);
    const previous = summarizeWindows(
      generateRollingWindows(choppySeries, 2000, (result.minHoldingYears ?? 1) - 1),
    );

    expect((previous.bestCagr ?? 0) - (previous.worstCagr ?? 0)).toBeGreaterThan(0.03);
  });

  it('should keep searching past lengths that diverge again', () => {
    // Spreads: 1y 0.30, 2y 0.028, 3y 0.080, 4y 0.022, 5y 0
    const result = findSpreadHorizon(choppySeries, 2000, 0.01);

    expect(result.status).toBe('found');
    expect(result.minHoldingYears).toBe(5);
    expect(result.spread).toBe(0);
    expect(result.bestWindow).toEqual({ startYear: 2000, endYear: 2004 });
    expect(result.worstWindow).toEqual({ startYear: 2000, endYear: 2004 });
  });

  it('should accept a zero threshold', () => {
    const result = findSpreadHorizon(choppySeries, 2003, 0);

    expect(result.minHoldingYears).toBe(2);
    expect(result.spread).toBe(0);
    expect(result.metCondition).toBe(true);
  });

  it('should report no data for a baseline outside the series', () => {
    const result = findSpreadHorizon(choppySeries, 2010, 0.01);

    expect(result.status).toBe('no-data');
    expect(result.metCondition).toBe(false);
    expect(result.minHoldingYears).toBeNull();
    expect(result.spread).toBeNull();
    expect(result.note).toBe('Baseline year 2010 not present in series');
  });

  it('should reject negative or non-finite thresholds', () => {
    expect(() => findSpreadHorizon(choppySeries, 2000, -0.01)).toThrow(InvalidParameterError);
    expect(() => findSpreadHorizon(choppySeries, 2000, Number.NaN)).toThrow(
      'Threshold must be a non-negative number, got NaN',
    );
  });

  it('should run independent searches per threshold', () => {
    const loose = findSpreadHorizon(choppySeries, 2000, 0.5);
    const tight = findSpreadHorizon(choppySeries, 2000, 0.03);

    expect(loose.minHoldingYears).toBe(1);
    expect(tight.minHoldingYears).toBe(2);
    expect(findSpreadHorizon(choppySeries, 2000, 0.5)).toEqual(loose);
  });
});
