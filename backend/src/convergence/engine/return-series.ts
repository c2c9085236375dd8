import { InvalidSeriesError } from './convergence.errors';
import { ReturnPoint, SeriesSpan } from './convergence.types';

/**
 * Immutable, chronologically ordered annual return series.
 *
 * Years are unique integers in strictly increasing order and every return is a
 * finite decimal fraction. Returns at or below -1 are accepted here and rejected
 * when a window containing them is compounded.
 */
export class ReturnSeries {
  readonly years: readonly number[];
  readonly returns: readonly number[];
  private readonly positions: ReadonlyMap<number, number>;

  private constructor(points: readonly ReturnPoint[]) {
    this.years = Object.freeze(points.map(p => p.year));
    this.returns = Object.freeze(points.map(p => p.return));
    this.positions = new Map(points.map((p, i) => [p.year, i]));
  }

  static fromPoints(points: readonly ReturnPoint[]): ReturnSeries {
    if (points.length === 0) {
      throw new InvalidSeriesError('Return series must contain at least one year');
    }

    for (let i = 0; i < points.length; i++) {
      const { year, return: value } = points[i];

      if (!Number.isInteger(year)) {
        throw new InvalidSeriesError(`Year at position ${i} is not an integer: ${year}`);
      }
      if (!Number.isFinite(value)) {
        throw new InvalidSeriesError(`Return for year ${year} is not a finite number`);
      }
      if (i > 0 && year <= points[i - 1].year) {
        throw new InvalidSeriesError(
          `Years must be strictly increasing: ${points[i - 1].year} is followed by ${year}`,
        );
      }
    }

    return new ReturnSeries(points);
  }

  get length(): number {
    return this.years.length;
  }

  /** Position of the year in the series, or -1 when absent. */
  indexOf(year: number): number {
    return this.positions.get(year) ?? -1;
  }

  yearAt(index: number): number {
    return this.years[index];
  }

  /** Returns for positions [start, end). */
  returnsBetween(start: number, end: number): readonly number[] {
    return this.returns.slice(start, end);
  }

  span(): SeriesSpan {
    return {
      firstYear: this.years[0],
      lastYear: this.years[this.years.length - 1],
      yearCount: this.years.length,
    };
  }

  toPoints(): ReturnPoint[] {
    return this.years.map((year, i) => ({ year, return: this.returns[i] }));
  }
}
