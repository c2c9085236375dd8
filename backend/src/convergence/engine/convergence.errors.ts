export class ConvergenceError extends Error {
  constructor(
    readonly code: string,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A return of -100% or worse: ln(1 + r) is undefined, so the window containing
 * it cannot be compounded.
 */
export class InvalidReturnError extends ConvergenceError {
  constructor(
    readonly value: number,
    readonly offset: number,
    readonly year: number | null = null,
  ) {
    super(
      'INVALID_RETURN',
      year === null
        ? `Return ${value} at window offset ${offset} is at or below -100%`
        : `Return ${value} for year ${year} is at or below -100%`,
    );
  }

  atYear(year: number): InvalidReturnError {
    return new InvalidReturnError(this.value, this.offset, year);
  }
}

export class InvalidSeriesError extends ConvergenceError {
  constructor(message: string) {
    super('INVALID_SERIES', message);
  }
}

export class InvalidParameterError extends ConvergenceError {
  constructor(message: string) {
    super('INVALID_PARAMETER', message);
  }
}
