import { InvalidParameterError, InvalidReturnError } from './convergence.errors';

export const FLOATING_TOLERANCE = 1e-12;

/**
 * Annualized compound return of a contiguous run of annual returns:
 * exp(mean(ln(1 + r))) - 1.
 *
 * Only the final value is snapped to zero inside FLOATING_TOLERANCE; the log sum
 * itself is accumulated unclamped.
 */
export function compoundAnnualGrowthRate(returns: readonly number[]): number {
  if (returns.length === 0) {
    throw new InvalidParameterError('Cannot compound an empty window');
  }

  let logSum = 0;
  for (let i = 0; i < returns.length; i++) {
    const r = returns[i];
    if (!(r > -1)) {
      throw new InvalidReturnError(r, i);
    }
    logSum += Math.log1p(r);
  }

  const cagr = Math.expm1(logSum / returns.length);
  return Math.abs(cagr) < FLOATING_TOLERANCE ? 0 : cagr;
}
