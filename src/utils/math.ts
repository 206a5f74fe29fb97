import { PRECISION } from '../config';

/**
 * Convert basis points to a plain fraction (7 bps -> 0.0007).
 */
export function bpsToFraction(bps: number): number {
  return bps / PRECISION.BPS_DENOMINATOR;
}

/**
 * Length of one simulation step in years.
 */
export function stepDurationYears(stepsPerDay: number): number {
  return 1 / (stepsPerDay * PRECISION.DAYS_PER_YEAR);
}

/**
 * Continuous-compounding growth factor exp(rate × years).
 */
export function growthFactor(rate: number, years: number): number {
  return Math.exp(rate * years);
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Absolute difference scaled by the larger magnitude, floored at 1
 * so values near zero compare absolutely.
 */
export function relativeDifference(a: number, b: number): number {
  return Math.abs(a - b) / Math.max(1, Math.abs(a), Math.abs(b));
}
