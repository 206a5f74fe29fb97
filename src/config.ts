import { AmmType, FlowModel } from './types/common';

/**
 * Default values applied when a configuration file omits optional fields.
 */
export const DEFAULTS = {
  horizonDays: 180,
  stepsPerDay: 24,
  seed: 42,
  ammType: AmmType.CONSTANT_PRODUCT,
  feeBps: 7,
  rehypFraction: 0.6,
  opsCostPerDay: 0,
  flowModel: FlowModel.DETERMINISTIC,
  deterministicBpsOfPool: 20,
  stochasticMuDaily: 0,
  stochasticSigmaDaily: 0.25,
  stochasticBaseBpsOfPool: 100,
  maxBorrowMultiple: 0.8,
  priceA: 1,
  priceB: 1,
  pegDeviationStdBps: 0,
} as const;

/**
 * Numeric constants shared by the engine modules.
 */
export const PRECISION = {
  BPS_DENOMINATOR: 10_000,
  DAYS_PER_YEAR: 365,
  /** Fraction of the output reserve a single swap may never take. */
  MIN_RESERVE_FRACTION: 1e-6,
  /** Lowest deposit-asset mark the peg-noise model may produce. */
  MIN_MARK_PRICE: 1e-9,
  /** Relative tolerance for the NAV reconciliation check. */
  RECONCILIATION_TOLERANCE: 1e-9,
  /** Largest seed the 32-bit generator accepts. */
  MAX_SEED: 0xffffffff,
} as const;

/**
 * Seed offset for the mark-price stream, so it never shares a sequence
 * with the flow generator's stream.
 */
export const MARK_STREAM_SALT = 0x9e3779b9;
