/**
 * Supported AMM pricing curves.
 */
export enum AmmType {
  CONSTANT_PRODUCT = 'constant_product',
}

/**
 * Trade flow models for the one-directional order stream.
 */
export enum FlowModel {
  DETERMINISTIC = 'deterministic',
  STOCHASTIC = 'stochastic',
}

/**
 * Lifecycle of a single simulation run.
 */
export enum RunStatus {
  INITIALIZED = 'initialized',
  RUNNING = 'running',
  COMPLETED = 'completed',
}

/**
 * Structured error payload, as surfaced to the CLI and exporters.
 */
export interface AmmSimErrorInfo {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Mark-to-market prices for the two pool assets.
 */
export interface MarkPrices {
  /** Price of the deposited asset */
  priceA: number;
  /** Price of the borrowed asset */
  priceB: number;
}

/**
 * Logger interface for engine instrumentation.
 *
 * Implement this interface to receive debug, info, and error
 * logs from a simulation run. Defaults to undefined (no logging).
 */
export interface Logger {
  /** Debug-level log for per-step events such as clamps and risk transitions. */
  debug(msg: string, data?: unknown): void;
  /** Info-level log for run start and completion. */
  info(msg: string, data?: unknown): void;
  /** Error-level log for aborted runs. */
  error(msg: string, err?: unknown): void;
}
