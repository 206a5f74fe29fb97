/**
 * Typed error hierarchy for the simulator.
 *
 * All errors extend AmmSimError and carry a machine-readable
 * error code for programmatic handling plus human-readable messages.
 */

import { AmmSimErrorInfo } from "./types/common";

/**
 * Base error class for all simulator errors.
 */
export class AmmSimError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(
    code: string,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "AmmSimError";
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): AmmSimErrorInfo {
    return { code: this.code, message: this.message, details: this.details };
  }
}

/**
 * Invalid run parameters. Raised before any step executes.
 */
export class ValidationError extends AmmSimError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], details?: Record<string, unknown>) {
    super("VALIDATION_ERROR", message, { issues, ...details });
    this.name = "ValidationError";
    this.issues = issues;
  }
}

/**
 * A swap against a pool whose reserve is already at zero.
 */
export class LiquidityExhaustedError extends AmmSimError {
  constructor(reserveIn: number, reserveOut: number, amountIn: number) {
    super(
      "LIQUIDITY_EXHAUSTED",
      `Pool liquidity exhausted (reserveIn: ${reserveIn}, reserveOut: ${reserveOut})`,
      { reserveIn, reserveOut, amountIn },
    );
    this.name = "LiquidityExhaustedError";
  }
}

/**
 * Operation not allowed in the run's current lifecycle state.
 */
export class SimulationStateError extends AmmSimError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("INVALID_STATE", message, details);
    this.name = "SimulationStateError";
  }
}

/**
 * NAV computed from balances disagrees with the sum of booked P&L components.
 */
export class ReconciliationError extends AmmSimError {
  constructor(step: number, nav: number, expected: number) {
    super(
      "RECONCILIATION_FAILED",
      `NAV drifted from booked components at step ${step} (nav: ${nav}, expected: ${expected})`,
      { step, nav, expected, drift: nav - expected },
    );
    this.name = "ReconciliationError";
  }
}

/**
 * Configuration file could not be read or parsed.
 */
export class ConfigError extends AmmSimError {
  constructor(configPath: string, message: string) {
    super("CONFIG_ERROR", `Failed to load config from ${configPath}: ${message}`, {
      configPath,
    });
    this.name = "ConfigError";
  }
}

/**
 * Map a raw error to the appropriate typed error class.
 *
 * Typed errors pass through unchanged; anything else is classified
 * from its message, falling back to a generic UNKNOWN_ERROR.
 */
export function mapError(err: unknown): AmmSimError {
  if (err instanceof AmmSimError) return err;

  const message = err instanceof Error ? err.message : String(err);
  const normalizedMessage = message.toLowerCase();

  if (
    message.includes("ENOENT") ||
    message.includes("EACCES") ||
    normalizedMessage.includes("yaml")
  ) {
    return new AmmSimError("CONFIG_ERROR", message);
  }

  if (
    normalizedMessage.includes("invalid") ||
    normalizedMessage.includes("must be") ||
    normalizedMessage.includes("required")
  ) {
    return new ValidationError(message);
  }

  return new AmmSimError("UNKNOWN_ERROR", message, {
    originalError: err,
  });
}
