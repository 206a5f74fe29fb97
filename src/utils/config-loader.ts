/**
 * Config loader: reads YAML or JSON run configurations.
 *
 * Files use snake_case keys. Optional sections fall back to DEFAULTS,
 * the result is mapped onto Parameters and validated before any run.
 */

import { readFileSync } from 'fs';
import { extname } from 'path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { DEFAULTS } from '../config';
import { ConfigError, ValidationError } from '../errors';
import { ErrorParser } from '../errors/parser';
import { Parameters } from '../types/params';
import { validateParameters } from './validation';

/**
 * Shape of a configuration file before validation of ranges.
 */
export const ConfigFileSchema = z.object({
  horizon_days: z.number().default(DEFAULTS.horizonDays),
  steps_per_day: z.number().default(DEFAULTS.stepsPerDay),
  seed: z.number().default(DEFAULTS.seed),
  amm: z
    .object({
      type: z.string().default(DEFAULTS.ammType),
      fee_bps: z.number().default(DEFAULTS.feeBps),
    })
    .default({}),
  initial_state: z.object({
    deposit_reserve: z.number(),
    borrowed_reserve: z.number(),
    deposit_amount: z.number(),
    rehyp_fraction: z.number().default(DEFAULTS.rehypFraction),
    borrowed_amount: z.number().optional(),
  }),
  yields: z.object({
    underlying_apr: z.number(),
    rehyp_apr: z.number().default(0),
    borrow_cost_apr: z.number(),
  }),
  ops_cost_per_day: z.number().default(DEFAULTS.opsCostPerDay),
  flow: z
    .object({
      model: z.string().default(DEFAULTS.flowModel),
      deterministic_bps_of_pool: z.number().default(DEFAULTS.deterministicBpsOfPool),
      stochastic: z
        .object({
          mu_daily: z.number().default(DEFAULTS.stochasticMuDaily),
          sigma_daily: z.number().default(DEFAULTS.stochasticSigmaDaily),
          base_bps_of_pool: z.number().default(DEFAULTS.stochasticBaseBpsOfPool),
        })
        .default({}),
    })
    .default({}),
  risk: z
    .object({
      max_borrow_multiple: z.number().default(DEFAULTS.maxBorrowMultiple),
    })
    .default({}),
  mark_to_market: z
    .object({
      price_a: z.number().default(DEFAULTS.priceA),
      price_b: z.number().default(DEFAULTS.priceB),
    })
    .default({}),
  peg_deviation_std_bps: z.number().default(DEFAULTS.pegDeviationStdBps),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * Detect config format by file extension
 */
export function detectConfigFormat(path: string): 'yaml' | 'json' {
  const ext = extname(path).toLowerCase();
  if (ext === '.yaml' || ext === '.yml') {
    return 'yaml';
  }
  return 'json';
}

/**
 * Deep merge two objects (override values win, arrays replace).
 */
export function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };

  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;

    const baseValue = result[key];
    if (isPlainObject(value) && isPlainObject(baseValue)) {
      result[key] = deepMerge(baseValue, value);
    } else {
      result[key] = value;
    }
  }

  return result;
}

/**
 * Map a parsed config document onto validated Parameters.
 *
 * @throws ValidationError when required fields are missing or out of range
 */
export function parseConfig(document: unknown): Parameters {
  const result = ConfigFileSchema.safeParse(document);
  if (!result.success) {
    const issues = ErrorParser.formatIssues(result.error);
    throw new ValidationError(`Invalid configuration (${issues.length} issue(s))`, issues);
  }
  return validateParameters(toParameters(result.data));
}

/**
 * Load config from a YAML or JSON file, optionally merging overrides.
 *
 * @throws ConfigError if the file cannot be read or parsed
 * @throws ValidationError if the configuration is invalid
 */
export function loadConfig(
  configPath: string,
  overrides?: Record<string, unknown>,
): Parameters {
  let document: unknown;
  try {
    const content = readFileSync(configPath, 'utf-8');
    document = detectConfigFormat(configPath) === 'yaml' ? yaml.load(content) : JSON.parse(content);
  } catch (error) {
    throw new ConfigError(configPath, error instanceof Error ? error.message : String(error));
  }

  if (!isPlainObject(document)) {
    throw new ConfigError(configPath, 'config root must be a mapping');
  }

  const merged = overrides && Object.keys(overrides).length > 0 ? deepMerge(document, overrides) : document;
  return parseConfig(merged);
}

function toParameters(file: ConfigFile) {
  const init = file.initial_state;
  return {
    horizonDays: file.horizon_days,
    stepsPerDay: file.steps_per_day,
    seed: file.seed,
    amm: { type: file.amm.type, feeBps: file.amm.fee_bps },
    initialState: {
      depositReserve: init.deposit_reserve,
      borrowedReserve: init.borrowed_reserve,
      depositAmount: init.deposit_amount,
      rehypFraction: init.rehyp_fraction,
      // the position funds the whole borrowed side unless told otherwise
      borrowedAmount: init.borrowed_amount ?? init.borrowed_reserve,
    },
    yields: {
      underlyingApr: file.yields.underlying_apr,
      rehypApr: file.yields.rehyp_apr,
      borrowCostApr: file.yields.borrow_cost_apr,
    },
    opsCostPerDay: file.ops_cost_per_day,
    flow: {
      model: file.flow.model,
      deterministicBpsOfPool: file.flow.deterministic_bps_of_pool,
      stochastic: {
        muDaily: file.flow.stochastic.mu_daily,
        sigmaDaily: file.flow.stochastic.sigma_daily,
        baseBpsOfPool: file.flow.stochastic.base_bps_of_pool,
      },
    },
    risk: { maxBorrowMultiple: file.risk.max_borrow_multiple },
    markToMarket: { priceA: file.mark_to_market.price_a, priceB: file.mark_to_market.price_b },
    pegDeviationStdBps: file.peg_deviation_std_bps,
  };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
