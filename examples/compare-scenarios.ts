/**
 * Scenario Comparison Example
 *
 * Runs the bundled configurations side by side and prints the comparison
 * table with the leading scenario for return, fees and LTV.
 *
 * Optional environment variables (see .env.example):
 * - LP_SIM_SEED: override the seed of every scenario
 * - LP_SIM_HORIZON_DAYS: override the horizon of every scenario
 *
 * Run with: npm run example:compare
 */

import 'dotenv/config';
import { join } from 'path';
import { loadConfig } from '../src/utils/config-loader';
import { compareScenarios, formatComparison } from '../src/modules/scenarios';
import { ErrorParser } from '../src/errors/parser';
import { mapError } from '../src/errors';

const CONFIG_DIR = join(__dirname, '..', 'configs');

const SCENARIOS = [
  { name: 'Default', file: 'default.yaml' },
  { name: 'Stochastic', file: 'stochastic.yaml' },
  { name: 'High volume', file: 'high-volume.json' },
];

function envOverrides(): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  if (process.env.LP_SIM_SEED) overrides.seed = Number(process.env.LP_SIM_SEED);
  if (process.env.LP_SIM_HORIZON_DAYS) overrides.horizon_days = Number(process.env.LP_SIM_HORIZON_DAYS);
  return overrides;
}

function main(): void {
  const overrides = envOverrides();
  const scenarios = SCENARIOS.map(({ name, file }) => ({
    name,
    parameters: loadConfig(join(CONFIG_DIR, file), overrides),
  }));

  console.log(formatComparison(compareScenarios(scenarios)));
}

try {
  main();
} catch (err) {
  console.error(ErrorParser.toHumanMessage(mapError(err)));
  process.exitCode = 1;
}
