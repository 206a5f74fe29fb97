#!/usr/bin/env node

/**
 * lp-sim CLI entry point
 *
 *   lp-sim run --config configs/default.yaml [--output out/run.csv] [--quiet] [--verbose]
 *   lp-sim compare configs/default.yaml configs/stochastic.yaml
 */

import { basename, extname } from 'path';
import { Command } from 'commander';
import { runSimulation } from './engine';
import { mapError } from './errors';
import { ErrorParser } from './errors/parser';
import { compareScenarios, formatComparison } from './modules/scenarios';
import { formatSummary, formatSummaryLine } from './modules/summary';
import { loadConfig } from './utils/config-loader';
import { writeResults } from './utils/export';
import { createConsoleLogger } from './utils/logger';

interface RunOptions {
  config: string;
  output?: string;
  quiet?: boolean;
  verbose?: boolean;
}

interface CompareOptions {
  verbose?: boolean;
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('lp-sim')
    .description('One-sided AMM liquidity position simulator')
    .version('0.1.0');

  program
    .command('run')
    .description('Run a single simulation from a YAML or JSON config')
    .requiredOption('-c, --config <file>', 'configuration file')
    .option('-o, --output <file>', 'write step records (.csv) or the full result (.json)')
    .option('-q, --quiet', 'print a one-line summary only')
    .option('-v, --verbose', 'log per-step events')
    .action((options: RunOptions) => {
      const parameters = loadConfig(options.config);
      const logger = options.quiet ? undefined : createConsoleLogger({ verbose: options.verbose });
      const result = runSimulation(parameters, { logger });

      console.log(options.quiet ? formatSummaryLine(result.summary) : formatSummary(result.summary));

      if (options.output) {
        const format = writeResults(options.output, result);
        if (!options.quiet) console.log(`Results written to ${options.output} (${format})`);
      }
    });

  program
    .command('compare')
    .description('Run several configs and compare them side by side')
    .argument('<configs...>', 'configuration files')
    .option('-v, --verbose', 'log run progress')
    .action((configs: string[], options: CompareOptions) => {
      const scenarios = configs.map((path) => ({
        name: basename(path, extname(path)),
        parameters: loadConfig(path),
      }));
      const logger = options.verbose ? createConsoleLogger({ verbose: true }) : undefined;
      console.log(formatComparison(compareScenarios(scenarios, { logger })));
    });

  program.configureOutput({
    writeErr: (str) => {
      process.stderr.write(str);
    },
  });

  return program;
}

export function main(argv: string[] = process.argv): number {
  try {
    buildProgram().parse(argv);
    return 0;
  } catch (error) {
    console.error(`Error: ${ErrorParser.toHumanMessage(mapError(error))}`);
    return 1;
  }
}

if (require.main === module) {
  process.exitCode = main();
}
