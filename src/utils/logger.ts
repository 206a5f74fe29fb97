import { Logger } from '../types/common';

export interface ConsoleLoggerOptions {
  /** Emit debug messages as well */
  verbose?: boolean;
}

/**
 * Logger that writes to the console. Structured data is appended as JSON.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const format = (level: string, msg: string, data?: unknown): string =>
    data === undefined ? `[${level}] ${msg}` : `[${level}] ${msg} ${JSON.stringify(data)}`;

  return {
    debug(msg, data) {
      if (options.verbose) console.debug(format('debug', msg, data));
    },
    info(msg, data) {
      console.info(format('info', msg, data));
    },
    error(msg, err) {
      if (err === undefined) console.error(format('error', msg));
      else console.error(format('error', msg), err instanceof Error ? err.message : err);
    },
  };
}
