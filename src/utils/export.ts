import { mkdirSync, writeFileSync } from 'fs';
import { dirname, extname } from 'path';
import { stringify } from 'csv-stringify/sync';
import { SimulationResult, StepRecord } from '../types/records';

export type ExportFormat = 'csv' | 'json';

type Row = Record<string, number | boolean>;

/**
 * Flatten a step record into one CSV row; cumulative components get a
 * `cum_` prefix.
 */
export function toRow(record: StepRecord): Row {
  const { cumulative, ...perStep } = record;
  return {
    ...perStep,
    cum_fees: cumulative.fees,
    cum_underlyingYield: cumulative.underlyingYield,
    cum_rehypYield: cumulative.rehypYield,
    cum_borrowCost: cumulative.borrowCost,
    cum_opsCost: cumulative.opsCost,
    cum_impermanentLoss: cumulative.impermanentLoss,
  };
}

/**
 * Step records as CSV, one row per step with a header line.
 */
export function toCsv(records: readonly StepRecord[]): string {
  return stringify(records.map(toRow), {
    header: true,
    cast: { boolean: (value) => (value ? 'true' : 'false') },
  });
}

/**
 * Summary and records as indented JSON. Non-finite numbers (an LTV with
 * no collateral left) are written as strings.
 */
export function toJson(result: SimulationResult): string {
  return JSON.stringify(
    { summary: result.summary, parameters: result.parameters, records: result.records },
    (_key, value: unknown) => (typeof value === 'number' && !Number.isFinite(value) ? String(value) : value),
    2,
  );
}

export function detectExportFormat(path: string): ExportFormat {
  return extname(path).toLowerCase() === '.json' ? 'json' : 'csv';
}

/**
 * Write a result to disk, choosing the format from the file extension.
 * Parent directories are created as needed.
 */
export function writeResults(path: string, result: SimulationResult): ExportFormat {
  const format = detectExportFormat(path);
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, format === 'json' ? toJson(result) : toCsv(result.records), 'utf-8');
  return format;
}
