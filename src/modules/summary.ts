import { PRECISION } from '../config';
import { Parameters } from '../types/params';
import { RunSummary, StepRecord } from '../types/records';

/**
 * Largest peak-to-trough NAV decline as a fraction of the peak.
 *
 * The peak starts at the initial NAV; while the peak is not positive
 * no drawdown is measured.
 */
export function maxDrawdown(initialNav: number, records: readonly StepRecord[]): number {
  let peak = initialNav;
  let worst = 0;
  for (const record of records) {
    if (record.nav > peak) peak = record.nav;
    if (peak > 0) {
      worst = Math.max(worst, (peak - record.nav) / peak);
    }
  }
  return worst;
}

/**
 * Derive end-of-run metrics from the full record sequence.
 */
export function summarize(
  params: Parameters,
  initialDepositValue: number,
  records: readonly StepRecord[],
): RunSummary {
  const final = records[records.length - 1];
  if (!final) {
    throw new RangeError('Cannot summarize a run without records');
  }

  const totalReturn = initialDepositValue > 0 ? final.netPnl / initialDepositValue : 0;
  const { cumulative } = final;

  return {
    horizonDays: params.horizonDays,
    steps: records.length,
    initialDepositValue,
    finalNav: final.nav,
    netPnl: final.netPnl,
    totalReturn,
    annualizedReturn: totalReturn * (PRECISION.DAYS_PER_YEAR / params.horizonDays),
    maxDrawdown: maxDrawdown(initialDepositValue, records),
    totalFees: cumulative.fees,
    totalYields: cumulative.underlyingYield + cumulative.rehypYield,
    totalBorrowCost: cumulative.borrowCost,
    totalOpsCost: cumulative.opsCost,
    finalImpermanentLossPct: final.impermanentLossPct,
    finalBorrowedBalance: final.borrowedBalance,
    finalLtv: final.ltv,
    finalAtRisk: final.atRisk,
    stepsAtRisk: records.filter((record) => record.atRisk).length,
  };
}

/** Whole-dollar amount with its sign in front: -$1,234 */
export const formatUsd = (value: number): string =>
  `${value < 0 ? '-' : ''}$${Math.abs(value).toLocaleString('en-US', { maximumFractionDigits: 0 })}`;

/** Fraction as a percentage with two decimals: 0.0123 -> 1.23% */
export const formatPct = (fraction: number): string => `${(fraction * 100).toFixed(2)}%`;

/**
 * Multi-line, human-readable summary.
 */
export function formatSummary(summary: RunSummary): string {
  const rows: Array<[string, string]> = [
    ['Horizon', `${summary.horizonDays} days (${summary.steps} steps)`],
    ['Initial value', formatUsd(summary.initialDepositValue)],
    ['Final NAV', formatUsd(summary.finalNav)],
    ['Fees earned', formatUsd(summary.totalFees)],
    ['Yields earned', formatUsd(summary.totalYields)],
    ['Borrow cost', formatUsd(-summary.totalBorrowCost)],
    ['Ops cost', formatUsd(-summary.totalOpsCost)],
    ['Impermanent loss', `${summary.finalImpermanentLossPct.toFixed(2)}%`],
    ['Net P&L', formatUsd(summary.netPnl)],
    ['Total return', formatPct(summary.totalReturn)],
    ['Annualized return', formatPct(summary.annualizedReturn)],
    ['Max drawdown', formatPct(summary.maxDrawdown)],
    ['Final borrowed', summary.finalBorrowedBalance.toFixed(2)],
    ['Final LTV', `${formatPct(summary.finalLtv)}${summary.finalAtRisk ? ' (AT RISK)' : ''}`],
    ['Steps at risk', String(summary.stepsAtRisk)],
  ];
  return rows.map(([label, value]) => `${label.padEnd(20)}${value}`).join('\n');
}

/**
 * One-line summary for quiet output.
 */
export function formatSummaryLine(summary: RunSummary): string {
  return `net_pnl=${summary.netPnl.toFixed(2)} annualized=${formatPct(summary.annualizedReturn)} final_ltv=${formatPct(summary.finalLtv)}`;
}
