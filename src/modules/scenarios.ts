import { EngineOptions, runSimulation } from '../engine';
import { ValidationError } from '../errors';
import { Parameters } from '../types/params';
import { RunSummary } from '../types/records';
import { formatPct, formatUsd } from './summary';

export interface Scenario {
  name: string;
  parameters: Parameters;
}

export interface ScenarioOutcome {
  name: string;
  parameters: Parameters;
  summary: RunSummary;
}

/**
 * Scenario that leads on each ranked metric. Ties go to the scenario listed first.
 */
export interface ScenarioRanking {
  bestAnnualReturn: ScenarioOutcome;
  mostFees: ScenarioOutcome;
  lowestLtv: ScenarioOutcome;
}

export interface ScenarioComparison {
  outcomes: ScenarioOutcome[];
  ranking: ScenarioRanking;
}

/**
 * Run each scenario independently and rank the results.
 *
 * @throws ValidationError when no scenarios are given, or one has invalid parameters
 */
export function compareScenarios(scenarios: readonly Scenario[], options: EngineOptions = {}): ScenarioComparison {
  const outcomes = scenarios.map((scenario) => ({
    name: scenario.name,
    parameters: scenario.parameters,
    summary: runSimulation(scenario.parameters, options).summary,
  }));
  return { outcomes, ranking: rankScenarios(outcomes) };
}

export function rankScenarios(outcomes: readonly ScenarioOutcome[]): ScenarioRanking {
  const [first, ...rest] = outcomes;
  if (!first) {
    throw new ValidationError('At least one scenario is required', ['scenarios: must not be empty']);
  }

  let bestAnnualReturn = first;
  let mostFees = first;
  let lowestLtv = first;
  for (const outcome of rest) {
    if (outcome.summary.annualizedReturn > bestAnnualReturn.summary.annualizedReturn) bestAnnualReturn = outcome;
    if (outcome.summary.totalFees > mostFees.summary.totalFees) mostFees = outcome;
    if (outcome.summary.finalLtv < lowestLtv.summary.finalLtv) lowestLtv = outcome;
  }
  return { bestAnnualReturn, mostFees, lowestLtv };
}

const LABEL_WIDTH = 24;
const COLUMN_WIDTH = 18;

const ROWS: ReadonlyArray<[string, (outcome: ScenarioOutcome) => string]> = [
  ['Horizon (days)', (o) => String(o.summary.horizonDays)],
  ['Initial value', (o) => formatUsd(o.summary.initialDepositValue)],
  ['Final NAV', (o) => formatUsd(o.summary.finalNav)],
  ['Total fees', (o) => formatUsd(o.summary.totalFees)],
  ['Total yields', (o) => formatUsd(o.summary.totalYields)],
  ['Borrow cost', (o) => formatUsd(-o.summary.totalBorrowCost)],
  ['Ops cost', (o) => formatUsd(-o.summary.totalOpsCost)],
  ['IL %', (o) => `${o.summary.finalImpermanentLossPct.toFixed(2)}%`],
  ['Net P&L', (o) => formatUsd(o.summary.netPnl)],
  ['Total return', (o) => formatPct(o.summary.totalReturn)],
  ['Annual return', (o) => formatPct(o.summary.annualizedReturn)],
  ['Max drawdown', (o) => formatPct(o.summary.maxDrawdown)],
  ['Fee (bps)', (o) => String(o.parameters.amm.feeBps)],
  ['Flow (bps/day)', (o) => String(o.parameters.flow.deterministicBpsOfPool)],
  ['Rehyp fraction', (o) => formatPct(o.parameters.initialState.rehypFraction)],
  ['Final LTV', (o) => formatPct(o.summary.finalLtv)],
];

/**
 * Render a comparison as a fixed-width text table followed by the ranking.
 */
export function formatComparison(comparison: ScenarioComparison): string {
  const { outcomes, ranking } = comparison;
  const row = (label: string, cells: string[]): string =>
    label.padEnd(LABEL_WIDTH) + cells.map((cell) => cell.padEnd(COLUMN_WIDTH)).join('');

  const lines = [row('Metric', outcomes.map((o) => o.name))];
  lines.push('-'.repeat(LABEL_WIDTH + COLUMN_WIDTH * outcomes.length));
  for (const [label, render] of ROWS) {
    lines.push(row(label, outcomes.map(render)));
  }

  lines.push('');
  lines.push(
    `Best annual return: ${ranking.bestAnnualReturn.name} (${formatPct(ranking.bestAnnualReturn.summary.annualizedReturn)})`,
  );
  lines.push(`Most fees earned: ${ranking.mostFees.name} (${formatUsd(ranking.mostFees.summary.totalFees)})`);
  lines.push(`Lowest LTV: ${ranking.lowestLtv.name} (${formatPct(ranking.lowestLtv.summary.finalLtv)})`);
  return lines.map((line) => line.trimEnd()).join('\n');
}
