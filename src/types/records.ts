import { Parameters } from './params';
import { PnlLedger } from './state';

/**
 * Cumulative P&L components carried on every record.
 */
export interface CumulativePnl extends PnlLedger {
  impermanentLoss: number;
}

/**
 * Immutable snapshot emitted once per step.
 */
export interface StepRecord {
  step: number;
  /** Elapsed time in days */
  timeDays: number;

  reserveDeposit: number;
  reserveBorrowed: number;

  depositBalance: number;
  rehypBalance: number;
  borrowedBalance: number;
  poolInventory: number;
  /** Position's share of pool value used for fee allocation */
  lpShare: number;

  /** Deposit asset swapped into the pool this step */
  volumeIn: number;
  /** Borrowed asset paid out this step */
  volumeOut: number;
  /** Debt repaid from the output this step */
  repayment: number;
  swapClamped: boolean;
  /** Pool price of the deposit asset after the swap, in borrowed-asset units */
  poolPrice: number;
  /** Fee-free price impact of the accepted volume, as a fraction */
  priceImpact: number;

  // Value accrued this step
  feeEarned: number;
  underlyingYield: number;
  rehypYield: number;
  borrowCost: number;
  opsCost: number;
  impermanentLossDelta: number;

  cumulative: CumulativePnl;

  nav: number;
  netPnl: number;
  impermanentLossPct: number;

  /** Deposit-asset mark used for this step's valuation */
  priceA: number;
  ltv: number;
  /** LTV as a fraction of the configured maximum */
  utilization: number;
  atRisk: boolean;
}

/**
 * End-of-run metrics, derived once from the full record sequence.
 */
export interface RunSummary {
  horizonDays: number;
  steps: number;
  initialDepositValue: number;
  finalNav: number;
  netPnl: number;
  /** Net P&L over initial deposit value, as a fraction */
  totalReturn: number;
  /** totalReturn scaled linearly to 365 days */
  annualizedReturn: number;
  /** Largest peak-to-trough NAV decline, as a fraction of the peak */
  maxDrawdown: number;
  totalFees: number;
  totalYields: number;
  totalBorrowCost: number;
  totalOpsCost: number;
  finalImpermanentLossPct: number;
  finalBorrowedBalance: number;
  finalLtv: number;
  finalAtRisk: boolean;
  stepsAtRisk: number;
}

/**
 * Output of a completed run.
 */
export interface SimulationResult {
  parameters: Parameters;
  records: readonly StepRecord[];
  summary: RunSummary;
}
