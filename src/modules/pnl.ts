import { PRECISION } from '../config';
import { ReconciliationError } from '../errors';
import { MarkPrices } from '../types/common';
import { Parameters } from '../types/params';
import { PnlLedger, PositionState, SimulationState } from '../types/state';
import { relativeDifference } from '../utils/math';

/**
 * Amounts accrued in one step, before valuation.
 */
export interface StepAccruals {
  /** Position's fee income, already in value terms */
  feeValue: number;
  /** Deposit-asset units */
  underlyingYield: number;
  /** Deposit-asset units */
  rehypYield: number;
  /** Borrowed-asset units */
  borrowCost: number;
}

/**
 * Value booked to the ledger in one step.
 */
export type BookedFlows = PnlLedger;

/**
 * P&L module -- values the position and decomposes its change.
 *
 * NAV is read top-down from balances at the step's marks:
 *
 *   depositBalance·pA + (poolInventory − borrowedBalance)·pB + cash
 *
 * Accruals are booked at the configured marks. Impermanent loss is
 * measured from the position's holdings and its unit counters, never from
 * the ledger: the position with its rehypothecation yield and borrow cost
 * taken out, at the step's marks, against a passive hold of the original
 * deposit plus the underlying yield, at the configured marks. A correct
 * step leaves NAV equal to the initial deposit value plus the booked
 * components plus IL; `reconcile` checks this every step.
 */
export class PnlAggregator {
  /** Operational cost charged each step */
  readonly opsCostPerStep: number;
  /** Configured marks; the valuation basis of the ledger and the baseline */
  readonly baseMarks: MarkPrices;

  private readonly depositAmount: number;

  constructor(params: Parameters) {
    this.opsCostPerStep = params.opsCostPerDay / params.stepsPerDay;
    this.baseMarks = { ...params.markToMarket };
    this.depositAmount = params.initialState.depositAmount;
  }

  newLedger(): PnlLedger {
    return { fees: 0, underlyingYield: 0, rehypYield: 0, borrowCost: 0, opsCost: 0 };
  }

  /**
   * Value this step's accruals and add them to the ledger.
   */
  book(ledger: PnlLedger, accruals: StepAccruals): BookedFlows {
    const { priceA, priceB } = this.baseMarks;
    const booked: BookedFlows = {
      fees: accruals.feeValue,
      underlyingYield: accruals.underlyingYield * priceA,
      rehypYield: accruals.rehypYield * priceA,
      borrowCost: accruals.borrowCost * priceB,
      opsCost: this.opsCostPerStep,
    };

    ledger.fees += booked.fees;
    ledger.underlyingYield += booked.underlyingYield;
    ledger.rehypYield += booked.rehypYield;
    ledger.borrowCost += booked.borrowCost;
    ledger.opsCost += booked.opsCost;

    return booked;
  }

  nav(position: Readonly<PositionState>, marks: MarkPrices): number {
    return (
      position.depositBalance * marks.priceA +
      (position.poolInventory - position.borrowedBalance) * marks.priceB +
      position.cash
    );
  }

  /**
   * Passive hold: the original deposit plus the underlying yield it earned.
   */
  baselineValue(position: Readonly<PositionState>): number {
    return (this.depositAmount + position.underlyingUnits) * this.baseMarks.priceA;
  }

  /**
   * Holdings at the step's marks, less the rehypothecation yield and plus
   * the borrow cost, both in units at the configured marks. Fee income and
   * ops are left out.
   */
  lpValue(position: Readonly<PositionState>, marks: MarkPrices): number {
    return (
      position.depositBalance * marks.priceA +
      (position.poolInventory - position.borrowedBalance) * marks.priceB -
      position.rehypUnits * this.baseMarks.priceA +
      position.borrowCostUnits * this.baseMarks.priceB
    );
  }

  impermanentLoss(position: Readonly<PositionState>, marks: MarkPrices): number {
    return this.lpValue(position, marks) - this.baselineValue(position);
  }

  impermanentLossPct(position: Readonly<PositionState>, impermanentLoss: number): number {
    const baseline = this.baselineValue(position);
    return baseline > 0 ? (impermanentLoss / baseline) * 100 : 0;
  }

  /**
   * NAV rebuilt bottom-up from the booked components and IL.
   */
  expectedNav(state: Readonly<SimulationState>, impermanentLoss: number): number {
    const { ledger } = state;
    return (
      state.initialDepositValue +
      ledger.fees +
      ledger.underlyingYield +
      ledger.rehypYield -
      ledger.borrowCost -
      ledger.opsCost +
      impermanentLoss
    );
  }

  /**
   * @throws ReconciliationError when top-down NAV and the booked components disagree
   */
  reconcile(state: Readonly<SimulationState>, nav: number, impermanentLoss: number): void {
    const expected = this.expectedNav(state, impermanentLoss);
    if (!(relativeDifference(nav, expected) <= PRECISION.RECONCILIATION_TOLERANCE)) {
      throw new ReconciliationError(state.step, nav, expected);
    }
  }
}
