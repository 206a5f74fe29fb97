import { Parameters } from '../types/params';
import { PositionState } from '../types/state';
import { AccrualEngine } from './accrual';

/**
 * Position module -- owns the arithmetic on the LP's balances.
 *
 * The tracker is stateless between calls: the engine hands it the
 * position to update and it never keeps a reference.
 */
export class PositionTracker {
  private readonly params: Parameters;
  private readonly accrual: AccrualEngine;

  constructor(params: Parameters, accrual: AccrualEngine) {
    this.params = params;
    this.accrual = accrual;
  }

  /**
   * Build the position at t=0: the deposit split into rehypothecated and
   * plain parts, and the borrowed asset placed in the pool as both debt
   * and pool inventory.
   */
  open(): PositionState {
    const { depositAmount, rehypFraction, borrowedAmount } = this.params.initialState;
    return {
      depositBalance: depositAmount,
      rehypBalance: depositAmount * rehypFraction,
      borrowedBalance: borrowedAmount,
      poolInventory: borrowedAmount,
      cash: 0,
      underlyingUnits: 0,
      rehypUnits: 0,
      borrowCostUnits: 0,
    };
  }

  /**
   * Compound both deposit sub-balances for one step.
   *
   * The plain part earns the underlying rate, the rehypothecated part its
   * own rate. Returns the increments in deposit-asset units.
   */
  accrueYield(position: PositionState): { underlyingYield: number; rehypYield: number } {
    const { underlyingApr, rehypApr } = this.params.yields;
    const plain = this.accrual.accrue(Math.max(0, position.depositBalance - position.rehypBalance), underlyingApr);
    const rehyp = this.accrual.accrue(position.rehypBalance, rehypApr);

    position.rehypBalance = rehyp.balance;
    position.depositBalance = plain.balance + rehyp.balance;
    position.underlyingUnits += plain.accrued;
    position.rehypUnits += rehyp.accrued;

    return { underlyingYield: plain.accrued, rehypYield: rehyp.accrued };
  }

  /**
   * Grow the debt by one step of borrow cost. Returns the increment in
   * borrowed-asset units.
   */
  accrueBorrowCost(position: PositionState): number {
    const cost = this.accrual.accrue(position.borrowedBalance, this.params.yields.borrowCostApr);
    position.borrowedBalance = cost.balance;
    position.borrowCostUnits += cost.accrued;
    return cost.accrued;
  }

  /**
   * Apply swap output against the debt.
   *
   * The repayment draws on the position's pool inventory and is capped by
   * both the debt and the inventory, so neither goes negative. Output
   * beyond that is not re-lent.
   *
   * @returns the amount actually repaid
   */
  repay(position: PositionState, amountOut: number): number {
    const repayment = Math.max(0, Math.min(amountOut, position.borrowedBalance, position.poolInventory));
    position.borrowedBalance -= repayment;
    position.poolInventory -= repayment;
    return repayment;
  }

  /** Credit the position's fee income. */
  receiveFee(position: PositionState, value: number): void {
    position.cash += value;
  }

  /** Pay one step of operational cost. */
  payOps(position: PositionState, value: number): void {
    position.cash -= value;
  }
}
