import { MarkPrices } from '../types/common';
import { PositionState } from '../types/state';

export interface RiskAssessment {
  /** Borrowed value over collateral value */
  ltv: number;
  /** LTV as a fraction of the configured maximum */
  utilization: number;
  /** True when LTV exceeds the maximum */
  atRisk: boolean;
}

/**
 * Risk module -- loan-to-value monitoring.
 *
 * Reports only. A breached threshold is flagged on the record; the
 * position is never closed or rebalanced.
 */
export class RiskMonitor {
  readonly maxBorrowMultiple: number;

  constructor(maxBorrowMultiple: number) {
    this.maxBorrowMultiple = maxBorrowMultiple;
  }

  assess(position: Readonly<PositionState>, marks: MarkPrices): RiskAssessment {
    const borrowedValue = position.borrowedBalance * marks.priceB;
    const collateralValue = position.depositBalance * marks.priceA;

    if (collateralValue <= 0) {
      const hasDebt = borrowedValue > 0;
      return {
        ltv: hasDebt ? Number.POSITIVE_INFINITY : 0,
        utilization: hasDebt ? Number.POSITIVE_INFINITY : 0,
        atRisk: hasDebt,
      };
    }

    const ltv = borrowedValue / collateralValue;
    return {
      ltv,
      utilization: ltv / this.maxBorrowMultiple,
      atRisk: ltv > this.maxBorrowMultiple,
    };
  }
}
