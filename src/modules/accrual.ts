import { growthFactor, stepDurationYears } from '../utils/math';

/**
 * A balance after accrual, plus the increment booked this period.
 */
export interface Accrual {
  balance: number;
  accrued: number;
}

/**
 * Continuous-compounding accrual over fixed simulation steps.
 */
export class AccrualEngine {
  /** Step length in years: 1 / (stepsPerDay × 365) */
  readonly dtYears: number;

  constructor(stepsPerDay: number) {
    this.dtYears = stepDurationYears(stepsPerDay);
  }

  /**
   * Advance a balance by one step.
   */
  accrue(balance: number, rate: number): Accrual {
    return this.accrueOver(balance, rate, this.dtYears);
  }

  /**
   * Advance a balance over an arbitrary duration. Non-positive balances
   * and a zero rate accrue nothing.
   */
  accrueOver(balance: number, rate: number, years: number): Accrual {
    if (balance <= 0 || rate === 0) {
      return { balance, accrued: 0 };
    }
    const next = balance * growthFactor(rate, years);
    return { balance: next, accrued: next - balance };
  }
}
