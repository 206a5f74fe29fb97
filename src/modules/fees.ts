import { MarkPrices } from '../types/common';
import { PoolReserves, PositionState } from '../types/state';
import { clamp } from '../utils/math';

/**
 * Fee module -- allocates swap fee revenue to the position.
 *
 * The position earns the share of each fee matching its share of pool
 * value: its deposit on the deposit-asset side plus the borrowed asset it
 * still holds in the pool, over the value of both reserves.
 */
export class FeeModule {
  /**
   * Position's share of total pool value, in [0, 1].
   *
   * @param reserves - Pool reserves after the swap
   * @param position - Position whose deposit and pool inventory are measured
   * @param marks - Prices used for both sides
   */
  poolShare(
    reserves: Readonly<PoolReserves>,
    position: Readonly<PositionState>,
    marks: MarkPrices,
  ): number {
    const poolValue = reserves.deposit * marks.priceA + reserves.borrowed * marks.priceB;
    if (poolValue <= 0) return 0;
    const stake = position.depositBalance * marks.priceA + position.poolInventory * marks.priceB;
    return clamp(stake / poolValue, 0, 1);
  }

  /**
   * Value of the position's cut of one swap's fee revenue.
   *
   * @param feeRevenue - Fee in deposit-asset units
   * @param share - Position's pool share
   * @param priceA - Deposit-asset mark
   */
  allocate(feeRevenue: number, share: number, priceA: number): number {
    return feeRevenue * share * priceA;
  }
}
