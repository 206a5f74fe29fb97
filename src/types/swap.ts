import { PoolReserves } from './state';

/**
 * Result of one swap of deposit asset into the pool.
 */
export interface SwapResult {
  /** Deposit asset accepted by the pool (may be below the request when clamped) */
  amountIn: number;
  /** Borrowed asset paid out */
  amountOut: number;
  /** Fee revenue in deposit-asset units (amountIn × fee rate) */
  feeRevenue: number;
  /** Reserves after the swap */
  reserves: PoolReserves;
  /** True when the output was capped to keep the reserve above zero */
  clamped: boolean;
}
