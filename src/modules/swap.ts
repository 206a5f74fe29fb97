import { PRECISION } from '../config';
import { LiquidityExhaustedError, ValidationError } from '../errors';
import { PoolReserves } from '../types/state';
import { SwapResult } from '../types/swap';
import { bpsToFraction } from '../utils/math';

/**
 * Swap module -- constant-product pricing with a proportional fee.
 *
 * The fee-adjusted input prices the trade, but the full input is added
 * to the reserve, so reserveIn × reserveOut grows by the fee and is
 * preserved exactly when the fee is zero. Outputs are capped so no swap
 * can take the output reserve to zero.
 */
export class SwapEngine {
  readonly feeBps: number;
  private readonly feeRate: number;

  constructor(feeBps: number) {
    if (!Number.isFinite(feeBps) || feeBps < 0 || feeBps >= PRECISION.BPS_DENOMINATOR) {
      throw new ValidationError(`Invalid fee: ${feeBps} bps`, ['amm.feeBps: must be in [0, 10000)']);
    }
    this.feeBps = feeBps;
    this.feeRate = bpsToFraction(feeBps);
  }

  /**
   * Swap deposit asset into the pool and return the new reserves.
   *
   * A zero input is a no-op. When the priced output would exceed the
   * available capacity (all but MIN_RESERVE_FRACTION of the output
   * reserve) the output is capped and only the input that buys exactly
   * the capped output is accepted.
   *
   * @throws ValidationError for negative or NaN input
   * @throws LiquidityExhaustedError when a reserve is already at zero
   */
  swap(reserves: Readonly<PoolReserves>, amountIn: number): SwapResult {
    if (!(amountIn >= 0)) {
      throw new ValidationError(`Invalid swap input: ${amountIn}`, ['amountIn: must be a non-negative number']);
    }

    if (amountIn === 0) {
      return {
        amountIn: 0,
        amountOut: 0,
        feeRevenue: 0,
        reserves: { deposit: reserves.deposit, borrowed: reserves.borrowed },
        clamped: false,
      };
    }

    const reserveIn = reserves.deposit;
    const reserveOut = reserves.borrowed;
    if (!(reserveIn > 0) || !(reserveOut > 0)) {
      throw new LiquidityExhaustedError(reserveIn, reserveOut, amountIn);
    }

    let accepted = amountIn;
    let amountOut = this.getAmountOut(amountIn, reserveIn, reserveOut);
    let clamped = false;

    const capacity = this.maxAmountOut(reserveOut);
    if (!(amountOut <= capacity)) {
      amountOut = capacity;
      accepted = this.getAmountIn(capacity, reserveIn, reserveOut);
      clamped = true;
    }

    return {
      amountIn: accepted,
      amountOut,
      feeRevenue: accepted * this.feeRate,
      reserves: {
        deposit: reserveIn + accepted,
        borrowed: reserveOut - amountOut,
      },
      clamped,
    };
  }

  /**
   * Output for an exact input: reserveOut − k / (reserveIn + input × (1 − fee)).
   */
  getAmountOut(amountIn: number, reserveIn: number, reserveOut: number): number {
    if (amountIn <= 0) return 0;
    const adjustedIn = amountIn * (1 - this.feeRate);
    return reserveOut - (reserveIn * reserveOut) / (reserveIn + adjustedIn);
  }

  /**
   * Input needed for an exact output.
   */
  getAmountIn(amountOut: number, reserveIn: number, reserveOut: number): number {
    if (amountOut <= 0) return 0;
    if (amountOut >= reserveOut) {
      throw new ValidationError('Insufficient reserve for output', ['amountOut: must be below reserveOut'], {
        amountOut,
        reserveOut,
      });
    }
    const adjustedIn = (reserveIn * amountOut) / (reserveOut - amountOut);
    return adjustedIn / (1 - this.feeRate);
  }

  /**
   * Largest output a single swap may take from a reserve.
   */
  maxAmountOut(reserveOut: number): number {
    return reserveOut * (1 - PRECISION.MIN_RESERVE_FRACTION);
  }

  /**
   * Marginal price of the deposit asset, in borrowed-asset units.
   */
  spotPrice(reserves: Readonly<PoolReserves>): number {
    return reserves.borrowed / reserves.deposit;
  }

  /**
   * Price impact of a fee-free swap, as a fraction of the spot price.
   */
  priceImpact(reserves: Readonly<PoolReserves>, amountIn: number): number {
    if (amountIn <= 0) return 0;
    const spot = this.spotPrice(reserves);
    const out = reserves.borrowed - (reserves.deposit * reserves.borrowed) / (reserves.deposit + amountIn);
    return Math.abs(out / amountIn - spot) / spot;
  }
}
