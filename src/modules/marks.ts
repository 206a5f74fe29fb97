import { PRECISION } from '../config';
import { MarkPrices } from '../types/common';
import { bpsToFraction } from '../utils/math';
import { RandomSource } from '../utils/random';

/**
 * Per-step mark prices.
 *
 * With a peg deviation configured, the deposit-asset mark is drawn
 * around its configured price each step; the borrowed-asset mark stays
 * fixed. The draw uses a stream separate from the flow generator's.
 */
export class MarkPriceModel {
  private readonly base: MarkPrices;
  private readonly deviation: number;
  private readonly rng: RandomSource;

  constructor(base: MarkPrices, pegDeviationStdBps: number, rng: RandomSource) {
    this.base = base;
    this.deviation = bpsToFraction(pegDeviationStdBps);
    this.rng = rng;
  }

  get initial(): MarkPrices {
    return { priceA: this.base.priceA, priceB: this.base.priceB };
  }

  next(): MarkPrices {
    if (this.deviation === 0) return this.initial;
    const shock = this.deviation * this.rng.nextGaussian();
    return {
      priceA: Math.max(PRECISION.MIN_MARK_PRICE, this.base.priceA * (1 + shock)),
      priceB: this.base.priceB,
    };
  }
}
