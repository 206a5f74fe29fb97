import { Parameters } from '../types/params';
import { PoolReserves } from '../types/state';
import { FlowModel } from '../types/common';
import { SimulationStateError } from '../errors';
import { bpsToFraction } from '../utils/math';
import { RandomSource } from '../utils/random';

/**
 * Flow module -- produces the one-directional trade volume entering the pool.
 *
 * Volume is denominated in the deposited asset. The deterministic model
 * takes a fixed share of pool value per day; the stochastic model scales
 * a base share by a seeded log-level random walk. The generator never
 * touches the reserves it is shown.
 */
export class FlowGenerator {
  private readonly params: Parameters;
  private readonly rng: RandomSource;
  private logLevel = 0;
  private lastStep = 0;

  constructor(params: Parameters, rng: RandomSource) {
    this.params = params;
    this.rng = rng;
  }

  /**
   * Volume for the given step. Steps must be requested in order, starting at 1.
   */
  next(step: number, reserves: Readonly<PoolReserves>): number {
    if (step !== this.lastStep + 1) {
      throw new SimulationStateError(`Flow requested for step ${step} after step ${this.lastStep}`, {
        step,
        lastStep: this.lastStep,
      });
    }
    this.lastStep = step;

    const poolSize = this.poolSize(reserves);
    const { flow, stepsPerDay } = this.params;

    if (flow.model === FlowModel.DETERMINISTIC) {
      return (bpsToFraction(flow.deterministicBpsOfPool) * poolSize) / stepsPerDay;
    }

    const dtDays = 1 / stepsPerDay;
    const { muDaily, sigmaDaily, baseBpsOfPool } = flow.stochastic;
    this.logLevel += muDaily * dtDays + sigmaDaily * Math.sqrt(dtDays) * this.rng.nextGaussian();

    const baseVolume = (bpsToFraction(baseBpsOfPool) * poolSize) / stepsPerDay;
    // no sign-flipping flow
    return Math.max(0, baseVolume * Math.exp(this.logLevel));
  }

  /**
   * Current flow level multiplier, exp(level). Always 1 for the deterministic model.
   */
  get levelMultiplier(): number {
    return Math.exp(this.logLevel);
  }

  /**
   * Pool value expressed in deposit-asset units at the configured marks.
   */
  poolSize(reserves: Readonly<PoolReserves>): number {
    const { priceA, priceB } = this.params.markToMarket;
    return reserves.deposit + (reserves.borrowed * priceB) / priceA;
  }
}
