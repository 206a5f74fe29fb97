import { AmmType, FlowModel, MarkPrices } from './common';

/**
 * AMM pool configuration.
 */
export interface AmmParams {
  /** Pricing curve identifier */
  type: AmmType;
  /** Swap fee in basis points (0-9999) */
  feeBps: number;
}

/**
 * Pool and position balances at t=0.
 */
export interface InitialStateParams {
  /** Deposit-asset reserve of the pool */
  depositReserve: number;
  /** Borrowed-asset reserve of the pool */
  borrowedReserve: number;
  /** Amount of deposit asset the position puts up */
  depositAmount: number;
  /** Share of the deposit redeployed for secondary yield (0 to 1) */
  rehypFraction: number;
  /** Borrowed asset the position supplies to the pool; defaults to the whole borrowed reserve */
  borrowedAmount: number;
}

/**
 * Annual rates, as decimals (0.06 = 6%).
 */
export interface YieldParams {
  underlyingApr: number;
  rehypApr: number;
  borrowCostApr: number;
}

export interface StochasticFlowParams {
  /** Drift of the log flow level per day */
  muDaily: number;
  /** Volatility of the log flow level per square-root day */
  sigmaDaily: number;
  /** Flow at level zero, in bps of pool value per day */
  baseBpsOfPool: number;
}

export interface FlowParams {
  model: FlowModel;
  /** Daily flow in bps of pool value, for the deterministic model */
  deterministicBpsOfPool: number;
  stochastic: StochasticFlowParams;
}

export interface RiskParams {
  /** LTV above which the position is flagged at risk */
  maxBorrowMultiple: number;
}

/**
 * Validated, immutable run parameters.
 *
 * Produced by `parseConfig` / `validateParameters`; never mutated
 * once a run starts.
 */
export interface Parameters {
  horizonDays: number;
  stepsPerDay: number;
  seed: number;
  amm: AmmParams;
  initialState: InitialStateParams;
  yields: YieldParams;
  /** Operational cost in value units per day */
  opsCostPerDay: number;
  flow: FlowParams;
  risk: RiskParams;
  markToMarket: MarkPrices;
  /** Standard deviation of the deposit-asset mark around its peg, in bps; 0 disables */
  pegDeviationStdBps: number;
}
