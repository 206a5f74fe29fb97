/**
 * Parameter and record builders shared by the test suites.
 *
 * `buildParameters()` returns the baseline scenario: a 1,000,000 deposit
 * against 5,000,000 / 5,000,000 reserves, 7 bps fee, 180 days at 24 steps
 * per day, deterministic flow of 20 bps of pool per day, 6% underlying,
 * 12% rehypothecation on 60% of the deposit, 8% borrow cost, 150 per day
 * ops cost. Each section can be partially overridden.
 */

import { AmmType, FlowModel, MarkPrices } from '../types/common';
import {
  AmmParams,
  FlowParams,
  InitialStateParams,
  Parameters,
  RiskParams,
  StochasticFlowParams,
  YieldParams,
} from '../types/params';
import { StepRecord } from '../types/records';
import { PositionState } from '../types/state';

export interface ParameterOverrides {
  horizonDays?: number;
  stepsPerDay?: number;
  seed?: number;
  opsCostPerDay?: number;
  pegDeviationStdBps?: number;
  amm?: Partial<AmmParams>;
  initialState?: Partial<InitialStateParams>;
  yields?: Partial<YieldParams>;
  flow?: Partial<Omit<FlowParams, 'stochastic'>> & { stochastic?: Partial<StochasticFlowParams> };
  risk?: Partial<RiskParams>;
  markToMarket?: Partial<MarkPrices>;
}

export function buildParameters(overrides: ParameterOverrides = {}): Parameters {
  return {
    horizonDays: overrides.horizonDays ?? 180,
    stepsPerDay: overrides.stepsPerDay ?? 24,
    seed: overrides.seed ?? 42,
    amm: { type: AmmType.CONSTANT_PRODUCT, feeBps: 7, ...overrides.amm },
    initialState: {
      depositReserve: 5_000_000,
      borrowedReserve: 5_000_000,
      depositAmount: 1_000_000,
      rehypFraction: 0.6,
      borrowedAmount: 5_000_000,
      ...overrides.initialState,
    },
    yields: { underlyingApr: 0.06, rehypApr: 0.12, borrowCostApr: 0.08, ...overrides.yields },
    opsCostPerDay: overrides.opsCostPerDay ?? 150,
    flow: {
      model: overrides.flow?.model ?? FlowModel.DETERMINISTIC,
      deterministicBpsOfPool: overrides.flow?.deterministicBpsOfPool ?? 20,
      stochastic: { muDaily: 0, sigmaDaily: 0.25, baseBpsOfPool: 100, ...overrides.flow?.stochastic },
    },
    risk: { maxBorrowMultiple: 0.8, ...overrides.risk },
    markToMarket: { priceA: 1, priceB: 1, ...overrides.markToMarket },
    pegDeviationStdBps: overrides.pegDeviationStdBps ?? 0,
  };
}

export function buildPosition(overrides: Partial<PositionState> = {}): PositionState {
  return {
    depositBalance: 1_000,
    rehypBalance: 0,
    borrowedBalance: 0,
    poolInventory: 0,
    cash: 0,
    underlyingUnits: 0,
    rehypUnits: 0,
    borrowCostUnits: 0,
    ...overrides,
  };
}

/**
 * A step record with every numeric field zeroed, for summary arithmetic.
 */
export function buildRecord(overrides: Partial<StepRecord> = {}): StepRecord {
  return {
    step: 1,
    timeDays: 0,
    reserveDeposit: 0,
    reserveBorrowed: 0,
    depositBalance: 0,
    rehypBalance: 0,
    borrowedBalance: 0,
    poolInventory: 0,
    lpShare: 0,
    volumeIn: 0,
    volumeOut: 0,
    repayment: 0,
    swapClamped: false,
    poolPrice: 1,
    priceImpact: 0,
    feeEarned: 0,
    underlyingYield: 0,
    rehypYield: 0,
    borrowCost: 0,
    opsCost: 0,
    impermanentLossDelta: 0,
    cumulative: { fees: 0, underlyingYield: 0, rehypYield: 0, borrowCost: 0, opsCost: 0, impermanentLoss: 0 },
    nav: 0,
    netPnl: 0,
    impermanentLossPct: 0,
    priceA: 1,
    ltv: 0,
    utilization: 0,
    atRisk: false,
    ...overrides,
  };
}
