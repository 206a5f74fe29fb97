import { MARK_STREAM_SALT } from './config';
import { AmmSimError, SimulationStateError } from './errors';
import { AccrualEngine } from './modules/accrual';
import { FeeModule } from './modules/fees';
import { FlowGenerator } from './modules/flow';
import { MarkPriceModel } from './modules/marks';
import { PnlAggregator } from './modules/pnl';
import { PositionTracker } from './modules/position';
import { RiskMonitor } from './modules/risk';
import { summarize } from './modules/summary';
import { SwapEngine } from './modules/swap';
import { Logger, RunStatus } from './types/common';
import { Parameters } from './types/params';
import { RunSummary, SimulationResult, StepRecord } from './types/records';
import { SimulationState } from './types/state';
import { SeededRandom } from './utils/random';
import { deepFreeze, validateParameters } from './utils/validation';

/**
 * Engine options.
 */
export interface EngineOptions {
  /** Optional logger for run instrumentation. */
  logger?: Logger;
}

/**
 * Simulation driver for a one-sided LP position.
 *
 * Owns the run's only mutable state and moves it through
 * INITIALIZED -> RUNNING -> COMPLETED, one step per `advance()`. Each step
 * runs, in this order: marks, flow, swap, fee allocation, yield accrual,
 * borrow-cost accrual, debt repayment, ops payment, NAV/P&L, risk check,
 * record.
 * The order changes the numbers and is fixed.
 */
export class SimulationEngine {
  readonly parameters: Parameters;
  readonly totalSteps: number;

  private readonly logger?: Logger;
  private readonly flow: FlowGenerator;
  private readonly swapEngine: SwapEngine;
  private readonly fees: FeeModule;
  private readonly tracker: PositionTracker;
  private readonly pnl: PnlAggregator;
  private readonly risk: RiskMonitor;
  private readonly marks: MarkPriceModel;

  private readonly state: SimulationState;
  private readonly records: StepRecord[] = [];
  private _status: RunStatus = RunStatus.INITIALIZED;
  private summary: RunSummary | null = null;
  private failure: AmmSimError | null = null;

  /**
   * Validate parameters and build the state at t=0.
   *
   * @throws ValidationError before any step executes
   */
  constructor(parameters: Parameters, options: EngineOptions = {}) {
    this.parameters = validateParameters(parameters);
    this.logger = options.logger;
    this.totalSteps = this.parameters.horizonDays * this.parameters.stepsPerDay;

    const params = this.parameters;
    const rng = new SeededRandom(params.seed);
    const accrual = new AccrualEngine(params.stepsPerDay);

    this.flow = new FlowGenerator(params, rng);
    this.marks = new MarkPriceModel(params.markToMarket, params.pegDeviationStdBps, rng.fork(MARK_STREAM_SALT));
    this.swapEngine = new SwapEngine(params.amm.feeBps);
    this.fees = new FeeModule();
    this.tracker = new PositionTracker(params, accrual);
    this.pnl = new PnlAggregator(params);
    this.risk = new RiskMonitor(params.risk.maxBorrowMultiple);

    const position = this.tracker.open();
    const initialMarks = this.marks.initial;
    this.state = {
      step: 0,
      reserves: {
        deposit: params.initialState.depositReserve,
        borrowed: params.initialState.borrowedReserve,
      },
      position,
      ledger: this.pnl.newLedger(),
      initialDepositValue: params.initialState.depositAmount * initialMarks.priceA,
      lastImpermanentLoss: 0,
      lastAtRisk: this.risk.assess(position, initialMarks).atRisk,
    };
  }

  get status(): RunStatus {
    return this._status;
  }

  /** Number of completed steps. */
  get currentStep(): number {
    return this.state.step;
  }

  /**
   * Copy of the current state, for inspection. Changes to the copy do not
   * reach the engine.
   */
  snapshot(): SimulationState {
    return structuredClone(this.state);
  }

  /**
   * Execute exactly one step and return its record.
   *
   * @throws SimulationStateError once the run has completed or aborted
   */
  advance(): StepRecord {
    if (this.failure) {
      throw new SimulationStateError('Run aborted; no further steps', { cause: this.failure.code });
    }
    if (this._status === RunStatus.COMPLETED) {
      throw new SimulationStateError('Run already completed', { steps: this.totalSteps });
    }
    if (this._status === RunStatus.INITIALIZED) {
      this._status = RunStatus.RUNNING;
      this.logger?.info('Simulation started', {
        totalSteps: this.totalSteps,
        flowModel: this.parameters.flow.model,
        feeBps: this.parameters.amm.feeBps,
        atRisk: this.state.lastAtRisk,
      });
    }

    let record: StepRecord;
    try {
      record = this.step();
    } catch (err) {
      this.failure = err instanceof AmmSimError ? err : new AmmSimError('UNKNOWN_ERROR', String(err));
      this.logger?.error(`Simulation aborted at step ${this.state.step + 1}`, err);
      throw err;
    }

    this.records.push(record);
    if (record.step === this.totalSteps) {
      this.complete();
    }
    return record;
  }

  /**
   * Drive all remaining steps and return the records and summary.
   */
  run(): SimulationResult {
    while (this._status !== RunStatus.COMPLETED) {
      this.advance();
    }
    return this.result();
  }

  /**
   * @throws SimulationStateError before the run has completed
   */
  result(): SimulationResult {
    if (this._status !== RunStatus.COMPLETED || !this.summary) {
      throw new SimulationStateError('Run has not completed', { step: this.state.step });
    }
    return {
      parameters: this.parameters,
      records: Object.freeze([...this.records]),
      summary: this.summary,
    };
  }

  private step(): StepRecord {
    const { state, parameters } = this;
    const step = state.step + 1;
    const marks = this.marks.next();

    const requested = this.flow.next(step, state.reserves);

    const reservesBefore = state.reserves;
    const swap = this.swapEngine.swap(reservesBefore, requested);
    state.reserves = swap.reserves;
    if (swap.clamped) {
      this.logger?.debug('Swap output capped at pool capacity', {
        step,
        requested,
        accepted: swap.amountIn,
        amountOut: swap.amountOut,
      });
    }

    const lpShare = this.fees.poolShare(state.reserves, state.position, marks);
    const feeValue = this.fees.allocate(swap.feeRevenue, lpShare, marks.priceA);
    this.tracker.receiveFee(state.position, feeValue);

    const yields = this.tracker.accrueYield(state.position);
    const borrowCost = this.tracker.accrueBorrowCost(state.position);
    const repayment = this.tracker.repay(state.position, swap.amountOut);
    this.tracker.payOps(state.position, this.pnl.opsCostPerStep);
    state.step = step;

    const booked = this.pnl.book(state.ledger, {
      feeValue,
      underlyingYield: yields.underlyingYield,
      rehypYield: yields.rehypYield,
      borrowCost,
    });
    const nav = this.pnl.nav(state.position, marks);
    const impermanentLoss = this.pnl.impermanentLoss(state.position, marks);
    this.pnl.reconcile(state, nav, impermanentLoss);

    const risk = this.risk.assess(state.position, marks);
    if (risk.atRisk !== state.lastAtRisk) {
      this.logger?.debug(risk.atRisk ? 'Position flagged at risk' : 'Position back within LTV limit', {
        step,
        ltv: risk.ltv,
        maxBorrowMultiple: this.risk.maxBorrowMultiple,
      });
    }

    const { position, reserves, ledger } = state;
    const record: StepRecord = {
      step,
      timeDays: step / parameters.stepsPerDay,
      reserveDeposit: reserves.deposit,
      reserveBorrowed: reserves.borrowed,
      depositBalance: position.depositBalance,
      rehypBalance: position.rehypBalance,
      borrowedBalance: position.borrowedBalance,
      poolInventory: position.poolInventory,
      lpShare,
      volumeIn: swap.amountIn,
      volumeOut: swap.amountOut,
      repayment,
      swapClamped: swap.clamped,
      poolPrice: this.swapEngine.spotPrice(reserves),
      priceImpact: this.swapEngine.priceImpact(reservesBefore, swap.amountIn),
      feeEarned: booked.fees,
      underlyingYield: booked.underlyingYield,
      rehypYield: booked.rehypYield,
      borrowCost: booked.borrowCost,
      opsCost: booked.opsCost,
      impermanentLossDelta: impermanentLoss - state.lastImpermanentLoss,
      cumulative: { ...ledger, impermanentLoss },
      nav,
      netPnl: nav - state.initialDepositValue,
      impermanentLossPct: this.pnl.impermanentLossPct(position, impermanentLoss),
      priceA: marks.priceA,
      ltv: risk.ltv,
      utilization: risk.utilization,
      atRisk: risk.atRisk,
    };

    state.lastImpermanentLoss = impermanentLoss;
    state.lastAtRisk = risk.atRisk;
    return deepFreeze(record);
  }

  private complete(): void {
    this.summary = deepFreeze(summarize(this.parameters, this.state.initialDepositValue, this.records));
    this._status = RunStatus.COMPLETED;
    this.logger?.info('Simulation completed', {
      steps: this.records.length,
      netPnl: this.summary.netPnl,
      annualizedReturn: this.summary.annualizedReturn,
      finalLtv: this.summary.finalLtv,
      finalAtRisk: this.summary.finalAtRisk,
    });
  }
}

/**
 * Validate parameters and build a run at t=0.
 */
export function initialize(parameters: Parameters, options: EngineOptions = {}): SimulationEngine {
  return new SimulationEngine(parameters, options);
}

/**
 * Run a full simulation in one call.
 */
export function runSimulation(parameters: Parameters, options: EngineOptions = {}): SimulationResult {
  return new SimulationEngine(parameters, options).run();
}
