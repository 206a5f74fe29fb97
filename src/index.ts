// Engine
export { SimulationEngine, initialize, runSimulation } from './engine';
export type { EngineOptions } from './engine';

// Modules
export { FlowGenerator } from './modules/flow';
export { SwapEngine } from './modules/swap';
export { FeeModule } from './modules/fees';
export { AccrualEngine } from './modules/accrual';
export type { Accrual } from './modules/accrual';
export { PositionTracker } from './modules/position';
export { PnlAggregator } from './modules/pnl';
export type { StepAccruals, BookedFlows } from './modules/pnl';
export { RiskMonitor } from './modules/risk';
export type { RiskAssessment } from './modules/risk';
export { MarkPriceModel } from './modules/marks';
export { summarize, maxDrawdown, formatSummary, formatSummaryLine } from './modules/summary';
export { compareScenarios, rankScenarios, formatComparison } from './modules/scenarios';
export type { Scenario, ScenarioOutcome, ScenarioRanking, ScenarioComparison } from './modules/scenarios';

// Types
export * from './types/common';
export * from './types/params';
export * from './types/state';
export * from './types/swap';
export * from './types/records';

// Errors
export {
  AmmSimError,
  ValidationError,
  LiquidityExhaustedError,
  SimulationStateError,
  ReconciliationError,
  ConfigError,
  mapError,
} from './errors';
export { ErrorParser } from './errors/parser';

// Config & utilities
export { DEFAULTS, PRECISION } from './config';
export { validateParameters, ParametersSchema } from './utils/validation';
export { loadConfig, parseConfig } from './utils/config-loader';
export { toCsv, toJson, writeResults } from './utils/export';
export { createConsoleLogger } from './utils/logger';
export { SeededRandom } from './utils/random';
export type { RandomSource } from './utils/random';
