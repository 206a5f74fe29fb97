/**
 * AMM pool reserves.
 */
export interface PoolReserves {
  /** Reserve of the deposited asset (swap input side) */
  deposit: number;
  /** Reserve of the borrowed asset (swap output side) */
  borrowed: number;
}

/**
 * Balances of the one-sided LP position.
 */
export interface PositionState {
  /** Deposited asset including accrued yield */
  depositBalance: number;
  /** Part of the deposit redeployed for secondary yield; never above depositBalance */
  rehypBalance: number;
  /** Outstanding debt in the borrowed asset; never negative */
  borrowedBalance: number;
  /** Borrowed asset the position still holds in the pool */
  poolInventory: number;
  /** Fee income received less operational cost paid, in value terms */
  cash: number;
  /** Deposit asset earned at the underlying rate */
  underlyingUnits: number;
  /** Deposit asset earned at the rehypothecation rate */
  rehypUnits: number;
  /** Borrowed asset added to the debt by interest */
  borrowCostUnits: number;
}

/**
 * Cumulative P&L components in value terms, each booked at the
 * mark in force when it accrued.
 */
export interface PnlLedger {
  fees: number;
  underlyingYield: number;
  rehypYield: number;
  borrowCost: number;
  opsCost: number;
}

/**
 * The single mutable state of a run. Owned by SimulationEngine only.
 */
export interface SimulationState {
  /** Number of completed steps */
  step: number;
  reserves: PoolReserves;
  position: PositionState;
  ledger: PnlLedger;
  /** Value of the deposit at t=0 */
  initialDepositValue: number;
  /** Impermanent loss as of the previous step */
  lastImpermanentLoss: number;
  /** Risk flag as of the previous step */
  lastAtRisk: boolean;
}
