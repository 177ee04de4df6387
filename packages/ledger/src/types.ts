/**
 * @ballast/ledger — Types for share accounting.
 *
 * Rules:
 * - Amounts are bigint base units, fees are basis points
 * - Valuation (total / available assets) is computed by the caller and
 *   passed in, so the ledger never awaits an external position
 * - Fail-closed: invalid operations throw, never silently succeed
 */

import type { Address } from "@ballast/types";

// ─── Fees ────────────────────────────────────────────────────────────────

/** Fee schedule, each component in basis points. */
export interface FeeSchedule {
  /** Performance fee on profit since the last checkpoint */
  readonly perf: number;
  /** Annualized management fee on total assets */
  readonly mgmt: number;
  /** Charged on deposits and mints */
  readonly entry: number;
  /** Charged on withdrawals and redemptions */
  readonly exit: number;
}

/** Protocol ceiling for every fee component. */
export const MAX_FEES: FeeSchedule = {
  perf: 5_000,
  mgmt: 500,
  entry: 200,
  exit: 200,
};

export const DEFAULT_FEES: FeeSchedule = {
  perf: 1_000,
  mgmt: 20,
  entry: 2,
  exit: 2,
};

// ─── Vault State ─────────────────────────────────────────────────────────

/**
 * Vault-level accounting state owned by the ShareLedger.
 *
 * `totalAssets` is not stored: it is `available + Σ invested` and is
 * supplied through a Valuation.
 */
export interface VaultState {
  readonly vault: Address;
  readonly asset: Address;
  /** 10^assetDecimals */
  readonly weiPerAsset: bigint;
  /** 10^shareDecimals */
  readonly weiPerShare: bigint;
  readonly totalSupply: bigint;
  /** Share price recorded at the last fee checkpoint (high-water mark) */
  readonly lastSharePrice: bigint;
  /** Unix seconds of the last fee checkpoint */
  readonly lastCheckpointTime: number;
  readonly maxTotalAssets: bigint;
  readonly minLiquidity: bigint;
  /** Entry/exit fees held in custody for the fee collector */
  readonly claimableAssetFees: bigint;
  readonly fees: FeeSchedule;
  readonly feeCollector: Address;
  /** Minimum seconds between two fee collections */
  readonly profitCooldown: number;
}

/**
 * Point-in-time valuation of the vault, computed by the coordinator.
 * Invariant: `totalAssets == available + Σ invested`.
 */
export interface Valuation {
  readonly totalAssets: bigint;
  readonly available: bigint;
}

export type Rounding = "down" | "up";

// ─── Construction ────────────────────────────────────────────────────────

export interface ShareLedgerInit {
  readonly vault: Address;
  readonly asset: Address;
  readonly assetDecimals: number;
  readonly shareDecimals: number;
  readonly feeCollector: Address;
  readonly fees?: FeeSchedule;
  readonly maxTotalAssets?: bigint;
  readonly minLiquidity?: bigint;
  readonly profitCooldown?: number;
  /** Callers exempt from entry/exit fees and the deposit cap */
  readonly exempt?: readonly Address[];
  /** Initial checkpoint time (unix seconds) */
  readonly now?: number;
}

// ─── Operation Results ───────────────────────────────────────────────────

/** Outcome of a deposit, mint, withdraw or redeem. */
export interface ShareMovement {
  readonly assets: bigint;
  readonly shares: bigint;
  /** Entry or exit fee retained as claimable asset fees */
  readonly fee: bigint;
}

export interface SafeDepositOptions {
  readonly minSharesOut: bigint;
  readonly deadline: number;
  readonly now: number;
}

export interface SafeMintOptions {
  readonly maxAssetsIn: bigint;
  readonly deadline: number;
  readonly now: number;
}

export interface SafeWithdrawOptions {
  readonly maxSharesIn: bigint;
  readonly deadline: number;
  readonly now: number;
}

export interface SafeRedeemOptions {
  readonly minAssetsOut: bigint;
  readonly deadline: number;
  readonly now: number;
}

/** Result of a fee collection that was not skipped by the cooldown. */
export interface FeeCollection {
  readonly elapsed: number;
  readonly profit: bigint;
  readonly perfFees: bigint;
  readonly mgmtFees: bigint;
  readonly sharesMinted: bigint;
  /** Entry/exit fees moved out of custody to the collector */
  readonly assetFeesClaimed: bigint;
  readonly sharePrice: bigint;
}

// ─── Snapshots ───────────────────────────────────────────────────────────

export interface ShareLedgerSnapshot {
  readonly state: VaultState;
  readonly balances: readonly (readonly [string, bigint])[];
  readonly allowances: readonly (readonly [string, bigint])[];
  readonly exempt: readonly string[];
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "AMOUNT_TOO_LOW"
  | "AMOUNT_TOO_HIGH"
  | "ADDRESS_IS_ZERO"
  | "UNAUTHORIZED"
  | "INSUFFICIENT_FUNDS"
  | "LIQUIDITY_TOO_LOW"
  | "TRANSACTION_EXPIRED"
  | "INVALID_DATA";

/**
 * Structured ledger error.
 * Always thrown, never returned.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}
