/**
 * @ballast/allocation — Collaborator contracts and slot types.
 *
 * The engine never talks to a protocol directly. Each input slot carries
 * a ProtocolAdapter; token conversion goes through a Swapper and
 * valuation through a PriceOracle. Adapters keep their positions as
 * receipt-token balances in the vault's Custody, so restoring a custody
 * snapshot rolls a failed operation back completely.
 */

import type { Address } from "@ballast/types";
import type { Custody } from "@ballast/ledger";
import type { Hex } from "viem";

/** Fixed number of input slots per vault. */
export const MAX_INPUTS = 8;

export const DEFAULT_DUST_THRESHOLD = 10n;

export const DEFAULT_MAX_SLIPPAGE_BPS = 100;

// =============================================================================
// Collaborators
// =============================================================================

export interface PriceOracle {
  hasFeed(token: Address): Promise<boolean>;
  /** Value of `amount` of `from` expressed in `to` base units. */
  convert(from: Address, amount: bigint, to: Address): Promise<bigint>;
}

/**
 * How an adapter's rewards are claimed, detected once when the input
 * is configured.
 */
export type RewardCapability =
  | { readonly kind: "none" }
  | { readonly kind: "standard" }
  | { readonly kind: "legacy" };

export interface RewardClaim {
  readonly token: Address;
  readonly amount: bigint;
}

interface RewardSource {
  detectRewards(): Promise<RewardCapability>;
  claimRewards(custody: Custody, capability: RewardCapability): Promise<readonly RewardClaim[]>;
}

/**
 * Single-token position (lending market, staking pool, ...).
 * Amounts are in the input token's base units.
 */
export interface ProtocolAdapter extends RewardSource {
  readonly kind: "single";
  stake(custody: Custody, amount: bigint): Promise<bigint>;
  unstake(custody: Custody, amount: bigint): Promise<bigint>;
  investedValue(custody: Custody): Promise<bigint>;
}

export type Pair<T> = readonly [T, T];

/**
 * Two-token AMM position backing an even/odd slot pair.
 */
export interface PairedProtocolAdapter extends RewardSource {
  readonly kind: "paired";
  /** Reference amounts of a balanced deposit, token0 then token1. */
  ratio(custody: Custody): Promise<Pair<bigint>>;
  stake(custody: Custody, amounts: Pair<bigint>): Promise<Pair<bigint>>;
  /** Exit enough liquidity to release `amount0` of token0, both legs. */
  unstake(custody: Custody, amount0: bigint): Promise<Pair<bigint>>;
  investedValue(custody: Custody): Promise<Pair<bigint>>;
}

export type AnyProtocolAdapter = ProtocolAdapter | PairedProtocolAdapter;

/** Opaque, caller-built swap calldata. */
export type SwapParams = Hex;

export interface SwapResult {
  readonly spent: bigint;
  readonly received: bigint;
}

export interface Swapper {
  decodeAndSwap(
    custody: Custody,
    inputToken: Address,
    outputToken: Address,
    amount: bigint,
    params: SwapParams,
  ): Promise<SwapResult>;
}

// =============================================================================
// Inputs & Slots
// =============================================================================

export interface InputConfig {
  readonly token: Address;
  /** Target share of total assets, basis points */
  readonly weight: number;
  readonly decimals: number;
  /** Receipt / LP token representing the position */
  readonly positionHandle: Address;
  readonly adapter: AnyProtocolAdapter;
}

export interface ActiveInput extends InputConfig {
  readonly rewards: RewardCapability;
}

export type Slot =
  | { readonly kind: "empty" }
  | { readonly kind: "active"; readonly input: ActiveInput };

export type AllocationMode = "single" | "paired";

/**
 * How the slippage tolerance is composed across the swap and stake legs.
 *
 * - "compound": one check of the end-to-end result against twice the
 *   tolerance
 * - "per-leg": the swap and the stake are each checked against the
 *   tolerance on their own
 */
export type SlippagePolicy = "compound" | "per-leg";

export interface AllocationEngineOptions {
  readonly asset: Address;
  readonly oracle: PriceOracle;
  readonly swapper: Swapper;
  readonly mode?: AllocationMode;
  readonly maxSlippageBps?: number;
  readonly slippagePolicy?: SlippagePolicy;
  readonly dustThreshold?: bigint;
}

/** Vault figures the previews are computed against. */
export interface AllocationContext {
  readonly totalAssets: bigint;
  readonly available: bigint;
  /** Assets owed to pending redemptions */
  readonly redemptionDemand: bigint;
}

// =============================================================================
// Results
// =============================================================================

export interface SlotMovement {
  readonly index: number;
  readonly token: Address;
  /** Asset units leaving (invest) or requested input units (liquidate) */
  readonly amount: bigint;
  /** Change of the position, input units */
  readonly positionDelta: bigint;
  /** Asset-denominated value moved */
  readonly value: bigint;
}

export interface InvestResult {
  readonly movements: readonly SlotMovement[];
  readonly totalInvested: bigint;
}

export interface LiquidateResult {
  readonly movements: readonly SlotMovement[];
  readonly totalRecovered: bigint;
}

export interface HarvestResult {
  readonly claims: readonly RewardClaim[];
  /** Asset received for swapped reward tokens, plus asset-denominated rewards */
  readonly assetsReceived: bigint;
}

export interface AllocationSnapshot {
  readonly asset: Address;
  readonly slots: readonly Slot[];
  readonly maxSlippageBps: number;
  readonly slippagePolicy: SlippagePolicy;
  readonly dustThreshold: bigint;
}

// ─── Error Types ─────────────────────────────────────────────────────────

export type AllocationErrorCode =
  | "AMOUNT_TOO_LOW"
  | "AMOUNT_TOO_HIGH"
  | "INCORRECT_ARRAY_LENGTHS"
  | "MISSING_ORACLE"
  | "WRONG_TOKEN"
  | "INVALID_DATA";

export class AllocationError extends Error {
  public readonly code: AllocationErrorCode;

  constructor(code: AllocationErrorCode, message: string) {
    super(message);
    this.name = "AllocationError";
    this.code = code;
  }
}
