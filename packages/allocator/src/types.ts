/**
 * @ballast/allocator — Types for cross-strategy capital allocation.
 *
 * The allocator ("crate") holds idle capital and lends it to registered
 * strategies. Each strategy carries a debt, the capital it currently owes
 * the crate, bounded by its maxDeposit unless it is panicked.
 */

import type { Address } from "@ballast/types";
import type { EventStore } from "@ballast/event-store";
import type { Logger } from "pino";

/**
 * Where the crate sends capital and recalls it from.
 */
export interface StrategyEntryPoint {
  readonly address: Address;
  deposit(amount: bigint): Promise<void>;
  /** Returns the assets actually recovered, which may be below `amount`. */
  withdraw(amount: bigint): Promise<bigint>;
}

export interface Strategy {
  readonly name: string;
  readonly entryPoint: StrategyEntryPoint;
  readonly maxDeposit: bigint;
  readonly debt: bigint;
  /** Sticky until cleared by setPanic */
  readonly panicked: boolean;
}

/**
 * Read-only view of one registered strategy.
 */
export interface StrategyMapEntry {
  readonly strategyName: string;
  readonly strategy: Address;
  readonly maxDeposit: bigint;
  readonly debt: bigint;
  /** max(0, maxDeposit − debt) */
  readonly totalAssetsAvailable: bigint;
  readonly entryPoint: Address;
  readonly panicked: boolean;
}

export interface AllocatorOptions {
  /** Committed events are appended to stream "allocator" */
  readonly store?: EventStore;
  readonly logger?: Logger;
  /** Default: the system clock */
  readonly now?: () => Date;
}

export interface LiquidationResult {
  readonly recovered: bigint;
  /** Debt written off by the recall */
  readonly debtReduction: bigint;
  readonly loss: bigint;
}

// =============================================================================
// Error
// =============================================================================

export type AllocatorErrorCode =
  | "AMOUNT_TOO_LOW"
  | "ADDRESS_IS_ZERO"
  | "INCORRECT_ARRAY_LENGTHS"
  | "MAX_DEPOSIT_REACHED"
  | "NOT_WHITELISTED"
  | "STRATEGY_PANICKED"
  | "INSUFFICIENT_FUNDS"
  | "CANT_UPDATE_CRATE"
  | "UNAUTHORIZED"
  | "REENTRANCY"
  | "INVALID_DATA";

export class AllocatorError extends Error {
  public readonly code: AllocatorErrorCode;

  constructor(code: AllocatorErrorCode, message: string) {
    super(message);
    this.name = "AllocatorError";
    this.code = code;
  }
}
