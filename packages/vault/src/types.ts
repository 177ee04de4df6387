/**
 * @ballast/vault — Types for the vault coordinator.
 */

import type { Logger } from "pino";
import type { Address } from "@ballast/types";
import type { EventStore } from "@ballast/event-store";
import type { Custody, FeeCollection, ShareLedgerSnapshot, CustodySnapshot } from "@ballast/ledger";
import type { RequestQueueSnapshot } from "@ballast/requests";
import type {
  AllocationSnapshot,
  HarvestResult,
  InvestResult,
  PriceOracle,
  Swapper,
} from "@ballast/allocation";

/**
 * Collaborators and infrastructure injected into a Vault.
 */
export interface VaultDependencies {
  readonly oracle: PriceOracle;
  readonly swapper: Swapper;
  /** Default: a fresh InMemoryCustody */
  readonly custody?: Custody;
  /** Committed events are appended to stream "vault" */
  readonly store?: EventStore;
  readonly logger?: Logger;
  /** Unix seconds. Default: the system clock */
  readonly clock?: () => number;
}

export interface VaultSnapshot {
  readonly ledger: ShareLedgerSnapshot;
  readonly queue: RequestQueueSnapshot;
  readonly allocation: AllocationSnapshot;
  readonly custody: CustodySnapshot;
  /** Pending rescues as [token, requestedAt] */
  readonly rescues: readonly (readonly [string, number])[];
}

export interface RescueRequest {
  readonly token: Address;
  readonly requestedAt: number;
  readonly unlocksAt: number;
  readonly expiresAt: number;
}

export interface CompoundResult {
  readonly harvest: HarvestResult;
  readonly invest: InvestResult;
}

export interface EmptyStrategyResult {
  readonly totalRecovered: bigint;
  /** null while the fee cooldown is running */
  readonly fees: FeeCollection | null;
}

// =============================================================================
// Error
// =============================================================================

export type VaultErrorCode =
  | "UNAUTHORIZED"
  | "REENTRANCY"
  | "INSUFFICIENT_FUNDS"
  | "AMOUNT_TOO_LOW"
  | "WRONG_REQUEST"
  | "WRONG_TOKEN"
  | "MISSING_ORACLE"
  | "INVALID_DATA"
  | "INVALID_CONFIG";

export class VaultError extends Error {
  public readonly code: VaultErrorCode;

  constructor(code: VaultErrorCode, message: string) {
    super(message);
    this.name = "VaultError";
    this.code = code;
  }
}
