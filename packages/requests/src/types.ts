/**
 * @ballast/requests — Types for asynchronous deposit / redeem requests.
 *
 * Lifecycle (one open request per operator):
 *
 *   (none) → pending → claimable → claimed
 *                    ↘ canceled
 *
 * Terminal records leave the queue; the operator may then open a new one.
 */

import type { Address } from "@ballast/types";

export type RequestKind = "deposit" | "redeem";

export type RequestStatus = "pending" | "claimable" | "canceled" | "claimed";

/**
 * A pending or settled request.
 *
 * `assetsOrShares` is the escrow: assets for a deposit, shares for a
 * redemption. `claimable` is filled at settlement: shares minted for a
 * deposit, assets locked for a redemption.
 */
export interface Erc7540Request {
  readonly id: string;
  /** Admission order across all operators */
  readonly sequence: number;
  readonly kind: RequestKind;
  readonly operator: Address;
  readonly owner: Address;
  readonly receiver: Address;
  readonly assetsOrShares: bigint;
  readonly requestTimestamp: number;
  readonly sharePriceAtRequest: bigint;
  /** Vault asset at the time of the request */
  readonly asset: Address;
  readonly status: RequestStatus;
  readonly claimable: bigint;
  readonly settledAt?: number;
}

/**
 * Vault conditions a new request is admitted under.
 */
export interface AdmissionContext {
  readonly now: number;
  readonly sharePrice: bigint;
  readonly asset: Address;
  /** Every price feed the vault depends on is live */
  readonly oracleReady: boolean;
}

/**
 * Vault conditions settlement runs under.
 */
export interface SettlementContext {
  readonly now: number;
  readonly asset: Address;
  readonly sharePrice: bigint;
  readonly weiPerShare: bigint;
  /** Idle assets that may be locked for redemptions */
  readonly liquidity: bigint;
}

export interface SettlementResult {
  readonly deposits: readonly Erc7540Request[];
  readonly redemptions: readonly Erc7540Request[];
  /** Escrowed deposit assets released into the vault */
  readonly depositedAssets: bigint;
  /** Shares minted for settled deposits */
  readonly mintedShares: bigint;
  /** Escrowed shares to burn for settled redemptions */
  readonly burnedShares: bigint;
  /** Assets locked for settled redemptions */
  readonly lockedAssets: bigint;
}

export interface ClaimContext {
  readonly now: number;
  readonly deadline: number;
  readonly asset: Address;
}

export interface RequestQueueSnapshot {
  readonly requests: readonly Erc7540Request[];
  readonly sequence: number;
}

// ─── Error Types ─────────────────────────────────────────────────────────

export type RequestErrorCode =
  | "AMOUNT_TOO_LOW"
  | "ADDRESS_IS_ZERO"
  | "WRONG_REQUEST"
  | "TRANSACTION_EXPIRED"
  | "WRONG_TOKEN"
  | "INSUFFICIENT_FUNDS"
  | "MISSING_ORACLE";

export class RequestError extends Error {
  public readonly code: RequestErrorCode;

  constructor(code: RequestErrorCode, message: string) {
    super(message);
    this.name = "RequestError";
    this.code = code;
  }
}
