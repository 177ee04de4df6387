/**
 * RequestQueue — ERC-7540-style asynchronous deposits and redemptions.
 *
 * Decouples a user's intent to enter or leave the vault from the moment
 * liquidity allows it. The queue owns the request records only; moving
 * assets and shares in and out of escrow is the vault's job.
 *
 * Rules:
 * - One open request per operator
 * - Cancellation is unconditional while pending
 * - Settlement is FIFO and driven by the vault, never by the requester
 * - Redemptions settle at min(price at request, price at settlement)
 */

import type { Address } from "@ballast/types";
import { ZERO_ADDRESS, sameAddress } from "@ballast/types";
import { minBigInt, mulDiv } from "@ballast/ledger";
import type {
  AdmissionContext,
  ClaimContext,
  Erc7540Request,
  RequestKind,
  RequestQueueSnapshot,
  RequestStatus,
  SettlementContext,
  SettlementResult,
} from "./types.js";
import { RequestError } from "./types.js";

// =============================================================================
// Valid Transitions
// =============================================================================

const VALID_TRANSITIONS: Record<RequestStatus, readonly RequestStatus[]> = {
  pending: ["claimable", "canceled"],
  claimable: ["claimed"],
  canceled: [],
  claimed: [],
};

function key(operator: Address): string {
  return operator.toLowerCase();
}

// =============================================================================
// Request Queue
// =============================================================================

export class RequestQueue {
  /** Open requests keyed by operator, in admission order */
  private readonly _requests = new Map<string, Erc7540Request>();
  private _sequence = 0;

  // ───────────────────────────────────────────────────────────────────────
  // Admission
  // ───────────────────────────────────────────────────────────────────────

  requestDeposit(
    operator: Address,
    owner: Address,
    receiver: Address,
    assets: bigint,
    context: AdmissionContext,
  ): Erc7540Request {
    return this._admit("deposit", operator, owner, receiver, assets, context);
  }

  requestRedeem(
    operator: Address,
    owner: Address,
    receiver: Address,
    shares: bigint,
    context: AdmissionContext,
  ): Erc7540Request {
    return this._admit("redeem", operator, owner, receiver, shares, context);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Cancellation
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Cancel a pending deposit. The returned request's `assetsOrShares`
   * is the escrow to refund.
   */
  cancelDepositRequest(operator: Address): Erc7540Request {
    return this._cancel("deposit", operator);
  }

  cancelRedeemRequest(operator: Address): Erc7540Request {
    return this._cancel("redeem", operator);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Settlement
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Settle pending requests in admission order.
   *
   * Deposits settle and add their escrow to the liquidity budget, unless
   * the share price is zero: a deposit cannot be priced against a vault
   * with no assets left, so it stays pending until cancelled or the price
   * recovers. Redemptions settle while the budget covers their locked assets; the
   * first one that does not fit stops all later redemptions so no request
   * is overtaken. Requests opened under a previous asset are skipped.
   */
  settle(context: SettlementContext): SettlementResult {
    const deposits: Erc7540Request[] = [];
    const redemptions: Erc7540Request[] = [];
    let budget = context.liquidity;
    let redemptionsBlocked = false;
    let depositedAssets = 0n;
    let mintedShares = 0n;
    let burnedShares = 0n;
    let lockedAssets = 0n;

    for (const request of this._ordered()) {
      if (request.status !== "pending" || !sameAddress(request.asset, context.asset)) {
        continue;
      }

      if (request.kind === "deposit") {
        if (context.sharePrice === 0n) continue;
        const shares = mulDiv(request.assetsOrShares, context.weiPerShare, context.sharePrice);
        const settled = this._transition(request, "claimable", {
          claimable: shares,
          settledAt: context.now,
        });
        deposits.push(settled);
        budget += request.assetsOrShares;
        depositedAssets += request.assetsOrShares;
        mintedShares += shares;
        continue;
      }

      if (redemptionsBlocked) continue;
      const price = minBigInt(request.sharePriceAtRequest, context.sharePrice);
      const assets = mulDiv(request.assetsOrShares, price, context.weiPerShare);
      if (assets > budget) {
        redemptionsBlocked = true;
        continue;
      }
      const settled = this._transition(request, "claimable", {
        claimable: assets,
        settledAt: context.now,
      });
      redemptions.push(settled);
      budget -= assets;
      burnedShares += request.assetsOrShares;
      lockedAssets += assets;
    }

    return { deposits, redemptions, depositedAssets, mintedShares, burnedShares, lockedAssets };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Claim
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Claim a settled request. The returned request's `claimable` is what
   * the vault releases: shares for a deposit, assets for a redemption.
   */
  claim(kind: RequestKind, operator: Address, context: ClaimContext): Erc7540Request {
    const request = this._requireRequest(kind, operator);

    if (context.now > context.deadline) {
      throw new RequestError(
        "TRANSACTION_EXPIRED",
        `Claim deadline ${String(context.deadline)} has passed (now ${String(context.now)})`,
      );
    }
    if (!sameAddress(request.asset, context.asset)) {
      throw new RequestError(
        "WRONG_TOKEN",
        `Request '${request.id}' was made in ${request.asset}, the vault now holds ${context.asset}`,
      );
    }
    if (request.status === "pending") {
      throw new RequestError(
        "INSUFFICIENT_FUNDS",
        `Request '${request.id}' has not been settled yet`,
      );
    }

    return this._transition(request, "claimed");
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  get(operator: Address): Erc7540Request | undefined {
    return this._requests.get(key(operator));
  }

  list(): readonly Erc7540Request[] {
    return this._ordered();
  }

  pendingDepositRequest(operator: Address): bigint {
    return this._amountOf(operator, "deposit", "pending");
  }

  pendingRedeemRequest(operator: Address): bigint {
    return this._amountOf(operator, "redeem", "pending");
  }

  claimableDepositRequest(operator: Address): bigint {
    return this._amountOf(operator, "deposit", "claimable");
  }

  claimableRedeemRequest(operator: Address): bigint {
    return this._amountOf(operator, "redeem", "claimable");
  }

  /** Escrowed assets of pending deposits in `asset`. */
  totalDepositRequest(asset: Address): bigint {
    return this._sum((r) => r.kind === "deposit" && r.status === "pending" && sameAddress(r.asset, asset), "escrow");
  }

  /** Escrowed shares of pending redemptions. */
  totalRedemptionRequest(): bigint {
    return this._sum((r) => r.kind === "redeem" && r.status === "pending", "escrow");
  }

  /** Assets locked for settled, unclaimed redemptions in `asset`. */
  totalClaimableRedemption(asset: Address): bigint {
    return this._sum((r) => r.kind === "redeem" && r.status === "claimable" && sameAddress(r.asset, asset), "claimable");
  }

  /** Shares minted for settled, unclaimed deposits. */
  totalClaimableShares(): bigint {
    return this._sum((r) => r.kind === "deposit" && r.status === "claimable", "claimable");
  }

  /**
   * Assets held in custody on behalf of requesters: pending deposit
   * escrow plus locked redemption assets. Excluded from `available`.
   */
  reservedAssets(asset: Address): bigint {
    return this.totalDepositRequest(asset) + this.totalClaimableRedemption(asset);
  }

  hasClaimable(): boolean {
    for (const request of this._requests.values()) {
      if (request.status === "claimable") return true;
    }
    return false;
  }

  get size(): number {
    return this._requests.size;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Snapshots
  // ───────────────────────────────────────────────────────────────────────

  snapshot(): RequestQueueSnapshot {
    return { requests: this._ordered(), sequence: this._sequence };
  }

  restore(snapshot: RequestQueueSnapshot): void {
    this._requests.clear();
    for (const request of snapshot.requests) {
      this._requests.set(key(request.operator), request);
    }
    this._sequence = snapshot.sequence;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private _admit(
    kind: RequestKind,
    operator: Address,
    owner: Address,
    receiver: Address,
    amount: bigint,
    context: AdmissionContext,
  ): Erc7540Request {
    if (amount <= 0n) {
      throw new RequestError("AMOUNT_TOO_LOW", `A ${kind} request needs a positive amount`);
    }
    for (const address of [operator, owner, receiver]) {
      if (sameAddress(address, ZERO_ADDRESS)) {
        throw new RequestError("ADDRESS_IS_ZERO", `A ${kind} request cannot involve the zero address`);
      }
    }
    const existing = this._requests.get(key(operator));
    if (existing !== undefined) {
      throw new RequestError(
        "WRONG_REQUEST",
        `Operator ${operator} already has an open ${existing.kind} request '${existing.id}'`,
      );
    }
    if (!context.oracleReady) {
      throw new RequestError("MISSING_ORACLE", `Price feeds are not ready, ${kind} requests are paused`);
    }

    this._sequence += 1;
    const request: Erc7540Request = {
      id: `${kind}-${String(this._sequence)}`,
      sequence: this._sequence,
      kind,
      operator,
      owner,
      receiver,
      assetsOrShares: amount,
      requestTimestamp: context.now,
      sharePriceAtRequest: context.sharePrice,
      asset: context.asset,
      status: "pending",
      claimable: 0n,
    };
    this._requests.set(key(operator), request);
    return request;
  }

  private _cancel(kind: RequestKind, operator: Address): Erc7540Request {
    const request = this._requireRequest(kind, operator);
    return this._transition(request, "canceled");
  }

  private _requireRequest(kind: RequestKind, operator: Address): Erc7540Request {
    const request = this._requests.get(key(operator));
    if (request === undefined || request.kind !== kind) {
      throw new RequestError("WRONG_REQUEST", `Operator ${operator} has no open ${kind} request`);
    }
    return request;
  }

  private _transition(
    request: Erc7540Request,
    to: RequestStatus,
    changes: Partial<Pick<Erc7540Request, "claimable" | "settledAt">> = {},
  ): Erc7540Request {
    if (!VALID_TRANSITIONS[request.status].includes(to)) {
      throw new RequestError(
        "WRONG_REQUEST",
        `Request '${request.id}' cannot move from ${request.status} to ${to}`,
      );
    }
    const next: Erc7540Request = { ...request, ...changes, status: to };
    if (VALID_TRANSITIONS[to].length === 0) {
      this._requests.delete(key(request.operator));
    } else {
      this._requests.set(key(request.operator), next);
    }
    return next;
  }

  private _ordered(): Erc7540Request[] {
    return [...this._requests.values()].sort((a, b) => a.sequence - b.sequence);
  }

  private _amountOf(operator: Address, kind: RequestKind, status: RequestStatus): bigint {
    const request = this._requests.get(key(operator));
    if (request === undefined || request.kind !== kind || request.status !== status) {
      return 0n;
    }
    return status === "pending" ? request.assetsOrShares : request.claimable;
  }

  private _sum(filter: (request: Erc7540Request) => boolean, field: "escrow" | "claimable"): bigint {
    let total = 0n;
    for (const request of this._requests.values()) {
      if (filter(request)) {
        total += field === "escrow" ? request.assetsOrShares : request.claimable;
      }
    }
    return total;
  }
}
