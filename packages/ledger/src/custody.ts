/**
 * @ballast/ledger — Token custody.
 *
 * The vault's multi-token balance book: the base asset, input tokens
 * waiting to be staked and position receipts. Protocol adapters and
 * swappers move balances through it, and the coordinator snapshots it
 * before every mutating call.
 */

import type { Address } from "@ballast/types";
import { LedgerError } from "./types.js";

export type CustodySnapshot = readonly (readonly [string, bigint])[];

export interface Custody {
  balanceOf(token: Address): bigint;
  credit(token: Address, amount: bigint): void;
  /** Throws INSUFFICIENT_FUNDS when the balance is short. */
  debit(token: Address, amount: bigint): void;
  snapshot(): CustodySnapshot;
  restore(snapshot: CustodySnapshot): void;
}

export class InMemoryCustody implements Custody {
  private readonly _balances = new Map<string, bigint>();

  balanceOf(token: Address): bigint {
    return this._balances.get(token.toLowerCase()) ?? 0n;
  }

  credit(token: Address, amount: bigint): void {
    this._requireNonNegative(amount);
    const key = token.toLowerCase();
    this._balances.set(key, (this._balances.get(key) ?? 0n) + amount);
  }

  debit(token: Address, amount: bigint): void {
    this._requireNonNegative(amount);
    const key = token.toLowerCase();
    const balance = this._balances.get(key) ?? 0n;
    if (balance < amount) {
      throw new LedgerError(
        "INSUFFICIENT_FUNDS",
        `Custody holds ${balance} of ${token}, cannot release ${amount}`,
      );
    }
    this._balances.set(key, balance - amount);
  }

  snapshot(): CustodySnapshot {
    return [...this._balances.entries()];
  }

  restore(snapshot: CustodySnapshot): void {
    this._balances.clear();
    for (const [token, amount] of snapshot) {
      this._balances.set(token, amount);
    }
  }

  private _requireNonNegative(amount: bigint): void {
    if (amount < 0n) {
      throw new LedgerError("INVALID_DATA", `Negative token amount: ${amount}`);
    }
  }
}
