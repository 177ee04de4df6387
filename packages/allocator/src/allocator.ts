/**
 * Allocator — Shared capital pool ("crate") across strategies.
 *
 * Rules:
 * - Every check of a dispatch runs before the first transfer
 * - A strategy's debt never exceeds its maxDeposit unless it is panicked
 * - Panic is sticky: only setPanic clears it, and it blocks dispatches
 *   while still permitting a full exit
 * - A strategy retires only with zero debt
 * - totalChainDebt() is always the sum of every strategy's debt
 * - Any failure restores the crate to its state before the call and
 *   drops the events recorded so far; a dispatch that fails part-way
 *   first recalls the legs already sent
 * - Operations queue behind each other; a strategy calling back in
 *   during an operation fails with REENTRANCY
 */

import pino from "pino";
import type { Logger } from "pino";
import type { Address } from "@ballast/types";
import { ReentrancyGuard, isNonZeroAddress, normalizeAddress } from "@ballast/types";
import { BALLAST_EVENTS, EventBuffer } from "@ballast/event-store";
import type { EventStore } from "@ballast/event-store";
import type {
  AllocatorOptions,
  LiquidationResult,
  Strategy,
  StrategyEntryPoint,
  StrategyMapEntry,
} from "./types.js";
import { AllocatorError } from "./types.js";

export const ALLOCATOR_STREAM = "allocator";

interface CrateSnapshot {
  readonly strategies: ReadonlyMap<Address, Strategy>;
  readonly idle: bigint;
}

export class Allocator {
  private _strategies = new Map<Address, Strategy>();
  private _idle = 0n;
  private readonly _guard = new ReentrancyGuard(
    () => new AllocatorError("REENTRANCY", "Allocator is already executing an operation"),
  );
  private readonly _store: EventStore | undefined;
  private readonly _log: Logger;
  private readonly _now: () => Date;

  constructor(options: AllocatorOptions = {}) {
    this._store = options.store;
    this._log = (options.logger ?? pino({ level: "silent" })).child({ component: "allocator" });
    this._now = options.now ?? (() => new Date());
  }

  // ───────────────────────────────────────────────────────────────────────
  // Views
  // ───────────────────────────────────────────────────────────────────────

  /** Capital held by the crate and not lent to any strategy. */
  get idle(): bigint {
    return this._idle;
  }

  totalChainDebt(): bigint {
    let total = 0n;
    for (const strategy of this._strategies.values()) {
      total += strategy.debt;
    }
    return total;
  }

  getStrategy(address: Address): Strategy | undefined {
    return this._strategies.get(normalizeAddress(address));
  }

  /**
   * Snapshot of every registered strategy in registration order.
   */
  strategyMap(): readonly StrategyMapEntry[] {
    return [...this._strategies.entries()].map(([address, s]) => ({
      strategyName: s.name,
      strategy: address,
      maxDeposit: s.maxDeposit,
      debt: s.debt,
      totalAssetsAvailable: s.maxDeposit > s.debt ? s.maxDeposit - s.debt : 0n,
      entryPoint: s.entryPoint.address,
      panicked: s.panicked,
    }));
  }

  // ───────────────────────────────────────────────────────────────────────
  // Administration
  // ───────────────────────────────────────────────────────────────────────

  async addStrategy(name: string, entryPoint: StrategyEntryPoint, maxDeposit: bigint): Promise<StrategyMapEntry> {
    return this._transact("addStrategy", "allocator", async (events) => {
      if (!isNonZeroAddress(entryPoint.address)) {
        throw new AllocatorError("ADDRESS_IS_ZERO", "Strategy entry point must be a non-zero address");
      }
      if (name.trim() === "") {
        throw new AllocatorError("INVALID_DATA", "Strategy name must not be empty");
      }
      requireNonNegative(maxDeposit, "maxDeposit");

      const address = normalizeAddress(entryPoint.address);
      if (this._strategies.has(address)) {
        throw new AllocatorError("INVALID_DATA", `Strategy ${address} is already registered`);
      }

      this._strategies.set(address, { name, entryPoint, maxDeposit, debt: 0n, panicked: false });
      events.record(BALLAST_EVENTS.STRATEGY_ADDED, {
        strategy: address,
        name,
        maxDeposit: maxDeposit.toString(),
      });
      return this._entry(address);
    });
  }

  async setMaxDeposit(strategy: Address, maxDeposit: bigint): Promise<void> {
    await this._transact("setMaxDeposit", "allocator", async (events) => {
      requireNonNegative(maxDeposit, "maxDeposit");
      const [address, current] = this._require(strategy);
      this._strategies.set(address, { ...current, maxDeposit });
      events.record(BALLAST_EVENTS.MAX_DEPOSIT_UPDATED, {
        strategy: address,
        previousMaxDeposit: current.maxDeposit.toString(),
        maxDeposit: maxDeposit.toString(),
      });
    });
  }

  async setPanic(strategy: Address, panicked: boolean): Promise<void> {
    await this._transact("setPanic", "allocator", async (events) => {
      const [address, current] = this._require(strategy);
      this._strategies.set(address, { ...current, panicked });
      events.record(BALLAST_EVENTS.PANIC_SET, { strategy: address, panicked });
    });
  }

  /**
   * Add idle capital to the crate.
   */
  async fund(amount: bigint): Promise<void> {
    await this._transact("fund", "allocator", async (events) => {
      if (amount <= 0n) {
        throw new AllocatorError("AMOUNT_TOO_LOW", "Funding amount must be positive");
      }
      this._idle += amount;
      events.record(BALLAST_EVENTS.CRATE_FUNDED, {
        amount: amount.toString(),
        idle: this._idle.toString(),
      });
    });
  }

  async retireStrategy(strategy: Address): Promise<void> {
    await this._transact("retireStrategy", "allocator", async (events) => {
      const [address, current] = this._require(strategy);
      if (current.debt > 0n) {
        throw new AllocatorError(
          "CANT_UPDATE_CRATE",
          `Strategy ${address} still owes ${current.debt.toString()}`,
        );
      }
      this._strategies.delete(address);
      events.record(BALLAST_EVENTS.STRATEGY_RETIRED, { strategy: address });
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Capital movement
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Lend `amounts[i]` to `strategies[i]`. A strategy may appear more than
   * once; its ceiling is checked against the combined amount.
   *
   * @returns totalChainDebt after the dispatch
   */
  async dispatchAssets(amounts: readonly bigint[], strategies: readonly Address[]): Promise<bigint> {
    return this._transact("dispatchAssets", "allocator", async (events) => {
      if (amounts.length !== strategies.length || amounts.length === 0) {
        throw new AllocatorError(
          "INCORRECT_ARRAY_LENGTHS",
          `Got ${String(amounts.length)} amounts for ${String(strategies.length)} strategies`,
        );
      }

      const projected = new Map<Address, bigint>();
      const legs: { address: Address; amount: bigint }[] = [];
      let total = 0n;

      for (const [i, target] of strategies.entries()) {
        const amount = amounts[i] ?? 0n;
        if (amount <= 0n) {
          throw new AllocatorError("AMOUNT_TOO_LOW", `Dispatch amount #${String(i)} must be positive`);
        }
        const [address, current] = this._require(target);
        if (current.panicked) {
          throw new AllocatorError("STRATEGY_PANICKED", `Strategy ${address} is panicked`);
        }
        const debt = (projected.get(address) ?? current.debt) + amount;
        if (debt > current.maxDeposit) {
          throw new AllocatorError(
            "MAX_DEPOSIT_REACHED",
            `Strategy ${address} debt ${debt.toString()} would exceed ${current.maxDeposit.toString()}`,
          );
        }
        projected.set(address, debt);
        legs.push({ address, amount });
        total += amount;
      }

      if (total > this._idle) {
        throw new AllocatorError(
          "INSUFFICIENT_FUNDS",
          `Dispatch of ${total.toString()} exceeds idle ${this._idle.toString()}`,
        );
      }

      const debtBefore = this.totalChainDebt();
      const sent: { entryPoint: StrategyEntryPoint; amount: bigint }[] = [];
      for (const { address, amount } of legs) {
        const [, current] = this._require(address);
        try {
          await current.entryPoint.deposit(amount);
        } catch (error) {
          await this._recallSent(sent);
          throw error;
        }
        sent.push({ entryPoint: current.entryPoint, amount });
        this._idle -= amount;
        const debtAfter = current.debt + amount;
        this._strategies.set(address, { ...current, debt: debtAfter });
        events.record(BALLAST_EVENTS.DEPOSIT_IN_STRATEGY, {
          strategy: address,
          amount: amount.toString(),
          debtBefore: current.debt.toString(),
          debtAfter: debtAfter.toString(),
        });
      }

      return this._recordChainDebt(events, debtBefore);
    });
  }

  /**
   * Recall `amount` from a strategy. The strategy's debt drops by the
   * amount requested, capped at its debt; a shortfall against that
   * reduction is reported as a loss.
   *
   * @throws AllocatorError AMOUNT_TOO_LOW when fewer than `minAmountOut` assets return
   */
  async liquidateStrategy(
    amount: bigint,
    minAmountOut: bigint,
    strategy: Address,
  ): Promise<LiquidationResult> {
    return this._transact("liquidateStrategy", "allocator", async (events) => {
      const [address, current] = this._require(strategy);
      if (amount <= 0n) {
        throw new AllocatorError("AMOUNT_TOO_LOW", "Liquidation amount must be positive");
      }

      const debtBefore = this.totalChainDebt();
      const recovered = await current.entryPoint.withdraw(amount);
      if (recovered < minAmountOut) {
        throw new AllocatorError(
          "AMOUNT_TOO_LOW",
          `Recovered ${recovered.toString()} below minimum ${minAmountOut.toString()}`,
        );
      }

      const debtReduction = amount < current.debt ? amount : current.debt;
      const loss = recovered < debtReduction ? debtReduction - recovered : 0n;
      this._settleRecall(address, current, recovered, debtReduction);

      events.record(BALLAST_EVENTS.STRATEGY_WITHDRAW, {
        strategy: address,
        amount: amount.toString(),
        recovered: recovered.toString(),
      });
      events.record(BALLAST_EVENTS.STRAT_POSITION_UPDATED, {
        strategy: address,
        debtBefore: current.debt.toString(),
        debtAfter: (current.debt - debtReduction).toString(),
      });
      if (loss > 0n) {
        events.record(BALLAST_EVENTS.LOSSES, { strategy: address, loss: loss.toString() });
      }
      this._recordChainDebt(events, debtBefore);

      return { recovered, debtReduction, loss };
    });
  }

  /**
   * Flag a strategy panicked and recall its whole debt with no minimum.
   */
  async panicLiquidateStrategy(strategy: Address): Promise<LiquidationResult> {
    return this._transact("panicLiquidateStrategy", "allocator", async (events) => {
      const [address, current] = this._require(strategy);
      const debtBefore = this.totalChainDebt();

      if (!current.panicked) {
        events.record(BALLAST_EVENTS.PANIC_SET, { strategy: address, panicked: true });
      }
      const panicked: Strategy = { ...current, panicked: true };
      this._strategies.set(address, panicked);

      const recovered = current.debt > 0n ? await current.entryPoint.withdraw(current.debt) : 0n;
      const loss = recovered < current.debt ? current.debt - recovered : 0n;
      this._settleRecall(address, panicked, recovered, current.debt);

      events.record(BALLAST_EVENTS.PANIC_LIQUIDATE, {
        strategy: address,
        debt: current.debt.toString(),
        recovered: recovered.toString(),
      });
      if (loss > 0n) {
        events.record(BALLAST_EVENTS.LOSSES, { strategy: address, loss: loss.toString() });
      }
      this._recordChainDebt(events, debtBefore);

      return { recovered, debtReduction: current.debt, loss };
    });
  }

  /**
   * A strategy reports its own debt, e.g. after compounding. Only the
   * maxDeposit bound is enforced, and not while the strategy is panicked.
   */
  async updateStrategyDebt(caller: Address, newDebt: bigint): Promise<void> {
    await this._transact("updateStrategyDebt", caller, async (events) => {
      const current = isNonZeroAddress(caller) ? this._strategies.get(normalizeAddress(caller)) : undefined;
      if (current === undefined) {
        throw new AllocatorError("UNAUTHORIZED", `${caller} is not a registered strategy`);
      }
      requireNonNegative(newDebt, "newDebt");
      if (!current.panicked && newDebt > current.maxDeposit) {
        throw new AllocatorError(
          "MAX_DEPOSIT_REACHED",
          `Reported debt ${newDebt.toString()} exceeds ${current.maxDeposit.toString()}`,
        );
      }

      const address = normalizeAddress(caller);
      const debtBefore = this.totalChainDebt();
      this._strategies.set(address, { ...current, debt: newDebt });
      events.record(BALLAST_EVENTS.STRATEGY_UPDATE, {
        strategy: address,
        debtBefore: current.debt.toString(),
        debtAfter: newDebt.toString(),
      });
      this._recordChainDebt(events, debtBefore);
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private _require(strategy: Address): [Address, Strategy] {
    const address = normalizeAddress(strategy);
    const current = this._strategies.get(address);
    if (current === undefined) {
      throw new AllocatorError("NOT_WHITELISTED", `Strategy ${address} is not registered`);
    }
    return [address, current];
  }

  private _entry(address: Address): StrategyMapEntry {
    const entry = this.strategyMap().find((e) => e.strategy === address);
    if (entry === undefined) {
      throw new AllocatorError("NOT_WHITELISTED", `Strategy ${address} is not registered`);
    }
    return entry;
  }

  /**
   * Take back the legs of a failed dispatch that already reached their
   * strategies, latest first, so the restored crate matches what the
   * strategies hold. A strategy that cannot return a leg in full is
   * logged; the dispatch still fails with its original error.
   */
  private async _recallSent(sent: readonly { entryPoint: StrategyEntryPoint; amount: bigint }[]): Promise<void> {
    for (const { entryPoint, amount } of [...sent].reverse()) {
      try {
        const recovered = await entryPoint.withdraw(amount);
        if (recovered < amount) {
          this._log.error(
            { strategy: entryPoint.address, amount: amount.toString(), recovered: recovered.toString() },
            "failed dispatch leg returned short",
          );
        }
      } catch (error) {
        this._log.error(
          { strategy: entryPoint.address, amount: amount.toString(), err: error },
          "failed dispatch leg could not be recalled",
        );
      }
    }
  }

  private _settleRecall(address: Address, current: Strategy, recovered: bigint, debtReduction: bigint): void {
    this._idle += recovered;
    this._strategies.set(address, { ...current, debt: current.debt - debtReduction });
  }

  private _recordChainDebt(events: EventBuffer, before: bigint): bigint {
    const after = this.totalChainDebt();
    events.record(BALLAST_EVENTS.CHAIN_DEBT_UPDATE, {
      totalChainDebtBefore: before.toString(),
      totalChainDebt: after.toString(),
    });
    return after;
  }

  private _snapshot(): CrateSnapshot {
    return { strategies: new Map(this._strategies), idle: this._idle };
  }

  private _restore(snapshot: CrateSnapshot): void {
    this._strategies = new Map(snapshot.strategies);
    this._idle = snapshot.idle;
  }

  private _buffer(actor: string): EventBuffer {
    return new EventBuffer({ source: "allocator", actor, timestamp: this._now().toISOString() });
  }

  private _commit(operation: string, events: EventBuffer): void {
    if (this._store !== undefined && events.size > 0) {
      this._store.append(ALLOCATOR_STREAM, events.events);
    }
    this._log.info(
      { operation, idle: this._idle.toString(), totalChainDebt: this.totalChainDebt().toString() },
      `${operation} committed`,
    );
  }

  private _rollback(operation: string, snapshot: CrateSnapshot, error: unknown): void {
    this._restore(snapshot);
    this._log.warn({ operation, code: errorCode(error) }, `${operation} rolled back`);
  }

  private async _transact<T>(
    operation: string,
    actor: string,
    fn: (events: EventBuffer) => Promise<T>,
  ): Promise<T> {
    return this._guard.runAsync(async () => {
      const snapshot = this._snapshot();
      const events = this._buffer(actor);
      try {
        const result = await fn(events);
        this._commit(operation, events);
        return result;
      } catch (error) {
        this._rollback(operation, snapshot, error);
        throw error;
      }
    });
  }
}

function requireNonNegative(value: bigint, name: string): void {
  if (value < 0n) {
    throw new AllocatorError("INVALID_DATA", `${name} must not be negative`);
  }
}

function errorCode(error: unknown): string {
  return typeof error === "object" && error !== null && "code" in error ? String(error.code) : "UNKNOWN";
}
