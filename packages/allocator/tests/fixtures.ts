/**
 * Shared fixtures for @ballast/allocator tests.
 */

import type { Address } from "@ballast/types";
import { InMemoryEventStore, createBallastCatalog } from "@ballast/event-store";
import { Allocator } from "../src/allocator.js";
import type { StrategyEntryPoint } from "../src/types.js";

export const STRATEGY_A: Address = "0x0000000000000000000000000000000000000511";
export const STRATEGY_B: Address = "0x0000000000000000000000000000000000000522";
export const STRANGER: Address = "0x0000000000000000000000000000000000000099";

export const FIXED_NOW = new Date("2026-03-01T12:00:00.000Z");

/**
 * Strategy that holds what it is sent and returns it on withdrawal,
 * less `lossBps`.
 */
export class MockStrategy implements StrategyEntryPoint {
  held = 0n;
  lossBps = 0;
  failure: Error | undefined;
  /** Runs inside deposit, before the funds are taken */
  onDeposit: (() => Promise<void>) | undefined;
  readonly deposits: bigint[] = [];

  constructor(readonly address: Address) {}

  async deposit(amount: bigint): Promise<void> {
    if (this.onDeposit !== undefined) await this.onDeposit();
    if (this.failure !== undefined) throw this.failure;
    this.deposits.push(amount);
    this.held += amount;
  }

  async withdraw(amount: bigint): Promise<bigint> {
    if (this.failure !== undefined) throw this.failure;
    const taken = amount < this.held ? amount : this.held;
    this.held -= taken;
    return taken - (taken * BigInt(this.lossBps)) / 10_000n;
  }
}

export interface Harness {
  readonly allocator: Allocator;
  readonly store: InMemoryEventStore;
  readonly a: MockStrategy;
  readonly b: MockStrategy;
}

/** Crate funded with 1000, two strategies capped at 600 and 400. */
export async function createHarness(): Promise<Harness> {
  const store = new InMemoryEventStore({ catalog: createBallastCatalog(), now: () => FIXED_NOW });
  const allocator = new Allocator({ store, now: () => FIXED_NOW });
  const a = new MockStrategy(STRATEGY_A);
  const b = new MockStrategy(STRATEGY_B);
  await allocator.addStrategy("lending", a, 600n);
  await allocator.addStrategy("staking", b, 400n);
  await allocator.fund(1000n);
  return { allocator, store, a, b };
}

/** Event types appended since `position`, in order. */
export function typesSince(store: InMemoryEventStore, position: number): string[] {
  return store.readAll({ fromPosition: position + 1 }).map((e) => e.event.type);
}
