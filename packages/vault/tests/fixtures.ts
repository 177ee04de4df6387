/**
 * Shared fixtures for @ballast/vault tests.
 */

import type { Address } from "@ballast/types";
import { InMemoryCustody } from "@ballast/ledger";
import type { FeeSchedule } from "@ballast/ledger";
import { InMemoryEventStore, createBallastCatalog } from "@ballast/event-store";
import { MockLendingAdapter, OracleSwapper, StaticPriceOracle } from "@ballast/allocation/testing";
import type { MockReward } from "@ballast/allocation/testing";
import type { InputConfig, Swapper } from "@ballast/allocation";
import { Vault, VAULT_STREAM } from "../src/vault.js";
import { parseVaultConfig } from "../src/config.js";
import type { VaultConfigInput } from "../src/config.js";

export const VAULT: Address = "0x0000000000000000000000000000000000000c01";
export const MANAGER: Address = "0x0000000000000000000000000000000000000c02";
export const COLLECTOR: Address = "0x0000000000000000000000000000000000000c03";
export const ALICE: Address = "0x0000000000000000000000000000000000000e01";
export const BOB: Address = "0x0000000000000000000000000000000000000e02";

export const USDC: Address = "0x00000000000000000000000000000000000000a0";
export const WETH: Address = "0x00000000000000000000000000000000000000a2";
export const RECEIPT_A: Address = "0x00000000000000000000000000000000000000d1";
export const RECEIPT_B: Address = "0x00000000000000000000000000000000000000d2";
export const RECEIPT_W: Address = "0x00000000000000000000000000000000000000d9";

/** One whole USDC */
export const ONE = 1_000_000n;

export const NOW = 1_767_225_600;

export const NO_FEES: FeeSchedule = { perf: 0, mgmt: 0, entry: 0, exit: 0 };

export function baseConfig(overrides: Partial<VaultConfigInput> = {}): VaultConfigInput {
  return {
    vault: VAULT,
    asset: USDC,
    assetDecimals: 6,
    shareDecimals: 6,
    manager: MANAGER,
    feeCollector: COLLECTOR,
    fees: NO_FEES,
    ...overrides,
  };
}

/** 1 USDC = $1, 1 WETH = $2000 (8-decimal quotes) */
export function createOracle(): StaticPriceOracle {
  return new StaticPriceOracle().setPrice(USDC, 100_000_000n, 6).setPrice(WETH, 200_000_000_000n, 18);
}

export interface Harness {
  readonly vault: Vault;
  readonly custody: InMemoryCustody;
  readonly oracle: StaticPriceOracle;
  readonly swapper: OracleSwapper;
  readonly store: InMemoryEventStore;
  readonly clock: { now: number };
}

export function createHarness(
  overrides: Partial<VaultConfigInput> = {},
  swapper?: Swapper,
): Harness {
  const custody = new InMemoryCustody();
  const oracle = createOracle();
  const oracleSwapper = new OracleSwapper(oracle);
  const store = new InMemoryEventStore({ catalog: createBallastCatalog() });
  const clock = { now: NOW };
  const vault = new Vault(parseVaultConfig(baseConfig(overrides)), {
    oracle,
    swapper: swapper ?? oracleSwapper,
    custody,
    store,
    clock: () => clock.now,
  });
  return { vault, custody, oracle, swapper: oracleSwapper, store, clock };
}

export type LendingInput = InputConfig & { readonly adapter: MockLendingAdapter };

export function lendingInput(
  token: Address,
  receipt: Address,
  weight: number,
  reward?: MockReward,
): LendingInput {
  return {
    token,
    weight,
    decimals: token === WETH ? 18 : 6,
    positionHandle: receipt,
    adapter: new MockLendingAdapter({ token, receipt, reward }),
  };
}

/** Two USDC lending inputs weighted 50% / 45%, leaving a 5% cash buffer. */
export function usdcInputs(reward?: MockReward): [LendingInput, LendingInput] {
  return [lendingInput(USDC, RECEIPT_A, 5_000, reward), lendingInput(USDC, RECEIPT_B, 4_500)];
}

export function eventTypes(store: InMemoryEventStore, fromVersion = 1): string[] {
  if (!store.streamExists(VAULT_STREAM)) return [];
  return store.read(VAULT_STREAM, { fromVersion }).map((e) => e.event.type);
}

export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("Expected the call to throw");
}
