/**
 * Shared fixtures for @ballast/allocation tests.
 */

import type { Address } from "@ballast/types";
import { InMemoryCustody } from "@ballast/ledger";
import { AllocationEngine } from "../src/allocation-engine.js";
import type { AllocationEngineOptions, InputConfig } from "../src/types.js";
import { MockLendingAdapter, OracleSwapper, StaticPriceOracle } from "../src/testing.js";
import type { MockReward } from "../src/testing.js";

export const USDC: Address = "0x00000000000000000000000000000000000000a0";
export const WETH: Address = "0x00000000000000000000000000000000000000a2";
export const COMP: Address = "0x00000000000000000000000000000000000000a3";
export const RECEIPT_A: Address = "0x00000000000000000000000000000000000000d1";
export const RECEIPT_B: Address = "0x00000000000000000000000000000000000000d2";
export const RECEIPT_C: Address = "0x00000000000000000000000000000000000000d3";

/** 1 USDC = $1, 1 WETH = $2000, 1 COMP = $50 (8-decimal quotes) */
export function createOracle(): StaticPriceOracle {
  return new StaticPriceOracle()
    .setPrice(USDC, 100_000_000n, 6)
    .setPrice(WETH, 200_000_000_000n, 18)
    .setPrice(COMP, 5_000_000_000n, 18);
}

export interface EngineHarness {
  readonly custody: InMemoryCustody;
  readonly oracle: StaticPriceOracle;
  readonly swapper: OracleSwapper;
  readonly engine: AllocationEngine;
}

export function createEngine(options: Partial<AllocationEngineOptions> = {}): EngineHarness {
  const custody = new InMemoryCustody();
  const oracle = createOracle();
  const swapper = new OracleSwapper(oracle);
  const engine = new AllocationEngine(custody, {
    asset: USDC,
    oracle,
    swapper,
    ...options,
  });
  return { custody, oracle, swapper, engine };
}

export function lendingInput(
  token: Address,
  receipt: Address,
  weight: number,
  reward?: MockReward,
): InputConfig & { readonly adapter: MockLendingAdapter } {
  const adapter = new MockLendingAdapter({ token, receipt, reward });
  return {
    token,
    weight,
    decimals: token === WETH || token === COMP ? 18 : 6,
    positionHandle: receipt,
    adapter,
  };
}
