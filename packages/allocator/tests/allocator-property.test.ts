/**
 * Property-based tests for crate accounting.
 *
 * 1. totalChainDebt() equals the sum of strategy debts after any sequence
 * 2. With lossless strategies, idle + debt is conserved
 * 3. No strategy that is not panicked ends above its ceiling
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { AllocatorError } from "../src/types.js";
import { STRATEGY_A, STRATEGY_B, createHarness } from "./fixtures.js";

const arbOp = fc.record({
  kind: fc.constantFrom("dispatch", "liquidate", "panic"),
  target: fc.constantFrom(STRATEGY_A, STRATEGY_B),
  amount: fc.bigInt({ min: 1n, max: 700n }),
});

async function tolerate(operation: Promise<unknown>): Promise<void> {
  try {
    await operation;
  } catch (error) {
    if (!(error instanceof AllocatorError)) throw error;
  }
}

describe("crate accounting properties", () => {
  it("conserves capital and respects ceilings", async () => {
    await fc.assert(
      fc.asyncProperty(fc.array(arbOp, { maxLength: 20 }), async (ops) => {
        const { allocator } = await createHarness();

        for (const op of ops) {
          if (op.kind === "dispatch") {
            await tolerate(allocator.dispatchAssets([op.amount], [op.target]));
          } else if (op.kind === "liquidate") {
            await tolerate(allocator.liquidateStrategy(op.amount, 0n, op.target));
          } else {
            await tolerate(allocator.panicLiquidateStrategy(op.target));
          }
        }

        const map = allocator.strategyMap();
        const debts = map.reduce((sum, s) => sum + s.debt, 0n);
        expect(allocator.totalChainDebt()).toBe(debts);
        expect(allocator.idle + debts).toBe(1000n);
        for (const s of map) {
          expect(s.panicked || s.debt <= s.maxDeposit).toBe(true);
        }
      }),
      { numRuns: 50 },
    );
  });
});
