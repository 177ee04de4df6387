/**
 * Property-based tests for vault accounting.
 *
 * With lossless inputs and no fees, any sequence of deposits,
 * withdrawals, investments and liquidations keeps the share price at
 * par and total assets equal to the outstanding supply.
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { ALICE, MANAGER, ONE, USDC, createHarness, usdcInputs } from "./fixtures.js";

const arbOp = fc.record({
  kind: fc.constantFrom("deposit", "withdraw", "invest", "liquidate"),
  amount: fc.bigInt({ min: 1n, max: 500n }).map((units) => units * ONE),
});

async function tolerate(operation: Promise<unknown>): Promise<void> {
  try {
    await operation;
  } catch (error) {
    if (!(typeof error === "object" && error !== null && "code" in error)) throw error;
  }
}

describe("vault accounting properties", () => {
  it("keeps the share price at par", async () => {
    await fc.assert(
      fc.asyncProperty(fc.array(arbOp, { maxLength: 15 }), async (ops) => {
        const { vault, custody } = createHarness();
        await vault.setInputs(MANAGER, usdcInputs());

        for (const op of ops) {
          if (op.kind === "deposit") {
            await tolerate(vault.deposit(ALICE, op.amount, ALICE));
          } else if (op.kind === "withdraw") {
            await tolerate(vault.withdraw(ALICE, op.amount, ALICE, ALICE));
          } else if (op.kind === "invest") {
            await tolerate(vault.invest(MANAGER, await vault.previewInvest(0n)));
          } else {
            await tolerate(vault.liquidate(MANAGER, await vault.previewLiquidate(op.amount)));
          }
        }

        await expect(vault.totalAssets()).resolves.toBe(vault.totalSupply);
        await expect(vault.sharePrice()).resolves.toBe(ONE);
        expect(custody.balanceOf(USDC)).toBe(vault.available());
      }),
      { numRuns: 30 },
    );
  });
});
