/**
 * Tests for asynchronous deposit and redeem requests through the Vault,
 * including a redemption that waits for liquidity to be freed.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { BALLAST_EVENTS } from "@ballast/event-store";
import { RequestError } from "@ballast/requests";
import type { Harness } from "./fixtures.js";
import {
  ALICE,
  BOB,
  MANAGER,
  NOW,
  ONE,
  RECEIPT_A,
  RECEIPT_B,
  RECEIPT_W,
  USDC,
  VAULT,
  WETH,
  createHarness,
  eventTypes,
  lendingInput,
  usdcInputs,
} from "./fixtures.js";

describe("Vault requests", () => {
  let h: Harness;

  beforeEach(async () => {
    h = createHarness();
    await h.vault.deposit(BOB, 1000n * ONE, BOB);
  });

  // ─── Deposits ──────────────────────────────────────────────────────

  describe("deposit requests", () => {
    it("escrows assets outside the available balance until settled", async () => {
      const request = await h.vault.requestDeposit(ALICE, 100n * ONE, ALICE);

      expect(request).toMatchObject({ id: "deposit-1", status: "pending", sharePriceAtRequest: ONE });
      expect(h.vault.available()).toBe(1000n * ONE);
      await expect(h.vault.totalAccountedAssets()).resolves.toBe(1100n * ONE);
      expect(h.vault.pendingDepositRequest(ALICE)).toBe(100n * ONE);
    });

    it("mints into escrow on settlement and pays shares on claim", async () => {
      await h.vault.requestDeposit(ALICE, 100n * ONE, ALICE);

      const settled = await h.vault.settleRequests(MANAGER);
      expect(settled).toMatchObject({ depositedAssets: 100n * ONE, mintedShares: 100n * ONE });
      expect(h.vault.balanceOf(VAULT)).toBe(100n * ONE);
      expect(h.vault.totalAccountedSupply()).toBe(1000n * ONE);
      expect(h.vault.available()).toBe(1100n * ONE);
      expect(h.vault.claimableDepositRequest(ALICE)).toBe(100n * ONE);

      await expect(h.vault.claimDeposit(ALICE, NOW)).resolves.toMatchObject({ status: "claimed" });
      expect(h.vault.balanceOf(ALICE)).toBe(100n * ONE);
      expect(h.vault.balanceOf(VAULT)).toBe(0n);
      expect(h.vault.request(ALICE)).toBeUndefined();
      expect(eventTypes(h.store, 2)).toEqual([
        BALLAST_EVENTS.DEPOSIT_REQUEST,
        BALLAST_EVENTS.REQUESTS_SETTLED,
        BALLAST_EVENTS.REQUEST_CLAIMED,
      ]);
    });

    it("refunds the escrow on cancel", async () => {
      await h.vault.requestDeposit(ALICE, 100n * ONE, ALICE);
      await h.vault.cancelDepositRequest(ALICE);

      expect(h.custody.balanceOf(USDC)).toBe(1000n * ONE);
      expect(h.vault.request(ALICE)).toBeUndefined();
      expect(h.store.read("vault").at(-1)?.event.payload).toEqual({
        requestId: "deposit-1",
        operator: ALICE,
        amount: "100000000",
      });
    });

    it("allows one open request per operator", async () => {
      await h.vault.requestDeposit(ALICE, 1n * ONE, ALICE);
      await expect(h.vault.requestDeposit(ALICE, 1n * ONE, ALICE)).rejects.toMatchObject({
        code: "WRONG_REQUEST",
      });
      expect(h.custody.balanceOf(USDC)).toBe(1001n * ONE);
    });

    it("pauses requests while an input has no price feed", async () => {
      await h.vault.setInputs(MANAGER, [lendingInput(WETH, RECEIPT_W, 5_000)]);
      h.oracle.removeFeed(WETH);

      const error: unknown = await h.vault.requestDeposit(ALICE, 1n * ONE, ALICE).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(RequestError);
      expect(error).toMatchObject({ code: "MISSING_ORACLE" });
    });

    it("rejects an expired claim", async () => {
      await h.vault.requestDeposit(ALICE, 1n * ONE, ALICE);
      await h.vault.settleRequests(MANAGER);
      h.clock.now = NOW + 10;

      await expect(h.vault.claimDeposit(ALICE, NOW)).rejects.toMatchObject({ code: "TRANSACTION_EXPIRED" });
      expect(h.vault.claimableDepositRequest(ALICE)).toBe(1n * ONE);
    });
  });

  // ─── Redemptions ───────────────────────────────────────────────────

  describe("redeem requests", () => {
    it("escrows shares with the vault and returns them on cancel", async () => {
      await h.vault.requestRedeem(BOB, 100n * ONE, BOB, BOB);
      expect(h.vault.balanceOf(BOB)).toBe(900n * ONE);
      expect(h.vault.pendingRedeemRequest(BOB)).toBe(100n * ONE);

      await h.vault.cancelRedeemRequest(BOB);
      expect(h.vault.balanceOf(BOB)).toBe(1000n * ONE);
      expect(h.vault.balanceOf(VAULT)).toBe(0n);
    });

    it("needs an allowance to queue someone else's shares", async () => {
      await expect(h.vault.requestRedeem(ALICE, 10n * ONE, ALICE, BOB)).rejects.toMatchObject({
        code: "UNAUTHORIZED",
      });
      expect(h.vault.request(ALICE)).toBeUndefined();

      await h.vault.approve(BOB, ALICE, 10n * ONE);
      await expect(h.vault.requestRedeem(ALICE, 10n * ONE, ALICE, BOB)).resolves.toMatchObject({
        owner: BOB,
        receiver: ALICE,
      });
      expect(h.vault.allowance(BOB, ALICE)).toBe(0n);
    });

    it("sizes a withdraw request in assets, rounding the escrowed shares up", async () => {
      h.custody.credit(USDC, 500n * ONE);

      await expect(h.vault.requestWithdraw(BOB, 100n * ONE, BOB, BOB)).resolves.toMatchObject({
        kind: "redeem",
        assetsOrShares: 66_666_667n,
      });
      expect(h.vault.balanceOf(BOB)).toBe(1000n * ONE - 66_666_667n);
      await expect(h.vault.pendingAssetRequest(BOB)).resolves.toBe(100n * ONE);
      expect(eventTypes(h.store, 2)).toEqual([BALLAST_EVENTS.REDEEM_REQUEST]);
    });

    it("locks assets at settlement so they cannot be withdrawn twice", async () => {
      await h.vault.requestRedeem(BOB, 100n * ONE, ALICE, BOB);
      await h.vault.settleRequests(MANAGER);

      expect(h.vault.available()).toBe(900n * ONE);
      expect(h.vault.totalSupply).toBe(900n * ONE);
      expect(h.vault.claimableRedeemRequest(BOB)).toBe(100n * ONE);

      await h.vault.claimRedeem(BOB, NOW);
      expect(h.custody.balanceOf(USDC)).toBe(900n * ONE);
      expect(h.vault.available()).toBe(900n * ONE);
    });
  });

  // ─── Redemption waiting on liquidity ───────────────────────────────

  describe("redemption before liquidation", () => {
    beforeEach(async () => {
      await h.vault.setInputs(MANAGER, usdcInputs());
      await h.vault.invest(MANAGER, await h.vault.previewInvest(0n));
      await h.vault.requestRedeem(BOB, 100n * ONE, BOB, BOB);
    });

    it("stays pending while idle assets cannot cover it", async () => {
      await expect(h.vault.settleRequests(MANAGER)).resolves.toMatchObject({ redemptions: [] });
      await expect(h.vault.claimRedeem(BOB, NOW)).rejects.toMatchObject({ code: "INSUFFICIENT_FUNDS" });
      expect(h.vault.available()).toBe(50n * ONE);
    });

    it("frees the redemption demand plus the cash buffer", async () => {
      await expect(h.vault.previewLiquidate(0n)).resolves.toEqual([
        52_631_579n,
        47_368_421n,
        0n,
        0n,
        0n,
        0n,
        0n,
        0n,
      ]);
    });

    it("settles the redemption as part of the liquidation", async () => {
      const from = h.store.streamVersion("vault") + 1;
      const amounts = await h.vault.previewLiquidate(0n);

      await expect(h.vault.liquidate(MANAGER, amounts, 100n * ONE)).resolves.toMatchObject({
        totalRecovered: 100n * ONE,
      });
      expect(eventTypes(h.store, from)).toEqual([BALLAST_EVENTS.LIQUIDATE, BALLAST_EVENTS.REQUESTS_SETTLED]);
      expect(h.vault.claimableRedeemRequest(BOB)).toBe(100n * ONE);

      await expect(h.vault.claimRedeem(BOB, NOW)).resolves.toMatchObject({ claimable: 100n * ONE });
      expect(h.vault.available()).toBe(50n * ONE);
      expect(h.vault.totalSupply).toBe(900n * ONE);
      await expect(h.vault.sharePrice()).resolves.toBe(ONE);
    });

    it("leaves the redemption pending on a panic exit", async () => {
      const from = h.store.streamVersion("vault") + 1;
      const amounts = await h.vault.previewLiquidate(0n);

      await h.vault.liquidate(MANAGER, amounts, 0n, true);
      expect(eventTypes(h.store, from)).toEqual([BALLAST_EVENTS.LIQUIDATE]);
      expect(h.vault.pendingRedeemRequest(BOB)).toBe(100n * ONE);

      await h.vault.settleRequests(MANAGER);
      expect(h.vault.claimableRedeemRequest(BOB)).toBe(100n * ONE);
    });

    it("rolls the liquidation back when it recovers less than asked", async () => {
      const amounts = await h.vault.previewLiquidate(0n);

      await expect(h.vault.liquidate(MANAGER, amounts, 100n * ONE + 1n)).rejects.toMatchObject({
        code: "AMOUNT_TOO_LOW",
      });
      await expect(h.vault.investedInputs()).resolves.toEqual([
        500n * ONE,
        450n * ONE,
        0n,
        0n,
        0n,
        0n,
        0n,
        0n,
      ]);
      expect(h.vault.pendingRedeemRequest(BOB)).toBe(100n * ONE);
    });
  });

  // ─── Total loss ────────────────────────────────────────────────────

  describe("after a total loss", () => {
    beforeEach(async () => {
      await h.vault.setInputs(MANAGER, [lendingInput(USDC, RECEIPT_A, 5_000), lendingInput(USDC, RECEIPT_B, 5_000)]);
      await h.vault.invest(MANAGER, [500n * ONE, 500n * ONE]);
      h.custody.debit(RECEIPT_A, 500n * ONE);
      h.custody.debit(RECEIPT_B, 500n * ONE);
      await h.vault.requestDeposit(ALICE, 100n * ONE, ALICE);
    });

    it("keeps deposits pending while shares are worth nothing", async () => {
      await expect(h.vault.sharePrice()).resolves.toBe(0n);

      await expect(h.vault.settleRequests(MANAGER)).resolves.toMatchObject({ deposits: [], mintedShares: 0n });
      expect(h.vault.pendingDepositRequest(ALICE)).toBe(100n * ONE);
      expect(h.vault.balanceOf(VAULT)).toBe(0n);
    });

    it("still lets the manager exit in panic", async () => {
      const amounts = await h.vault.investedInputs();

      await expect(h.vault.liquidate(MANAGER, amounts, 0n, true)).resolves.toMatchObject({ totalRecovered: 0n });
      await h.vault.cancelDepositRequest(ALICE);
      expect(h.custody.balanceOf(USDC)).toBe(0n);
    });
  });
});
