/**
 * Tests for RequestQueue — admission, cancellation, FIFO settlement
 * and claims.
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { Address } from "@ballast/types";
import { ZERO_ADDRESS } from "@ballast/types";
import { RequestQueue } from "../src/request-queue.js";
import { RequestError } from "../src/types.js";
import type { AdmissionContext, SettlementContext } from "../src/types.js";

const ASSET: Address = "0x00000000000000000000000000000000000000a0";
const OTHER_ASSET: Address = "0x00000000000000000000000000000000000000a2";
const ALICE: Address = "0x00000000000000000000000000000000000000a1";
const BOB: Address = "0x00000000000000000000000000000000000000b1";
const CAROL: Address = "0x00000000000000000000000000000000000000c1";

const WEI_PER_SHARE = 1_000_000n;

function admission(overrides: Partial<AdmissionContext> = {}): AdmissionContext {
  return { now: 100, sharePrice: 1_000_000n, asset: ASSET, oracleReady: true, ...overrides };
}

function settlement(overrides: Partial<SettlementContext> = {}): SettlementContext {
  return {
    now: 200,
    asset: ASSET,
    sharePrice: 1_000_000n,
    weiPerShare: WEI_PER_SHARE,
    liquidity: 0n,
    ...overrides,
  };
}

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("Expected the call to throw");
}

describe("RequestQueue", () => {
  let queue: RequestQueue;

  beforeEach(() => {
    queue = new RequestQueue();
  });

  // ─── Admission ──────────────────────────────────────────────────────

  describe("admission", () => {
    it("creates a pending deposit request", () => {
      const request = queue.requestDeposit(ALICE, ALICE, ALICE, 500n, admission());
      expect(request).toMatchObject({
        id: "deposit-1",
        sequence: 1,
        kind: "deposit",
        status: "pending",
        assetsOrShares: 500n,
        requestTimestamp: 100,
        sharePriceAtRequest: 1_000_000n,
        claimable: 0n,
      });
      expect(queue.pendingDepositRequest(ALICE)).toBe(500n);
    });

    it("rejects a second open request from the same operator", () => {
      queue.requestDeposit(ALICE, ALICE, ALICE, 500n, admission());
      const err = thrown(() => queue.requestRedeem(ALICE, ALICE, ALICE, 10n, admission()));
      expect(err).toBeInstanceOf(RequestError);
      expect(err).toMatchObject({ code: "WRONG_REQUEST" });
    });

    it("requires live price feeds", () => {
      expect(
        thrown(() => queue.requestRedeem(ALICE, ALICE, ALICE, 10n, admission({ oracleReady: false }))),
      ).toMatchObject({ code: "MISSING_ORACLE" });
      expect(queue.size).toBe(0);
    });

    it("rejects zero amounts and zero addresses", () => {
      expect(thrown(() => queue.requestDeposit(ALICE, ALICE, ALICE, 0n, admission()))).toMatchObject({
        code: "AMOUNT_TOO_LOW",
      });
      expect(thrown(() => queue.requestDeposit(ALICE, ZERO_ADDRESS, ALICE, 5n, admission()))).toMatchObject({
        code: "ADDRESS_IS_ZERO",
      });
    });
  });

  // ─── Cancellation ───────────────────────────────────────────────────

  describe("cancellation", () => {
    it("cancels a pending request and frees the operator", () => {
      queue.requestDeposit(ALICE, ALICE, ALICE, 500n, admission());
      const canceled = queue.cancelDepositRequest(ALICE);
      expect(canceled.status).toBe("canceled");
      expect(canceled.assetsOrShares).toBe(500n);
      expect(queue.size).toBe(0);

      const next = queue.requestRedeem(ALICE, ALICE, ALICE, 10n, admission());
      expect(next.id).toBe("redeem-2");
    });

    it("rejects cancelling the wrong kind", () => {
      queue.requestDeposit(ALICE, ALICE, ALICE, 500n, admission());
      expect(thrown(() => queue.cancelRedeemRequest(ALICE))).toMatchObject({ code: "WRONG_REQUEST" });
    });

    it("rejects cancelling a settled request", () => {
      queue.requestDeposit(ALICE, ALICE, ALICE, 500n, admission());
      queue.settle(settlement());
      expect(thrown(() => queue.cancelDepositRequest(ALICE))).toMatchObject({ code: "WRONG_REQUEST" });
    });
  });

  // ─── Settlement ─────────────────────────────────────────────────────

  describe("settlement", () => {
    it("mints deposit shares at the current price", () => {
      queue.requestDeposit(ALICE, ALICE, ALICE, 500n, admission());
      const result = queue.settle(settlement({ sharePrice: 1_100_000n }));
      expect(result.mintedShares).toBe(454n);
      expect(result.depositedAssets).toBe(500n);
      expect(queue.claimableDepositRequest(ALICE)).toBe(454n);
    });

    it("settles redemptions FIFO while liquidity lasts", () => {
      queue.requestRedeem(ALICE, ALICE, ALICE, 100n, admission());
      queue.requestRedeem(BOB, BOB, BOB, 300n, admission());
      queue.requestDeposit(CAROL, CAROL, CAROL, 50n, admission());

      const result = queue.settle(settlement({ liquidity: 250n, sharePrice: 1_200_000n }));

      expect(result.redemptions.map((r) => r.operator)).toEqual([ALICE]);
      expect(result.lockedAssets).toBe(100n);
      expect(result.burnedShares).toBe(100n);
      // CAROL's deposit still settles behind the blocked redemption
      expect(result.deposits.map((r) => r.operator)).toEqual([CAROL]);
      expect(queue.pendingRedeemRequest(BOB)).toBe(300n);
      expect(queue.claimableRedeemRequest(ALICE)).toBe(100n);
    });

    it("locks redemptions at the lower of the two prices", () => {
      queue.requestRedeem(ALICE, ALICE, ALICE, 100n, admission({ sharePrice: 1_200_000n }));
      const result = queue.settle(settlement({ liquidity: 1_000n, sharePrice: 1_000_000n }));
      expect(result.lockedAssets).toBe(100n);
    });

    it("counts earlier deposits toward redemption liquidity", () => {
      queue.requestDeposit(CAROL, CAROL, CAROL, 200n, admission());
      queue.requestRedeem(ALICE, ALICE, ALICE, 150n, admission());
      const result = queue.settle(settlement({ liquidity: 0n }));
      expect(result.redemptions).toHaveLength(1);
      expect(result.lockedAssets).toBe(150n);
    });

    it("leaves deposits pending while the share price is zero", () => {
      queue.requestDeposit(ALICE, ALICE, ALICE, 200n, admission());
      const result = queue.settle(settlement({ sharePrice: 0n }));

      expect(result.deposits).toHaveLength(0);
      expect(result.mintedShares).toBe(0n);
      expect(queue.pendingDepositRequest(ALICE)).toBe(200n);
    });

    it("skips requests opened under a previous asset", () => {
      queue.requestDeposit(ALICE, ALICE, ALICE, 200n, admission());
      const result = queue.settle(settlement({ asset: OTHER_ASSET }));
      expect(result.deposits).toHaveLength(0);
      expect(queue.get(ALICE)?.status).toBe("pending");
    });
  });

  // ─── Claim ──────────────────────────────────────────────────────────

  describe("claim", () => {
    const claimAt = { now: 300, deadline: 400, asset: ASSET };

    it("fails with insufficient funds before settlement", () => {
      queue.requestRedeem(ALICE, ALICE, ALICE, 100n, admission());
      expect(thrown(() => queue.claim("redeem", ALICE, claimAt))).toMatchObject({
        code: "INSUFFICIENT_FUNDS",
      });
    });

    it("releases a settled redemption and removes it", () => {
      queue.requestRedeem(ALICE, ALICE, ALICE, 100n, admission());
      queue.settle(settlement({ liquidity: 100n }));
      const claimed = queue.claim("redeem", ALICE, claimAt);
      expect(claimed.status).toBe("claimed");
      expect(claimed.claimable).toBe(100n);
      expect(queue.get(ALICE)).toBeUndefined();
    });

    it("rejects an expired deadline", () => {
      queue.requestRedeem(ALICE, ALICE, ALICE, 100n, admission());
      queue.settle(settlement({ liquidity: 100n }));
      expect(thrown(() => queue.claim("redeem", ALICE, { ...claimAt, now: 401 }))).toMatchObject({
        code: "TRANSACTION_EXPIRED",
      });
    });

    it("rejects claims after the asset changed", () => {
      queue.requestDeposit(ALICE, ALICE, ALICE, 100n, admission());
      expect(thrown(() => queue.claim("deposit", ALICE, { ...claimAt, asset: OTHER_ASSET }))).toMatchObject({
        code: "WRONG_TOKEN",
      });
    });

    it("rejects claims without a request", () => {
      expect(thrown(() => queue.claim("deposit", BOB, claimAt))).toMatchObject({ code: "WRONG_REQUEST" });
    });
  });

  // ─── Aggregates ─────────────────────────────────────────────────────

  describe("aggregates", () => {
    it("tracks escrow and locked assets", () => {
      queue.requestDeposit(CAROL, CAROL, CAROL, 70n, admission());
      queue.requestRedeem(ALICE, ALICE, ALICE, 100n, admission());
      queue.requestRedeem(BOB, BOB, BOB, 40n, admission());
      expect(queue.totalDepositRequest(ASSET)).toBe(70n);
      expect(queue.totalRedemptionRequest()).toBe(140n);

      queue.settle(settlement({ liquidity: 30n }));
      // CAROL's 70 joins the 30 budget, ALICE's 100 then fits exactly
      expect(queue.totalClaimableRedemption(ASSET)).toBe(100n);
      expect(queue.totalClaimableShares()).toBe(70n);
      expect(queue.totalRedemptionRequest()).toBe(40n);
      expect(queue.reservedAssets(ASSET)).toBe(100n);
      expect(queue.hasClaimable()).toBe(true);
    });
  });

  // ─── Snapshots ──────────────────────────────────────────────────────

  describe("snapshot / restore", () => {
    it("restores requests and the sequence", () => {
      queue.requestDeposit(ALICE, ALICE, ALICE, 70n, admission());
      const snapshot = queue.snapshot();
      queue.cancelDepositRequest(ALICE);
      queue.requestRedeem(BOB, BOB, BOB, 5n, admission());

      queue.restore(snapshot);
      expect(queue.list().map((r) => r.id)).toEqual(["deposit-1"]);
      expect(queue.requestRedeem(BOB, BOB, BOB, 5n, admission()).id).toBe("redeem-2");
    });
  });
});
