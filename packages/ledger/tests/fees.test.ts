/**
 * Tests for FeeAccrualEngine — high-water-mark performance fees,
 * time-based management fees and the collection cooldown.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { FeeAccrualEngine } from "../src/fees.js";
import type { LedgerHarness } from "./fixtures.js";
import { ALICE, ASSET, BOB, COLLECTOR, createHarness } from "./fixtures.js";

const HOUR = 3_600;
const YEAR = 31_536_000;

describe("FeeAccrualEngine", () => {
  let h: LedgerHarness;
  let engine: FeeAccrualEngine;

  beforeEach(() => {
    h = createHarness({
      fees: { perf: 1_000, mgmt: 20, entry: 0, exit: 0 },
      profitCooldown: HOUR,
      now: 0,
    });
    engine = new FeeAccrualEngine(h.ledger);
    h.ledger.deposit(ALICE, 1_000n, ALICE, h.value());
  });

  // ─── Cooldown ─────────────────────────────────────────────────────────

  describe("cooldown", () => {
    it("is a no-op before the cooldown elapses", () => {
      h.custody.credit(ASSET, 100n);
      expect(engine.cooldownRemaining(1_800)).toBe(1_800);
      expect(engine.collect(h.value(), 1_800)).toBeNull();
      expect(h.ledger.balanceOf(COLLECTOR)).toBe(0n);
      expect(h.ledger.state.lastCheckpointTime).toBe(0);
    });

    it("restarts after each collection", () => {
      engine.collect(h.value(), HOUR);
      expect(engine.cooldownRemaining(HOUR + 60)).toBe(HOUR - 60);
    });
  });

  // ─── Performance fees ─────────────────────────────────────────────────

  describe("performance fees", () => {
    it("charges on profit above the checkpoint price", () => {
      h.custody.credit(ASSET, 100n);
      const result = engine.collect(h.value(), HOUR);

      expect(result).toEqual({
        elapsed: HOUR,
        profit: 100n,
        perfFees: 10n,
        mgmtFees: 0n,
        sharesMinted: 9n,
        assetFeesClaimed: 0n,
        sharePrice: 1_090_188n,
      });
      expect(h.ledger.balanceOf(COLLECTOR)).toBe(9n);
      expect(h.ledger.state.lastSharePrice).toBe(1_090_188n);
      expect(h.ledger.state.lastCheckpointTime).toBe(HOUR);
    });

    it("charges nothing on a loss", () => {
      h.custody.debit(ASSET, 100n);
      const preview = engine.preview(h.value(), HOUR);
      expect(preview.profit).toBe(0n);
      expect(preview.perfFees).toBe(0n);
    });

    it("does not treat new deposits as profit", () => {
      h.ledger.deposit(BOB, 500n, BOB, h.value());
      expect(engine.preview(h.value(), HOUR).profit).toBe(0n);
    });
  });

  // ─── Management fees ──────────────────────────────────────────────────

  describe("management fees", () => {
    it("accrues linearly over a year", () => {
      h = createHarness({ fees: { perf: 0, mgmt: 100, entry: 0, exit: 0 }, now: 0 });
      engine = new FeeAccrualEngine(h.ledger);
      h.ledger.deposit(ALICE, 1_000_000_000_000n, ALICE, h.value());

      const result = engine.collect(h.value(), YEAR);
      expect(result?.mgmtFees).toBe(10_000_000_000n);
      expect(result?.sharesMinted).toBe(10_000_000_000n);
      expect(h.ledger.balanceOf(COLLECTOR)).toBe(10_000_000_000n);
    });
  });

  // ─── Asset fees ───────────────────────────────────────────────────────

  describe("entry / exit fees", () => {
    it("releases claimable asset fees to the collector", () => {
      h = createHarness({ fees: { perf: 0, mgmt: 0, entry: 200, exit: 0 }, now: 0 });
      engine = new FeeAccrualEngine(h.ledger);
      h.ledger.deposit(ALICE, 1_000n, ALICE, h.value());

      const result = engine.collect(h.value(), 10);
      expect(result?.assetFeesClaimed).toBe(20n);
      expect(result?.sharesMinted).toBe(0n);
      expect(h.custody.balanceOf(ASSET)).toBe(980n);
      expect(h.ledger.claimableAssetFees).toBe(0n);
    });
  });

  // ─── Empty vault ──────────────────────────────────────────────────────

  describe("empty vault", () => {
    it("checkpoints without charging", () => {
      h = createHarness({ now: 0 });
      engine = new FeeAccrualEngine(h.ledger);
      const result = engine.collect(h.value(), 50);
      expect(result?.sharesMinted).toBe(0n);
      expect(result?.sharePrice).toBe(1_000_000n);
      expect(h.ledger.state.lastCheckpointTime).toBe(50);
    });
  });
});
