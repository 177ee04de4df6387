/**
 * Tests for InMemoryCustody.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { InMemoryCustody } from "../src/custody.js";
import { LedgerError } from "../src/types.js";
import { ASSET, BOB, thrown } from "./fixtures.js";

describe("InMemoryCustody", () => {
  let custody: InMemoryCustody;

  beforeEach(() => {
    custody = new InMemoryCustody();
  });

  it("starts empty", () => {
    expect(custody.balanceOf(ASSET)).toBe(0n);
  });

  it("credits and debits", () => {
    custody.credit(ASSET, 100n);
    custody.debit(ASSET, 40n);
    expect(custody.balanceOf(ASSET)).toBe(60n);
  });

  it("treats addresses case-insensitively", () => {
    custody.credit("0x00000000000000000000000000000000000000AA", 5n);
    expect(custody.balanceOf("0x00000000000000000000000000000000000000aa")).toBe(5n);
  });

  it("refuses to overdraw", () => {
    custody.credit(ASSET, 10n);
    const err = thrown(() => custody.debit(ASSET, 11n));
    expect(err).toBeInstanceOf(LedgerError);
    expect(err).toMatchObject({ code: "INSUFFICIENT_FUNDS" });
    expect(custody.balanceOf(ASSET)).toBe(10n);
  });

  it("rejects negative amounts", () => {
    expect(() => custody.credit(ASSET, -1n)).toThrow(/Negative/);
  });

  it("restores a snapshot", () => {
    custody.credit(ASSET, 10n);
    const snapshot = custody.snapshot();
    custody.credit(ASSET, 5n);
    custody.credit(BOB, 7n);
    custody.restore(snapshot);
    expect(custody.balanceOf(ASSET)).toBe(10n);
    expect(custody.balanceOf(BOB)).toBe(0n);
  });
});
