/**
 * Tests for EventCatalog and the vault/allocator event set.
 */

import { describe, it, expect } from "vitest";
import { z } from "zod";
import { CatalogError, EventCatalog } from "../src/catalog.js";
import { BALLAST_EVENTS, createBallastCatalog } from "../src/ballast-events.js";
import { STRATEGY } from "./fixtures.js";

const OWNER = "0x00000000000000000000000000000000000000c1";

describe("EventCatalog", () => {
  function schema(version: number) {
    return {
      type: "vault.test.noted",
      version,
      description: "test",
      source: "vault" as const,
      payload: z.object({ note: z.string().max(version * 4) }),
    };
  }

  it("registers and lists types in sorted order", () => {
    const catalog = new EventCatalog();
    catalog.register({ ...schema(1), type: "vault.b" });
    catalog.register({ ...schema(1), type: "vault.a" });
    expect(catalog.listTypes()).toEqual(["vault.a", "vault.b"]);
    expect(catalog.size).toBe(2);
  });

  it("replaces a schema with a higher version", () => {
    const catalog = new EventCatalog();
    catalog.register(schema(1));
    catalog.register(schema(2));
    expect(catalog.getSchema("vault.test.noted")?.version).toBe(2);
    expect(catalog.validate("vault.test.noted", { note: "12345678" })).toBe(true);
  });

  it("refuses a lower version", () => {
    const catalog = new EventCatalog();
    catalog.register(schema(2));
    expect(() => catalog.register(schema(1))).toThrow(CatalogError);
  });

  it("reports unknown types as a single issue", () => {
    expect(new EventCatalog().issues("vault.missing", {})).toEqual(['Unknown event type "vault.missing"']);
  });

  it("reports payload issues with their path", () => {
    const catalog = new EventCatalog();
    catalog.register(schema(1));
    const issues = catalog.issues("vault.test.noted", { note: 7 });
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^note: /);
  });
});

describe("createBallastCatalog", () => {
  const catalog = createBallastCatalog();

  it("registers every boundary event", () => {
    expect(catalog.size).toBe(Object.keys(BALLAST_EVENTS).length);
  });

  it("splits events by source", () => {
    const allocator = catalog.listBySource("allocator").map((s) => s.type);
    expect(allocator).toContain(BALLAST_EVENTS.LOSSES);
    expect(allocator).not.toContain(BALLAST_EVENTS.DEPOSIT);
    expect(allocator.every((type) => type.startsWith("allocator."))).toBe(true);
  });

  it("accepts a well-formed deposit", () => {
    expect(
      catalog.validate(BALLAST_EVENTS.DEPOSIT, {
        caller: OWNER,
        receiver: OWNER,
        owner: OWNER,
        assets: "1000000",
        shares: "1000000",
        fee: "0",
        sharePrice: "1000000",
      }),
    ).toBe(true);
  });

  it("rejects the zero address and non-decimal amounts", () => {
    expect(
      catalog.validate(BALLAST_EVENTS.LOSSES, {
        strategy: "0x0000000000000000000000000000000000000000",
        loss: "1",
      }),
    ).toBe(false);
    expect(catalog.validate(BALLAST_EVENTS.LOSSES, { strategy: STRATEGY, loss: "1.5" })).toBe(false);
  });

  it("bounds fee schedules to basis points", () => {
    expect(catalog.validate(BALLAST_EVENTS.FEES_UPDATED, { perf: 2000, mgmt: 200, entry: 0, exit: 0 })).toBe(true);
    expect(catalog.validate(BALLAST_EVENTS.FEES_UPDATED, { perf: 10_001, mgmt: 0, entry: 0, exit: 0 })).toBe(false);
  });
});
