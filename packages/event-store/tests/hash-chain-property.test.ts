/**
 * Property-based tests for hash chain integrity.
 *
 * 1. Any sequence of appends → valid chain
 * 2. Removing any interior event → broken chain
 * 3. Changing any amount → broken chain at that position
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import { verifyHashChain } from "../src/hash-chain.js";
import type { StoredEvent } from "../src/types.js";
import { funded } from "./fixtures.js";

const arbBatches = fc.array(
  fc.array(fc.integer({ min: 1, max: 1_000_000 }), { minLength: 1, maxLength: 4 }),
  { minLength: 1, maxLength: 6 },
);

function build(batches: readonly (readonly number[])[]): readonly StoredEvent[] {
  const store = new InMemoryEventStore();
  batches.forEach((batch, i) => {
    store.append(i % 2 === 0 ? "allocator" : "vault", batch.map(funded));
  });
  return store.readAll();
}

describe("hash chain properties", () => {
  it("any sequence of appends verifies", () => {
    fc.assert(
      fc.property(arbBatches, (batches) => {
        const events = build(batches);
        const result = verifyHashChain(events);
        expect(result.valid).toBe(true);
        expect(result.lastVerifiedPosition).toBe(events.length);
      }),
    );
  });

  it("removing an interior event breaks the chain", () => {
    fc.assert(
      fc.property(arbBatches, fc.nat(), (batches, seed) => {
        const events = build(batches);
        fc.pre(events.length >= 2);
        const removed = seed % (events.length - 1);
        expect(verifyHashChain(events.filter((_, i) => i !== removed)).valid).toBe(false);
      }),
    );
  });

  it("changing an amount is reported at its position", () => {
    fc.assert(
      fc.property(arbBatches, fc.nat(), (batches, seed) => {
        const events = build(batches);
        const index = seed % events.length;
        const tampered = events.map((event, i) =>
          i === index
            ? { ...event, event: { ...event.event, payload: { amount: "0", idle: "0" } } }
            : event,
        );

        const result = verifyHashChain(tampered);
        expect(result.valid).toBe(false);
        expect(result.lastVerifiedPosition).toBe(index);
        expect(result.errors[0]?.position).toBe(index + 1);
      }),
    );
  });
});
