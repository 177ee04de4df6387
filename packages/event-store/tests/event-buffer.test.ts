import { describe, it, expect } from "vitest";
import { EventBuffer } from "../src/event-buffer.js";
import { BALLAST_EVENTS, createBallastCatalog } from "../src/ballast-events.js";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import { STRATEGY } from "./fixtures.js";

describe("EventBuffer", () => {
  function buffer(): EventBuffer {
    return new EventBuffer({
      source: "allocator",
      actor: "test-operator",
      timestamp: "2026-03-01T12:00:00.000Z",
      correlationId: "op-1",
    });
  }

  it("numbers events and chains causation", () => {
    const b = buffer();
    b.record(BALLAST_EVENTS.PANIC_SET, { strategy: STRATEGY, panicked: true });
    b.record(BALLAST_EVENTS.PANIC_LIQUIDATE, { strategy: STRATEGY, debt: "100", recovered: "90" });

    const [first, second] = b.events;
    expect(b.size).toBe(2);
    expect(first?.metadata.eventId).toBe("op-1:1");
    expect(first?.metadata.causationId).toBeUndefined();
    expect(second?.metadata.eventId).toBe("op-1:2");
    expect(second?.metadata.causationId).toBe("op-1:1");
    expect(second?.metadata.correlationId).toBe("op-1");
  });

  it("generates a correlation ID when none is given", () => {
    const b = new EventBuffer({ source: "vault", actor: "x", timestamp: "2026-03-01T12:00:00.000Z" });
    expect(b.correlationId).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("produces events the ballast catalog accepts", () => {
    const b = buffer();
    b.record(BALLAST_EVENTS.CRATE_FUNDED, { amount: "500", idle: "500" });
    const store = new InMemoryEventStore({ catalog: createBallastCatalog() });
    expect(store.append("allocator", b.events).count).toBe(1);
  });

  it("returns a copy of its events", () => {
    const b = buffer();
    const before = b.events;
    b.record(BALLAST_EVENTS.CRATE_FUNDED, { amount: "1", idle: "1" });
    expect(before).toHaveLength(0);
  });
});
