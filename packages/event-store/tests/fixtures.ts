/**
 * Shared fixtures for @ballast/event-store tests.
 */

import type { DomainEvent, EventSource } from "@ballast/types";
import { BALLAST_EVENTS } from "../src/ballast-events.js";

export const STRATEGY = "0x00000000000000000000000000000000000000b7";
export const FIXED_NOW = new Date("2026-03-01T12:00:00.000Z");

let counter = 0;

export function makeEvent(
  type: string,
  payload: Readonly<Record<string, unknown>>,
  source: EventSource = "allocator",
): DomainEvent {
  counter += 1;
  return {
    type,
    metadata: {
      eventId: `evt-${String(counter)}`,
      timestamp: FIXED_NOW.toISOString(),
      actor: "test-operator",
      correlationId: `corr-${String(counter)}`,
      source,
    },
    payload,
  };
}

/** A valid crate-funding event carrying `amount`. */
export function funded(amount: number): DomainEvent {
  return makeEvent(BALLAST_EVENTS.CRATE_FUNDED, { amount: String(amount), idle: String(amount) });
}

export function fundedBatch(count: number): DomainEvent[] {
  return Array.from({ length: count }, (_, i) => funded(i + 1));
}
