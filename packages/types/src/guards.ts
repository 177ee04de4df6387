/**
 * Runtime Type Guards
 *
 * Narrowing functions for shared domain types, used when events come
 * back from storage or cross a process boundary.
 */

import type { DomainEvent, EventMetadata, EventSource } from "./event.js";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

// =============================================================================
// Amount guards
// =============================================================================

const DECIMAL_STRING = /^(0|[1-9][0-9]*)$/;

/**
 * A non-negative base-10 integer string, the wire form of a bigint amount.
 */
export function isDecimalString(value: unknown): value is string {
  return typeof value === "string" && DECIMAL_STRING.test(value);
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES: ReadonlySet<string> = new Set<EventSource>([
  "vault",
  "requests",
  "allocation",
  "allocator",
]);

export function isEventSource(value: unknown): value is EventSource {
  return typeof value === "string" && EVENT_SOURCES.has(value);
}

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (!isRecord(value)) return false;
  return (
    typeof value.eventId === "string" &&
    typeof value.timestamp === "string" &&
    typeof value.actor === "string" &&
    typeof value.correlationId === "string" &&
    (value.causationId === undefined || typeof value.causationId === "string") &&
    isEventSource(value.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (!isRecord(value)) return false;
  return (
    typeof value.type === "string" &&
    isEventMetadata(value.metadata) &&
    isRecord(value.payload)
  );
}
