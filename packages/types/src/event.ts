/**
 * Event Types
 *
 * Every externally observable state change of a vault or of the
 * allocator is captured as a DomainEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, which operation)
 * - Amounts travel as base-10 strings so payloads stay JSON-safe
 * - Events are only published once the operation that raised them commits
 */

/**
 * Subsystem that emitted an event.
 */
export type EventSource = "vault" | "requests" | "allocation" | "allocator";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Address (or operator label) that invoked the operation */
  readonly actor: string;

  /** ID of the event that caused this event (causal chain) */
  readonly causationId?: string;

  /** Groups every event raised by a single operation */
  readonly correlationId: string;

  /** Which subsystem emitted this event */
  readonly source: EventSource;
}

/**
 * A domain event. Discriminated by `type`
 * (e.g. "vault.shares.deposited", "allocator.strategy.added").
 */
export interface DomainEvent {
  readonly type: string;

  readonly metadata: EventMetadata;

  /** Event-specific payload (typed by the event catalog) */
  readonly payload: Readonly<Record<string, unknown>>;
}
