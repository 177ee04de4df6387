/**
 * @ballast/event-store — Append-only event persistence.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore with a SHA-256 hash chain
 * - EventCatalog with zod payload schemas
 * - Vault and allocator boundary event definitions
 * - EventBuffer for publishing an operation's events on commit
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  ExpectedVersion,
  AppendOptions,
  AppendResult,
  ReadDirection,
  ReadOptions,
  ReadAllOptions,
  EventHandler,
  Subscription,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";
export type { HashableEvent } from "./hash-chain.js";

// Implementation
export { InMemoryEventStore } from "./in-memory-store.js";
export type { InMemoryEventStoreOptions } from "./in-memory-store.js";

// Catalog
export type { EventSchema } from "./catalog.js";
export { EventCatalog, CatalogError } from "./catalog.js";

// Boundary events
export { BALLAST_EVENTS, PAYLOAD_SCHEMAS, createBallastCatalog } from "./ballast-events.js";
export type { BallastEventType, BallastPayload } from "./ballast-events.js";

export { EventBuffer } from "./event-buffer.js";
export type { EventBufferOptions } from "./event-buffer.js";
