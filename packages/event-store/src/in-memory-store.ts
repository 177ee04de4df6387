/**
 * @ballast/event-store — In-memory EventStore implementation.
 *
 * Stores events in plain arrays. State is lost on process exit.
 *
 * Properties:
 * - O(1) append (amortized)
 * - O(n) read (where n = number of events returned)
 * - Synchronous subscription dispatch
 * - Optional catalog validation on append
 */

import type { DomainEvent } from "@ballast/types";
import type { EventCatalog } from "./catalog.js";
import type {
  AppendOptions,
  AppendResult,
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
  Subscription,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";
import type { HashableEvent } from "./hash-chain.js";

export interface InMemoryEventStoreOptions {
  /** When set, every appended event must be registered and valid */
  readonly catalog?: EventCatalog;
  /** Source of `appendedAt`. Default: the system clock */
  readonly now?: () => Date;
}

export class InMemoryEventStore implements EventStore {
  private readonly _streams = new Map<string, StoredEvent[]>();
  private readonly _globalLog: StoredEvent[] = [];
  private readonly _streamSubscribers = new Map<string, Set<EventHandler>>();
  private readonly _globalSubscribers = new Set<EventHandler>();
  private readonly _catalog: EventCatalog | undefined;
  private readonly _now: () => Date;
  private _lastHash: string = GENESIS_HASH;

  constructor(options: InMemoryEventStoreOptions = {}) {
    this._catalog = options.catalog;
    this._now = options.now ?? (() => new Date());
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(streamId: string, events: readonly DomainEvent[], options?: AppendOptions): AppendResult {
    this._validateStreamId(streamId);

    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }

    // Validate the whole batch before anything is written
    for (const event of events) {
      this._validateEvent(streamId, event);
    }

    const stream = this._streams.get(streamId) ?? [];
    const currentVersion = stream.length;
    this._checkExpectedVersion(streamId, currentVersion, options?.expectedVersion);

    const fromVersion = currentVersion + 1;
    const appendedAt = this._now().toISOString();
    const stored: StoredEvent[] = [];

    for (const [offset, event] of events.entries()) {
      const base: HashableEvent = {
        event,
        streamId,
        version: fromVersion + offset,
        globalPosition: this._globalLog.length + 1,
        appendedAt,
      };
      const previousHash = this._lastHash;
      const record: StoredEvent = { ...base, hash: computeEventHash(base, previousHash), previousHash };
      this._lastHash = record.hash;

      stream.push(record);
      this._globalLog.push(record);
      stored.push(record);
    }
    this._streams.set(streamId, stream);

    this._dispatch(streamId, stored);

    return {
      streamId,
      fromVersion,
      toVersion: fromVersion + events.length - 1,
      count: events.length,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    this._validateStreamId(streamId);

    const stream = this._streams.get(streamId);
    if (stream === undefined) {
      return [];
    }

    const fromVersion = options?.fromVersion ?? 1;
    if (fromVersion < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be >= 1, got ${String(fromVersion)}`,
        streamId,
      );
    }

    const result =
      options?.direction === "backward"
        ? stream.filter((e) => e.version <= fromVersion).reverse()
        : stream.filter((e) => e.version >= fromVersion);
    return limit(result, options?.maxCount);
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    const fromPosition = options?.fromPosition ?? 1;
    const result =
      options?.direction === "backward"
        ? this._globalLog.filter((e) => e.globalPosition <= fromPosition).reverse()
        : this._globalLog.filter((e) => e.globalPosition >= fromPosition);
    return limit(result, options?.maxCount);
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribe(streamId: string, handler: EventHandler): Subscription {
    this._validateStreamId(streamId);

    let subscribers = this._streamSubscribers.get(streamId);
    if (subscribers === undefined) {
      subscribers = new Set();
      this._streamSubscribers.set(streamId, subscribers);
    }
    const set = subscribers;
    set.add(handler);

    return {
      unsubscribe: () => {
        set.delete(handler);
        if (set.size === 0) {
          this._streamSubscribers.delete(streamId);
        }
      },
    };
  }

  subscribeAll(handler: EventHandler): Subscription {
    this._globalSubscribers.add(handler);
    return {
      unsubscribe: () => {
        this._globalSubscribers.delete(handler);
      },
    };
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamExists(streamId: string): boolean {
    return this.streamVersion(streamId) > 0;
  }

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._globalLog.length;
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _validateStreamId(streamId: string): void {
    if (streamId.length === 0) {
      throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
    }
  }

  private _validateEvent(streamId: string, event: DomainEvent): void {
    if (this._catalog === undefined) return;
    if (!this._catalog.has(event.type)) {
      throw new EventStoreError("UNKNOWN_EVENT_TYPE", `Event type "${event.type}" is not registered`, streamId);
    }
    const issues = this._catalog.issues(event.type, event.payload);
    if (issues.length > 0) {
      throw new EventStoreError(
        "INVALID_PAYLOAD",
        `Invalid "${event.type}" payload: ${issues.join("; ")}`,
        streamId,
      );
    }
  }

  private _checkExpectedVersion(
    streamId: string,
    currentVersion: number,
    expectedVersion: AppendOptions["expectedVersion"],
  ): void {
    if (expectedVersion === undefined || expectedVersion === "any") return;
    if (expectedVersion === "no_stream") {
      if (currentVersion !== 0) {
        throw new EventStoreError(
          "CONCURRENCY_CONFLICT",
          `Stream "${streamId}" already exists (version ${String(currentVersion)}), expected no_stream`,
          streamId,
        );
      }
      return;
    }
    if (currentVersion !== expectedVersion) {
      throw new EventStoreError(
        "CONCURRENCY_CONFLICT",
        `Stream "${streamId}" is at version ${String(currentVersion)}, expected ${String(expectedVersion)}`,
        streamId,
      );
    }
  }

  private _dispatch(streamId: string, events: readonly StoredEvent[]): void {
    const streamSubs = this._streamSubscribers.get(streamId);
    if (streamSubs !== undefined) {
      for (const handler of streamSubs) {
        for (const event of events) handler(event);
      }
    }
    for (const handler of this._globalSubscribers) {
      for (const event of events) handler(event);
    }
  }
}

function limit(events: StoredEvent[], maxCount: number | undefined): StoredEvent[] {
  return maxCount !== undefined && maxCount >= 0 ? events.slice(0, maxCount) : events;
}
