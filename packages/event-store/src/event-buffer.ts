/**
 * @ballast/event-store — Per-operation event buffer.
 *
 * Coordinators record events while an operation runs and append them
 * to the store only once it commits. A failed operation discards its
 * buffer, so nothing it raised is ever published.
 */

import { randomUUID } from "node:crypto";
import type { DomainEvent, EventSource } from "@ballast/types";
import type { BallastEventType, BallastPayload } from "./ballast-events.js";

export interface EventBufferOptions {
  readonly source: EventSource;
  /** Address or label of the caller */
  readonly actor: string;
  readonly timestamp: string;
  /** Default: a random UUID */
  readonly correlationId?: string;
}

export class EventBuffer {
  readonly correlationId: string;
  private readonly _source: EventSource;
  private readonly _actor: string;
  private readonly _timestamp: string;
  private readonly _events: DomainEvent[] = [];

  constructor(options: EventBufferOptions) {
    this.correlationId = options.correlationId ?? randomUUID();
    this._source = options.source;
    this._actor = options.actor;
    this._timestamp = options.timestamp;
  }

  record<T extends BallastEventType>(
    type: T,
    payload: BallastPayload<T> & Readonly<Record<string, unknown>>,
  ): void {
    const previous = this._events[this._events.length - 1];
    this._events.push({
      type,
      metadata: {
        eventId: `${this.correlationId}:${String(this._events.length + 1)}`,
        timestamp: this._timestamp,
        actor: this._actor,
        correlationId: this.correlationId,
        source: this._source,
        ...(previous !== undefined ? { causationId: previous.metadata.eventId } : {}),
      },
      payload,
    });
  }

  get events(): readonly DomainEvent[] {
    return [...this._events];
  }

  get size(): number {
    return this._events.length;
  }
}
