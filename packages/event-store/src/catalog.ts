/**
 * @ballast/event-store — Event Catalog.
 *
 * Registry of every event type the system may append, each with the
 * payload schema it is validated against.
 *
 * Rules:
 * - A type is registered once; re-registering the same version is a no-op
 * - A higher version replaces the schema, a lower one is refused
 * - Unregistered types never validate
 */

import type { EventSource } from "@ballast/types";
import type { ZodType } from "zod";

/**
 * A registered event schema.
 */
export interface EventSchema {
  /** Event type string (e.g. "vault.shares.deposited") */
  readonly type: string;

  readonly version: number;

  readonly description: string;

  readonly source: EventSource;

  readonly payload: ZodType;
}

export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogError";
  }
}

export class EventCatalog {
  private readonly _schemas = new Map<string, EventSchema>();

  /**
   * @throws CatalogError when `schema` is older than the registered version
   */
  register(schema: EventSchema): void {
    const existing = this._schemas.get(schema.type);
    if (existing !== undefined && existing.version > schema.version) {
      throw new CatalogError(
        `"${schema.type}" is registered at version ${String(existing.version)}, refusing version ${String(schema.version)}`,
      );
    }
    if (existing !== undefined && existing.version === schema.version) return;
    this._schemas.set(schema.type, schema);
  }

  getSchema(eventType: string): EventSchema | undefined {
    return this._schemas.get(eventType);
  }

  has(eventType: string): boolean {
    return this._schemas.has(eventType);
  }

  listTypes(): readonly string[] {
    return [...this._schemas.keys()].sort();
  }

  listBySource(source: EventSource): readonly EventSchema[] {
    return [...this._schemas.values()].filter((schema) => schema.source === source);
  }

  /**
   * Issues of a payload against its schema. Empty when valid; a single
   * issue when the type is unknown.
   */
  issues(eventType: string, payload: unknown): readonly string[] {
    const schema = this._schemas.get(eventType);
    if (schema === undefined) {
      return [`Unknown event type "${eventType}"`];
    }
    const result = schema.payload.safeParse(payload);
    if (result.success) return [];
    return result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
  }

  validate(eventType: string, payload: unknown): boolean {
    return this.issues(eventType, payload).length === 0;
  }

  get size(): number {
    return this._schemas.size;
  }
}
