/**
 * @fracta/event-store — Event Catalog.
 *
 * Formalizes all domain events into a single catalog with:
 * - Typed event definitions (type string → payload shape)
 * - Schema versions per event type
 * - Runtime payload validation before an event is recorded
 * - Discovery: listing all known event types, by source
 *
 * Usage:
 * ```ts
 * const catalog = new EventCatalog();
 *
 * catalog.register({
 *   type: "custody.asset.deposited",
 *   version: 1,
 *   description: "An asset entered custody",
 *   source: "custody",
 *   validate: (p) => isRecord(p) && typeof p["assetId"] === "string",
 * });
 * ```
 */

import type { EventSource } from "@fracta/types";

// =============================================================================
// Event Schema Definition
// =============================================================================

export interface EventSchema {
  /** Event type string (e.g., "auction.bid.placed") */
  readonly type: string;

  /** Current schema version (positive integer) */
  readonly version: number;

  readonly description: string;

  /** Which component emits this event */
  readonly source: EventSource;

  /** Whether the payload is valid for the current schema version */
  validate(payload: unknown): boolean;
}

// =============================================================================
// Event Catalog
// =============================================================================

export class EventCatalog {
  private readonly _schemas = new Map<string, EventSchema>();

  /**
   * Register an event schema. Re-registering the same type replaces
   * the schema only when the version moves forward.
   *
   * @throws CatalogError on a version downgrade
   */
  register(schema: EventSchema): void {
    const existing = this._schemas.get(schema.type);
    if (existing !== undefined && schema.version < existing.version) {
      throw new CatalogError(
        `Cannot downgrade "${schema.type}" from version ${existing.version} to ${schema.version}`,
      );
    }
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

  listSchemas(): readonly EventSchema[] {
    return [...this._schemas.values()];
  }

  listBySource(source: EventSource): readonly EventSchema[] {
    return [...this._schemas.values()].filter((s) => s.source === source);
  }

  /**
   * @returns true if valid, false if invalid or unregistered
   */
  validate(eventType: string, payload: unknown): boolean {
    const schema = this._schemas.get(eventType);
    if (schema === undefined) {
      return false;
    }
    return schema.validate(payload);
  }

  get size(): number {
    return this._schemas.size;
  }
}

// =============================================================================
// Errors
// =============================================================================

export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogError";
  }
}
