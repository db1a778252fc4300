/**
 * @fracta/event-store — Event recorder.
 *
 * The one path by which components append to the observable log.
 * Builds metadata from the injected clock, validates the payload
 * against the catalog, and appends.
 */

import { randomUUID } from "node:crypto";
import type { Clock, EventSource } from "@fracta/types";
import { isoAt } from "@fracta/types";
import type { EventCatalog } from "./catalog.js";
import type { EventStore, StoredEvent } from "./types.js";
import { EventStoreError } from "./types.js";

export interface RecordOptions {
  readonly correlationId?: string;
  readonly causationId?: string;
}

export class EventRecorder {
  constructor(
    private readonly store: EventStore,
    private readonly source: EventSource,
    private readonly clock: Clock,
    private readonly catalog?: EventCatalog,
  ) {}

  /** A fresh correlation ID for grouping the events of one operation. */
  correlation(): string {
    return randomUUID();
  }

  record(
    streamId: string,
    type: string,
    actor: string,
    payload: Readonly<Record<string, unknown>>,
    options?: RecordOptions,
  ): StoredEvent {
    if (this.catalog !== undefined) {
      if (!this.catalog.has(type)) {
        throw new EventStoreError("UNKNOWN_EVENT_TYPE", `Event type "${type}" is not in the catalog`, streamId);
      }
      if (!this.catalog.validate(type, payload)) {
        throw new EventStoreError("INVALID_PAYLOAD", `Payload does not match schema for "${type}"`, streamId);
      }
    }

    const metadata = {
      eventId: randomUUID(),
      timestamp: isoAt(this.clock.now()),
      actor,
      correlationId: options?.correlationId ?? randomUUID(),
      source: this.source,
      ...(options?.causationId !== undefined ? { causationId: options.causationId } : {}),
    };

    const [stored] = this.store.append(streamId, [{ type, metadata, payload }]);
    if (stored === undefined) {
      throw new EventStoreError("EMPTY_APPEND", `Append to "${streamId}" returned no events`, streamId);
    }
    return stored;
  }
}
