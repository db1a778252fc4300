/**
 * @fracta/event-store — In-memory EventStore implementation.
 *
 * The engine is an in-process state machine, so this is the store it
 * runs on; durability is the embedding process's concern.
 *
 * Versions and global positions are contiguous from 1, so a read from
 * version v (or position p) is a slice starting at index v - 1.
 */

import type { DomainEvent } from "@fracta/types";
import { isDomainEvent } from "@fracta/types";
import type {
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
  Subscription,
  UnhashedEvent,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

export class InMemoryEventStore implements EventStore {
  private readonly _streams = new Map<string, StoredEvent[]>();
  private readonly _globalLog: StoredEvent[] = [];
  private readonly _subscribers = new Set<EventHandler>();
  private _lastHash: string = GENESIS_HASH;

  constructor(private readonly _now: () => string = () => new Date().toISOString()) {}

  // ─── Append ─────────────────────────────────────────────────────────

  append(streamId: string, events: readonly DomainEvent[]): readonly StoredEvent[] {
    this._validateStreamId(streamId);
    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }
    const malformed = events.findIndex((event) => !isDomainEvent(event));
    if (malformed !== -1) {
      throw new EventStoreError(
        "INVALID_PAYLOAD",
        `Event ${malformed} of the batch is not a well-formed domain event`,
        streamId,
      );
    }

    const stream = this._streams.get(streamId) ?? [];
    this._streams.set(streamId, stream);
    const appendedAt = this._now();

    const stored = events.map((event) => {
      const base: UnhashedEvent = {
        event: { type: event.type, metadata: event.metadata, payload: event.payload },
        streamId,
        version: stream.length + 1,
        globalPosition: this._globalLog.length + 1,
        appendedAt,
      };
      const record: StoredEvent = {
        ...base,
        hash: computeEventHash(base, this._lastHash),
        previousHash: this._lastHash,
      };
      this._lastHash = record.hash;
      stream.push(record);
      this._globalLog.push(record);
      return record;
    });

    for (const handler of this._subscribers) {
      stored.forEach(handler);
    }
    return stored;
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    this._validateStreamId(streamId);
    const fromVersion = options?.fromVersion ?? 1;
    if (!Number.isSafeInteger(fromVersion) || fromVersion < 1) {
      throw new EventStoreError("INVALID_VERSION", `fromVersion must be >= 1, got ${fromVersion}`, streamId);
    }
    return window(this._streams.get(streamId) ?? [], fromVersion, options?.maxCount);
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    const fromPosition = options?.fromPosition ?? 1;
    if (!Number.isSafeInteger(fromPosition) || fromPosition < 1) {
      throw new EventStoreError("INVALID_VERSION", `fromPosition must be >= 1, got ${fromPosition}`);
    }
    return window(this._globalLog, fromPosition, options?.maxCount);
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribeAll(handler: EventHandler): Subscription {
    this._subscribers.add(handler);
    return {
      unsubscribe: () => {
        this._subscribers.delete(handler);
      },
    };
  }

  // ─── Query ──────────────────────────────────────────────────────────

  globalPosition(): number {
    return this._globalLog.length;
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  private _validateStreamId(streamId: string): void {
    if (streamId.length === 0) {
      throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
    }
  }
}

/** Events from 1-based index `from`, at most `maxCount` of them. */
function window(events: readonly StoredEvent[], from: number, maxCount: number | undefined): readonly StoredEvent[] {
  const start = from - 1;
  return maxCount === undefined ? events.slice(start) : events.slice(start, start + Math.max(0, maxCount));
}
