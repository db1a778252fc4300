/**
 * @fracta/event-store — Core types.
 *
 * Defines the interfaces and types for the append-only observable log.
 *
 * Design principles:
 * - Events are immutable after creation
 * - Streams are append-only (no UPDATE, no DELETE)
 * - Every event has a monotonically increasing version within its stream
 * - Every event is linked to its predecessor by a SHA-256 hash chain
 * - A global subscription feeds reactive consumers (the service log)
 */

import type { DomainEvent, EventMetadata } from "@fracta/types";

// =============================================================================
// Stored Event
// =============================================================================

/**
 * An event as persisted in the store.
 */
export interface StoredEvent<TPayload = Record<string, unknown>> {
  /** The domain event */
  readonly event: Readonly<{
    readonly type: string;
    readonly metadata: EventMetadata;
    readonly payload: Readonly<TPayload>;
  }>;

  /** Stream this event belongs to */
  readonly streamId: string;

  /** Position within this stream (1-based) */
  readonly version: number;

  /** Position across all streams (1-based) */
  readonly globalPosition: number;

  /** When this event was persisted */
  readonly appendedAt: string;

  /** SHA-256 of this event's canonical content and `previousHash` */
  readonly hash: string;

  /** Hash of the preceding event, or GENESIS_HASH */
  readonly previousHash: string;
}

/** The fields of a StoredEvent that feed its hash. */
export type UnhashedEvent = Omit<StoredEvent, "hash" | "previousHash">;

// =============================================================================
// Read Options
// =============================================================================

export interface ReadOptions {
  /** First stream version to return (1-based). Default: 1 */
  readonly fromVersion?: number;
  /** Maximum number of events to return. Default: unlimited */
  readonly maxCount?: number;
}

export interface ReadAllOptions {
  /** First global position to return. Default: 1 */
  readonly fromPosition?: number;
  readonly maxCount?: number;
}

// =============================================================================
// Subscription
// =============================================================================

export type EventHandler = (event: StoredEvent) => void;

export interface Subscription {
  unsubscribe(): void;
}

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  readonly position: number;
  readonly reason: string;
}

export interface EventStoreIntegrityResult {
  readonly valid: boolean;
  /** Global position of the last event whose hash verified */
  readonly lastVerifiedPosition: number;
  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Event Store Interface
// =============================================================================

/**
 * Append-only event store.
 *
 * Invariants:
 * - Events are immutable once appended
 * - Stream versions are contiguous (1, 2, 3, ...) with no gaps
 * - Global positions are monotonically increasing with no gaps
 * - Subscribers see events in order
 */
export interface EventStore {
  /** Append events to a stream and return them as stored. */
  append(streamId: string, events: readonly DomainEvent[]): readonly StoredEvent[];

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[];

  readAll(options?: ReadAllOptions): readonly StoredEvent[];

  subscribeAll(handler: EventHandler): Subscription;

  /** Position of the last event, or 0 if the store is empty */
  globalPosition(): number;

  verifyIntegrity(): EventStoreIntegrityResult;
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode =
  | "INVALID_STREAM_ID"
  | "EMPTY_APPEND"
  | "INVALID_VERSION"
  | "UNKNOWN_EVENT_TYPE"
  | "INVALID_PAYLOAD";

export class EventStoreError extends Error {
  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
    public readonly streamId?: string,
  ) {
    super(message);
    this.name = "EventStoreError";
  }
}
