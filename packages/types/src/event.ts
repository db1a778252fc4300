/**
 * Event Types
 *
 * Every mutating operation appends a DomainEvent to the observable log.
 *
 * Rules:
 * - Events are immutable after creation
 * - Events are appended only after the operation has fully succeeded
 * - Payloads are JSON-safe: amounts are base-10 strings
 */

/** Which component emitted the event. */
export type EventSource =
  | "custody"
  | "auction"
  | "payments"
  | "claims"
  | "governance"
  | "timelock";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp (from the injected clock) */
  readonly timestamp: string;

  /** Address that invoked the operation */
  readonly actor: string;

  /** ID for grouping the events of one operation */
  readonly correlationId: string;

  /** ID of the event that caused this one, if any */
  readonly causationId?: string;

  readonly source: EventSource;
}

/**
 * A domain event, discriminated by `type`.
 */
export interface DomainEvent {
  /** e.g. "custody.asset.deposited" */
  readonly type: string;

  readonly metadata: EventMetadata;

  readonly payload: Readonly<Record<string, unknown>>;
}
