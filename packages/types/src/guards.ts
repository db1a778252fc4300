/**
 * Runtime Type Guards
 *
 * Narrowing functions used at system boundaries (HTTP input,
 * deserialized events).
 */

import type { DomainEvent, EventMetadata, EventSource } from "./event.js";
import type { FailureCode } from "./failure.js";
import { FAILURE_RETRYABLE } from "./failure.js";

const EVENT_SOURCES = new Set<string>([
  "custody",
  "auction",
  "payments",
  "claims",
  "governance",
  "timelock",
]);

const AMOUNT_PATTERN = /^(0|[1-9]\d*)$/;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/** Non-empty string without surrounding whitespace. */
export function isAddress(value: unknown): value is string {
  return typeof value === "string" && value.length > 0 && value.trim() === value;
}

export function isAssetId(value: unknown): value is string {
  return isAddress(value);
}

/** Canonical base-10 representation of a non-negative integer. */
export function isAmountString(value: unknown): value is string {
  return typeof value === "string" && AMOUNT_PATTERN.test(value);
}

export function isEventSource(value: unknown): value is EventSource {
  return typeof value === "string" && EVENT_SOURCES.has(value);
}

export function isFailureCode(value: unknown): value is FailureCode {
  return typeof value === "string" && Object.hasOwn(FAILURE_RETRYABLE, value);
}

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (!isRecord(value)) return false;
  return (
    typeof value["eventId"] === "string" &&
    typeof value["timestamp"] === "string" &&
    typeof value["actor"] === "string" &&
    typeof value["correlationId"] === "string" &&
    (value["causationId"] === undefined || typeof value["causationId"] === "string") &&
    isEventSource(value["source"])
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (!isRecord(value)) return false;
  return (
    typeof value["type"] === "string" &&
    value["type"].length > 0 &&
    isEventMetadata(value["metadata"]) &&
    isRecord(value["payload"])
  );
}
