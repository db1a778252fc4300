/**
 * @fracta/event-store — Append-only observable event log.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore with a SHA-256 hash chain
 * - EventCatalog with every Fracta event type
 * - EventRecorder, the path components append through
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  UnhashedEvent,
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

// Implementation
export { InMemoryEventStore } from "./in-memory-store.js";

// Catalog
export type { EventSchema } from "./catalog.js";
export { EventCatalog, CatalogError } from "./catalog.js";
export { FRACTA_EVENTS, createFractaCatalog } from "./fracta-events.js";
export type {
  FractaEventType,
  AssetDepositedPayload,
  AssetWithdrawnPayload,
  ProceedsRedeemedPayload,
  ProceedsRecordedPayload,
  AuthoritySetPayload,
  AuctionStartedPayload,
  BidPlacedPayload,
  AuctionEndedPayload,
  AuctionCancelledPayload,
  AuctionParameterUpdatedPayload,
  PaymentCreditedPayload,
  PaymentWithdrawnPayload,
  ProposalCreatedPayload,
  VoteCastPayload,
  ProposalExecutedPayload,
  OperationPayload,
} from "./fracta-events.js";

// Recorder
export { EventRecorder } from "./recorder.js";
export type { RecordOptions } from "./recorder.js";
