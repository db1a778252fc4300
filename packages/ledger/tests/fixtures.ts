/**
 * Shared wiring for ledger tests.
 */

import { EventRecorder, InMemoryEventStore, createFractaCatalog } from "@fracta/event-store";
import type { EventSource } from "@fracta/types";
import { ManualClock, isoAt } from "@fracta/types";

export function makeRecorders(clock = new ManualClock()) {
  const store = new InMemoryEventStore(() => isoAt(clock.now()));
  const catalog = createFractaCatalog();
  const recorder = (source: EventSource) => new EventRecorder(store, source, clock, catalog);
  return { store, clock, recorder };
}
