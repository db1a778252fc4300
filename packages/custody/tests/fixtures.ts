/**
 * Wires a vault with its collaborators for tests.
 */

import { EventRecorder, InMemoryEventStore, createFractaCatalog } from "@fracta/event-store";
import { BusyGuard, FractionLedger, InMemoryValueRail } from "@fracta/ledger";
import { ManualClock, isoAt } from "@fracta/types";
import { InMemoryAssetRegistry } from "../src/asset-registry.js";
import { CustodyVault } from "../src/vault.js";

export const VAULT = "vault";
export const OWNER = "owner";

export function makeVault(fractionsPerAsset = 1000n) {
  const clock = new ManualClock();
  const store = new InMemoryEventStore(() => isoAt(clock.now()));
  const catalog = createFractaCatalog();
  const guard = new BusyGuard();
  const rail = new InMemoryValueRail();
  const registry = new InMemoryAssetRegistry();
  const claims = new FractionLedger(OWNER, new EventRecorder(store, "claims", clock, catalog));
  claims.setAuthority(VAULT, OWNER);

  const vault = new CustodyVault({
    address: VAULT,
    owner: OWNER,
    fractionsPerAsset,
    claims,
    registry,
    rail,
    guard,
    events: new EventRecorder(store, "custody", clock, catalog),
  });
  return { clock, store, guard, rail, registry, claims, vault };
}
