/**
 * Wires an auction engine over a real vault for tests.
 */

import { EventRecorder, InMemoryEventStore, createFractaCatalog } from "@fracta/event-store";
import { CustodyVault, InMemoryAssetRegistry } from "@fracta/custody";
import { BusyGuard, FractionLedger, InMemoryValueRail, PendingPaymentLedger } from "@fracta/ledger";
import { ManualClock, isoAt } from "@fracta/types";
import { AuctionEngine } from "../src/engine.js";
import type { AuctionParameters } from "../src/types.js";

export const T0 = 1_700_000_000;
export const WEEK = 604_800;
export const OWNER = "owner";
export const GOV = "gov";

export function makeMarket(parameters?: Partial<AuctionParameters>) {
  const clock = new ManualClock(T0);
  const store = new InMemoryEventStore(() => isoAt(clock.now()));
  const catalog = createFractaCatalog();
  const recorder = (source: "custody" | "auction" | "payments" | "claims") =>
    new EventRecorder(store, source, clock, catalog);

  const guard = new BusyGuard();
  const rail = new InMemoryValueRail();
  const registry = new InMemoryAssetRegistry();
  const claims = new FractionLedger(OWNER, recorder("claims"));
  claims.setAuthority("vault", OWNER);

  const vault = new CustodyVault({
    address: "vault",
    owner: OWNER,
    fractionsPerAsset: 1000n,
    claims,
    registry,
    rail,
    guard,
    events: recorder("custody"),
  });
  const payments = new PendingPaymentLedger({ rail, events: recorder("payments"), guard });
  const engine = new AuctionEngine({
    address: "auction-engine",
    custody: vault.grantAuctionCapability(),
    payments,
    rail,
    guard,
    clock,
    events: recorder("auction"),
    parameters,
  });

  return { clock, store, guard, rail, registry, claims, vault, payments, engine };
}

/** Register asset `id` to `depositor` and lock it in the vault. */
export function depositAsset(market: ReturnType<typeof makeMarket>, id: string, depositor = "alice"): void {
  market.registry.register(id, depositor);
  market.vault.deposit([id], depositor);
}
