/**
 * Full engine wiring for governance tests: the vault authority is the
 * timelock, and the timelock applies actions to the auction engine.
 */

import { EventRecorder, InMemoryEventStore, createFractaCatalog } from "@fracta/event-store";
import { AuctionEngine } from "@fracta/auction";
import { CustodyVault, InMemoryAssetRegistry } from "@fracta/custody";
import { BusyGuard, FractionLedger, InMemoryValueRail, PendingPaymentLedger } from "@fracta/ledger";
import type { EventSource } from "@fracta/types";
import { ManualClock, isoAt } from "@fracta/types";
import { auctionExecutor } from "../src/actions.js";
import { GovernanceController } from "../src/controller.js";
import { Timelock } from "../src/timelock.js";

export const T0 = 1_700_000_000;
export const VOTING_PERIOD = 259_200;
export const DELAY = 172_800;
export const OWNER = "owner";
export const ENGINE = "auction-engine";

export function makeGovernedMarket() {
  const clock = new ManualClock(T0);
  const store = new InMemoryEventStore(() => isoAt(clock.now()));
  const catalog = createFractaCatalog();
  const recorder = (source: EventSource) => new EventRecorder(store, source, clock, catalog);

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
    address: ENGINE,
    custody: vault.grantAuctionCapability(),
    payments,
    rail,
    guard,
    clock,
    events: recorder("auction"),
  });

  const timelock = new Timelock({
    address: "timelock",
    controller: "governance",
    guardian: OWNER,
    delay: DELAY,
    clock,
    events: recorder("timelock"),
  });
  timelock.registerTarget(ENGINE, auctionExecutor(engine));
  vault.setAuthority(timelock.address, OWNER);

  const governance = new GovernanceController({
    address: "governance",
    claims,
    timelock,
    clock,
    events: recorder("governance"),
  });

  return { clock, store, rail, registry, claims, vault, payments, engine, timelock, governance };
}

export type GovernedMarket = ReturnType<typeof makeGovernedMarket>;

/**
 * Lock asset 7 for alice and spread its claims:
 * alice 650, bob 300, carol 50.
 */
export function distributeClaims(m: GovernedMarket): void {
  m.registry.register("7", "alice");
  m.vault.deposit(["7"], "alice");
  m.claims.transfer("alice", "bob", 300n);
  m.claims.transfer("alice", "carol", 50n);
}
