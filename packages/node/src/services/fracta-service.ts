/**
 * FractaService — composition root.
 *
 * Wires one claim ledger, value rail, asset registry, vault, payment
 * ledger, auction engine, timelock and governance controller onto a
 * shared event store, busy guard and clock.
 *
 *   FractionLedger ◄── mint/burn ── CustodyVault ◄── CustodyPort ── AuctionEngine
 *                                        ▲                              ▲
 *                                   authority                      auctionExecutor
 *                                        │                              │
 *   GovernanceController ── schedule ──► Timelock ─────── execute ──────┘
 */

import type { Logger } from "pino";
import { pino } from "pino";
import type { Address, Amount, Clock } from "@fracta/types";
import { ManualClock, SystemClock, isoAt } from "@fracta/types";
import type { EventSource } from "@fracta/types";
import type {
  EventStoreIntegrityResult,
  StoredEvent,
  Subscription,
} from "@fracta/event-store";
import {
  EventRecorder,
  InMemoryEventStore,
  createFractaCatalog,
} from "@fracta/event-store";
import {
  BusyGuard,
  FractionLedger,
  InMemoryValueRail,
  PendingPaymentLedger,
} from "@fracta/ledger";
import { CustodyVault, InMemoryAssetRegistry } from "@fracta/custody";
import type { AuctionParameters } from "@fracta/auction";
import { AuctionEngine } from "@fracta/auction";
import type { GovernanceParameters } from "@fracta/governance";
import {
  GovernanceController,
  Timelock,
  auctionExecutor,
} from "@fracta/governance";

/** Fixed addresses of the system's own components. */
export const SYSTEM_ADDRESSES = {
  vault: "vault",
  auction: "auction-engine",
  timelock: "timelock",
  governance: "governance",
} as const;

export interface EventQuery {
  readonly streamId?: string | undefined;
  readonly after: number;
  readonly maxCount: number;
}

export interface FractaServiceConfig {
  /** Owns the vault, starts auctions, administers the claim ledger and guards the timelock. */
  readonly ownerAddress: Address;
  readonly fractionsPerAsset: Amount;
  readonly auction?: Partial<AuctionParameters>;
  readonly governance?: Partial<GovernanceParameters>;
  readonly timelockDelay?: number;
  /**
   * Set the vault authority to the timelock at startup. When false the
   * owner sets it later through `vault.setAuthority`. Default: true
   */
  readonly bindTimelockAuthority?: boolean;
  readonly clock?: Clock;
  readonly logger?: Logger;
}

export class FractaService {
  readonly clock: Clock;
  readonly store: InMemoryEventStore;
  readonly guard: BusyGuard;
  readonly rail: InMemoryValueRail;
  readonly registry: InMemoryAssetRegistry;
  readonly claims: FractionLedger;
  readonly vault: CustodyVault;
  readonly payments: PendingPaymentLedger;
  readonly engine: AuctionEngine;
  readonly timelock: Timelock;
  readonly governance: GovernanceController;

  private readonly logger: Logger;
  private readonly eventLog: Subscription;

  constructor(config: FractaServiceConfig) {
    const clock = config.clock ?? new SystemClock();
    this.clock = clock;
    this.logger = config.logger ?? pino({ level: "silent" });

    this.store = new InMemoryEventStore(() => isoAt(clock.now()));
    const catalog = createFractaCatalog();
    const recorder = (source: EventSource): EventRecorder =>
      new EventRecorder(this.store, source, clock, catalog);

    this.eventLog = this.store.subscribeAll((stored) => {
      this.logger.debug(
        {
          type: stored.event.type,
          streamId: stored.streamId,
          globalPosition: stored.globalPosition,
          actor: stored.event.metadata.actor,
        },
        "Event recorded",
      );
    });

    this.guard = new BusyGuard();
    this.rail = new InMemoryValueRail();
    this.registry = new InMemoryAssetRegistry();

    this.claims = new FractionLedger(config.ownerAddress, recorder("claims"));
    this.claims.setAuthority(SYSTEM_ADDRESSES.vault, config.ownerAddress);

    this.vault = new CustodyVault({
      address: SYSTEM_ADDRESSES.vault,
      owner: config.ownerAddress,
      fractionsPerAsset: config.fractionsPerAsset,
      claims: this.claims,
      registry: this.registry,
      rail: this.rail,
      guard: this.guard,
      events: recorder("custody"),
    });

    this.payments = new PendingPaymentLedger({
      rail: this.rail,
      events: recorder("payments"),
      guard: this.guard,
    });

    this.engine = new AuctionEngine({
      address: SYSTEM_ADDRESSES.auction,
      custody: this.vault.grantAuctionCapability(),
      payments: this.payments,
      rail: this.rail,
      guard: this.guard,
      clock,
      events: recorder("auction"),
      ...(config.auction !== undefined ? { parameters: config.auction } : {}),
    });

    this.timelock = new Timelock({
      address: SYSTEM_ADDRESSES.timelock,
      controller: SYSTEM_ADDRESSES.governance,
      guardian: config.ownerAddress,
      clock,
      events: recorder("timelock"),
      ...(config.timelockDelay !== undefined ? { delay: config.timelockDelay } : {}),
    });
    this.timelock.registerTarget(SYSTEM_ADDRESSES.auction, auctionExecutor(this.engine));

    if (config.bindTimelockAuthority !== false) {
      this.vault.setAuthority(SYSTEM_ADDRESSES.timelock, config.ownerAddress);
    }

    this.governance = new GovernanceController({
      address: SYSTEM_ADDRESSES.governance,
      claims: this.claims,
      timelock: this.timelock,
      clock,
      events: recorder("governance"),
      ...(config.governance !== undefined ? { parameters: config.governance } : {}),
    });

    this.logger.info(
      {
        owner: config.ownerAddress,
        fractionsPerAsset: config.fractionsPerAsset.toString(),
        auction: this.engine.getParameters(),
        governance: this.governance.parameters,
        timelockDelay: this.timelock.delay,
        timelockBound: config.bindTimelockAuthority !== false,
      },
      "Fracta service composed",
    );
  }

  // ─── Events ──────────────────────────────────────────────────────────

  /**
   * Read up to `maxCount` events after `after`: a global position, or a
   * stream version when `streamId` is given.
   */
  readEvents(query: EventQuery): readonly StoredEvent[] {
    const { streamId, after, maxCount } = query;
    return streamId === undefined
      ? this.store.readAll({ fromPosition: after + 1, maxCount })
      : this.store.read(streamId, { fromVersion: after + 1, maxCount });
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return this.store.verifyIntegrity();
  }

  // ─── Sandbox ─────────────────────────────────────────────────────────

  /** The clock, when it is one the sandbox may move. */
  manualClock(): ManualClock | undefined {
    return this.clock instanceof ManualClock ? this.clock : undefined;
  }

  // ─── Lifecycle ───────────────────────────────────────────────────────

  stop(): void {
    this.eventLog.unsubscribe();
  }
}
