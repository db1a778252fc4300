/**
 * CustodyVault — locks unique assets against fungible claims.
 *
 * Responsibilities:
 * - deposit(): take custody of a batch of assets, mint claims per asset
 * - withdraw(): return an asset against a full claim set
 * - redeem(): burn claims for a pro-rata share of an asset's sale proceeds
 * - setAuthority(): one-time designation of the governance authority
 *
 * The vault is the single owner of asset records and of the proceeds
 * pool. The auction engine reaches it only through the CustodyPort
 * capability, issued once.
 *
 * Every operation that moves an asset or value out of the vault runs
 * under a busy marker and mutates state before the external move. A
 * refused move rolls the state back and fails with TRANSFER_FAILED.
 */

import type { Address, Amount, AssetId, OneTimeSlot } from "@fracta/types";
import { UNSET, isSlotSet, slotHolds, slotOf } from "@fracta/types";
import type { EventRecorder } from "@fracta/event-store";
import { FRACTA_EVENTS } from "@fracta/event-store";
import type { BusyGuard, ClaimLedger, ValueRail } from "@fracta/ledger";
import { formatAmount, mulDiv, requirePositive, resourceKey } from "@fracta/ledger";
import type { AssetRecord, AssetRegistry, CustodyPort, RedeemResult } from "./types.js";
import { CustodyError } from "./types.js";

// =============================================================================
// Configuration
// =============================================================================

export interface CustodyVaultOptions {
  /** The vault's own account on the asset registry and value rail. */
  readonly address: Address;
  readonly owner: Address;
  readonly fractionsPerAsset: Amount;
  readonly claims: ClaimLedger;
  readonly registry: AssetRegistry;
  readonly rail: ValueRail;
  readonly guard: BusyGuard;
  readonly events: EventRecorder;
}

interface MutableAssetRecord {
  inCustody: boolean;
  originalOwner: Address;
  saleProceeds: Amount;
  listed: boolean;
}

function streamOf(assetId: AssetId): string {
  return `asset:${assetId}`;
}

// =============================================================================
// Vault
// =============================================================================

export class CustodyVault {
  readonly address: Address;
  readonly fractionsPerAsset: Amount;

  private readonly ownerAddress: Address;
  private readonly claims: ClaimLedger;
  private readonly registry: AssetRegistry;
  private readonly rail: ValueRail;
  private readonly guard: BusyGuard;
  private readonly events: EventRecorder;

  private readonly assets = new Map<AssetId, MutableAssetRecord>();
  private authoritySlot: OneTimeSlot<Address> = UNSET;
  private capabilityIssued = false;

  constructor(options: CustodyVaultOptions) {
    requirePositive(options.fractionsPerAsset, "Fractions per asset");
    this.address = options.address;
    this.ownerAddress = options.owner;
    this.fractionsPerAsset = options.fractionsPerAsset;
    this.claims = options.claims;
    this.registry = options.registry;
    this.rail = options.rail;
    this.guard = options.guard;
    this.events = options.events;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Deposit
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Take custody of every asset in the batch and mint
   * `fractionsPerAsset` claims per asset to the caller.
   *
   * All-or-nothing: if any transfer fails, the assets already moved in
   * this batch are returned and the call fails with TRANSFER_FAILED.
   */
  deposit(assetIds: readonly AssetId[], caller: Address): readonly AssetRecord[] {
    if (assetIds.length === 0) {
      throw new CustodyError("INVALID_ARGUMENT", "EMPTY_BATCH", "Deposit needs at least one asset");
    }
    if (new Set(assetIds).size !== assetIds.length) {
      throw new CustodyError("INVALID_ARGUMENT", "DUPLICATE_ASSET", "Deposit batch repeats an asset");
    }
    if (!slotHolds(this.claims.authority(), this.address)) {
      throw new CustodyError("PRECONDITION_FAILED", "VAULT_NOT_MINTER", "The vault is not the claim ledger authority");
    }

    return this.guard.runAll(assetIds.map(resourceKey.asset), () => {
      for (const assetId of assetIds) {
        if (this.assets.get(assetId)?.inCustody === true) {
          throw new CustodyError("PRECONDITION_FAILED", "ALREADY_IN_CUSTODY", `Asset ${assetId} is already in custody`);
        }
      }

      this.takeCustody(assetIds, caller);

      const correlationId = this.events.correlation();
      const records: AssetRecord[] = [];
      for (const assetId of assetIds) {
        const record: MutableAssetRecord = {
          inCustody: true,
          originalOwner: caller,
          saleProceeds: this.assets.get(assetId)?.saleProceeds ?? 0n,
          listed: false,
        };
        this.assets.set(assetId, record);
        this.claims.mint(caller, this.fractionsPerAsset, this.address);
        this.events.record(streamOf(assetId), FRACTA_EVENTS.ASSET_DEPOSITED, caller, {
          assetId,
          depositor: caller,
          minted: formatAmount(this.fractionsPerAsset),
        }, { correlationId });
        records.push(this.view(assetId, record));
      }
      return records;
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Withdraw
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Return `assetId` to the caller, burning a full claim set from them.
   */
  withdraw(assetId: AssetId, caller: Address): AssetRecord {
    return this.guard.run(resourceKey.asset(assetId), () => {
      const record = this.assets.get(assetId);
      if (record === undefined || !record.inCustody) {
        throw new CustodyError("NOT_IN_CUSTODY", "NOT_IN_CUSTODY", `Asset ${assetId} is not in custody`);
      }
      if (record.listed) {
        throw new CustodyError("PRECONDITION_FAILED", "ASSET_UNDER_AUCTION", `Asset ${assetId} is under auction`);
      }
      this.requireClaims(caller, this.fractionsPerAsset);

      this.claims.burnFrom(caller, this.fractionsPerAsset, this.address);
      record.inCustody = false;
      try {
        this.registry.transfer(assetId, this.address, caller);
      } catch (err) {
        record.inCustody = true;
        this.claims.mint(caller, this.fractionsPerAsset, this.address);
        throw new CustodyError("TRANSFER_FAILED", "RECIPIENT_REJECTED", `Returning asset ${assetId} failed`, {
          cause: err,
        });
      }

      this.events.record(streamOf(assetId), FRACTA_EVENTS.ASSET_WITHDRAWN, caller, {
        assetId,
        holder: caller,
        burned: formatAmount(this.fractionsPerAsset),
      });
      return this.view(assetId, record);
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Redeem
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Burn `fractionAmount` claims for `proceeds * fractionAmount / supply`.
   *
   * Division truncates; the remainder stays in the pool. A redemption
   * that would pay nothing is rejected.
   */
  redeem(assetId: AssetId, fractionAmount: Amount, caller: Address): RedeemResult {
    requirePositive(fractionAmount, "Redeemed amount");

    return this.guard.runAll([resourceKey.asset(assetId), resourceKey.holder(caller)], () => {
      const record = this.assets.get(assetId);
      if (record === undefined || record.saleProceeds === 0n) {
        throw new CustodyError("NO_PROCEEDS", "NO_PROCEEDS", `Asset ${assetId} has no proceeds to redeem`);
      }
      const supply = this.claims.totalSupply();
      if (supply === 0n) {
        throw new CustodyError("SUPPLY_ZERO", "SUPPLY_ZERO", "No claims are outstanding");
      }
      this.requireClaims(caller, fractionAmount);

      const payout = mulDiv(record.saleProceeds, fractionAmount, supply);
      if (payout === 0n) {
        throw new CustodyError(
          "PRECONDITION_FAILED",
          "PAYOUT_ZERO",
          `Redeeming ${formatAmount(fractionAmount)} claims would pay nothing`,
        );
      }

      record.saleProceeds -= payout;
      this.claims.burnFrom(caller, fractionAmount, this.address);
      try {
        this.rail.send(caller, payout);
      } catch (err) {
        this.claims.mint(caller, fractionAmount, this.address);
        record.saleProceeds += payout;
        throw new CustodyError("TRANSFER_FAILED", "RECIPIENT_REJECTED", `Paying ${caller} failed`, { cause: err });
      }

      this.events.record(streamOf(assetId), FRACTA_EVENTS.PROCEEDS_REDEEMED, caller, {
        assetId,
        holder: caller,
        fractionAmount: formatAmount(fractionAmount),
        payout: formatAmount(payout),
        remainingProceeds: formatAmount(record.saleProceeds),
      });
      return { payout, remainingProceeds: record.saleProceeds };
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Authority
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Designate the governance authority. Owner only, exactly once;
   * a wrong address cannot be corrected.
   */
  setAuthority(authority: Address, caller: Address): void {
    if (caller !== this.ownerAddress) {
      throw new CustodyError("UNAUTHORIZED", "NOT_OWNER", `${caller} is not the vault owner`);
    }
    if (isSlotSet(this.authoritySlot)) {
      throw new CustodyError(
        "ALREADY_SET",
        "AUTHORITY_ALREADY_SET",
        `Governance authority is already ${this.authoritySlot.value}`,
      );
    }
    this.authoritySlot = slotOf(authority);
    this.events.record("custody", FRACTA_EVENTS.CUSTODY_AUTHORITY_SET, caller, { authority });
  }

  authority(): OneTimeSlot<Address> {
    return this.authoritySlot;
  }

  owner(): Address {
    return this.ownerAddress;
  }

  /**
   * Issue the auction engine's capability. Callable once.
   */
  grantAuctionCapability(): CustodyPort {
    if (this.capabilityIssued) {
      throw new CustodyError("ALREADY_SET", "CAPABILITY_ALREADY_GRANTED", "The auction capability was already granted");
    }
    this.capabilityIssued = true;

    return {
      owner: () => this.ownerAddress,
      authority: () => this.authoritySlot,
      isInCustody: (assetId) => this.isInCustody(assetId),
      originalOwnerOf: (assetId) => this.assets.get(assetId)?.originalOwner,
      setListed: (assetId, listed) => {
        this.requireRecord(assetId).listed = listed;
      },
      releaseAsset: (assetId, to) => {
        this.registry.transfer(assetId, this.address, to);
      },
      recordSaleProceeds: (assetId, amount, correlationId) => {
        this.recordSaleProceeds(assetId, amount, correlationId);
      },
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  isInCustody(assetId: AssetId): boolean {
    return this.assets.get(assetId)?.inCustody === true;
  }

  getAsset(assetId: AssetId): AssetRecord | undefined {
    const record = this.assets.get(assetId);
    return record === undefined ? undefined : this.view(assetId, record);
  }

  listAssets(): readonly AssetRecord[] {
    return [...this.assets.entries()].map(([assetId, record]) => this.view(assetId, record));
  }

  /** Sum of every asset's unredeemed proceeds. */
  totalProceeds(): Amount {
    let total = 0n;
    for (const record of this.assets.values()) {
      total += record.saleProceeds;
    }
    return total;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private recordSaleProceeds(assetId: AssetId, amount: Amount, correlationId?: string): void {
    requirePositive(amount, "Sale proceeds");
    const record = this.requireRecord(assetId);
    record.saleProceeds += amount;
    record.inCustody = false;
    record.listed = false;
    this.events.record(streamOf(assetId), FRACTA_EVENTS.PROCEEDS_RECORDED, this.address, {
      assetId,
      amount: formatAmount(amount),
      totalProceeds: formatAmount(record.saleProceeds),
    }, correlationId !== undefined ? { correlationId } : undefined);
  }

  /** Move every asset to the vault, returning the moved ones if any move fails. */
  private takeCustody(assetIds: readonly AssetId[], caller: Address): void {
    const moved: AssetId[] = [];
    try {
      for (const assetId of assetIds) {
        this.registry.transfer(assetId, caller, this.address);
        moved.push(assetId);
      }
    } catch (err) {
      for (const assetId of moved.reverse()) {
        this.registry.revertTransfer(assetId, caller, this.address);
      }
      throw new CustodyError(
        "TRANSFER_FAILED",
        err instanceof CustodyError ? err.reason : "RECIPIENT_REJECTED",
        `Deposit failed after ${moved.length} of ${assetIds.length} assets; the batch was returned`,
        { cause: err },
      );
    }
  }

  private requireRecord(assetId: AssetId): MutableAssetRecord {
    const record = this.assets.get(assetId);
    if (record === undefined) {
      throw new CustodyError("NOT_FOUND", "UNKNOWN_ASSET", `Asset ${assetId} was never deposited`);
    }
    return record;
  }

  private requireClaims(holder: Address, amount: Amount): void {
    const balance = this.claims.balanceOf(holder);
    if (balance < amount) {
      throw new CustodyError(
        "INSUFFICIENT_CLAIMS",
        "BALANCE_TOO_LOW",
        `${holder} holds ${formatAmount(balance)} claims, needs ${formatAmount(amount)}`,
      );
    }
  }

  private view(assetId: AssetId, record: MutableAssetRecord): AssetRecord {
    return { assetId, ...record };
  }
}
