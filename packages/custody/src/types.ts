/**
 * @fracta/custody — Types, ports and errors.
 */

import type { Address, Amount, AssetId, FailureCode, OneTimeSlot } from "@fracta/types";

// =============================================================================
// Errors
// =============================================================================

export type CustodyFailureReason =
  | "NOT_OWNER"
  | "AUTHORITY_ALREADY_SET"
  | "CAPABILITY_ALREADY_GRANTED"
  | "VAULT_NOT_MINTER"
  | "EMPTY_BATCH"
  | "DUPLICATE_ASSET"
  | "ALREADY_IN_CUSTODY"
  | "NOT_IN_CUSTODY"
  | "ASSET_UNDER_AUCTION"
  | "NOT_ASSET_OWNER"
  | "UNKNOWN_ASSET"
  | "ASSET_EXISTS"
  | "RECIPIENT_REJECTED"
  | "BALANCE_TOO_LOW"
  | "NO_PROCEEDS"
  | "SUPPLY_ZERO"
  | "PAYOUT_ZERO"
  | "NON_POSITIVE_AMOUNT";

export class CustodyError extends Error {
  public readonly code: FailureCode;
  public readonly reason: CustodyFailureReason;

  constructor(code: FailureCode, reason: CustodyFailureReason, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "CustodyError";
    this.code = code;
    this.reason = reason;
  }
}

// =============================================================================
// Asset Registry Port
// =============================================================================

/**
 * The external registry of unique, non-divisible assets.
 */
export interface AssetRegistry {
  ownerOf(assetId: AssetId): Address | undefined;

  /**
   * Move `assetId` from `from` to `to`. Throws if `from` does not own it
   * or the recipient refuses it; nothing changes on failure.
   */
  transfer(assetId: AssetId, from: Address, to: Address): void;

  /**
   * Undo a completed `transfer(assetId, from, to)`. Receive hooks are not
   * consulted, so the undo cannot be refused.
   */
  revertTransfer(assetId: AssetId, from: Address, to: Address): void;
}

/** Runs when an address receives an asset. Throwing refuses it. */
export type AssetReceiveHook = (assetId: AssetId, from: Address) => void;

// =============================================================================
// Records
// =============================================================================

export interface AssetRecord {
  readonly assetId: AssetId;
  readonly inCustody: boolean;
  /** Depositor of the current (or most recent) lock cycle. */
  readonly originalOwner: Address;
  /** Unredeemed proceeds owed to claim holders. */
  readonly saleProceeds: Amount;
  /** True while an auction for the asset is active. */
  readonly listed: boolean;
}

export interface RedeemResult {
  readonly payout: Amount;
  readonly remainingProceeds: Amount;
}

// =============================================================================
// Auction Capability
// =============================================================================

/**
 * What the auction engine may do to the vault. Issued once by
 * `CustodyVault.grantAuctionCapability()`; the vault never calls back
 * into the engine.
 */
export interface CustodyPort {
  /** Vault owner, who alone may start auctions. */
  owner(): Address;

  /** Governance authority, who alone may cancel auctions and change parameters. */
  authority(): OneTimeSlot<Address>;

  isInCustody(assetId: AssetId): boolean;

  originalOwnerOf(assetId: AssetId): Address | undefined;

  setListed(assetId: AssetId, listed: boolean): void;

  /** Hand a custodied asset to an auction winner. */
  releaseAsset(assetId: AssetId, to: Address): void;

  /** Book a sale: add to proceeds and clear the custody flag. */
  recordSaleProceeds(assetId: AssetId, amount: Amount, correlationId?: string): void;
}
