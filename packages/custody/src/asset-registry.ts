/**
 * @fracta/custody — In-memory asset registry.
 *
 * Tracks the owner of each unique asset. Addresses may register a
 * receive hook; a hook that throws refuses the asset.
 */

import type { Address, AssetId } from "@fracta/types";
import type { AssetReceiveHook, AssetRegistry } from "./types.js";
import { CustodyError } from "./types.js";

export class InMemoryAssetRegistry implements AssetRegistry {
  private readonly owners = new Map<AssetId, Address>();
  private readonly hooks = new Map<Address, AssetReceiveHook>();

  /** Bring a new asset into existence. */
  register(assetId: AssetId, owner: Address): void {
    if (this.owners.has(assetId)) {
      throw new CustodyError("INVALID_ARGUMENT", "ASSET_EXISTS", `Asset ${assetId} already exists`);
    }
    this.owners.set(assetId, owner);
  }

  ownerOf(assetId: AssetId): Address | undefined {
    return this.owners.get(assetId);
  }

  assetsOf(owner: Address): readonly AssetId[] {
    return [...this.owners.entries()].filter(([, o]) => o === owner).map(([id]) => id);
  }

  onReceive(address: Address, hook: AssetReceiveHook): () => void {
    this.hooks.set(address, hook);
    return () => {
      if (this.hooks.get(address) === hook) {
        this.hooks.delete(address);
      }
    };
  }

  transfer(assetId: AssetId, from: Address, to: Address): void {
    const owner = this.owners.get(assetId);
    if (owner === undefined) {
      throw new CustodyError("NOT_FOUND", "UNKNOWN_ASSET", `Asset ${assetId} does not exist`);
    }
    if (owner !== from) {
      throw new CustodyError("TRANSFER_FAILED", "NOT_ASSET_OWNER", `${from} does not own asset ${assetId}`);
    }

    this.owners.set(assetId, to);
    const hook = this.hooks.get(to);
    if (hook === undefined) {
      return;
    }
    try {
      hook(assetId, from);
    } catch (err) {
      this.owners.set(assetId, from);
      throw new CustodyError(
        "TRANSFER_FAILED",
        "RECIPIENT_REJECTED",
        `${to} refused asset ${assetId}`,
        { cause: err },
      );
    }
  }

  revertTransfer(assetId: AssetId, from: Address, to: Address): void {
    if (this.owners.get(assetId) !== to) {
      throw new CustodyError("PRECONDITION_FAILED", "NOT_ASSET_OWNER", `${to} does not hold asset ${assetId}`);
    }
    this.owners.set(assetId, from);
  }
}
