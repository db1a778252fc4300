/**
 * @fracta/custody — Custody vault.
 *
 * Provides:
 * - CustodyVault: deposit, withdraw, redeem, one-time governance authority
 * - CustodyPort: the capability the auction engine holds on the vault
 * - InMemoryAssetRegistry: ownership of unique assets
 *
 * @packageDocumentation
 */

export type {
  CustodyFailureReason,
  AssetRegistry,
  AssetReceiveHook,
  AssetRecord,
  RedeemResult,
  CustodyPort,
} from "./types.js";
export { CustodyError } from "./types.js";

export { InMemoryAssetRegistry } from "./asset-registry.js";
export { CustodyVault } from "./vault.js";
export type { CustodyVaultOptions } from "./vault.js";
