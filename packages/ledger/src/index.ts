/**
 * @fracta/ledger — Claims, value and pull payments.
 *
 * Provides:
 * - FractionLedger: fungible claim units with a single mint/burn authority
 * - PendingPaymentLedger: pull-payment escrow for refunds and royalties
 * - InMemoryValueRail: native value accounts with receive hooks
 * - BusyGuard: per-resource reentrancy markers
 *
 * @packageDocumentation
 */

export type {
  LedgerFailureReason,
  ClaimLedger,
  ClaimBalances,
  ValueRail,
  ReceiveHook,
  HolderBalance,
  PendingPayment,
} from "./types.js";
export { LedgerError } from "./types.js";

export { formatAmount, requirePositive, mulDiv, percentOf } from "./amount-math.js";
export { BusyGuard, resourceKey } from "./busy-guard.js";
export { InMemoryValueRail } from "./value-rail.js";
export { FractionLedger } from "./fraction-ledger.js";
export { PendingPaymentLedger } from "./pending-payments.js";
export type { CreditReason, PendingPaymentDeps } from "./pending-payments.js";
