/**
 * Request DTOs with Zod validation schemas.
 *
 * Amounts travel as base-10 strings and are parsed to bigint here.
 */

import { z } from "zod";
import { isAddress, isAmountString, isAssetId } from "@fracta/types";
import { GovernanceActionSchema } from "@fracta/governance";

// =============================================================================
// Shared Schemas
// =============================================================================

export const AmountSchema = z
  .string()
  .refine(isAmountString, "must be a non-negative base-10 integer string")
  .transform((v) => BigInt(v));

const WHITESPACE_MESSAGE = "must be non-empty without surrounding whitespace";

export const AddressSchema = z.string().max(128).refine(isAddress, WHITESPACE_MESSAGE);

export const AssetIdSchema = z.string().max(128).refine(isAssetId, WHITESPACE_MESSAGE);

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(500).default(100),
});

// =============================================================================
// Custody
// =============================================================================

export const DepositSchema = z.object({
  assetIds: z.array(AssetIdSchema).max(100),
});
export type DepositDto = z.infer<typeof DepositSchema>;

export const RedeemSchema = z.object({
  amount: AmountSchema,
});
export type RedeemDto = z.infer<typeof RedeemSchema>;

export const SetAuthoritySchema = z.object({
  authority: AddressSchema,
});
export type SetAuthorityDto = z.infer<typeof SetAuthoritySchema>;

// =============================================================================
// Claims
// =============================================================================

export const TransferClaimsSchema = z.object({
  to: AddressSchema,
  amount: AmountSchema,
});
export type TransferClaimsDto = z.infer<typeof TransferClaimsSchema>;

// =============================================================================
// Auctions
// =============================================================================

export const StartAuctionSchema = z.object({
  startingPrice: AmountSchema,
  duration: z.number().int().positive(),
});
export type StartAuctionDto = z.infer<typeof StartAuctionSchema>;

export const BidSchema = z.object({
  amount: AmountSchema,
});
export type BidDto = z.infer<typeof BidSchema>;

export const ListAuctionsQuerySchema = z.object({
  active: z.enum(["true", "false"]).optional(),
});

// =============================================================================
// Governance
// =============================================================================

export const CreateProposalSchema = z.object({
  description: z.string().max(2048),
  target: AddressSchema,
  action: GovernanceActionSchema,
});
export type CreateProposalDto = z.infer<typeof CreateProposalSchema>;

export const VoteSchema = z.object({
  support: z.boolean(),
});
export type VoteDto = z.infer<typeof VoteSchema>;

// =============================================================================
// Events
// =============================================================================

export const ListEventsQuerySchema = PaginationQuerySchema.extend({
  streamId: z.string().min(1).optional(),
});
export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;

// =============================================================================
// Sandbox
// =============================================================================

export const FundSchema = z.object({
  address: AddressSchema,
  amount: AmountSchema,
});
export type FundDto = z.infer<typeof FundSchema>;

export const RegisterAssetSchema = z.object({
  assetId: AssetIdSchema,
  owner: AddressSchema,
});
export type RegisterAssetDto = z.infer<typeof RegisterAssetSchema>;

export const AdvanceClockSchema = z.object({
  seconds: z.number().int().min(0),
});
export type AdvanceClockDto = z.infer<typeof AdvanceClockSchema>;
