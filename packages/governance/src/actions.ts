/**
 * @fracta/governance — Proposal actions.
 *
 * A proposal carries its action as calldata: the RFC 8785 canonical
 * JSON of a GovernanceAction. Decoding validates with zod.
 */

import { canonicalize } from "json-canonicalize";
import { z } from "zod";
import type { AuctionEngine } from "@fracta/auction";
import type { Address } from "@fracta/types";
import { GovernanceError } from "./types.js";

// =============================================================================
// Schema
// =============================================================================

export const GovernanceActionSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("auction.setDuration"),
    seconds: z.number().int().positive(),
  }),
  z.object({
    type: z.literal("auction.setRoyaltyPercentage"),
    percentage: z.number().int().min(0).max(100),
  }),
  z.object({
    type: z.literal("auction.setMaxExtensions"),
    count: z.number().int().nonnegative(),
  }),
  z.object({
    type: z.literal("auction.cancel"),
    assetId: z.string().min(1),
  }),
]);

export type GovernanceAction = z.infer<typeof GovernanceActionSchema>;

// =============================================================================
// Encoding
// =============================================================================

export function encodeAction(action: GovernanceAction): string {
  return canonicalize(GovernanceActionSchema.parse(action));
}

export function decodeAction(calldata: string): GovernanceAction {
  let raw: unknown;
  try {
    raw = JSON.parse(calldata);
  } catch (err) {
    throw new GovernanceError("INVALID_ARGUMENT", "INVALID_CALLDATA", "Calldata is not JSON", { cause: err });
  }
  const result = GovernanceActionSchema.safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new GovernanceError("INVALID_ARGUMENT", "INVALID_CALLDATA", `Calldata is not a valid action: ${detail}`);
  }
  return result.data;
}

// =============================================================================
// Executors
// =============================================================================

/** Applies a decoded action as `caller`. */
export type ActionExecutor = (action: GovernanceAction, caller: Address) => void;

export type AuctionControls = Pick<
  AuctionEngine,
  "setDuration" | "setRoyaltyPercentage" | "setMaxExtensions" | "cancel"
>;

/**
 * Executor for actions that target the auction engine.
 */
export function auctionExecutor(engine: AuctionControls): ActionExecutor {
  return (action, caller) => {
    switch (action.type) {
      case "auction.setDuration":
        engine.setDuration(action.seconds, caller);
        return;
      case "auction.setRoyaltyPercentage":
        engine.setRoyaltyPercentage(action.percentage, caller);
        return;
      case "auction.setMaxExtensions":
        engine.setMaxExtensions(action.count, caller);
        return;
      case "auction.cancel":
        engine.cancel(action.assetId, caller);
        return;
    }
  };
}
