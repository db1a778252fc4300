/**
 * @fracta/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { Address } from "@fracta/types";

// =============================================================================
// Schema
// =============================================================================

const flag = (fallback: "true" | "false") =>
  z
    .enum(["true", "false"])
    .default(fallback)
    .transform((v) => v === "true");

const percentage = (fallback: number) =>
  z.coerce.number().int().min(0).max(100).default(fallback);

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Auth
  API_KEYS: z.string().default(""),

  // Custody
  OWNER_ADDRESS: z.string().min(1).default("owner"),
  FRACTIONS_PER_ASSET: z
    .string()
    .regex(/^[1-9][0-9]*$/, "must be a positive integer")
    .default("1000")
    .transform((v) => BigInt(v)),
  BIND_TIMELOCK_AUTHORITY: flag("true"),

  // Auction
  AUCTION_DURATION_SECONDS: z.coerce.number().int().min(1).default(604_800),
  ANTI_SNIPE_WINDOW_SECONDS: z.coerce.number().int().min(0).default(900),
  ANTI_SNIPE_EXTENSION_SECONDS: z.coerce.number().int().min(0).default(900),
  AUCTION_MAX_EXTENSIONS: z.coerce.number().int().min(0).default(0),
  ROYALTY_PERCENTAGE: percentage(5),

  // Governance
  PROPOSAL_THRESHOLD_PERCENTAGE: percentage(5),
  QUORUM_PERCENTAGE: percentage(10),
  VOTING_PERIOD_SECONDS: z.coerce.number().int().min(1).default(259_200),
  TIMELOCK_DELAY_SECONDS: z.coerce.number().int().min(0).default(172_800),

  // Sandbox
  SANDBOX_ENABLED: z.enum(["true", "false"]).optional(),
  CLOCK: z.enum(["system", "manual"]).default("system"),
});

/** Production runs refuse header-asserted callers. */
const EnvSchema = ConfigSchema.superRefine((env, ctx) => {
  if (env.NODE_ENV === "production" && env.API_KEYS.trim() === "") {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["API_KEYS"],
      message: "API_KEYS is required when NODE_ENV is production",
    });
  }
});

export type AppConfig = Omit<z.infer<typeof ConfigSchema>, "SANDBOX_ENABLED"> & {
  readonly SANDBOX_ENABLED: boolean;
};

// =============================================================================
// API Key Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
  readonly address: Address;
}

/**
 * Parse the API_KEYS env var into key → caller address records.
 *
 * Format: "key1:address1,key2:address2"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];
  const seen = new Set<string>();

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    const [key, address] = parts;
    if (parts.length !== 2 || key === undefined || address === undefined) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:address`,
      );
    }
    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (address === "") {
      throw new Error(`Address cannot be empty for API key "${key}"`);
    }
    if (seen.has(key)) {
      throw new Error(`Duplicate API key "${key}" in API_KEYS`);
    }
    seen.add(key);
    keys.push({ key, address });
  }

  return keys;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * The sandbox is on by default everywhere except production, and
 * production needs API keys.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const { SANDBOX_ENABLED, ...parsed } = EnvSchema.parse(env);
  return {
    ...parsed,
    SANDBOX_ENABLED:
      SANDBOX_ENABLED === undefined
        ? parsed.NODE_ENV !== "production"
        : SANDBOX_ENABLED === "true",
  };
}
