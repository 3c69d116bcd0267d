/**
 * @tallybridge/node: Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 * Read once at start-up; nothing mutates it afterwards.
 */

import { z } from "zod";
import type { Role } from "./types/auth.js";
import { ROLES } from "./types/auth.js";

// =============================================================================
// Schema
// =============================================================================

const booleanFlag = z
  .enum(["true", "false"])
  .transform((v) => v === "true");

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Auth
  API_KEYS: z.string().default(""),

  // Transport boundary
  TRUSTED_TRANSPORT_ADDRESS: z.string().min(1),
  FALLBACK_ROUTE: z.string().min(1).default("treasury:global"),
  COMPUTE_CEILING: z.coerce.number().int().min(1).default(400_000),

  // Weighting
  WEIGHT_MODE: z.enum(["normalized", "raw"]).default("normalized"),
  STALENESS_WINDOW_SECONDS: z.coerce.number().int().min(0).default(3600),
  STALE_ORACLE_POLICY: z.enum(["flag", "reject"]).default("flag"),

  // Event log
  EMIT_DUPLICATE_REJECTIONS: booleanFlag.default("true"),
  EVENT_LOG_PATH: z.string().min(1).optional(),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
  readonly role: Role;
}

function isRole(value: string): value is Role {
  return ROLES.some((role) => role === value);
}

/**
 * Parse the API_KEYS env var.
 *
 * Format: "key1:role1,key2:role2"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];

  for (const entry of raw.split(",")) {
    const [key, role, ...rest] = entry.trim().split(":");
    if (key === undefined || role === undefined || rest.length > 0) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:role`,
      );
    }
    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (!isRole(role)) {
      throw new Error(
        `Invalid role "${role}" in API_KEYS. Must be one of: ${ROLES.join(", ")}`,
      );
    }

    keys.push({ key, role });
  }

  return keys;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
