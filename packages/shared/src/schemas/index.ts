/**
 * NAV Ledger Zod Schemas
 * Validation schemas for configuration and persisted state
 *
 * Snapshot versioning enables backward compatibility tracking
 */

import { z } from "zod";
import { COOLDOWN_MODES } from "../constants/index.js";
import { addressSchema, uintStringSchema } from "./common.js";

// ============================================
// RE-EXPORT ALL SCHEMAS
// ============================================

// Common primitives
export * from "./common.js";

// Persisted ledger state
export * from "./ledger-snapshot.js";

// ============================================
// ENVIRONMENT SCHEMAS
// ============================================

const optionalAmount = uintStringSchema.transform((v) => BigInt(v)).optional();

export const envSchema = z.object({
  // Identity
  LEDGER_ADDRESS: addressSchema,
  LEDGER_OWNER_ADDRESS: addressSchema,
  LEDGER_TREASURY_ADDRESS: addressSchema,
  LEDGER_CUSTODY_ADDRESS: addressSchema,
  LEDGER_OPERATOR_ADDRESSES: z
    .string()
    .default("")
    .transform((v) => v.split(",").map((s) => s.trim()).filter((s) => s.length > 0))
    .pipe(z.array(addressSchema)),

  // Fees and yield (fixed point, 1e18 = 100%)
  LEDGER_FEE_RATE: optionalAmount,
  LEDGER_MAX_YIELD_CHANGE: optionalAmount,
  LEDGER_YIELD_REPORT_INTERVAL_MS: z.string().transform(Number).pipe(z.number().int().nonnegative()).optional(),

  // Withdrawals
  LEDGER_COOLDOWN_MS: z.string().transform(Number).pipe(z.number().int().nonnegative()).optional(),
  LEDGER_COOLDOWN_MODE: z.enum([COOLDOWN_MODES.CURRENT, COOLDOWN_MODES.SNAPSHOT]).default(COOLDOWN_MODES.CURRENT),

  // Caps and liquidity (value units)
  LEDGER_PER_USER_CAP: optionalAmount,
  LEDGER_GLOBAL_CAP: optionalAmount,
  LEDGER_LIQUIDITY_BUFFER: optionalAmount,

  // Storage
  LEDGER_STATE_PATH: z.string().default("./data/ledger"),

  // Logging
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  LOG_FORMAT: z.enum(["json", "pretty"]).default("json"),

  // Node
  NODE_ENV: z.enum(["development", "production", "test"]).default("production"),
});

export type EnvConfig = z.infer<typeof envSchema>;
