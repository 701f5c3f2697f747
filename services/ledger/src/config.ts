/**
 * Ledger Service Configuration
 */

import { z } from "zod";
import {
  envSchema,
  addressSchema,
  COOLDOWN_MODES,
  LEDGER_DEFAULTS,
  LEDGER_LIMITS,
  MAX_FEE_RATE,
  PRECISION,
} from "@navledger/shared";

// ============================================
// LEDGER CONFIG SCHEMA
// ============================================

const ledgerConfigSchema = z.object({
  // Identity
  ledgerAddress: addressSchema,
  ownerAddress: addressSchema,
  operatorAddresses: z.array(addressSchema),
  treasury: addressSchema,
  custodyVenue: addressSchema,

  // Parameters
  parameters: z.object({
    feeRate: z.bigint().nonnegative().lte(MAX_FEE_RATE, "LEDGER_FEE_RATE exceeds MAX_FEE_RATE"),
    cooldownPeriodMs: z.number().int().nonnegative().max(LEDGER_LIMITS.maxCooldownMs),
    perUserCap: z.bigint().nonnegative(),
    globalCap: z.bigint().nonnegative(),
    liquidityBuffer: z.bigint().nonnegative(),
    maxYieldChangePercent: z.bigint().nonnegative().lte(PRECISION),
    yieldReportIntervalMs: z.number().int().nonnegative(),
  }),
  cooldownMode: z.enum([COOLDOWN_MODES.CURRENT, COOLDOWN_MODES.SNAPSHOT]),

  // Storage
  statePath: z.string().min(1),
});

export type LedgerServiceConfig = z.infer<typeof ledgerConfigSchema>;

// ============================================
// LOAD CONFIGURATION
// ============================================

export function loadLedgerConfig(source: NodeJS.ProcessEnv = process.env): LedgerServiceConfig {
  // Parse environment with defaults
  const env = envSchema.parse(source);

  const config: LedgerServiceConfig = {
    ledgerAddress: env.LEDGER_ADDRESS,
    ownerAddress: env.LEDGER_OWNER_ADDRESS,
    operatorAddresses: env.LEDGER_OPERATOR_ADDRESSES,
    treasury: env.LEDGER_TREASURY_ADDRESS,
    custodyVenue: env.LEDGER_CUSTODY_ADDRESS,

    parameters: {
      feeRate: env.LEDGER_FEE_RATE ?? LEDGER_DEFAULTS.feeRate,
      cooldownPeriodMs: env.LEDGER_COOLDOWN_MS ?? LEDGER_DEFAULTS.cooldownPeriodMs,
      perUserCap: env.LEDGER_PER_USER_CAP ?? LEDGER_DEFAULTS.perUserCap,
      globalCap: env.LEDGER_GLOBAL_CAP ?? LEDGER_DEFAULTS.globalCap,
      liquidityBuffer: env.LEDGER_LIQUIDITY_BUFFER ?? LEDGER_DEFAULTS.liquidityBuffer,
      maxYieldChangePercent: env.LEDGER_MAX_YIELD_CHANGE ?? LEDGER_DEFAULTS.maxYieldChangePercent,
      yieldReportIntervalMs: env.LEDGER_YIELD_REPORT_INTERVAL_MS ?? LEDGER_DEFAULTS.yieldReportIntervalMs,
    },
    cooldownMode: env.LEDGER_COOLDOWN_MODE,

    statePath: env.LEDGER_STATE_PATH,
  };

  // Validate the configuration
  return ledgerConfigSchema.parse(config);
}
