/**
 * LedgerSnapshot Schema
 * Persisted form of the complete ledger state
 *
 * @version 2
 * @backward-compatibility
 * - v1: Initial schema
 * - v2: Added navHistory and inceptionAt (v1 snapshots load with an empty history)
 */

import { z } from "zod";
import { NAV_HISTORY } from "../constants/index.js";
import {
  CURRENT_SNAPSHOT_VERSION,
  addressSchema,
  bigIntSchema,
  uintSchema,
  epochMsSchema,
} from "./common.js";

// ============================================
// WITHDRAWAL REQUESTS
// ============================================

export const withdrawalStatusSchema = z.enum(["pending", "fulfilled", "cancelled"]);

export const withdrawalRequestSchema = z.object({
  id: z.number().int().nonnegative(),
  requester: addressSchema,
  shares: uintSchema,
  requestedAt: epochMsSchema,
  cooldownAtRequest: epochMsSchema,
  status: withdrawalStatusSchema,
  valuePaid: uintSchema.optional(),
  resolvedAt: epochMsSchema.optional(),
});

export type WithdrawalRequestRecord = z.infer<typeof withdrawalRequestSchema>;

export const withdrawalQueueSnapshotSchema = z
  .object({
    head: z.number().int().nonnegative(),
    length: z.number().int().nonnegative(),
    purgeCursor: z.number().int().nonnegative(),
    requests: z.array(withdrawalRequestSchema),
  })
  .refine((q) => q.purgeCursor <= q.head && q.head <= q.length, {
    message: "Queue cursors out of order (purgeCursor <= head <= length)",
  });

export type WithdrawalQueueSnapshot = z.infer<typeof withdrawalQueueSnapshotSchema>;

// ============================================
// TIMELOCKED PARAMETER CHANGES
// ============================================

export const pendingParameterChangeSchema = z.discriminatedUnion("key", [
  z.object({ key: z.literal("feeRate"), value: uintSchema, executableAt: epochMsSchema }),
  z.object({ key: z.literal("cooldownPeriod"), value: epochMsSchema, executableAt: epochMsSchema }),
  z.object({ key: z.literal("treasury"), value: addressSchema, executableAt: epochMsSchema }),
  z.object({ key: z.literal("custodyVenue"), value: addressSchema, executableAt: epochMsSchema }),
]);

export type PendingParameterChange = z.infer<typeof pendingParameterChangeSchema>;

// ============================================
// NAV HISTORY
// ============================================

export const navHistoryEntrySchema = z.object({
  recordedAt: epochMsSchema,
  delta: bigIntSchema,
  totalAssets: uintSchema,
  totalSupply: uintSchema,
  sharePrice: uintSchema,
});

export type NavHistoryEntry = z.infer<typeof navHistoryEntrySchema>;

// ============================================
// LEDGER SNAPSHOT
// ============================================

const balanceEntrySchema = z.tuple([addressSchema, uintSchema]);

export const ledgerSnapshotSchema = z.object({
  version: z.union([z.literal(1), z.literal(CURRENT_SNAPSHOT_VERSION)]),
  ledgerAddress: addressSchema,
  savedAt: epochMsSchema,
  inceptionAt: epochMsSchema.optional(),

  // Accounting scalars
  totalDeposited: uintSchema,
  totalWithdrawn: uintSchema,
  accumulatedYield: bigIntSchema,
  pendingWithdrawalShares: uintSchema,
  priceHighWaterMark: uintSchema,
  lastYieldReportAt: epochMsSchema,

  // Parameters
  parameters: z.object({
    feeRate: uintSchema,
    cooldownPeriodMs: epochMsSchema,
    perUserCap: uintSchema,
    globalCap: uintSchema,
    liquidityBuffer: uintSchema,
    maxYieldChangePercent: uintSchema,
    yieldReportIntervalMs: epochMsSchema,
    treasury: addressSchema,
    custodyVenue: addressSchema,
  }),

  // Accounts
  totalSupply: uintSchema,
  balances: z.array(balanceEntrySchema),
  userTotalDeposited: z.array(balanceEntrySchema),
  pendingRequestCounts: z.array(z.tuple([addressSchema, z.number().int().nonnegative()])),

  queue: withdrawalQueueSnapshotSchema,
  pendingChanges: z.array(pendingParameterChangeSchema),

  navHistory: z.array(navHistoryEntrySchema).max(NAV_HISTORY.maxEntries).default([]),
});

export type LedgerSnapshot = z.infer<typeof ledgerSnapshotSchema>;

/**
 * JSON replacer that writes bigints as decimal strings
 */
export function bigintJsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}
