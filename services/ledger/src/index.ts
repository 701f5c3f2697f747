/**
 * NAV Ledger Service
 * Custodial pooled-savings ledger
 *
 * Features:
 * - Share pricing against a reported NAV
 * - Asynchronous FIFO withdrawals with escrow
 * - Profit-only fees above a price high-water-mark
 * - Atomic operations with invariant checks and rollback
 * - Snapshot persistence
 */

export * from "./vault/index.js";
export * from "./storage/index.js";
export * from "./config.js";
export * from "./service.js";
