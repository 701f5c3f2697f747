/**
 * Vault Module Exports
 *
 * Provides the pooled-capital ledger with:
 * - NAV pricing and share accounting
 * - Deposits with per-user and global caps
 * - FIFO withdrawal queue with share escrow
 * - High-water-mark performance fees
 * - Timelocked parameter changes
 * - NAV history and yield reconciliation
 */

// Types and errors
export * from "./types.js";
export * from "./errors.js";

// Math and identities
export * from "./fixed-point.js";
export * from "./address.js";

// Collaborators
export * from "./access-control.js";
export * from "./settlement-token.js";

// Components
export * from "./share-registry.js";
export * from "./pricing-engine.js";
export * from "./withdrawal-queue.js";
export * from "./fee-engine.js";
export * from "./parameter-timelock.js";
export * from "./invariant-checker.js";
export * from "./nav-history.js";

// Main ledger
export * from "./vault-ledger.js";
