/**
 * @navledger/shared
 * Shared constants, schemas and logging for the NAV ledger
 */

// Export schemas (includes snapshot and env types)
export * from "./schemas/index.js";

// Export constants (includes PRECISION, LEDGER_LIMITS, TIMELOCK_DELAYS, etc.)
export * from "./constants/index.js";

// Export logger
export {
  logger,
  createServiceLogger,
  ledgerLogger,
  storageLogger,
  audit,
  logError,
  logFatal,
  createTimer,
} from "./logger/index.js";
