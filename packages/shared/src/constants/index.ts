/**
 * NAV Ledger Constants
 * Fixed-point scales, protocol limits and timelock delays
 */

// ============================================
// FIXED POINT
// ============================================
export const PRECISION = 10n ** 18n;

// One unit of value per share unit when no shares exist
export const INITIAL_SHARE_PRICE = PRECISION;

// ============================================
// PROTOCOL LIMITS
// ============================================
export const LEDGER_LIMITS = {
  // 30% of profit, expressed against PRECISION
  maxFeeRate: (3n * PRECISION) / 10n,

  maxPendingPerUser: 10,

  cancellationWindowMs: 60 * 60 * 1000, // 1 hour
  maxCooldownMs: 30 * 24 * 60 * 60 * 1000, // 30 days
} as const;

export const MAX_FEE_RATE = LEDGER_LIMITS.maxFeeRate;
export const MAX_PENDING_PER_USER = LEDGER_LIMITS.maxPendingPerUser;
export const CANCELLATION_WINDOW_MS = LEDGER_LIMITS.cancellationWindowMs;

// ============================================
// DEFAULT PARAMETERS
// ============================================
export const LEDGER_DEFAULTS = {
  feeRate: PRECISION / 5n, // 20%
  cooldownPeriodMs: 24 * 60 * 60 * 1000, // 1 day
  perUserCap: 0n, // unlimited
  globalCap: 0n, // unlimited
  liquidityBuffer: 0n,
  maxYieldChangePercent: PRECISION / 10n, // 10% of NAV per report
  yieldReportIntervalMs: 0, // disabled
} as const;

// ============================================
// TIMELOCK DELAYS
// ============================================
const DAY_MS = 24 * 60 * 60 * 1000;

export const TIMELOCK_DELAYS = {
  feeRate: 2 * DAY_MS,
  cooldownPeriod: 1 * DAY_MS,
  treasury: 2 * DAY_MS,
  custodyVenue: 3 * DAY_MS,
} as const;

export type TimelockedParameter = keyof typeof TIMELOCK_DELAYS;

// ============================================
// NAV HISTORY
// ============================================
export const NAV_HISTORY = {
  // One entry per yield report, oldest dropped first
  maxEntries: 90,
  // Trailing window for the annualized return view
  returnWindowMs: 7 * DAY_MS,
  yearMs: 365 * DAY_MS,
} as const;

// ============================================
// WITHDRAWAL STATUS
// ============================================
export const WITHDRAWAL_STATUS = {
  PENDING: "pending",
  FULFILLED: "fulfilled",
  CANCELLED: "cancelled",
} as const;

export type WithdrawalStatus = (typeof WITHDRAWAL_STATUS)[keyof typeof WITHDRAWAL_STATUS];

// ============================================
// COOLDOWN MODES
// ============================================
export const COOLDOWN_MODES = {
  // Fulfillment checks the cooldown in force at fulfillment time
  CURRENT: "current",
  // Fulfillment checks the cooldown captured when the request was made
  SNAPSHOT: "snapshot",
} as const;

export type CooldownMode = (typeof COOLDOWN_MODES)[keyof typeof COOLDOWN_MODES];
