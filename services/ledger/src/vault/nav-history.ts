/**
 * NAV History & Yield Reconciliation
 *
 * Bounded record of NAV and share price taken at every yield report, plus
 * the views built on it:
 * - Unreported yield: observed backing value minus the NAV on record,
 *   clamped to what a single report may carry
 * - Trailing and inception returns, annualized
 */

import { INITIAL_SHARE_PRICE, NAV_HISTORY, PRECISION, ledgerLogger as logger } from "@navledger/shared";
import { mulDiv } from "./fixed-point.js";
import type { NavHistoryEntry, UnreportedYield, YieldSummary } from "./types.js";

const historyLogger = logger.child({ component: "nav-history" });

// ============================================
// NAV HISTORY
// ============================================

export class NavHistory {
  private entries: NavHistoryEntry[] = [];

  constructor(private readonly maxEntries: number = NAV_HISTORY.maxEntries) {}

  get size(): number {
    return this.entries.length;
  }

  record(entry: NavHistoryEntry): void {
    this.entries.push({ ...entry });

    if (this.entries.length > this.maxEntries) {
      const dropped = this.entries.length - this.maxEntries;
      this.entries.splice(0, dropped);
      historyLogger.debug({ dropped, retained: this.maxEntries }, "NAV history trimmed");
    }
  }

  latest(): NavHistoryEntry | undefined {
    const last = this.entries[this.entries.length - 1];
    return last ? { ...last } : undefined;
  }

  /**
   * Most recent entry recorded at or before `at`
   */
  latestAtOrBefore(at: number): NavHistoryEntry | undefined {
    for (let i = this.entries.length - 1; i >= 0; i--) {
      const entry = this.entries[i];
      if (entry && entry.recordedAt <= at) return { ...entry };
    }
    return undefined;
  }

  list(): NavHistoryEntry[] {
    return this.entries.map((entry) => ({ ...entry }));
  }

  checkpoint(): NavHistoryEntry[] {
    return this.list();
  }

  restore(entries: NavHistoryEntry[]): void {
    this.entries = entries.slice(-this.maxEntries).map((entry) => ({ ...entry }));
  }
}

// ============================================
// RECONCILIATION
// ============================================

/**
 * Compare the value observed backing the ledger against its NAV.
 * `maxYieldChangePercent` of 0n leaves the report unbounded.
 */
export function computeUnreportedYield(
  backingValue: bigint,
  totalAssets: bigint,
  maxYieldChangePercent: bigint
): UnreportedYield {
  const unreported = backingValue - totalAssets;

  if (maxYieldChangePercent === 0n) {
    return { backingValue, totalAssets, unreported, reportable: unreported, exceedsBound: false };
  }

  const bound = mulDiv(totalAssets, maxYieldChangePercent, PRECISION, "down");
  let reportable = unreported;
  if (unreported > bound) reportable = bound;
  if (unreported < -bound) reportable = -bound;

  return {
    backingValue,
    totalAssets,
    unreported,
    bound,
    reportable,
    exceedsBound: reportable !== unreported,
  };
}

/**
 * Share price change between two readings, valued at `totalSupply`
 */
export function priceDeltaYield(previousPrice: bigint, currentPrice: bigint, totalSupply: bigint): bigint {
  return mulDiv(currentPrice - previousPrice, totalSupply, PRECISION, "down");
}

// ============================================
// RETURNS
// ============================================

export function summarizeYield(input: {
  history: NavHistory;
  sharePrice: bigint;
  totalSupply: bigint;
  inceptionAt: number;
  now: number;
  windowMs?: number;
}): YieldSummary {
  const { history, sharePrice, totalSupply, inceptionAt, now } = input;
  const windowMs = input.windowMs ?? NAV_HISTORY.returnWindowMs;

  const windowStart = history.latestAtOrBefore(now - windowMs);
  const baselinePrice = windowStart?.sharePrice ?? INITIAL_SHARE_PRICE;
  const baselineAt = windowStart?.recordedAt ?? inceptionAt;
  const elapsedMs = Math.max(0, now - baselineAt);

  const periodReturnPercent = baselinePrice > 0n
    ? Number(((sharePrice - baselinePrice) * 10000n) / baselinePrice) / 100
    : 0;

  // Less than a day of history says nothing about an annual rate
  const annualizedPercent = elapsedMs >= NAV_HISTORY.yearMs / 365
    ? periodReturnPercent * (NAV_HISTORY.yearMs / elapsedMs)
    : 0;

  const last = history.latest();

  return {
    sharePrice,
    baselinePrice,
    baselineAt,
    source: windowStart ? "window" : "inception",
    elapsedMs,
    periodReturnPercent,
    annualizedPercent,
    yieldSinceLastReport: last ? priceDeltaYield(last.sharePrice, sharePrice, totalSupply) : 0n,
    reports: history.size,
  };
}
