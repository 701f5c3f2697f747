/**
 * Fee & Yield Engine
 *
 * Applies owner-reported yield deltas to the NAV and collects the
 * performance fee by minting shares to the treasury:
 * - Fees only on positive yield, only above the price high-water-mark
 * - Fees are paid in shares, never in settlement value
 * - Each report is bounded by a percentage of NAV at call time
 *
 * The bound is checked per report against the NAV that already includes
 * earlier reports, so consecutive reports compound. An optional minimum
 * interval between reports closes that gap when configured.
 */

import { ledgerLogger as logger, PRECISION } from "@navledger/shared";
import { InvariantViolationError, LedgerError } from "./errors.js";
import { absBigInt, minBigInt, mulDiv } from "./fixed-point.js";
import type { PricingEngine } from "./pricing-engine.js";
import type { ShareRegistry } from "./share-registry.js";
import type { FeeCollection, VaultState, YieldReport } from "./types.js";

const feeLogger = logger.child({ component: "fee-engine" });

export class FeeEngine {
  constructor(
    private readonly state: VaultState,
    private readonly shares: ShareRegistry,
    private readonly pricing: PricingEngine
  ) {}

  /**
   * Largest |delta| a single report may carry right now. 0n means unbounded.
   */
  currentYieldBound(): bigint {
    const maxChange = this.state.parameters.maxYieldChangePercent;
    if (maxChange === 0n) return 0n;
    return mulDiv(this.pricing.totalAssets(), maxChange, PRECISION, "down");
  }

  /**
   * Validate, apply the yield delta and collect any fee owed
   */
  applyYield(delta: bigint, now: number): YieldReport {
    this.requireReportInterval(now);
    this.requireWithinBound(delta);

    this.state.accumulatedYield += delta;
    this.state.lastYieldReportAt = now;

    const fee = delta > 0n ? this.collectFee(delta) : undefined;

    const report: YieldReport = {
      delta,
      accumulatedYield: this.state.accumulatedYield,
      totalAssets: this.pricing.totalAssets(),
      sharePrice: this.pricing.sharePrice(),
    };
    if (fee) report.fee = fee;

    feeLogger.info({
      delta: delta.toString(),
      accumulatedYield: report.accumulatedYield.toString(),
      totalAssets: report.totalAssets.toString(),
      sharePrice: report.sharePrice.toString(),
      feeShares: fee?.feeShares.toString() ?? "0",
    }, "Yield applied");

    return report;
  }

  /**
   * Move the high-water-mark to the current price, forfeiting fees on
   * any gain accrued above the old mark.
   */
  resetHighWaterMark(): { previous: bigint; current: bigint } {
    const previous = this.state.priceHighWaterMark;
    const current = this.pricing.sharePrice();
    this.state.priceHighWaterMark = current;

    feeLogger.warn({
      previous: previous.toString(),
      current: current.toString(),
    }, "Price high-water-mark reset");

    return { previous, current };
  }

  // ============================================
  // PRIVATE METHODS
  // ============================================

  private requireReportInterval(now: number): void {
    const interval = this.state.parameters.yieldReportIntervalMs;
    const last = this.state.lastYieldReportAt;
    if (interval === 0 || last === 0) return;

    if (now < last + interval) {
      throw new LedgerError("YieldReportTooSoon", "Yield report interval has not elapsed", {
        details: { lastYieldReportAt: last, nextAllowedAt: last + interval, now },
      });
    }
  }

  private requireWithinBound(delta: bigint): void {
    if (this.state.parameters.maxYieldChangePercent === 0n) return;

    const bound = this.currentYieldBound();
    if (absBigInt(delta) > bound) {
      throw new LedgerError("YieldChangeExceedsBound", "Yield delta exceeds the per-report bound", {
        details: {
          delta: delta.toString(),
          bound: bound.toString(),
          totalAssets: this.pricing.totalAssets().toString(),
        },
      });
    }
  }

  private collectFee(delta: bigint): FeeCollection | undefined {
    const supply = this.shares.totalSupply();
    if (supply === 0n) return undefined;

    const price = this.pricing.sharePrice();
    const highWaterMark = this.state.priceHighWaterMark;
    if (price <= highWaterMark) return undefined;

    const gainAboveMark = mulDiv(price - highWaterMark, supply, PRECISION, "down");
    const profit = minBigInt(delta, gainAboveMark);
    const feeValue = mulDiv(profit, this.state.parameters.feeRate, PRECISION, "down");
    const nav = this.pricing.totalAssets();

    if (feeValue >= nav) {
      throw new InvariantViolationError(
        `Fee (${feeValue}) would consume the NAV (${nav})`,
        "fee_below_nav",
        { feeValue: feeValue.toString(), totalAssets: nav.toString() }
      );
    }

    // Dilute existing holders by exactly `feeValue` at the post-yield NAV
    const feeShares = feeValue === 0n ? 0n : mulDiv(feeValue, supply, nav - feeValue, "down");
    if (feeShares > 0n) {
      this.shares.mint(this.state.parameters.treasury, feeShares);
    }

    this.state.priceHighWaterMark = this.pricing.sharePrice();

    if (feeShares === 0n) return undefined;

    return {
      profit,
      feeValue,
      feeShares,
      highWaterMark: this.state.priceHighWaterMark,
    };
  }
}
