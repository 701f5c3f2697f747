/**
 * Pricing Engine
 *
 * NAV and share price as a pure function of current ledger state.
 * Nothing is cached: every deposit, withdrawal and fee calculation reads
 * the price as of the moment it runs.
 *
 * Both conversions floor, which always rounds in the ledger's favor.
 */

import { INITIAL_SHARE_PRICE, PRECISION } from "@navledger/shared";
import { LedgerError } from "./errors.js";
import { mulDiv } from "./fixed-point.js";
import type { ShareRegistry } from "./share-registry.js";
import type { VaultState } from "./types.js";

export class PricingEngine {
  constructor(
    private readonly state: VaultState,
    private readonly shares: ShareRegistry
  ) {}

  /** max(0, deposited − withdrawn + accumulatedYield) */
  totalAssets(): bigint {
    const nav = this.state.totalDeposited - this.state.totalWithdrawn + this.state.accumulatedYield;
    return nav > 0n ? nav : 0n;
  }

  sharePrice(): bigint {
    const supply = this.shares.totalSupply();
    if (supply === 0n) return INITIAL_SHARE_PRICE;
    return mulDiv(this.totalAssets(), PRECISION, supply, "down");
  }

  valueToShares(value: bigint): bigint {
    const price = this.sharePrice();
    if (price === 0n) {
      throw new LedgerError("VaultInsolvent", "Share price is zero; shares cannot be priced", {
        details: { totalSupply: this.shares.totalSupply().toString() },
      });
    }
    return mulDiv(value, PRECISION, price, "down");
  }

  sharesToValue(shares: bigint): bigint {
    return mulDiv(shares, this.sharePrice(), PRECISION, "down");
  }
}
