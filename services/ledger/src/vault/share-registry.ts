/**
 * Share Registry
 *
 * Account → share balance, plus total supply. Every mutation goes through
 * mint, burn or transfer, so Σ balances == totalSupply by construction;
 * the invariant checker still verifies it after each operation.
 */

import { LedgerError } from "./errors.js";
import type { Address } from "./types.js";

export interface ShareRegistryCheckpoint {
  balances: Map<Address, bigint>;
  totalSupply: bigint;
}

export class ShareRegistry {
  private balances: Map<Address, bigint> = new Map();
  private supply = 0n;

  balanceOf(account: Address): bigint {
    return this.balances.get(account) ?? 0n;
  }

  totalSupply(): bigint {
    return this.supply;
  }

  mint(to: Address, shares: bigint): void {
    this.requirePositive(shares, "mint");
    this.balances.set(to, this.balanceOf(to) + shares);
    this.supply += shares;
  }

  burn(from: Address, shares: bigint): void {
    this.requirePositive(shares, "burn");
    this.debit(from, shares);
    this.supply -= shares;
  }

  transfer(from: Address, to: Address, shares: bigint): void {
    this.requirePositive(shares, "transfer");
    this.debit(from, shares);
    this.balances.set(to, this.balanceOf(to) + shares);
  }

  /** Σ balances, computed from scratch */
  sumOfBalances(): bigint {
    let total = 0n;
    for (const balance of this.balances.values()) {
      total += balance;
    }
    return total;
  }

  holders(): Array<[Address, bigint]> {
    return Array.from(this.balances.entries()).filter(([, balance]) => balance > 0n);
  }

  checkpoint(): ShareRegistryCheckpoint {
    return { balances: new Map(this.balances), totalSupply: this.supply };
  }

  restore(checkpoint: ShareRegistryCheckpoint): void {
    this.balances = new Map(checkpoint.balances);
    this.supply = checkpoint.totalSupply;
  }

  // ============================================
  // PRIVATE METHODS
  // ============================================

  private debit(from: Address, shares: bigint): void {
    const balance = this.balanceOf(from);
    if (balance < shares) {
      throw new LedgerError("InsufficientBalance", "Share balance too low", {
        details: { account: from, balance: balance.toString(), requested: shares.toString() },
      });
    }
    const remaining = balance - shares;
    if (remaining === 0n) {
      this.balances.delete(from);
    } else {
      this.balances.set(from, remaining);
    }
  }

  private requirePositive(shares: bigint, op: string): void {
    if (shares <= 0n) {
      throw new LedgerError("ZeroAmount", `${op} amount must be > 0`, {
        details: { shares: shares.toString() },
      });
    }
  }
}
