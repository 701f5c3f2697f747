/**
 * Settlement Token
 *
 * The stable unit of value depositors contribute and withdrawals pay out.
 * The ledger only consumes this interface. The custody venue returns value
 * by transferring tokens back to the ledger address.
 */

import { ledgerLogger as logger } from "@navledger/shared";
import { normalizeAddress } from "./address.js";
import { LedgerError } from "./errors.js";
import type { Address } from "./types.js";

const tokenLogger = logger.child({ component: "settlement-token" });

export interface SettlementToken {
  balanceOf(account: Address): bigint;

  /**
   * Moves `amount` from `from` to `to`. Throws when `from` cannot cover it.
   * Implementations may run arbitrary code here; the ledger treats this as
   * an external call.
   */
  transfer(from: Address, to: Address, amount: bigint): void;
}

// ============================================
// IN-MEMORY TOKEN (local use and tests)
// ============================================

export class InMemorySettlementToken implements SettlementToken {
  private readonly balances: Map<Address, bigint> = new Map();
  private supply = 0n;

  constructor(readonly symbol: string = "USDC") {}

  balanceOf(account: Address): bigint {
    return this.balances.get(normalizeAddress(account)) ?? 0n;
  }

  totalSupply(): bigint {
    return this.supply;
  }

  mint(to: Address, amount: bigint): void {
    if (amount < 0n) {
      throw new LedgerError("InvalidParameter", "mint amount must be non-negative");
    }
    const account = normalizeAddress(to);
    this.balances.set(account, this.balanceOf(account) + amount);
    this.supply += amount;
  }

  transfer(from: Address, to: Address, amount: bigint): void {
    if (amount < 0n) {
      throw new LedgerError("InvalidParameter", "transfer amount must be non-negative");
    }
    const sender = normalizeAddress(from);
    const recipient = normalizeAddress(to);
    const available = this.balanceOf(sender);
    if (available < amount) {
      throw new LedgerError("InsufficientBalance", `${this.symbol} balance too low for transfer`, {
        details: { from: sender, available: available.toString(), requested: amount.toString() },
      });
    }

    this.balances.set(sender, available - amount);
    this.balances.set(recipient, this.balanceOf(recipient) + amount);

    tokenLogger.debug({
      from: sender,
      to: recipient,
      amount: amount.toString(),
    }, "Settlement transfer");
  }
}
