/**
 * Access & Pause Authority
 *
 * The ledger consumes AccessAuthority only. RoleRegistry is an in-memory
 * implementation: one owner, an operator set, and three pause switches.
 * Operators may pause; only the owner unpauses.
 */

import { ledgerLogger as logger, audit } from "@navledger/shared";
import { normalizeAddress, sameAddress } from "./address.js";
import { LedgerError } from "./errors.js";
import type { Address } from "./types.js";

const accessLogger = logger.child({ component: "access-control" });

// ============================================
// AUTHORITY INTERFACE
// ============================================

export interface AccessAuthority {
  owner(): Address;
  isOperator(account: Address): boolean;
  paused(): boolean;
  depositsPaused(): boolean;
  withdrawalsPaused(): boolean;
}

export type PauseScope = "all" | "deposits" | "withdrawals";

// ============================================
// ROLE REGISTRY
// ============================================

export class RoleRegistry implements AccessAuthority {
  private ownerAddress: Address;
  private readonly operators: Set<Address> = new Set();
  private readonly pauseFlags: Record<PauseScope, boolean> = {
    all: false,
    deposits: false,
    withdrawals: false,
  };

  constructor(owner: Address, operators: Address[] = []) {
    this.ownerAddress = normalizeAddress(owner, "owner");
    for (const operator of operators) {
      this.operators.add(normalizeAddress(operator, "operator"));
    }

    accessLogger.info({
      owner: this.ownerAddress,
      operators: this.operators.size,
    }, "RoleRegistry initialized");
  }

  owner(): Address {
    return this.ownerAddress;
  }

  isOperator(account: Address): boolean {
    return this.operators.has(normalizeAddress(account));
  }

  paused(): boolean {
    return this.pauseFlags.all;
  }

  depositsPaused(): boolean {
    return this.pauseFlags.deposits;
  }

  withdrawalsPaused(): boolean {
    return this.pauseFlags.withdrawals;
  }

  setOperator(caller: Address, account: Address, enabled: boolean): void {
    this.requireOwner(caller);
    const operator = normalizeAddress(account, "operator");
    if (enabled) {
      this.operators.add(operator);
    } else {
      this.operators.delete(operator);
    }
    audit({
      action: enabled ? "operator_granted" : "operator_revoked",
      entityType: "role",
      entityId: operator,
      actor: caller,
    });
  }

  transferOwnership(caller: Address, newOwner: Address): void {
    this.requireOwner(caller);
    this.ownerAddress = normalizeAddress(newOwner, "owner");
    audit({
      action: "ownership_transferred",
      entityType: "role",
      entityId: this.ownerAddress,
      actor: caller,
    });
  }

  pause(caller: Address, scope: PauseScope = "all"): void {
    if (!this.isOwner(caller) && !this.isOperator(caller)) {
      throw new LedgerError("Unauthorized", "Only the owner or an operator can pause", {
        details: { caller, scope },
      });
    }
    this.pauseFlags[scope] = true;
    accessLogger.warn({ caller, scope }, "Ledger paused");
  }

  unpause(caller: Address, scope: PauseScope = "all"): void {
    this.requireOwner(caller);
    this.pauseFlags[scope] = false;
    accessLogger.info({ caller, scope }, "Ledger unpaused");
  }

  private isOwner(caller: Address): boolean {
    return sameAddress(caller, this.ownerAddress);
  }

  private requireOwner(caller: Address): void {
    if (!this.isOwner(caller)) {
      throw new LedgerError("Unauthorized", "Caller is not the owner", { details: { caller } });
    }
  }
}
