/**
 * Invariant Checker
 *
 * Verifies ledger invariants after every operation, before commit:
 * - Σ balances == totalSupply
 * - escrow balance >= pendingWithdrawalShares
 * - purgeCursor <= head <= queue length
 * - feeRate <= MAX_FEE_RATE
 *
 * A failed check aborts the operation; the ledger rolls back and logs at fatal.
 */

import { ledgerLogger as logger, MAX_FEE_RATE, WITHDRAWAL_STATUS } from "@navledger/shared";
import { InvariantViolationError, type LedgerInvariant } from "./errors.js";
import type { Address, WithdrawalRequest } from "./types.js";

const invariantLogger = logger.child({ component: "invariant-checker" });

export interface LedgerInvariantInputs {
  totalSupply: bigint;
  sumOfBalances: bigint;
  escrowBalance: bigint;
  pendingWithdrawalShares: bigint;
  queueHead: number;
  queueLength: number;
  purgeCursor: number;
  feeRate: bigint;
}

export interface InvariantViolation {
  invariant: LedgerInvariant;
  message: string;
  details: Record<string, string>;
}

export interface InvariantCheckResult {
  passed: boolean;
  operation: string;
  violations: InvariantViolation[];
  timestamp: number;
}

// ============================================
// INVARIANT CHECKER
// ============================================

export class InvariantChecker {
  // Check history
  private readonly checkHistory: InvariantCheckResult[] = [];
  private readonly maxHistorySize = 1000;

  // Statistics
  private totalChecks = 0;
  private passedChecks = 0;
  private failedChecks = 0;

  /**
   * Evaluate every invariant against the given state
   */
  check(inputs: LedgerInvariantInputs, operation: string, timestamp: number): InvariantCheckResult {
    this.totalChecks++;

    const violations: InvariantViolation[] = [];

    if (inputs.sumOfBalances !== inputs.totalSupply) {
      violations.push({
        invariant: "supply_conservation",
        message: `Share balances (${inputs.sumOfBalances}) do not sum to total supply (${inputs.totalSupply})`,
        details: {
          sumOfBalances: inputs.sumOfBalances.toString(),
          totalSupply: inputs.totalSupply.toString(),
        },
      });
    }

    const escrow = this.checkEscrowCoverage(inputs.escrowBalance, inputs.pendingWithdrawalShares);
    if (escrow) violations.push(escrow);

    if (inputs.queueHead > inputs.queueLength || inputs.purgeCursor > inputs.queueHead) {
      violations.push({
        invariant: "queue_head_bounded",
        message: `Queue cursors out of order: purgeCursor=${inputs.purgeCursor}, head=${inputs.queueHead}, length=${inputs.queueLength}`,
        details: {
          purgeCursor: String(inputs.purgeCursor),
          head: String(inputs.queueHead),
          length: String(inputs.queueLength),
        },
      });
    }

    if (inputs.feeRate < 0n || inputs.feeRate > MAX_FEE_RATE) {
      violations.push({
        invariant: "fee_rate_bounded",
        message: `Fee rate ${inputs.feeRate} outside [0, ${MAX_FEE_RATE}]`,
        details: { feeRate: inputs.feeRate.toString(), max: MAX_FEE_RATE.toString() },
      });
    }

    const result: InvariantCheckResult = {
      passed: violations.length === 0,
      operation,
      violations,
      timestamp,
    };

    if (result.passed) {
      this.passedChecks++;
      invariantLogger.debug({ operation }, "Invariant check passed");
    } else {
      this.failedChecks++;
      invariantLogger.warn({
        operation,
        violations: violations.map((v) => v.invariant),
      }, "Invariant check FAILED");
    }

    this.addToHistory(result);

    return result;
  }

  /**
   * Check and throw on the first violation
   */
  enforce(inputs: LedgerInvariantInputs, operation: string, timestamp: number): void {
    const result = this.check(inputs, operation, timestamp);
    const [first] = result.violations;
    if (first) {
      throw new InvariantViolationError(first.message, first.invariant, first.details);
    }
  }

  /**
   * Guard run before any operation that releases escrowed shares or value.
   * Extra escrow (donated shares) is tolerated.
   */
  enforceEscrowCoverage(escrowBalance: bigint, pendingWithdrawalShares: bigint): void {
    const violation = this.checkEscrowCoverage(escrowBalance, pendingWithdrawalShares);
    if (violation) {
      throw new InvariantViolationError(violation.message, violation.invariant, violation.details);
    }
  }

  /**
   * Cross-check the queue against the counters kept beside it. Run on
   * state loaded from outside, where the two were not built together.
   */
  enforceQueueAccounting(input: {
    requests: readonly WithdrawalRequest[];
    queueLength: number;
    pendingWithdrawalShares: bigint;
    pendingRequestCounts: ReadonlyMap<Address, number>;
  }): void {
    let pendingShares = 0n;
    const counts = new Map<Address, number>();

    for (const request of input.requests) {
      if (request.id >= input.queueLength) {
        throw new InvariantViolationError(
          `Request id ${request.id} is beyond the queue length (${input.queueLength})`,
          "request_id_bounded",
          { requestId: String(request.id), queueLength: String(input.queueLength) }
        );
      }
      if (request.status !== WITHDRAWAL_STATUS.PENDING) continue;
      pendingShares += request.shares;
      counts.set(request.requester, (counts.get(request.requester) ?? 0) + 1);
    }

    if (pendingShares !== input.pendingWithdrawalShares) {
      throw new InvariantViolationError(
        `Pending requests hold ${pendingShares} shares but ${input.pendingWithdrawalShares} are recorded`,
        "pending_shares_match",
        {
          requestShares: pendingShares.toString(),
          pendingWithdrawalShares: input.pendingWithdrawalShares.toString(),
        }
      );
    }

    for (const account of new Set([...counts.keys(), ...input.pendingRequestCounts.keys()])) {
      const actual = counts.get(account) ?? 0;
      const recorded = input.pendingRequestCounts.get(account) ?? 0;
      if (actual !== recorded) {
        throw new InvariantViolationError(
          `Pending request count for ${account} is ${recorded} but the queue holds ${actual}`,
          "pending_counts_match",
          { account, recorded: String(recorded), actual: String(actual) }
        );
      }
    }
  }

  getStatistics(): {
    totalChecks: number;
    passedChecks: number;
    failedChecks: number;
    successRate: number;
  } {
    return {
      totalChecks: this.totalChecks,
      passedChecks: this.passedChecks,
      failedChecks: this.failedChecks,
      successRate: this.totalChecks > 0 ? this.passedChecks / this.totalChecks : 1,
    };
  }

  getFailedChecks(limit = 50): InvariantCheckResult[] {
    return this.checkHistory
      .filter((c) => !c.passed)
      .slice(-limit);
  }

  // ============================================
  // PRIVATE METHODS
  // ============================================

  private checkEscrowCoverage(escrowBalance: bigint, pending: bigint): InvariantViolation | undefined {
    if (escrowBalance >= pending) return undefined;
    return {
      invariant: "escrow_coverage",
      message: `Escrow balance (${escrowBalance}) below pending withdrawal shares (${pending})`,
      details: {
        escrowBalance: escrowBalance.toString(),
        pendingWithdrawalShares: pending.toString(),
      },
    };
  }

  private addToHistory(result: InvariantCheckResult): void {
    this.checkHistory.push(result);

    if (this.checkHistory.length > this.maxHistorySize) {
      this.checkHistory.splice(0, this.checkHistory.length - this.maxHistorySize);
    }
  }
}

/**
 * Factory function
 */
export function createInvariantChecker(): InvariantChecker {
  return new InvariantChecker();
}
