/**
 * Withdrawal Queue
 *
 * Append-only FIFO log of withdrawal requests:
 * - Request ids are queue indices and never reused
 * - `head` only moves forward and marks the first unresolved entry
 * - Resolved entries are zeroed, not removed, until purged
 *
 * purgeCursor <= head <= length at all times.
 */

import { ledgerLogger as logger, WITHDRAWAL_STATUS } from "@navledger/shared";
import { LedgerError } from "./errors.js";
import type { Address, WithdrawalRequest } from "./types.js";

const queueLogger = logger.child({ component: "withdrawal-queue" });

export interface WithdrawalQueueCheckpoint {
  requests: Map<number, WithdrawalRequest>;
  head: number;
  length: number;
  purgeCursor: number;
}

// ============================================
// WITHDRAWAL QUEUE
// ============================================

export class WithdrawalQueue {
  private requests: Map<number, WithdrawalRequest> = new Map();
  private headIndex = 0;
  private queueLength = 0;
  private purgeCursor = 0;

  get head(): number {
    return this.headIndex;
  }

  get length(): number {
    return this.queueLength;
  }

  get purgedUpTo(): number {
    return this.purgeCursor;
  }

  /**
   * Append a new pending request
   */
  enqueue(requester: Address, shares: bigint, requestedAt: number, cooldownAtRequest: number): WithdrawalRequest {
    const request: WithdrawalRequest = {
      id: this.queueLength,
      requester,
      shares,
      requestedAt,
      cooldownAtRequest,
      status: WITHDRAWAL_STATUS.PENDING,
    };

    this.requests.set(request.id, request);
    this.queueLength++;

    return request;
  }

  /**
   * Look up a request. Purged ids resolve to undefined.
   */
  get(id: number): WithdrawalRequest | undefined {
    return this.requests.get(id);
  }

  /**
   * Look up a request that must still be pending
   */
  requirePending(id: number): WithdrawalRequest {
    if (!Number.isInteger(id) || id < 0 || id >= this.queueLength) {
      throw new LedgerError("RequestNotFound", `Withdrawal request not found: ${id}`, {
        details: { id, length: this.queueLength },
      });
    }

    const request = this.requests.get(id);
    if (!request || request.status !== WITHDRAWAL_STATUS.PENDING) {
      throw new LedgerError("RequestAlreadyResolved", `Withdrawal request ${id} already resolved`, {
        details: { id, status: request?.status ?? "purged" },
      });
    }

    return request;
  }

  markFulfilled(request: WithdrawalRequest, valuePaid: bigint, now: number): void {
    request.status = WITHDRAWAL_STATUS.FULFILLED;
    request.shares = 0n;
    request.valuePaid = valuePaid;
    request.resolvedAt = now;
  }

  markCancelled(request: WithdrawalRequest, now: number): void {
    request.status = WITHDRAWAL_STATUS.CANCELLED;
    request.shares = 0n;
    request.resolvedAt = now;
  }

  /**
   * Move head forward past `index`. Never moves backward.
   */
  advancePast(index: number): void {
    const next = index + 1;
    if (next > this.headIndex && next <= this.queueLength) {
      this.headIndex = next;
    }
  }

  /**
   * Entries from head to the end of the queue, in index order
   */
  *fromHead(): Generator<{ index: number; request: WithdrawalRequest | undefined }> {
    for (let index = this.headIndex; index < this.queueLength; index++) {
      yield { index, request: this.requests.get(index) };
    }
  }

  /**
   * Delete resolved entries behind head. Returns how many were removed.
   */
  purge(maxEntries: number): number {
    if (!Number.isInteger(maxEntries) || maxEntries <= 0) {
      throw new LedgerError("InvalidParameter", "maxEntries must be a positive integer", {
        details: { maxEntries },
      });
    }

    let purged = 0;
    while (this.purgeCursor < this.headIndex && purged < maxEntries) {
      const request = this.requests.get(this.purgeCursor);
      // Never purge a pending entry
      if (request && request.status === WITHDRAWAL_STATUS.PENDING) break;
      if (request) {
        this.requests.delete(this.purgeCursor);
        purged++;
      }
      this.purgeCursor++;
    }

    if (purged > 0) {
      queueLogger.debug({ purged, purgeCursor: this.purgeCursor }, "Purged resolved withdrawal requests");
    }

    return purged;
  }

  /**
   * Pending requests for one requester, oldest first
   */
  getPendingRequests(requester?: Address): WithdrawalRequest[] {
    const pending: WithdrawalRequest[] = [];
    for (const request of this.requests.values()) {
      if (request.status !== WITHDRAWAL_STATUS.PENDING) continue;
      if (requester !== undefined && request.requester !== requester) continue;
      pending.push(request);
    }
    return pending.sort((a, b) => a.id - b.id);
  }

  /**
   * All stored requests, in index order
   */
  toArray(): WithdrawalRequest[] {
    return Array.from(this.requests.values())
      .sort((a, b) => a.id - b.id)
      .map((r) => ({ ...r }));
  }

  getStatistics(): {
    length: number;
    head: number;
    stored: number;
    pending: number;
    fulfilled: number;
    cancelled: number;
    pendingShares: bigint;
    totalValuePaid: bigint;
  } {
    const stats = {
      length: this.queueLength,
      head: this.headIndex,
      stored: this.requests.size,
      pending: 0,
      fulfilled: 0,
      cancelled: 0,
      pendingShares: 0n,
      totalValuePaid: 0n,
    };

    for (const request of this.requests.values()) {
      switch (request.status) {
        case WITHDRAWAL_STATUS.PENDING:
          stats.pending++;
          stats.pendingShares += request.shares;
          break;
        case WITHDRAWAL_STATUS.FULFILLED:
          stats.fulfilled++;
          stats.totalValuePaid += request.valuePaid ?? 0n;
          break;
        case WITHDRAWAL_STATUS.CANCELLED:
          stats.cancelled++;
          break;
      }
    }

    return stats;
  }

  checkpoint(): WithdrawalQueueCheckpoint {
    return {
      requests: new Map(Array.from(this.requests, ([id, r]): [number, WithdrawalRequest] => [id, { ...r }])),
      head: this.headIndex,
      length: this.queueLength,
      purgeCursor: this.purgeCursor,
    };
  }

  restore(checkpoint: WithdrawalQueueCheckpoint): void {
    this.requests = new Map(Array.from(checkpoint.requests, ([id, r]): [number, WithdrawalRequest] => [id, { ...r }]));
    this.headIndex = checkpoint.head;
    this.queueLength = checkpoint.length;
    this.purgeCursor = checkpoint.purgeCursor;
  }
}

/**
 * Factory function
 */
export function createWithdrawalQueue(): WithdrawalQueue {
  return new WithdrawalQueue();
}
