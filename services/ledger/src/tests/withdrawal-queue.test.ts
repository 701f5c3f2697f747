/**
 * Withdrawal Queue & Escrow Tests
 *
 * - Escrow on request, release on cancel
 * - Cooldown and FIFO ordering
 * - Payout at the price at fulfillment
 * - Graceful degradation on low liquidity
 * - Donation into escrow never blocks a withdrawal path
 * - Forced processing, purging and orphan recovery
 */

import { describe, it, expect, beforeEach } from "vitest";
import { CANCELLATION_WINDOW_MS, COOLDOWN_MODES, MAX_PENDING_PER_USER } from "@navledger/shared";
import {
  createWithdrawalQueue,
  isLedgerError,
  WithdrawalQueue,
  type InMemorySettlementToken,
  type RoleRegistry,
  type VaultLedger,
  type WithdrawalCancelledEvent,
  type WithdrawalFulfilledEvent,
} from "../vault/index.js";
import {
  ALICE,
  BOB,
  CAROL,
  CUSTODY,
  DAY_MS,
  HOUR_MS,
  LEDGER,
  OPERATOR,
  OWNER,
  START_TIME,
  captureError,
  createLedgerFixture,
  returnFromCustody,
  type ManualClock,
} from "./fixtures.js";

// ============================================
// WITHDRAWAL QUEUE TESTS
// ============================================

describe("WithdrawalQueue", () => {
  let queue: WithdrawalQueue;

  beforeEach(() => {
    queue = createWithdrawalQueue();
  });

  it("should assign sequential ids", () => {
    expect(queue.enqueue(ALICE, 10n, 1, 5).id).toBe(0);
    expect(queue.enqueue(BOB, 20n, 2, 5).id).toBe(1);
    expect(queue.length).toBe(2);
    expect(queue.head).toBe(0);
  });

  it("should distinguish unknown ids from resolved ones", () => {
    const request = queue.enqueue(ALICE, 10n, 1, 5);
    queue.markCancelled(request, 2);

    expect(isLedgerError(captureError(() => queue.requirePending(1)), "RequestNotFound")).toBe(true);
    expect(isLedgerError(captureError(() => queue.requirePending(-1)), "RequestNotFound")).toBe(true);
    expect(isLedgerError(captureError(() => queue.requirePending(0)), "RequestAlreadyResolved")).toBe(true);
    expect(queue.get(0)).toMatchObject({ status: "cancelled", shares: 0n, resolvedAt: 2 });
  });

  it("should only move head forward and within bounds", () => {
    queue.enqueue(ALICE, 10n, 1, 5);
    queue.enqueue(ALICE, 10n, 1, 5);

    queue.advancePast(0);
    expect(queue.head).toBe(1);
    queue.advancePast(0);
    expect(queue.head).toBe(1);
    queue.advancePast(5);
    expect(queue.head).toBe(1);
  });

  it("should restore a checkpoint without sharing request objects", () => {
    queue.enqueue(ALICE, 10n, 1, 5);
    const checkpoint = queue.checkpoint();

    const request = queue.requirePending(0);
    queue.markFulfilled(request, 10n, 3);
    queue.advancePast(0);
    queue.restore(checkpoint);

    expect(queue.head).toBe(0);
    expect(queue.get(0)).toMatchObject({ status: "pending", shares: 10n });
    expect(queue.getStatistics()).toMatchObject({ pending: 1, fulfilled: 0, pendingShares: 10n });
  });
});

// ============================================
// LEDGER WITHDRAWAL TESTS
// ============================================

describe("VaultLedger withdrawals", () => {
  let ledger: VaultLedger;
  let token: InMemorySettlementToken;
  let roles: RoleRegistry;
  let clock: ManualClock;

  beforeEach(() => {
    ({ ledger, token, roles, clock } = createLedgerFixture({ parameters: { feeRate: 0n } }));
  });

  describe("requestWithdrawal", () => {
    it("should move shares into escrow and enqueue the request", () => {
      ledger.deposit(ALICE, 1_000_000n);

      expect(ledger.requestWithdrawal(ALICE, 1_000_000n)).toBe(0);

      expect(ledger.balanceOf(ALICE)).toBe(0n);
      expect(ledger.escrowBalance()).toBe(1_000_000n);
      expect(ledger.pendingWithdrawalShares()).toBe(1_000_000n);
      expect(ledger.pendingRequestCount(ALICE)).toBe(1);
      expect(ledger.totalSupply()).toBe(1_000_000n);
      expect(ledger.getWithdrawalRequest(0)).toEqual({
        id: 0,
        requester: ALICE,
        shares: 1_000_000n,
        requestedAt: START_TIME,
        cooldownAtRequest: DAY_MS,
        status: "pending",
      });
    });

    it("should make escrowed shares unusable by the requester", () => {
      ledger.deposit(ALICE, 1_000n);
      ledger.requestWithdrawal(ALICE, 1_000n);

      expect(isLedgerError(captureError(() => ledger.transferShares(ALICE, BOB, 1n)), "InsufficientBalance")).toBe(true);
      expect(isLedgerError(captureError(() => ledger.requestWithdrawal(ALICE, 1n)), "InsufficientBalance")).toBe(true);
      expect(isLedgerError(captureError(() => ledger.transferShares(LEDGER, BOB, 1n)), "Unauthorized")).toBe(true);
    });

    it("should reject zero shares", () => {
      ledger.deposit(ALICE, 1_000n);
      expect(isLedgerError(captureError(() => ledger.requestWithdrawal(ALICE, 0n)), "ZeroAmount")).toBe(true);
    });

    it("should cap pending requests per user", () => {
      ledger.deposit(ALICE, 1_000n);
      for (let i = 0; i < MAX_PENDING_PER_USER; i++) {
        ledger.requestWithdrawal(ALICE, 1n);
      }

      const error = captureError(() => ledger.requestWithdrawal(ALICE, 1n));
      expect(isLedgerError(error, "TooManyPendingRequests")).toBe(true);
      expect(ledger.withdrawalQueueLength()).toBe(10);

      ledger.cancelWithdrawal(ALICE, 0);
      expect(ledger.pendingRequestCount(ALICE)).toBe(9);
      expect(ledger.requestWithdrawal(ALICE, 1n)).toBe(10);
    });

    it("should block requests while withdrawals are paused", () => {
      ledger.deposit(ALICE, 1_000n);
      roles.pause(OPERATOR, "withdrawals");

      expect(isLedgerError(captureError(() => ledger.requestWithdrawal(ALICE, 1n)), "Paused")).toBe(true);
    });
  });

  describe("cancelWithdrawal", () => {
    beforeEach(() => {
      ledger.deposit(ALICE, 1_000n);
      ledger.requestWithdrawal(ALICE, 400n);
    });

    it("should let the requester cancel at the end of the window", () => {
      const events: WithdrawalCancelledEvent[] = [];
      ledger.on("withdrawal:cancelled", (event) => events.push(event));
      clock.advance(CANCELLATION_WINDOW_MS);

      ledger.cancelWithdrawal(ALICE, 0);

      expect(ledger.balanceOf(ALICE)).toBe(1_000n);
      expect(ledger.escrowBalance()).toBe(0n);
      expect(ledger.pendingWithdrawalShares()).toBe(0n);
      expect(ledger.pendingRequestCount(ALICE)).toBe(0);
      expect(ledger.getWithdrawalRequest(0)).toMatchObject({ status: "cancelled", shares: 0n });
      expect(events).toEqual([{ requestId: 0, user: ALICE, shares: 400n, cancelledBy: ALICE }]);
    });

    it("should reject the requester after the window closes", () => {
      clock.advance(CANCELLATION_WINDOW_MS + 1);

      const error = captureError(() => ledger.cancelWithdrawal(ALICE, 0));
      expect(isLedgerError(error, "CancellationWindowExpired")).toBe(true);
      expect(ledger.escrowBalance()).toBe(400n);
    });

    it("should let the owner cancel at any time", () => {
      clock.advance(10 * DAY_MS);

      ledger.cancelWithdrawal(OWNER, 0);

      expect(ledger.balanceOf(ALICE)).toBe(1_000n);
      expect(ledger.balanceOf(OWNER)).toBe(0n);
    });

    it("should reject anyone else", () => {
      expect(isLedgerError(captureError(() => ledger.cancelWithdrawal(BOB, 0)), "Unauthorized")).toBe(true);
      expect(isLedgerError(captureError(() => ledger.cancelWithdrawal(OPERATOR, 0)), "Unauthorized")).toBe(true);
    });

    it("should reject resolved and unknown requests", () => {
      ledger.cancelWithdrawal(ALICE, 0);

      expect(isLedgerError(captureError(() => ledger.cancelWithdrawal(ALICE, 0)), "RequestAlreadyResolved")).toBe(true);
      expect(isLedgerError(captureError(() => ledger.cancelWithdrawal(ALICE, 5)), "RequestNotFound")).toBe(true);
    });

    it("should still work while withdrawals are paused", () => {
      roles.pause(OWNER);

      ledger.cancelWithdrawal(ALICE, 0);
      expect(ledger.balanceOf(ALICE)).toBe(1_000n);
    });
  });

  describe("fulfillWithdrawals", () => {
    it("should process nothing before the cooldown elapses", () => {
      ledger.deposit(ALICE, 1_000_000n);
      ledger.requestWithdrawal(ALICE, 1_000_000n);
      clock.advance(DAY_MS - 1);

      expect(ledger.fulfillWithdrawals(OPERATOR, 1)).toEqual({ processed: 0, totalPaid: 0n });
      expect(ledger.escrowBalance()).toBe(1_000_000n);
      expect(ledger.withdrawalQueueHead()).toBe(0);
    });

    it("should pay at the price at fulfillment, not at request", () => {
      const events: WithdrawalFulfilledEvent[] = [];
      ledger.on("withdrawal:fulfilled", (event) => events.push(event));

      ledger.deposit(ALICE, 1_000_000n);
      ledger.requestWithdrawal(ALICE, 1_000_000n);
      ledger.reportYieldAndCollectFees(OWNER, 50_000n);
      token.mint(CUSTODY, 50_000n);
      returnFromCustody(token, 50_000n);
      clock.advance(DAY_MS);

      expect(ledger.fulfillWithdrawals(OPERATOR, 1)).toEqual({ processed: 1, totalPaid: 1_050_000n });

      expect(token.balanceOf(ALICE)).toBe(10_050_000n);
      expect(ledger.totalSupply()).toBe(0n);
      expect(ledger.escrowBalance()).toBe(0n);
      expect(ledger.pendingWithdrawalShares()).toBe(0n);
      expect(ledger.totalAssets()).toBe(0n);
      expect(ledger.withdrawalQueueHead()).toBe(1);
      expect(ledger.pendingRequestCount(ALICE)).toBe(0);
      expect(ledger.getWithdrawalRequest(0)).toMatchObject({
        status: "fulfilled",
        shares: 0n,
        valuePaid: 1_050_000n,
        resolvedAt: START_TIME + DAY_MS,
      });
      expect(events).toEqual([
        { requestId: 0, user: ALICE, shares: 1_000_000n, value: 1_050_000n, forced: false },
      ]);
    });

    it("should stop without failing when idle liquidity runs short", () => {
      ({ ledger, token, clock } = createLedgerFixture({ parameters: { feeRate: 0n, liquidityBuffer: 0n } }));
      ledger.deposit(ALICE, 1_000n);
      ledger.deposit(BOB, 1_000n);
      ledger.requestWithdrawal(ALICE, 1_000n);
      ledger.requestWithdrawal(BOB, 1_000n);
      clock.advance(DAY_MS);
      returnFromCustody(token, 1_500n);

      expect(ledger.fulfillWithdrawals(OPERATOR, 10)).toEqual({ processed: 1, totalPaid: 1_000n });
      expect(ledger.withdrawalQueueHead()).toBe(1);
      expect(ledger.idleLiquidity()).toBe(500n);
      expect(ledger.getWithdrawalRequest(1)).toMatchObject({ status: "pending", shares: 1_000n });

      returnFromCustody(token, 500n);
      expect(ledger.fulfillWithdrawals(OPERATOR, 10)).toEqual({ processed: 1, totalPaid: 1_000n });
      expect(ledger.withdrawalQueueHead()).toBe(2);
    });

    it("should skip cleared entries without counting them", () => {
      ledger.deposit(ALICE, 1_000n);
      ledger.deposit(BOB, 1_000n);
      ledger.requestWithdrawal(ALICE, 500n);
      ledger.requestWithdrawal(BOB, 500n);
      ledger.cancelWithdrawal(ALICE, 0);
      clock.advance(DAY_MS);

      expect(ledger.fulfillWithdrawals(OPERATOR, 1)).toEqual({ processed: 1, totalPaid: 500n });
      expect(ledger.withdrawalQueueHead()).toBe(2);
    });

    it("should respect the count", () => {
      ledger.deposit(ALICE, 1_000n);
      ledger.requestWithdrawal(ALICE, 100n);
      ledger.requestWithdrawal(ALICE, 100n);
      ledger.requestWithdrawal(ALICE, 100n);
      clock.advance(DAY_MS);

      expect(ledger.fulfillWithdrawals(OPERATOR, 2)).toEqual({ processed: 2, totalPaid: 200n });
      expect(ledger.withdrawalQueueHead()).toBe(2);
    });

    it("should require an operator and a positive integer count", () => {
      expect(isLedgerError(captureError(() => ledger.fulfillWithdrawals(ALICE, 1)), "Unauthorized")).toBe(true);
      expect(isLedgerError(captureError(() => ledger.fulfillWithdrawals(OWNER, 1)), "Unauthorized")).toBe(true);
      expect(isLedgerError(captureError(() => ledger.fulfillWithdrawals(OPERATOR, 0)), "InvalidParameter")).toBe(true);
      expect(isLedgerError(captureError(() => ledger.fulfillWithdrawals(OPERATOR, 1.5)), "InvalidParameter")).toBe(true);
    });

    it("should be blocked while withdrawals are paused", () => {
      roles.pause(OPERATOR, "withdrawals");
      expect(isLedgerError(captureError(() => ledger.fulfillWithdrawals(OPERATOR, 1)), "Paused")).toBe(true);
    });
  });

  describe("cooldown modes", () => {
    it("should apply a raised cooldown to pending requests by default", () => {
      ledger.deposit(ALICE, 1_000n);
      ledger.requestWithdrawal(ALICE, 1_000n);
      ledger.queueParameterChange(OWNER, "cooldownPeriod", 3 * DAY_MS);
      clock.advance(DAY_MS);
      ledger.executeParameterChange(OWNER, "cooldownPeriod");

      expect(ledger.cooldownMode).toBe(COOLDOWN_MODES.CURRENT);
      expect(ledger.fulfillWithdrawals(OPERATOR, 1)).toEqual({ processed: 0, totalPaid: 0n });

      clock.advance(2 * DAY_MS);
      expect(ledger.fulfillWithdrawals(OPERATOR, 1)).toEqual({ processed: 1, totalPaid: 1_000n });
    });

    it("should keep the cooldown captured at request in snapshot mode", () => {
      ({ ledger, clock } = createLedgerFixture({ cooldownMode: COOLDOWN_MODES.SNAPSHOT }));
      ledger.deposit(ALICE, 1_000n);
      ledger.requestWithdrawal(ALICE, 1_000n);
      ledger.queueParameterChange(OWNER, "cooldownPeriod", 3 * DAY_MS);
      clock.advance(DAY_MS);
      ledger.executeParameterChange(OWNER, "cooldownPeriod");

      expect(ledger.fulfillWithdrawals(OPERATOR, 1)).toEqual({ processed: 1, totalPaid: 1_000n });
    });

    it("should let an unexpired head block expired requests behind it", () => {
      ({ ledger, clock } = createLedgerFixture({
        parameters: { cooldownPeriodMs: 3 * DAY_MS },
        cooldownMode: COOLDOWN_MODES.SNAPSHOT,
      }));
      ledger.deposit(ALICE, 1_000n);
      ledger.deposit(BOB, 1_000n);
      ledger.requestWithdrawal(ALICE, 1_000n);
      ledger.queueParameterChange(OWNER, "cooldownPeriod", HOUR_MS);
      clock.advance(DAY_MS);
      ledger.executeParameterChange(OWNER, "cooldownPeriod");
      ledger.requestWithdrawal(BOB, 1_000n);
      clock.advance(HOUR_MS);

      expect(ledger.fulfillWithdrawals(OPERATOR, 10)).toEqual({ processed: 0, totalPaid: 0n });
      expect(ledger.withdrawalQueueHead()).toBe(0);

      clock.advance(2 * DAY_MS);
      expect(ledger.fulfillWithdrawals(OPERATOR, 10)).toEqual({ processed: 2, totalPaid: 2_000n });
    });
  });

  describe("forceProcessWithdrawal", () => {
    beforeEach(() => {
      ledger.deposit(ALICE, 1_000n);
      ledger.deposit(BOB, 1_000n);
      ledger.requestWithdrawal(ALICE, 1_000n);
      ledger.requestWithdrawal(BOB, 1_000n);
    });

    it("should settle one request out of order and before its cooldown", () => {
      const events: WithdrawalFulfilledEvent[] = [];
      ledger.on("withdrawal:fulfilled", (event) => events.push(event));

      expect(ledger.forceProcessWithdrawal(OWNER, 1)).toBe(1_000n);

      expect(token.balanceOf(BOB)).toBe(10_000_000n);
      expect(ledger.withdrawalQueueHead()).toBe(0);
      expect(ledger.getWithdrawalRequest(1)).toMatchObject({ status: "fulfilled", valuePaid: 1_000n });
      expect(events).toEqual([{ requestId: 1, user: BOB, shares: 1_000n, value: 1_000n, forced: true }]);

      clock.advance(DAY_MS);
      expect(ledger.fulfillWithdrawals(OPERATOR, 5)).toEqual({ processed: 1, totalPaid: 1_000n });
      expect(ledger.withdrawalQueueHead()).toBe(2);
    });

    it("should advance head when forcing the head request", () => {
      ledger.forceProcessWithdrawal(OWNER, 0);
      expect(ledger.withdrawalQueueHead()).toBe(1);
    });

    it("should be owner-only and reject resolved requests", () => {
      expect(isLedgerError(captureError(() => ledger.forceProcessWithdrawal(OPERATOR, 0)), "Unauthorized")).toBe(true);

      ledger.forceProcessWithdrawal(OWNER, 0);
      expect(isLedgerError(captureError(() => ledger.forceProcessWithdrawal(OWNER, 0)), "RequestAlreadyResolved")).toBe(true);
    });

    it("should fail on insufficient liquidity and leave the request pending", () => {
      ({ ledger } = createLedgerFixture({ parameters: { liquidityBuffer: 0n } }));
      ledger.deposit(ALICE, 1_000n);
      ledger.requestWithdrawal(ALICE, 1_000n);

      const error = captureError(() => ledger.forceProcessWithdrawal(OWNER, 0));

      expect(isLedgerError(error, "InsufficientLiquidity")).toBe(true);
      expect(ledger.getWithdrawalRequest(0)).toMatchObject({ status: "pending", shares: 1_000n });
      expect(ledger.escrowBalance()).toBe(1_000n);
      expect(ledger.pendingWithdrawalShares()).toBe(1_000n);
    });
  });

  describe("escrow donations", () => {
    it("should not block fulfill, cancel or force after a donation into escrow", () => {
      ledger.deposit(ALICE, 1_000n);
      ledger.deposit(BOB, 1_000n);
      ledger.requestWithdrawal(ALICE, 500n);
      ledger.requestWithdrawal(ALICE, 500n);

      ledger.transferShares(BOB, LEDGER, 1n);
      expect(ledger.escrowBalance()).toBe(1_001n);
      expect(ledger.pendingWithdrawalShares()).toBe(1_000n);

      clock.advance(DAY_MS);
      expect(ledger.fulfillWithdrawals(OPERATOR, 1)).toEqual({ processed: 1, totalPaid: 500n });

      ledger.cancelWithdrawal(OWNER, 1);
      expect(ledger.balanceOf(ALICE)).toBe(500n);

      const id = ledger.requestWithdrawal(ALICE, 200n);
      expect(ledger.forceProcessWithdrawal(OWNER, id)).toBe(200n);

      expect(ledger.escrowBalance()).toBe(1n);
      expect(ledger.pendingWithdrawalShares()).toBe(0n);
      expect(ledger.getStatistics().invariants.failedChecks).toBe(0);
    });

    it("should burn orphaned escrow shares on recovery", () => {
      ledger.deposit(ALICE, 1_000n);
      ledger.deposit(BOB, 1_000n);
      ledger.requestWithdrawal(ALICE, 400n);
      ledger.transferShares(BOB, LEDGER, 25n);

      expect(isLedgerError(captureError(() => ledger.recoverOrphanedShares(ALICE)), "Unauthorized")).toBe(true);
      expect(ledger.recoverOrphanedShares(OWNER)).toBe(25n);

      expect(ledger.escrowBalance()).toBe(400n);
      expect(ledger.totalSupply()).toBe(1_975n);
      expect(ledger.recoverOrphanedShares(OWNER)).toBe(0n);
    });
  });

  describe("purgeProcessedWithdrawals", () => {
    beforeEach(() => {
      ledger.deposit(ALICE, 1_000n);
      ledger.requestWithdrawal(ALICE, 100n);
      ledger.requestWithdrawal(ALICE, 100n);
      ledger.requestWithdrawal(ALICE, 100n);
      clock.advance(DAY_MS);
      ledger.fulfillWithdrawals(OPERATOR, 2);
    });

    it("should delete cleared entries behind head only", () => {
      const assetsBefore = ledger.totalAssets();

      expect(ledger.purgeProcessedWithdrawals(1)).toBe(1);
      expect(ledger.getWithdrawalRequest(0)).toBeUndefined();
      expect(ledger.purgeProcessedWithdrawals(10)).toBe(1);
      expect(ledger.purgeProcessedWithdrawals(10)).toBe(0);

      expect(ledger.getWithdrawalRequest(2)).toMatchObject({ status: "pending" });
      expect(ledger.totalAssets()).toBe(assetsBefore);
      expect(ledger.withdrawalQueueLength()).toBe(3);
    });

    it("should be callable by anyone", () => {
      expect(ledger.purgeProcessedWithdrawals(5)).toBe(2);
    });

    it("should treat a purged id as resolved", () => {
      ledger.purgeProcessedWithdrawals(5);
      expect(isLedgerError(captureError(() => ledger.cancelWithdrawal(OWNER, 0)), "RequestAlreadyResolved")).toBe(true);
    });

    it("should reject a non-positive batch size", () => {
      expect(isLedgerError(captureError(() => ledger.purgeProcessedWithdrawals(0)), "InvalidParameter")).toBe(true);
    });
  });

  describe("multiple holders", () => {
    it("should process requests strictly in submission order", () => {
      const order: string[] = [];
      ledger.on("withdrawal:fulfilled", (event) => order.push(event.user));

      ledger.deposit(CAROL, 300n);
      ledger.deposit(BOB, 300n);
      ledger.deposit(ALICE, 300n);
      ledger.requestWithdrawal(BOB, 100n);
      ledger.requestWithdrawal(CAROL, 100n);
      ledger.requestWithdrawal(ALICE, 100n);
      clock.advance(DAY_MS);

      ledger.fulfillWithdrawals(OPERATOR, 3);
      expect(order).toEqual([BOB, CAROL, ALICE]);
    });
  });
});
