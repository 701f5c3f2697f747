/**
 * Vault Ledger
 *
 * Main service orchestrating all pooled-capital operations:
 * - Deposits and share minting
 * - Withdrawal requests, escrow and FIFO fulfillment
 * - Yield reporting and high-water-mark fees
 * - Immediate and timelocked parameter changes
 *
 * Every mutating operation is one unit of work: reentrancy guard,
 * checkpoint, body, invariant check, then commit or rollback. Events and
 * audit entries are buffered and only released on commit.
 *
 * Settlement value only moves after the ledger state for that movement
 * has passed the invariants, and nothing after a transfer can break them.
 * A rollback therefore never has to undo a transfer.
 */

import { EventEmitter } from "eventemitter3";
import {
  ledgerLogger as logger,
  audit,
  logError,
  logFatal,
  CANCELLATION_WINDOW_MS,
  COOLDOWN_MODES,
  CURRENT_SNAPSHOT_VERSION,
  INITIAL_SHARE_PRICE,
  LEDGER_DEFAULTS,
  LEDGER_LIMITS,
  MAX_FEE_RATE,
  MAX_PENDING_PER_USER,
  PRECISION,
  WITHDRAWAL_STATUS,
  type CooldownMode,
  type LedgerSnapshot,
  type PendingParameterChange,
  type TimelockedParameter,
} from "@navledger/shared";
import type { AccessAuthority } from "./access-control.js";
import { normalizeAddress, sameAddress } from "./address.js";
import { InvariantViolationError, LedgerError } from "./errors.js";
import { FeeEngine } from "./fee-engine.js";
import {
  InvariantChecker,
  createInvariantChecker,
  type InvariantCheckResult,
  type LedgerInvariantInputs,
} from "./invariant-checker.js";
import { NavHistory, computeUnreportedYield, summarizeYield } from "./nav-history.js";
import { ParameterTimelock } from "./parameter-timelock.js";
import { PricingEngine } from "./pricing-engine.js";
import { ShareRegistry, type ShareRegistryCheckpoint } from "./share-registry.js";
import type { SettlementToken } from "./settlement-token.js";
import type {
  Address,
  FulfillmentResult,
  ImmediateParameter,
  LedgerParameters,
  LedgerSummary,
  NavHistoryEntry,
  PayoutFailure,
  UnreportedYield,
  VaultLedgerConfig,
  VaultLedgerEvents,
  VaultState,
  WithdrawalRequest,
  YieldReport,
  YieldSummary,
} from "./types.js";
import {
  WithdrawalQueue,
  createWithdrawalQueue,
  type WithdrawalQueueCheckpoint,
} from "./withdrawal-queue.js";

const vaultLogger = logger.child({ component: "vault-ledger" });

interface LedgerCheckpoint {
  state: VaultState;
  shares: ShareRegistryCheckpoint;
  queue: WithdrawalQueueCheckpoint;
  timelock: Map<TimelockedParameter, PendingParameterChange>;
  history: NavHistoryEntry[];
}

// ============================================
// VAULT LEDGER
// ============================================

export class VaultLedger extends EventEmitter<VaultLedgerEvents> {
  readonly ledgerAddress: Address;
  readonly cooldownMode: CooldownMode;

  private readonly token: SettlementToken;
  private readonly authority: AccessAuthority;
  private readonly clock: () => number;

  // Components
  private readonly state: VaultState;
  private readonly shares: ShareRegistry;
  private readonly queue: WithdrawalQueue;
  private readonly timelock: ParameterTimelock;
  private readonly pricing: PricingEngine;
  private readonly fees: FeeEngine;
  private readonly invariants: InvariantChecker;
  private readonly history: NavHistory;

  // Transaction boundary
  private inOperation = false;
  private deferred: Array<() => void> = [];
  private committedOperations = 0;

  constructor(config: VaultLedgerConfig) {
    super();

    this.ledgerAddress = normalizeAddress(config.ledgerAddress, "ledgerAddress");
    this.token = config.token;
    this.authority = config.authority;
    this.cooldownMode = config.cooldownMode ?? COOLDOWN_MODES.CURRENT;
    this.clock = config.clock ?? Date.now;

    const parameters: LedgerParameters = {
      ...LEDGER_DEFAULTS,
      ...config.parameters,
      treasury: normalizeAddress(config.treasury, "treasury"),
      custodyVenue: normalizeAddress(config.custodyVenue, "custodyVenue"),
    };
    this.validateParameters(parameters);

    this.state = {
      totalDeposited: 0n,
      totalWithdrawn: 0n,
      accumulatedYield: 0n,
      pendingWithdrawalShares: 0n,
      priceHighWaterMark: INITIAL_SHARE_PRICE,
      lastYieldReportAt: 0,
      inceptionAt: this.clock(),
      parameters,
      userTotalDeposited: new Map(),
      pendingRequestCounts: new Map(),
    };

    this.shares = new ShareRegistry();
    this.queue = createWithdrawalQueue();
    this.timelock = new ParameterTimelock();
    this.pricing = new PricingEngine(this.state, this.shares);
    this.fees = new FeeEngine(this.state, this.shares, this.pricing);
    this.invariants = createInvariantChecker();
    this.history = new NavHistory();

    vaultLogger.info({
      ledgerAddress: this.ledgerAddress,
      treasury: parameters.treasury,
      custodyVenue: parameters.custodyVenue,
      feeRate: parameters.feeRate.toString(),
      cooldownPeriodMs: parameters.cooldownPeriodMs,
      cooldownMode: this.cooldownMode,
    }, "VaultLedger initialized");
  }

  /**
   * Rebuild a ledger from a persisted snapshot
   */
  static fromSnapshot(config: VaultLedgerConfig, snapshot: LedgerSnapshot): VaultLedger {
    const ledger = new VaultLedger(config);
    ledger.restore(snapshot);
    return ledger;
  }

  // ============================================
  // DEPOSITS
  // ============================================

  /**
   * Deposit settlement value and receive shares at the current price
   */
  deposit(caller: Address, amount: bigint): bigint {
    return this.run("deposit", (now) => {
      const user = normalizeAddress(caller, "caller");
      this.requireNotPaused("deposits");
      if (sameAddress(user, this.ledgerAddress)) {
        throw new LedgerError("Unauthorized", "The ledger cannot deposit into itself");
      }
      if (amount <= 0n) {
        throw new LedgerError("ZeroAmount", "Deposit amount must be > 0");
      }

      const shares = this.pricing.valueToShares(amount);
      if (shares === 0n) {
        throw new LedgerError("ZeroShares", "Deposit too small to mint any shares", {
          details: { amount: amount.toString(), sharePrice: this.pricing.sharePrice().toString() },
        });
      }

      const { perUserCap, globalCap } = this.state.parameters;
      if (perUserCap > 0n) {
        const holding = this.pricing.sharesToValue(this.shares.balanceOf(user)) + amount;
        if (holding > perUserCap) {
          throw new LedgerError("PerUserCapExceeded", "Deposit exceeds the per-user cap", {
            details: { holding: holding.toString(), perUserCap: perUserCap.toString() },
          });
        }
      }
      if (globalCap > 0n) {
        const total = this.pricing.totalAssets() + amount;
        if (total > globalCap) {
          throw new LedgerError("GlobalCapExceeded", "Deposit exceeds the global cap", {
            details: { totalAssets: total.toString(), globalCap: globalCap.toString() },
          });
        }
      }

      const sharePrice = this.pricing.sharePrice();

      // State first, external transfers last
      this.shares.mint(user, shares);
      this.state.totalDeposited += amount;
      this.state.userTotalDeposited.set(user, (this.state.userTotalDeposited.get(user) ?? 0n) + amount);

      this.invariants.enforce(this.invariantInputs(), "deposit", now);
      this.token.transfer(user, this.ledgerAddress, amount);
      const forwarded = this.forwardExcessLiquidity();

      this.defer(() => {
        vaultLogger.info({
          user,
          value: amount.toString(),
          shares: shares.toString(),
          forwarded: forwarded.toString(),
        }, "Deposit recorded");
        this.emit("deposit", { user, value: amount, shares, sharePrice });
      });

      return shares;
    });
  }

  // ============================================
  // WITHDRAWALS
  // ============================================

  /**
   * Escrow shares and enqueue a withdrawal request. Returns the request id.
   */
  requestWithdrawal(caller: Address, shares: bigint): number {
    return this.run("requestWithdrawal", (now) => {
      const user = normalizeAddress(caller, "caller");
      this.requireNotPaused("withdrawals");
      if (sameAddress(user, this.ledgerAddress)) {
        throw new LedgerError("Unauthorized", "Escrowed shares cannot be withdrawn");
      }
      if (shares <= 0n) {
        throw new LedgerError("ZeroAmount", "Withdrawal shares must be > 0");
      }

      const balance = this.shares.balanceOf(user);
      if (balance < shares) {
        throw new LedgerError("InsufficientBalance", "Share balance too low for withdrawal", {
          details: { balance: balance.toString(), requested: shares.toString() },
        });
      }

      const pendingCount = this.state.pendingRequestCounts.get(user) ?? 0;
      if (pendingCount >= MAX_PENDING_PER_USER) {
        throw new LedgerError("TooManyPendingRequests", "Too many pending withdrawal requests", {
          details: { pending: pendingCount, max: MAX_PENDING_PER_USER },
        });
      }

      this.shares.transfer(user, this.ledgerAddress, shares);
      this.state.pendingWithdrawalShares += shares;
      this.state.pendingRequestCounts.set(user, pendingCount + 1);

      const request = this.queue.enqueue(user, shares, now, this.state.parameters.cooldownPeriodMs);

      this.defer(() => {
        vaultLogger.info({
          requestId: request.id,
          user,
          shares: shares.toString(),
        }, "Withdrawal requested");
        this.emit("withdrawal:requested", { requestId: request.id, user, shares });
      });

      return request.id;
    });
  }

  /**
   * Return escrowed shares to the requester. The requester may cancel
   * within the cancellation window; the owner at any time.
   */
  cancelWithdrawal(caller: Address, requestId: number): void {
    this.run("cancelWithdrawal", (now) => {
      const actor = normalizeAddress(caller, "caller");
      const request = this.queue.requirePending(requestId);

      if (!this.isOwner(actor)) {
        if (!sameAddress(actor, request.requester)) {
          throw new LedgerError("Unauthorized", "Only the requester or the owner can cancel", {
            details: { requestId, caller: actor },
          });
        }
        if (now > request.requestedAt + CANCELLATION_WINDOW_MS) {
          throw new LedgerError("CancellationWindowExpired", "Cancellation window has closed", {
            details: { requestId, closedAt: request.requestedAt + CANCELLATION_WINDOW_MS, now },
          });
        }
      }

      this.requireEscrowCoverage();

      const { requester, shares } = request;
      this.shares.transfer(this.ledgerAddress, requester, shares);
      this.state.pendingWithdrawalShares -= shares;
      this.decrementPendingCount(requester);
      this.queue.markCancelled(request, now);

      this.defer(() => {
        vaultLogger.info({ requestId, user: requester, cancelledBy: actor }, "Withdrawal cancelled");
        this.emit("withdrawal:cancelled", { requestId, user: requester, shares, cancelledBy: actor });
      });
    });
  }

  /**
   * Process up to `count` pending requests from the head of the queue.
   * Stops early, without failing, at an unexpired request or when idle
   * liquidity cannot cover the next payout.
   */
  fulfillWithdrawals(caller: Address, count: number): FulfillmentResult {
    return this.run("fulfillWithdrawals", (now) => {
      this.requireOperator(caller);
      this.requireNotPaused("withdrawals");
      if (!Number.isInteger(count) || count <= 0) {
        throw new LedgerError("InvalidParameter", "count must be a positive integer", {
          details: { count },
        });
      }

      this.requireEscrowCoverage();

      let processed = 0;
      let totalPaid = 0n;
      let stoppedAt: PayoutFailure | undefined;

      for (const { index, request } of this.queue.fromHead()) {
        if (processed >= count) break;

        if (!request || request.status !== WITHDRAWAL_STATUS.PENDING) {
          this.queue.advancePast(index);
          continue;
        }

        // FIFO: an unexpired head blocks everything behind it
        if (now < request.requestedAt + this.cooldownFor(request)) break;

        const valueOut = this.pricing.sharesToValue(request.shares);
        const idle = this.idleLiquidity();
        if (valueOut > idle) {
          vaultLogger.warn({
            requestId: request.id,
            valueOut: valueOut.toString(),
            idleLiquidity: idle.toString(),
          }, "Insufficient idle liquidity; stopping fulfillment");
          break;
        }

        // A failed payout undoes only its own entry and ends this batch
        const { id: requestId, requester } = request;
        const undo = this.checkpoint();
        try {
          this.settle(request, valueOut, now, false, "fulfillWithdrawals");
        } catch (error) {
          if (error instanceof InvariantViolationError) throw error;
          this.restoreCheckpoint(undo);

          const failure: PayoutFailure = {
            requestId,
            reason: error instanceof Error ? error.message : String(error),
          };
          stoppedAt = failure;
          this.defer(() => {
            vaultLogger.warn({
              ...failure,
              user: requester,
              valueOut: valueOut.toString(),
            }, "Payout failed; request left pending");
            this.emit("withdrawal:payout-failed", { ...failure, user: requester, value: valueOut });
          });
          break;
        }
        this.queue.advancePast(index);

        processed++;
        totalPaid += valueOut;
      }

      const result: FulfillmentResult = { processed, totalPaid };
      if (stoppedAt) result.stoppedAt = stoppedAt;
      return result;
    });
  }

  /**
   * Owner emergency path: settle one request regardless of queue order
   * and cooldown. Returns the value paid.
   */
  forceProcessWithdrawal(caller: Address, requestId: number): bigint {
    return this.run("forceProcessWithdrawal", (now) => {
      this.requireOwner(caller);
      const request = this.queue.requirePending(requestId);
      this.requireEscrowCoverage();

      const valueOut = this.pricing.sharesToValue(request.shares);
      const idle = this.idleLiquidity();
      if (valueOut > idle) {
        throw new LedgerError("InsufficientLiquidity", "Idle liquidity cannot cover the payout", {
          details: { requestId, valueOut: valueOut.toString(), idleLiquidity: idle.toString() },
        });
      }

      this.settle(request, valueOut, now, true, "forceProcessWithdrawal");
      if (requestId === this.queue.head) {
        this.queue.advancePast(requestId);
      }

      const actor = normalizeAddress(caller, "caller");
      this.defer(() => audit({
        action: "withdrawal_force_processed",
        entityType: "withdrawal",
        entityId: String(requestId),
        actor,
        details: { value: valueOut.toString() },
      }));

      return valueOut;
    });
  }

  /**
   * Delete cleared requests behind the head. Open to anyone.
   */
  purgeProcessedWithdrawals(maxEntries: number): number {
    return this.run("purgeProcessedWithdrawals", () => this.queue.purge(maxEntries));
  }

  /**
   * Burn escrowed shares not backing any pending request (donations).
   * Returns the number of shares burned.
   */
  recoverOrphanedShares(caller: Address): bigint {
    return this.run("recoverOrphanedShares", () => {
      this.requireOwner(caller);
      this.requireEscrowCoverage();

      const orphaned = this.shares.balanceOf(this.ledgerAddress) - this.state.pendingWithdrawalShares;
      if (orphaned === 0n) return 0n;

      this.shares.burn(this.ledgerAddress, orphaned);

      const actor = normalizeAddress(caller, "caller");
      this.defer(() => {
        audit({
          action: "orphaned_shares_recovered",
          entityType: "escrow",
          entityId: this.ledgerAddress,
          actor,
          details: { shares: orphaned.toString() },
        });
        this.emit("shares:orphaned-recovered", { shares: orphaned });
      });

      return orphaned;
    });
  }

  // ============================================
  // SHARE TRANSFERS
  // ============================================

  /**
   * Move shares between holders. Anyone may send into escrow; nothing
   * leaves escrow except through the withdrawal paths.
   */
  transferShares(caller: Address, to: Address, shares: bigint): void {
    this.run("transferShares", () => {
      const from = normalizeAddress(caller, "caller");
      const recipient = normalizeAddress(to, "recipient");
      if (sameAddress(from, this.ledgerAddress)) {
        throw new LedgerError("Unauthorized", "Escrowed shares cannot be transferred");
      }

      this.shares.transfer(from, recipient, shares);

      this.defer(() => this.emit("transfer", { from, to: recipient, shares }));
    });
  }

  // ============================================
  // YIELD & FEES
  // ============================================

  /**
   * Apply an owner-reported yield delta and mint any fee owed to the treasury
   */
  reportYieldAndCollectFees(caller: Address, delta: bigint): YieldReport {
    return this.run("reportYieldAndCollectFees", (now) => {
      this.requireOwner(caller);

      const report = this.fees.applyYield(delta, now);
      this.history.record({
        recordedAt: now,
        delta,
        totalAssets: report.totalAssets,
        totalSupply: this.shares.totalSupply(),
        sharePrice: report.sharePrice,
      });
      const treasury = this.state.parameters.treasury;
      const actor = normalizeAddress(caller, "caller");

      this.defer(() => {
        audit({
          action: "yield_reported",
          entityType: "ledger",
          entityId: this.ledgerAddress,
          actor,
          details: { delta: delta.toString(), sharePrice: report.sharePrice.toString() },
        });
        if (report.fee) {
          this.emit("fee:collected", { ...report.fee, treasury });
        }
        this.emit("yield:reported", report);
      });

      return report;
    });
  }

  /**
   * Owner emergency: move the fee baseline to the current price
   */
  resetPriceHighWaterMark(caller: Address): bigint {
    return this.run("resetPriceHighWaterMark", () => {
      this.requireOwner(caller);
      const reset = this.fees.resetHighWaterMark();
      const actor = normalizeAddress(caller, "caller");

      this.defer(() => {
        audit({
          action: "hwm_reset",
          entityType: "ledger",
          entityId: this.ledgerAddress,
          actor,
          details: { previous: reset.previous.toString(), current: reset.current.toString() },
        });
        this.emit("hwm:reset", reset);
      });

      return reset.current;
    });
  }

  // ============================================
  // IMMEDIATE PARAMETERS
  // ============================================

  setPerUserCap(caller: Address, cap: bigint): void {
    this.requireNonNegative("perUserCap", cap);
    this.updateImmediate(caller, "perUserCap", cap);
  }

  setGlobalCap(caller: Address, cap: bigint): void {
    this.requireNonNegative("globalCap", cap);
    this.updateImmediate(caller, "globalCap", cap);
  }

  setLiquidityBuffer(caller: Address, buffer: bigint): void {
    this.requireNonNegative("liquidityBuffer", buffer);
    this.updateImmediate(caller, "liquidityBuffer", buffer);
  }

  setMaxYieldChangePercent(caller: Address, percent: bigint): void {
    if (percent < 0n || percent > PRECISION) {
      throw new LedgerError("InvalidParameter", "maxYieldChangePercent must be within [0, PRECISION]", {
        details: { value: percent.toString() },
      });
    }
    this.updateImmediate(caller, "maxYieldChangePercent", percent);
  }

  setYieldReportInterval(caller: Address, intervalMs: number): void {
    if (!Number.isInteger(intervalMs) || intervalMs < 0) {
      throw new LedgerError("InvalidParameter", "yieldReportIntervalMs must be a non-negative integer", {
        details: { value: intervalMs },
      });
    }
    this.updateImmediate(caller, "yieldReportIntervalMs", intervalMs);
  }

  // ============================================
  // TIMELOCKED PARAMETERS
  // ============================================

  queueParameterChange(caller: Address, key: "feeRate", value: bigint): PendingParameterChange;
  queueParameterChange(caller: Address, key: "cooldownPeriod", value: number): PendingParameterChange;
  queueParameterChange(caller: Address, key: "treasury" | "custodyVenue", value: Address): PendingParameterChange;
  queueParameterChange(
    caller: Address,
    key: TimelockedParameter,
    value: bigint | number | Address
  ): PendingParameterChange {
    return this.run("queueParameterChange", (now) => {
      this.requireOwner(caller);
      const executableAt = now + this.timelock.delayFor(key);
      const change = this.timelock.queue(this.buildChange(key, value, executableAt));
      const actor = normalizeAddress(caller, "caller");

      this.defer(() => {
        audit({
          action: "parameter_change_queued",
          entityType: "parameter",
          entityId: key,
          actor,
          details: { value: String(change.value), executableAt },
        });
        this.emit("parameter:queued", { key, value: String(change.value), executableAt });
      });

      return change;
    });
  }

  executeParameterChange(caller: Address, key: TimelockedParameter): void {
    this.run("executeParameterChange", (now) => {
      this.requireOwner(caller);
      const change = this.timelock.take(key, now);

      const parameters = this.state.parameters;
      switch (change.key) {
        case "feeRate":
          this.requireFeeRate(change.value);
          parameters.feeRate = change.value;
          break;
        case "cooldownPeriod":
          this.requireCooldown(change.value);
          parameters.cooldownPeriodMs = change.value;
          break;
        case "treasury":
          parameters.treasury = this.requireExternalAccount(change.value, "treasury");
          break;
        case "custodyVenue":
          parameters.custodyVenue = this.requireExternalAccount(change.value, "custodyVenue");
          break;
      }

      const actor = normalizeAddress(caller, "caller");
      this.defer(() => {
        audit({
          action: "parameter_change_executed",
          entityType: "parameter",
          entityId: key,
          actor,
          details: { value: String(change.value) },
        });
        this.emit("parameter:executed", { key, value: String(change.value) });
      });
    });
  }

  cancelParameterChange(caller: Address, key: TimelockedParameter): void {
    this.run("cancelParameterChange", () => {
      this.requireOwner(caller);
      const change = this.timelock.cancel(key);
      const actor = normalizeAddress(caller, "caller");

      this.defer(() => {
        audit({
          action: "parameter_change_cancelled",
          entityType: "parameter",
          entityId: key,
          actor,
        });
        this.emit("parameter:cancelled", {
          key,
          value: String(change.value),
          executableAt: change.executableAt,
        });
      });
    });
  }

  // ============================================
  // VIEWS
  // ============================================

  totalAssets(): bigint {
    return this.pricing.totalAssets();
  }

  sharePrice(): bigint {
    return this.pricing.sharePrice();
  }

  valueToShares(value: bigint): bigint {
    return this.pricing.valueToShares(value);
  }

  sharesToValue(shares: bigint): bigint {
    return this.pricing.sharesToValue(shares);
  }

  /** Shares a deposit of `amount` would mint right now */
  previewDeposit(amount: bigint): bigint {
    return amount > 0n ? this.pricing.valueToShares(amount) : 0n;
  }

  /** Value `shares` would be paid if fulfilled right now */
  previewRedeem(shares: bigint): bigint {
    return shares > 0n ? this.pricing.sharesToValue(shares) : 0n;
  }

  balanceOf(account: Address): bigint {
    return this.shares.balanceOf(normalizeAddress(account));
  }

  totalSupply(): bigint {
    return this.shares.totalSupply();
  }

  escrowBalance(): bigint {
    return this.shares.balanceOf(this.ledgerAddress);
  }

  pendingWithdrawalShares(): bigint {
    return this.state.pendingWithdrawalShares;
  }

  /** Settlement tokens held by the ledger itself */
  idleLiquidity(): bigint {
    return this.token.balanceOf(this.ledgerAddress);
  }

  getWithdrawalRequest(requestId: number): WithdrawalRequest | undefined {
    const request = this.queue.get(requestId);
    return request ? { ...request } : undefined;
  }

  getPendingWithdrawals(requester?: Address): WithdrawalRequest[] {
    const account = requester === undefined ? undefined : normalizeAddress(requester);
    return this.queue.getPendingRequests(account).map((r) => ({ ...r }));
  }

  withdrawalQueueHead(): number {
    return this.queue.head;
  }

  withdrawalQueueLength(): number {
    return this.queue.length;
  }

  userTotalDeposited(account: Address): bigint {
    return this.state.userTotalDeposited.get(normalizeAddress(account)) ?? 0n;
  }

  pendingRequestCount(account: Address): number {
    return this.state.pendingRequestCounts.get(normalizeAddress(account)) ?? 0;
  }

  getParameters(): LedgerParameters {
    return { ...this.state.parameters };
  }

  getPendingParameterChange(key: TimelockedParameter): PendingParameterChange | undefined {
    return this.timelock.get(key);
  }

  /** NAV and share price at each retained yield report, oldest first */
  getNavHistory(): NavHistoryEntry[] {
    return this.history.list();
  }

  /**
   * Yield the custody side holds that has not been reported yet, and the
   * part of it one report may carry right now
   */
  computeUnreportedYield(backingValue: bigint): UnreportedYield {
    if (backingValue < 0n) {
      throw new LedgerError("InvalidParameter", "backingValue must be non-negative", {
        details: { backingValue: backingValue.toString() },
      });
    }
    return computeUnreportedYield(
      backingValue,
      this.pricing.totalAssets(),
      this.state.parameters.maxYieldChangePercent
    );
  }

  getYieldSummary(windowMs?: number): YieldSummary {
    return summarizeYield({
      history: this.history,
      sharePrice: this.pricing.sharePrice(),
      totalSupply: this.shares.totalSupply(),
      inceptionAt: this.state.inceptionAt,
      now: this.clock(),
      windowMs,
    });
  }

  /**
   * Current ledger summary
   */
  getState(): LedgerSummary {
    return {
      ledgerAddress: this.ledgerAddress,
      totalAssets: this.pricing.totalAssets(),
      totalSupply: this.shares.totalSupply(),
      sharePrice: this.pricing.sharePrice(),
      totalDeposited: this.state.totalDeposited,
      totalWithdrawn: this.state.totalWithdrawn,
      accumulatedYield: this.state.accumulatedYield,
      pendingWithdrawalShares: this.state.pendingWithdrawalShares,
      escrowBalance: this.escrowBalance(),
      idleLiquidity: this.idleLiquidity(),
      priceHighWaterMark: this.state.priceHighWaterMark,
      lastYieldReportAt: this.state.lastYieldReportAt,
      queueHead: this.queue.head,
      queueLength: this.queue.length,
      parameters: this.getParameters(),
    };
  }

  getStatistics(): {
    committedOperations: number;
    holders: number;
    withdrawals: ReturnType<WithdrawalQueue["getStatistics"]>;
    invariants: ReturnType<InvariantChecker["getStatistics"]> & { recentFailures: InvariantCheckResult[] };
  } {
    return {
      committedOperations: this.committedOperations,
      holders: this.shares.holders().length,
      withdrawals: this.queue.getStatistics(),
      invariants: {
        ...this.invariants.getStatistics(),
        recentFailures: this.invariants.getFailedChecks(10),
      },
    };
  }

  // ============================================
  // PERSISTENCE
  // ============================================

  /**
   * Complete ledger state in its persisted shape
   */
  snapshot(): LedgerSnapshot {
    return {
      version: CURRENT_SNAPSHOT_VERSION,
      ledgerAddress: this.ledgerAddress,
      savedAt: this.clock(),
      inceptionAt: this.state.inceptionAt,

      totalDeposited: this.state.totalDeposited,
      totalWithdrawn: this.state.totalWithdrawn,
      accumulatedYield: this.state.accumulatedYield,
      pendingWithdrawalShares: this.state.pendingWithdrawalShares,
      priceHighWaterMark: this.state.priceHighWaterMark,
      lastYieldReportAt: this.state.lastYieldReportAt,

      parameters: { ...this.state.parameters },

      totalSupply: this.shares.totalSupply(),
      balances: this.shares.holders(),
      userTotalDeposited: Array.from(this.state.userTotalDeposited.entries()),
      pendingRequestCounts: Array.from(this.state.pendingRequestCounts.entries()),

      queue: {
        head: this.queue.head,
        length: this.queue.length,
        purgeCursor: this.queue.purgedUpTo,
        requests: this.queue.toArray(),
      },
      pendingChanges: this.timelock.list(),
      navHistory: this.history.list(),
    };
  }

  /**
   * Replace the whole ledger state with a snapshot. The result must pass
   * every invariant or nothing changes.
   */
  restore(snapshot: LedgerSnapshot): void {
    this.run("restore", () => {
      const ledgerAddress = normalizeAddress(snapshot.ledgerAddress, "ledgerAddress");
      if (!sameAddress(ledgerAddress, this.ledgerAddress)) {
        throw new LedgerError("InvalidParameter", "Snapshot belongs to a different ledger", {
          details: { expected: this.ledgerAddress, actual: ledgerAddress },
        });
      }

      const parameters: LedgerParameters = {
        ...snapshot.parameters,
        treasury: normalizeAddress(snapshot.parameters.treasury, "treasury"),
        custodyVenue: normalizeAddress(snapshot.parameters.custodyVenue, "custodyVenue"),
      };
      this.validateParameters(parameters);

      Object.assign(this.state, {
        totalDeposited: snapshot.totalDeposited,
        totalWithdrawn: snapshot.totalWithdrawn,
        accumulatedYield: snapshot.accumulatedYield,
        pendingWithdrawalShares: snapshot.pendingWithdrawalShares,
        priceHighWaterMark: snapshot.priceHighWaterMark,
        lastYieldReportAt: snapshot.lastYieldReportAt,
        inceptionAt: snapshot.inceptionAt ?? this.state.inceptionAt,
        parameters,
        userTotalDeposited: new Map(
          snapshot.userTotalDeposited.map(([account, value]): [Address, bigint] => [normalizeAddress(account), value])
        ),
        pendingRequestCounts: new Map(
          snapshot.pendingRequestCounts
            .filter(([, n]) => n > 0)
            .map(([account, n]): [Address, number] => [normalizeAddress(account), n])
        ),
      } satisfies VaultState);

      this.shares.restore({
        balances: new Map(
          snapshot.balances.map(([account, balance]): [Address, bigint] => [normalizeAddress(account), balance])
        ),
        totalSupply: snapshot.totalSupply,
      });

      this.queue.restore({
        head: snapshot.queue.head,
        length: snapshot.queue.length,
        purgeCursor: snapshot.queue.purgeCursor,
        requests: new Map(
          snapshot.queue.requests.map((r): [number, WithdrawalRequest] => [
            r.id,
            { ...r, requester: normalizeAddress(r.requester) },
          ])
        ),
      });

      this.timelock.restore(new Map(
        snapshot.pendingChanges.map((change): [TimelockedParameter, PendingParameterChange] => [change.key, change])
      ));

      this.history.restore(snapshot.navHistory);

      this.invariants.enforceQueueAccounting({
        requests: this.queue.toArray(),
        queueLength: this.queue.length,
        pendingWithdrawalShares: this.state.pendingWithdrawalShares,
        pendingRequestCounts: this.state.pendingRequestCounts,
      });

      this.defer(() => {
        vaultLogger.info({
          savedAt: snapshot.savedAt,
          totalSupply: snapshot.totalSupply.toString(),
          queueLength: snapshot.queue.length,
        }, "Ledger state restored from snapshot");
      });
    });
  }

  // ============================================
  // TRANSACTION BOUNDARY
  // ============================================

  private run<T>(operation: string, body: (now: number) => T): T {
    if (this.inOperation) {
      throw new LedgerError("ReentrantCall", `Re-entrant call to ${operation}`, {
        details: { operation },
      });
    }

    this.inOperation = true;
    const checkpoint = this.checkpoint();
    const now = this.clock();

    let result: T;
    try {
      result = body(now);
      this.invariants.enforce(this.invariantInputs(), operation, now);
    } catch (error) {
      this.rollback(checkpoint);
      if (error instanceof InvariantViolationError) {
        logFatal(error, {
          operation,
          invariant: error.invariant,
          details: error.details,
        }, `Ledger invariant violated during ${operation}; rolled back`);
      }
      throw error;
    } finally {
      this.inOperation = false;
    }

    this.commit(operation);
    return result;
  }

  private defer(effect: () => void): void {
    this.deferred.push(effect);
  }

  private commit(operation: string): void {
    const effects = this.deferred;
    this.deferred = [];
    this.committedOperations++;
    const sequence = this.committedOperations;

    for (const effect of effects) {
      this.runListener(operation, effect);
    }
    this.runListener(operation, () => this.emit("operation:committed", { operation, sequence }));
  }

  // Listener failures never undo a committed operation
  private runListener(operation: string, effect: () => void): void {
    try {
      effect();
    } catch (error) {
      logError(
        error instanceof Error ? error : new Error(String(error)),
        { operation },
        "Ledger event listener failed"
      );
    }
  }

  private checkpoint(): LedgerCheckpoint {
    return {
      state: structuredClone(this.state),
      shares: this.shares.checkpoint(),
      queue: this.queue.checkpoint(),
      timelock: this.timelock.checkpoint(),
      history: this.history.checkpoint(),
    };
  }

  private restoreCheckpoint(checkpoint: LedgerCheckpoint): void {
    Object.assign(this.state, checkpoint.state);
    this.shares.restore(checkpoint.shares);
    this.queue.restore(checkpoint.queue);
    this.timelock.restore(checkpoint.timelock);
    this.history.restore(checkpoint.history);
  }

  private rollback(checkpoint: LedgerCheckpoint): void {
    this.restoreCheckpoint(checkpoint);
    this.deferred = [];
  }

  private invariantInputs(): LedgerInvariantInputs {
    return {
      totalSupply: this.shares.totalSupply(),
      sumOfBalances: this.shares.sumOfBalances(),
      escrowBalance: this.escrowBalance(),
      pendingWithdrawalShares: this.state.pendingWithdrawalShares,
      queueHead: this.queue.head,
      queueLength: this.queue.length,
      purgeCursor: this.queue.purgedUpTo,
      feeRate: this.state.parameters.feeRate,
    };
  }

  // ============================================
  // PRIVATE METHODS
  // ============================================

  private settle(
    request: WithdrawalRequest,
    valueOut: bigint,
    now: number,
    forced: boolean,
    operation: string
  ): void {
    const { id: requestId, requester, shares } = request;
    if (shares <= 0n) {
      throw new InvariantViolationError(
        `Payout of ${valueOut} for request ${requestId} has no shares to burn`,
        "payout_without_burn",
        { requestId: String(requestId), valueOut: valueOut.toString() }
      );
    }

    // Burn before paying out
    this.shares.burn(this.ledgerAddress, shares);
    this.state.pendingWithdrawalShares -= shares;
    this.state.totalWithdrawn += valueOut;
    this.decrementPendingCount(requester);
    this.queue.markFulfilled(request, valueOut, now);

    this.invariants.enforce(this.invariantInputs(), operation, now);
    this.token.transfer(this.ledgerAddress, requester, valueOut);

    this.defer(() => {
      vaultLogger.info({
        requestId,
        user: requester,
        shares: shares.toString(),
        value: valueOut.toString(),
        forced,
      }, "Withdrawal fulfilled");
      this.emit("withdrawal:fulfilled", { requestId, user: requester, shares, value: valueOut, forced });
    });
  }

  /**
   * Send idle liquidity above the buffer to the custody venue. A failed
   * forward leaves the value idle; the next deposit tries again.
   */
  private forwardExcessLiquidity(): bigint {
    const idle = this.idleLiquidity();
    const buffer = this.state.parameters.liquidityBuffer;
    if (idle <= buffer) return 0n;

    const excess = idle - buffer;
    const custodyVenue = this.state.parameters.custodyVenue;
    try {
      this.token.transfer(this.ledgerAddress, custodyVenue, excess);
    } catch (error) {
      if (error instanceof InvariantViolationError) throw error;
      const reason = error instanceof Error ? error.message : String(error);
      this.defer(() => {
        vaultLogger.warn({
          custodyVenue,
          excess: excess.toString(),
          reason,
        }, "Forward to custody failed; value left idle");
      });
      return 0n;
    }
    return excess;
  }

  private cooldownFor(request: WithdrawalRequest): number {
    return this.cooldownMode === COOLDOWN_MODES.SNAPSHOT
      ? request.cooldownAtRequest
      : this.state.parameters.cooldownPeriodMs;
  }

  private decrementPendingCount(requester: Address): void {
    const remaining = (this.state.pendingRequestCounts.get(requester) ?? 0) - 1;
    if (remaining > 0) {
      this.state.pendingRequestCounts.set(requester, remaining);
    } else {
      this.state.pendingRequestCounts.delete(requester);
    }
  }

  private updateImmediate<K extends ImmediateParameter>(
    caller: Address,
    key: K,
    value: LedgerParameters[K]
  ): void {
    this.run("updateParameter", () => {
      this.requireOwner(caller);
      this.state.parameters[key] = value;
      const actor = normalizeAddress(caller, "caller");

      this.defer(() => {
        audit({
          action: "parameter_updated",
          entityType: "parameter",
          entityId: key,
          actor,
          details: { value: String(value) },
        });
        this.emit("parameter:updated", { key, value: String(value) });
      });
    });
  }

  private buildChange(
    key: TimelockedParameter,
    value: bigint | number | Address,
    executableAt: number
  ): PendingParameterChange {
    switch (key) {
      case "feeRate":
        if (typeof value !== "bigint") break;
        this.requireFeeRate(value);
        return { key, value, executableAt };
      case "cooldownPeriod":
        if (typeof value !== "number") break;
        this.requireCooldown(value);
        return { key, value, executableAt };
      case "treasury":
      case "custodyVenue":
        if (typeof value !== "string") break;
        return { key, value: this.requireExternalAccount(value, key), executableAt };
    }
    throw new LedgerError("InvalidParameter", `Wrong value type for ${key}`, {
      details: { key, type: typeof value },
    });
  }

  private validateParameters(parameters: LedgerParameters): void {
    this.requireFeeRate(parameters.feeRate);
    this.requireCooldown(parameters.cooldownPeriodMs);
    this.requireNonNegative("perUserCap", parameters.perUserCap);
    this.requireNonNegative("globalCap", parameters.globalCap);
    this.requireNonNegative("liquidityBuffer", parameters.liquidityBuffer);
    if (parameters.maxYieldChangePercent < 0n || parameters.maxYieldChangePercent > PRECISION) {
      throw new LedgerError("InvalidParameter", "maxYieldChangePercent must be within [0, PRECISION]");
    }
    if (!Number.isInteger(parameters.yieldReportIntervalMs) || parameters.yieldReportIntervalMs < 0) {
      throw new LedgerError("InvalidParameter", "yieldReportIntervalMs must be a non-negative integer");
    }
    this.requireExternalAccount(parameters.treasury, "treasury");
    this.requireExternalAccount(parameters.custodyVenue, "custodyVenue");
  }

  private requireFeeRate(feeRate: bigint): void {
    if (feeRate < 0n || feeRate > MAX_FEE_RATE) {
      throw new LedgerError("InvalidParameter", "feeRate must be within [0, MAX_FEE_RATE]", {
        details: { value: feeRate.toString(), max: MAX_FEE_RATE.toString() },
      });
    }
  }

  private requireCooldown(cooldownMs: number): void {
    if (!Number.isInteger(cooldownMs) || cooldownMs < 0 || cooldownMs > LEDGER_LIMITS.maxCooldownMs) {
      throw new LedgerError("InvalidParameter", "cooldownPeriod must be within [0, MAX_COOLDOWN_MS]", {
        details: { value: cooldownMs, max: LEDGER_LIMITS.maxCooldownMs },
      });
    }
  }

  private requireNonNegative(key: string, value: bigint): void {
    if (value < 0n) {
      throw new LedgerError("InvalidParameter", `${key} must be non-negative`, {
        details: { value: value.toString() },
      });
    }
  }

  private requireExternalAccount(value: string, field: string): Address {
    const account = normalizeAddress(value, field);
    if (sameAddress(account, this.ledgerAddress)) {
      throw new LedgerError("InvalidParameter", `${field} cannot be the ledger itself`);
    }
    return account;
  }

  private requireEscrowCoverage(): void {
    this.invariants.enforceEscrowCoverage(this.escrowBalance(), this.state.pendingWithdrawalShares);
  }

  private isOwner(account: Address): boolean {
    return sameAddress(account, this.authority.owner());
  }

  private requireOwner(caller: Address): void {
    if (!this.isOwner(normalizeAddress(caller, "caller"))) {
      throw new LedgerError("Unauthorized", "Caller is not the owner", { details: { caller } });
    }
  }

  private requireOperator(caller: Address): void {
    if (!this.authority.isOperator(normalizeAddress(caller, "caller"))) {
      throw new LedgerError("Unauthorized", "Caller is not an operator", { details: { caller } });
    }
  }

  private requireNotPaused(scope: "deposits" | "withdrawals"): void {
    const scopePaused = scope === "deposits"
      ? this.authority.depositsPaused()
      : this.authority.withdrawalsPaused();
    if (this.authority.paused() || scopePaused) {
      throw new LedgerError("Paused", `Ledger ${scope} are paused`, { details: { scope } });
    }
  }
}

/**
 * Factory function
 */
export function createVaultLedger(config: VaultLedgerConfig): VaultLedger {
  return new VaultLedger(config);
}
