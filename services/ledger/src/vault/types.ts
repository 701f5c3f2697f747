/**
 * Vault Ledger Types
 *
 * Types for the pooled-capital ledger:
 * - Accounting scalars and parameters
 * - Withdrawal requests
 * - Operation results
 * - Events emitted after every committed operation
 */

import type {
  CooldownMode,
  NavHistoryEntry,
  TimelockedParameter,
  WithdrawalStatus,
} from "@navledger/shared";
import type { Address } from "viem";
import type { AccessAuthority } from "./access-control.js";
import type { SettlementToken } from "./settlement-token.js";

export type { Address, NavHistoryEntry };

// ============================================
// PARAMETERS
// ============================================

export interface LedgerParameters {
  feeRate: bigint;
  cooldownPeriodMs: number;
  perUserCap: bigint;
  globalCap: bigint;
  liquidityBuffer: bigint;
  maxYieldChangePercent: bigint;
  yieldReportIntervalMs: number;
  treasury: Address;
  custodyVenue: Address;
}

/** Parameters that change immediately on an owner call */
export type ImmediateParameter =
  | "perUserCap"
  | "globalCap"
  | "liquidityBuffer"
  | "maxYieldChangePercent"
  | "yieldReportIntervalMs";

// ============================================
// VAULT STATE
// ============================================

/**
 * Accounting scalars. Share balances live in the ShareRegistry,
 * withdrawal requests in the WithdrawalQueue.
 */
export interface VaultState {
  totalDeposited: bigint;
  totalWithdrawn: bigint;
  accumulatedYield: bigint;
  pendingWithdrawalShares: bigint;
  priceHighWaterMark: bigint;
  lastYieldReportAt: number;
  inceptionAt: number;

  parameters: LedgerParameters;

  userTotalDeposited: Map<Address, bigint>;
  pendingRequestCounts: Map<Address, number>;
}

// ============================================
// WITHDRAWAL REQUESTS
// ============================================

export interface WithdrawalRequest {
  id: number;
  requester: Address;

  // Zeroed once the request is fulfilled or cancelled
  shares: bigint;

  requestedAt: number;
  cooldownAtRequest: number;
  status: WithdrawalStatus;

  valuePaid?: bigint;
  resolvedAt?: number;
}

// ============================================
// CONFIGURATION
// ============================================

export interface VaultLedgerConfig {
  /** The ledger's own account. Escrowed shares and idle liquidity sit here. */
  ledgerAddress: Address;
  token: SettlementToken;
  authority: AccessAuthority;

  treasury: Address;
  custodyVenue: Address;

  parameters?: Partial<Omit<LedgerParameters, "treasury" | "custodyVenue">>;
  cooldownMode?: CooldownMode;

  /** Wall clock in epoch milliseconds */
  clock?: () => number;
}

// ============================================
// RESULTS
// ============================================

export interface FulfillmentResult {
  processed: number;
  totalPaid: bigint;
  /** Set when a payout failed; that request stays pending */
  stoppedAt?: PayoutFailure;
}

export interface PayoutFailure {
  requestId: number;
  reason: string;
}

export interface YieldReport {
  delta: bigint;
  accumulatedYield: bigint;
  totalAssets: bigint;
  sharePrice: bigint;
  fee?: FeeCollection;
}

export interface FeeCollection {
  profit: bigint;
  feeValue: bigint;
  feeShares: bigint;
  highWaterMark: bigint;
}

/**
 * Difference between the value observed backing the ledger and the NAV
 * it has on record
 */
export interface UnreportedYield {
  backingValue: bigint;
  totalAssets: bigint;
  unreported: bigint;
  /** Largest |delta| one report may carry. Undefined when unbounded. */
  bound?: bigint;
  /** `unreported` clamped to the bound */
  reportable: bigint;
  exceedsBound: boolean;
}

export interface YieldSummary {
  sharePrice: bigint;
  baselinePrice: bigint;
  baselineAt: number;
  /** "window" when a report old enough exists, else measured from inception */
  source: "window" | "inception";
  elapsedMs: number;
  periodReturnPercent: number;
  annualizedPercent: number;
  /** Share price change since the last report, valued at current supply */
  yieldSinceLastReport: bigint;
  reports: number;
}

export interface LedgerSummary {
  ledgerAddress: Address;
  totalAssets: bigint;
  totalSupply: bigint;
  sharePrice: bigint;
  totalDeposited: bigint;
  totalWithdrawn: bigint;
  accumulatedYield: bigint;
  pendingWithdrawalShares: bigint;
  escrowBalance: bigint;
  idleLiquidity: bigint;
  priceHighWaterMark: bigint;
  lastYieldReportAt: number;
  queueHead: number;
  queueLength: number;
  parameters: LedgerParameters;
}

// ============================================
// EVENTS
// ============================================

export interface DepositEvent {
  user: Address;
  value: bigint;
  shares: bigint;
  sharePrice: bigint;
}

export interface WithdrawalRequestedEvent {
  requestId: number;
  user: Address;
  shares: bigint;
}

export interface WithdrawalFulfilledEvent {
  requestId: number;
  user: Address;
  shares: bigint;
  value: bigint;
  forced: boolean;
}

export interface WithdrawalCancelledEvent {
  requestId: number;
  user: Address;
  shares: bigint;
  cancelledBy: Address;
}

export interface FeeCollectedEvent extends FeeCollection {
  treasury: Address;
}

export interface ShareTransferEvent {
  from: Address;
  to: Address;
  shares: bigint;
}

export interface ParameterChangeEvent {
  key: TimelockedParameter | ImmediateParameter;
  value: string;
  executableAt?: number;
}

export interface VaultLedgerEvents {
  deposit: (event: DepositEvent) => void;
  "withdrawal:requested": (event: WithdrawalRequestedEvent) => void;
  "withdrawal:fulfilled": (event: WithdrawalFulfilledEvent) => void;
  "withdrawal:cancelled": (event: WithdrawalCancelledEvent) => void;
  "withdrawal:payout-failed": (event: PayoutFailure & { user: Address; value: bigint }) => void;
  "fee:collected": (event: FeeCollectedEvent) => void;
  "yield:reported": (event: YieldReport) => void;
  transfer: (event: ShareTransferEvent) => void;
  "hwm:reset": (event: { previous: bigint; current: bigint }) => void;
  "shares:orphaned-recovered": (event: { shares: bigint }) => void;
  "parameter:queued": (event: ParameterChangeEvent) => void;
  "parameter:executed": (event: ParameterChangeEvent) => void;
  "parameter:cancelled": (event: ParameterChangeEvent) => void;
  "parameter:updated": (event: ParameterChangeEvent) => void;
  "operation:committed": (event: { operation: string; sequence: number }) => void;
}
