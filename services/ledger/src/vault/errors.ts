/**
 * Ledger Errors
 *
 * Two channels:
 * - LedgerError: caller-correctable input and authorization failures.
 *   The operation is rolled back and nothing changes.
 * - InvariantViolationError: the accounting is broken. Never caught inside
 *   the ledger, always rolled back and logged at fatal.
 */

export type LedgerErrorCategory = "input" | "authorization";

export type LedgerInputErrorCode =
  | "ZeroAmount"
  | "ZeroShares"
  | "PerUserCapExceeded"
  | "GlobalCapExceeded"
  | "InsufficientBalance"
  | "TooManyPendingRequests"
  | "RequestNotFound"
  | "RequestAlreadyResolved"
  | "CancellationWindowExpired"
  | "InsufficientLiquidity"
  | "YieldChangeExceedsBound"
  | "YieldReportTooSoon"
  | "InvalidParameter"
  | "NoPendingChange"
  | "TimelockNotElapsed"
  | "InvalidAddress"
  | "VaultInsolvent"
  | "DivisionByZero";

export type LedgerAuthorizationErrorCode = "Unauthorized" | "Paused" | "ReentrantCall";

export type LedgerErrorCode = LedgerInputErrorCode | LedgerAuthorizationErrorCode;

const AUTHORIZATION_CODES: ReadonlySet<LedgerErrorCode> = new Set<LedgerErrorCode>([
  "Unauthorized",
  "Paused",
  "ReentrantCall",
]);

export class LedgerError extends Error {
  readonly code: LedgerErrorCode;
  readonly category: LedgerErrorCategory;
  readonly details?: Record<string, unknown>;

  constructor(
    code: LedgerErrorCode,
    message: string,
    options?: { cause?: unknown; details?: Record<string, unknown> }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "LedgerError";
    this.code = code;
    this.category = AUTHORIZATION_CODES.has(code) ? "authorization" : "input";
    if (options?.details !== undefined) {
      this.details = options.details;
    }
  }
}

export type LedgerInvariant =
  | "supply_conservation"
  | "escrow_coverage"
  | "fee_rate_bounded"
  | "queue_head_bounded"
  | "fee_below_nav"
  | "payout_without_burn"
  | "request_id_bounded"
  | "pending_shares_match"
  | "pending_counts_match";

export class InvariantViolationError extends Error {
  constructor(
    message: string,
    public readonly invariant: LedgerInvariant,
    public readonly details: Record<string, string> = {}
  ) {
    super(message);
    this.name = "InvariantViolationError";
  }
}

export function isLedgerError(error: unknown, code?: LedgerErrorCode): error is LedgerError {
  return error instanceof LedgerError && (code === undefined || error.code === code);
}
