/**
 * Parameter Timelock
 *
 * queue → wait → execute for parameters that move value or fees.
 * At most one pending change per key; queueing again replaces it and
 * restarts the delay. Value validation belongs to the caller.
 */

import {
  ledgerLogger as logger,
  TIMELOCK_DELAYS,
  type PendingParameterChange,
  type TimelockedParameter,
} from "@navledger/shared";
import { LedgerError } from "./errors.js";

const timelockLogger = logger.child({ component: "parameter-timelock" });

export class ParameterTimelock {
  private pending: Map<TimelockedParameter, PendingParameterChange> = new Map();

  constructor(private readonly delays: Record<TimelockedParameter, number> = TIMELOCK_DELAYS) {}

  delayFor(key: TimelockedParameter): number {
    return this.delays[key];
  }

  /**
   * Queue a change, replacing any pending change for the same key
   */
  queue(change: PendingParameterChange): PendingParameterChange {
    this.pending.set(change.key, change);

    timelockLogger.info({
      key: change.key,
      value: String(change.value),
      executableAt: change.executableAt,
    }, "Parameter change queued");

    return change;
  }

  /**
   * Remove and return a pending change whose delay has elapsed
   */
  take(key: TimelockedParameter, now: number): PendingParameterChange {
    const change = this.require(key);
    if (now < change.executableAt) {
      throw new LedgerError("TimelockNotElapsed", `Timelock for ${key} has not elapsed`, {
        details: { key, executableAt: change.executableAt, now },
      });
    }
    this.pending.delete(key);
    return change;
  }

  cancel(key: TimelockedParameter): PendingParameterChange {
    const change = this.require(key);
    this.pending.delete(key);
    timelockLogger.info({ key }, "Parameter change cancelled");
    return change;
  }

  get(key: TimelockedParameter): PendingParameterChange | undefined {
    return this.pending.get(key);
  }

  list(): PendingParameterChange[] {
    return Array.from(this.pending.values()).map((change) => ({ ...change }));
  }

  checkpoint(): Map<TimelockedParameter, PendingParameterChange> {
    return new Map(this.pending);
  }

  restore(checkpoint: Map<TimelockedParameter, PendingParameterChange>): void {
    this.pending = new Map(checkpoint);
  }

  private require(key: TimelockedParameter): PendingParameterChange {
    const change = this.pending.get(key);
    if (!change) {
      throw new LedgerError("NoPendingChange", `No pending change for ${key}`, { details: { key } });
    }
    return change;
  }
}
