/**
 * Ledger State Storage
 *
 * Persists complete ledger snapshots:
 * - FileSystemLedgerStore writes one JSON document, atomically
 * - InMemoryLedgerStore keeps the serialized form for tests and local runs
 * - LedgerCheckpointer saves a snapshot after every committed operation
 *
 * Snapshots are validated against ledgerSnapshotSchema on load.
 */

import {
  storageLogger as logger,
  bigintJsonReplacer,
  createTimer,
  ledgerSnapshotSchema,
  logError,
  type LedgerSnapshot,
} from "@navledger/shared";
import fs from "fs/promises";
import path from "path";
import type { VaultLedger } from "../vault/vault-ledger.js";

// ============================================
// STORE INTERFACE
// ============================================

export interface LedgerStateStore {
  save(snapshot: LedgerSnapshot): Promise<void>;
  load(): Promise<LedgerSnapshot | null>;
}

export function serializeSnapshot(snapshot: LedgerSnapshot): string {
  return JSON.stringify(snapshot, bigintJsonReplacer, 2);
}

export function parseSnapshot(content: string): LedgerSnapshot {
  return ledgerSnapshotSchema.parse(JSON.parse(content));
}

// ============================================
// FILE SYSTEM STORE
// ============================================

export class FileSystemLedgerStore implements LedgerStateStore {
  private readonly filePath: string;

  constructor(basePath: string = "./data/ledger") {
    this.filePath = path.join(basePath, "ledger-state.json");
  }

  get path(): string {
    return this.filePath;
  }

  async save(snapshot: LedgerSnapshot): Promise<void> {
    const done = createTimer("ledger-snapshot-save");
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });

    // Write atomically (write to temp, then rename)
    const tempPath = `${this.filePath}.tmp`;
    await fs.writeFile(tempPath, serializeSnapshot(snapshot), "utf-8");
    await fs.rename(tempPath, this.filePath);
    done();

    logger.debug({ path: this.filePath, savedAt: snapshot.savedAt }, "Ledger snapshot saved");
  }

  async load(): Promise<LedgerSnapshot | null> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, "utf-8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        logger.info({ path: this.filePath }, "No ledger snapshot found");
        return null;
      }
      throw error;
    }

    const snapshot = parseSnapshot(content);
    logger.info({
      path: this.filePath,
      savedAt: snapshot.savedAt,
      queueLength: snapshot.queue.length,
    }, "Ledger snapshot loaded");
    return snapshot;
  }
}

// ============================================
// IN-MEMORY STORE
// ============================================

export class InMemoryLedgerStore implements LedgerStateStore {
  private content: string | null = null;
  private saveCount = 0;

  async save(snapshot: LedgerSnapshot): Promise<void> {
    this.content = serializeSnapshot(snapshot);
    this.saveCount++;
  }

  async load(): Promise<LedgerSnapshot | null> {
    return this.content === null ? null : parseSnapshot(this.content);
  }

  get saves(): number {
    return this.saveCount;
  }
}

// ============================================
// CHECKPOINTER
// ============================================

/**
 * Saves a snapshot after each committed ledger operation. Snapshots are
 * taken synchronously at commit and written in commit order.
 */
export class LedgerCheckpointer {
  private chain: Promise<void> = Promise.resolve();
  private saved = 0;
  private failed = 0;
  private readonly onCommitted = (event: { operation: string; sequence: number }): void => {
    this.schedule(event.operation, event.sequence);
  };

  constructor(
    private readonly ledger: VaultLedger,
    private readonly store: LedgerStateStore
  ) {}

  start(): void {
    this.ledger.on("operation:committed", this.onCommitted);
  }

  /**
   * Detach from the ledger and wait for outstanding writes
   */
  async stop(): Promise<void> {
    this.ledger.off("operation:committed", this.onCommitted);
    await this.flush();
  }

  flush(): Promise<void> {
    return this.chain;
  }

  getStatistics(): { saved: number; failed: number } {
    return { saved: this.saved, failed: this.failed };
  }

  private schedule(operation: string, sequence: number): void {
    const snapshot = this.ledger.snapshot();

    this.chain = this.chain
      .then(() => this.store.save(snapshot))
      .then(
        () => {
          this.saved++;
        },
        (error: unknown) => {
          this.failed++;
          logError(
            error instanceof Error ? error : new Error(String(error)),
            { operation, sequence },
            "Failed to persist ledger snapshot"
          );
        }
      );
  }
}
