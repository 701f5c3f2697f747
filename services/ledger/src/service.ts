/**
 * Ledger Service Bootstrap
 *
 * Wires configuration, roles, the ledger and its state store together,
 * resuming from the last persisted snapshot when one exists.
 */

import { ledgerLogger as logger } from "@navledger/shared";
import type { LedgerServiceConfig } from "./config.js";
import {
  FileSystemLedgerStore,
  LedgerCheckpointer,
  type LedgerStateStore,
} from "./storage/ledger-state-store.js";
import { RoleRegistry } from "./vault/access-control.js";
import type { SettlementToken } from "./vault/settlement-token.js";
import { VaultLedger } from "./vault/vault-ledger.js";

const serviceLogger = logger.child({ component: "ledger-service" });

export interface LedgerServiceDeps {
  token: SettlementToken;
  store?: LedgerStateStore;
  clock?: () => number;
}

export interface LedgerService {
  ledger: VaultLedger;
  roles: RoleRegistry;
  store: LedgerStateStore;
  checkpointer: LedgerCheckpointer;
  stop(): Promise<void>;
}

export async function startLedgerService(
  config: LedgerServiceConfig,
  deps: LedgerServiceDeps
): Promise<LedgerService> {
  const store = deps.store ?? new FileSystemLedgerStore(config.statePath);
  const roles = new RoleRegistry(config.ownerAddress, config.operatorAddresses);

  const ledgerConfig = {
    ledgerAddress: config.ledgerAddress,
    token: deps.token,
    authority: roles,
    treasury: config.treasury,
    custodyVenue: config.custodyVenue,
    parameters: config.parameters,
    cooldownMode: config.cooldownMode,
    clock: deps.clock,
  };

  const snapshot = await store.load();
  const ledger = snapshot
    ? VaultLedger.fromSnapshot(ledgerConfig, snapshot)
    : new VaultLedger(ledgerConfig);

  const checkpointer = new LedgerCheckpointer(ledger, store);
  checkpointer.start();

  serviceLogger.info({
    ledgerAddress: ledger.ledgerAddress,
    resumed: snapshot !== null,
    totalSupply: ledger.totalSupply().toString(),
  }, "Ledger service started");

  return {
    ledger,
    roles,
    store,
    checkpointer,
    async stop(): Promise<void> {
      await checkpointer.stop();
      serviceLogger.info({ ledgerAddress: ledger.ledgerAddress }, "Ledger service stopped");
    },
  };
}
