/**
 * Shared test fixtures: fixed accounts, a manual clock and a ledger
 * wired to an in-memory token and role registry.
 */

import type { CooldownMode } from "@navledger/shared";
import type { Address } from "../vault/types.js";
import {
  InMemorySettlementToken,
  RoleRegistry,
  VaultLedger,
  type LedgerParameters,
} from "../vault/index.js";

export const OWNER: Address = "0x1000000000000000000000000000000000000001";
export const OPERATOR: Address = "0x2000000000000000000000000000000000000002";
export const LEDGER: Address = "0x3000000000000000000000000000000000000003";
export const TREASURY: Address = "0x4000000000000000000000000000000000000004";
export const CUSTODY: Address = "0x5000000000000000000000000000000000000005";
export const ALICE: Address = "0x6000000000000000000000000000000000000006";
export const BOB: Address = "0x7000000000000000000000000000000000000007";
export const CAROL: Address = "0x8000000000000000000000000000000000000008";

export const START_TIME = 1_700_000_000_000;
export const HOUR_MS = 3_600_000;
export const DAY_MS = 24 * HOUR_MS;

// Large enough that deposits stay idle in the ledger unless a test lowers it
export const IDLE_BUFFER = 10n ** 30n;

export class ManualClock {
  constructor(public now: number = START_TIME) {}

  advance(ms: number): void {
    this.now += ms;
  }

  readonly read = (): number => this.now;
}

export interface LedgerFixture {
  ledger: VaultLedger;
  token: InMemorySettlementToken;
  roles: RoleRegistry;
  clock: ManualClock;
}

export function createLedgerFixture(options: {
  parameters?: Partial<Omit<LedgerParameters, "treasury" | "custodyVenue">>;
  cooldownMode?: CooldownMode;
  token?: InMemorySettlementToken;
} = {}): LedgerFixture {
  const clock = new ManualClock();
  const token = options.token ?? new InMemorySettlementToken();
  const roles = new RoleRegistry(OWNER, [OPERATOR]);

  const ledger = new VaultLedger({
    ledgerAddress: LEDGER,
    token,
    authority: roles,
    treasury: TREASURY,
    custodyVenue: CUSTODY,
    parameters: { liquidityBuffer: IDLE_BUFFER, ...options.parameters },
    cooldownMode: options.cooldownMode,
    clock: clock.read,
  });

  for (const account of [ALICE, BOB, CAROL]) {
    token.mint(account, 10_000_000n);
  }

  return { ledger, token, roles, clock };
}

/**
 * Custody venue sends value back to the ledger
 */
export function returnFromCustody(token: InMemorySettlementToken, amount: bigint): void {
  token.transfer(CUSTODY, LEDGER, amount);
}

/**
 * Run `fn` and return what it threw
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("Expected the operation to throw");
}
