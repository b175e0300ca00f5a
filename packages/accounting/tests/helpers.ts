/**
 * Shared fixtures for accounting tests.
 */

import pino from "pino";
import type { Logger } from "pino";
import { InMemoryKvStore } from "@acct-emulator/store";
import { ReferenceCatalog } from "../src/catalog.js";
import { ACCOUNTING_COLLECTIONS } from "../src/collections.js";
import type { CreateWalletTxnInput } from "../src/types.js";

export const FIXED_NOW = new Date("2024-11-21T09:00:00.000Z");

export const clock = (): Date => FIXED_NOW;

export const catalog = ReferenceCatalog.load();

export const silentLogger: Logger = pino({ level: "silent" });

export function createStore(): InMemoryKvStore {
  return new InMemoryKvStore({ collections: ACCOUNTING_COLLECTIONS });
}

/** Logger that keeps every emitted line, parsed. */
export function capturingLogger(): { logger: Logger; lines: unknown[] } {
  const lines: unknown[] = [];
  const logger = pino(
    { level: "info" },
    {
      write(msg: string) {
        lines.push(JSON.parse(msg));
      },
    },
  );
  return { logger, lines };
}

export function cardTxn(overrides: Partial<CreateWalletTxnInput> = {}): CreateWalletTxnInput {
  return {
    company_id: 1,
    date: "2024-11-20",
    amount: -1980,
    walletable_type: "credit_card",
    walletable_id: 2,
    description: "Office supplies",
    ...overrides,
  };
}
