/**
 * Wallet transaction service.
 *
 * Statement lines awaiting classification. Created `unbooked`; the
 * settlement engine (or a direct update) moves them to `settled`.
 * There is no way back from `settled`.
 */

import type { KvStore } from "@acct-emulator/store";
import { WALLET_TXNS } from "./collections.js";
import type {
  CreateWalletTxnInput,
  EntrySide,
  UpdateWalletTxnInput,
  WalletTxn,
  WalletTxnFilter,
} from "./types.js";
import { AccountingError } from "./types.js";

export function defaultEntrySide(amount: number): EntrySide {
  return amount < 0 ? "expense" : "income";
}

export class WalletTxnService {
  private readonly _store: KvStore;
  private readonly _now: () => Date;

  constructor(store: KvStore, now: () => Date = () => new Date()) {
    this._store = store;
    this._now = now;
  }

  list(filter: WalletTxnFilter = {}): WalletTxn[] {
    return this._store.scan(
      WALLET_TXNS,
      (txn) =>
        (filter.company_id === undefined || txn.company_id === filter.company_id) &&
        (filter.status === undefined || txn.status === filter.status),
    );
  }

  get(id: number): WalletTxn {
    const txn = this._store.find(WALLET_TXNS, id);
    if (txn === undefined) {
      throw new AccountingError("NOT_FOUND", "Wallet transaction not found");
    }
    return txn;
  }

  create(input: CreateWalletTxnInput): WalletTxn {
    const now = this._now().toISOString();
    return this._store.update((tx) => {
      const txn: WalletTxn = {
        id: tx.nextID(WALLET_TXNS),
        company_id: input.company_id,
        date: input.date,
        amount: input.amount,
        entry_side: input.entry_side ?? defaultEntrySide(input.amount),
        walletable_type: input.walletable_type,
        walletable_id: input.walletable_id,
        description: input.description ?? "",
        status: "unbooked",
        created_at: now,
        updated_at: now,
      };
      tx.put(WALLET_TXNS, txn.id, txn);
      return txn;
    });
  }

  /**
   * Partial update of status, deal_id and description.
   *
   * @throws AccountingError INVALID_PARAMETER when un-settling
   */
  update(id: number, input: UpdateWalletTxnInput): WalletTxn {
    return this._store.update((tx) => {
      const current = tx.find(WALLET_TXNS, id);
      if (current === undefined) {
        throw new AccountingError("NOT_FOUND", "Wallet transaction not found");
      }
      if (current.status === "settled" && input.status === "unbooked") {
        throw new AccountingError(
          "INVALID_PARAMETER",
          "A settled wallet transaction cannot return to unbooked",
        );
      }

      const updated: WalletTxn = {
        ...current,
        status: input.status ?? current.status,
        deal_id: input.deal_id ?? current.deal_id,
        description: input.description ?? current.description,
        updated_at: this._now().toISOString(),
      };
      tx.put(WALLET_TXNS, id, updated);
      return updated;
    });
  }

  delete(id: number): void {
    this._store.update((tx) => {
      if (tx.find(WALLET_TXNS, id) === undefined) {
        throw new AccountingError("NOT_FOUND", "Wallet transaction not found");
      }
      tx.delete(WALLET_TXNS, id);
    });
  }
}
