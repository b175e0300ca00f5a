/**
 * @acct-emulator/accounting — Reference catalog.
 *
 * Companies, account items and walletables are immutable for the
 * lifetime of the process. They are read once from a JSON file and
 * never stored in the KvStore.
 */

import { readFileSync } from "node:fs";
import type {
  AccountItem,
  Company,
  ReferenceData,
  Walletable,
  WalletableType,
} from "./types.js";
import { ReferenceDataSchema } from "./types.js";

/** Seed data shipped with this package. */
export const DEFAULT_REFERENCE_DATA_URL = new URL("../data/reference-data.json", import.meta.url);

export class ReferenceCatalog {
  private readonly _companies: readonly Company[];
  private readonly _accountItems: readonly AccountItem[];
  private readonly _accountItemsById: ReadonlyMap<number, AccountItem>;
  private readonly _walletables: readonly Walletable[];

  constructor(data: ReferenceData) {
    this._companies = data.companies;
    this._accountItems = data.account_items;
    this._accountItemsById = new Map(data.account_items.map((item) => [item.id, item]));
    this._walletables = data.walletables;
  }

  /**
   * Load and validate reference data from a JSON file.
   *
   * @throws ZodError if the file does not match the schema
   */
  static load(source: string | URL = DEFAULT_REFERENCE_DATA_URL): ReferenceCatalog {
    const raw: unknown = JSON.parse(readFileSync(source, "utf-8"));
    return new ReferenceCatalog(ReferenceDataSchema.parse(raw));
  }

  companies(): readonly Company[] {
    return this._companies;
  }

  accountItems(): readonly AccountItem[] {
    return this._accountItems;
  }

  accountItem(id: number): AccountItem | undefined {
    return this._accountItemsById.get(id);
  }

  /** Display name for a detail line; unknown ids get a placeholder. */
  accountItemName(id: number): string {
    return this._accountItemsById.get(id)?.name ?? `Account Item ${id}`;
  }

  walletables(type?: WalletableType): readonly Walletable[] {
    return type === undefined
      ? this._walletables
      : this._walletables.filter((w) => w.type === type);
  }
}
