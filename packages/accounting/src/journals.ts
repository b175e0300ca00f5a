/**
 * Journal service.
 *
 * Manual double-entry postings. Balance is the caller's responsibility;
 * `isBalanced` is provided for callers and tests that want to check it.
 */

import type { KvStore } from "@acct-emulator/store";
import type { ReferenceCatalog } from "./catalog.js";
import { JOURNALS, JOURNAL_DETAILS } from "./collections.js";
import type { CompanyFilter, CreateJournalInput, Journal } from "./types.js";
import { AccountingError } from "./types.js";

/** Σ debit amounts equals Σ credit amounts. */
export function isBalanced(journal: Pick<Journal, "details">): boolean {
  let debit = 0;
  let credit = 0;
  for (const detail of journal.details) {
    if (detail.entry_type === "debit") {
      debit += detail.amount;
    } else {
      credit += detail.amount;
    }
  }
  return debit === credit;
}

export class JournalService {
  private readonly _store: KvStore;
  private readonly _catalog: ReferenceCatalog;
  private readonly _now: () => Date;

  constructor(store: KvStore, catalog: ReferenceCatalog, now: () => Date = () => new Date()) {
    this._store = store;
    this._catalog = catalog;
    this._now = now;
  }

  list(filter: CompanyFilter = {}): Journal[] {
    return this._store.scan(
      JOURNALS,
      (journal) => filter.company_id === undefined || journal.company_id === filter.company_id,
    );
  }

  get(id: number): Journal {
    const journal = this._store.find(JOURNALS, id);
    if (journal === undefined) {
      throw new AccountingError("NOT_FOUND", "Journal not found");
    }
    return journal;
  }

  create(input: CreateJournalInput): Journal {
    if (input.details.length === 0) {
      throw new AccountingError("INVALID_PARAMETER", "Missing details");
    }
    const now = this._now().toISOString();

    return this._store.update((tx) => {
      const journal: Journal = {
        id: tx.nextID(JOURNALS),
        company_id: input.company_id,
        issue_date: input.issue_date,
        details: input.details.map((detail) => ({
          id: tx.nextID(JOURNAL_DETAILS),
          entry_type: detail.entry_type,
          account_item_id: detail.account_item_id,
          account_item_name: this._catalog.accountItemName(detail.account_item_id),
          tax_code: detail.tax_code ?? 0,
          partner_id: detail.partner_id,
          amount: detail.amount,
          vat: detail.vat ?? 0,
          description: detail.description,
          item_id: detail.item_id,
          section_id: detail.section_id,
        })),
        created_at: now,
        updated_at: now,
      };
      tx.put(JOURNALS, journal.id, journal);
      return journal;
    });
  }
}
