/**
 * @acct-emulator/accounting — Deal service.
 *
 * A deal is a classified income/expense transaction. Creating one with
 * payment lines runs the settlement engine in the same store
 * transaction, so the deal and the wallet transactions it settles are
 * committed together.
 *
 * Deleting a deal does not un-settle wallet transactions.
 */

import type { KvStore, WriteTransaction } from "@acct-emulator/store";
import type { Logger } from "pino";
import type { ReferenceCatalog } from "./catalog.js";
import { DEALS, DEAL_DETAILS, DEAL_PAYMENTS } from "./collections.js";
import type { SettlementOutcome } from "./settlement.js";
import { SettlementEngine } from "./settlement.js";
import { computeVat, totalWithVat } from "./tax.js";
import type {
  CompanyFilter,
  CreateDealInput,
  Deal,
  DealDetail,
  DealDetailInput,
  UpdateDealInput,
} from "./types.js";
import { AccountingError } from "./types.js";

export interface DealServiceOptions {
  readonly catalog: ReferenceCatalog;
  readonly logger: Logger;
  /** Try date/amount settlement for deals created without payment lines */
  readonly settleWithoutPayments?: boolean | undefined;
  readonly now?: (() => Date) | undefined;
}

export interface CreateDealResult {
  readonly deal: Deal;
  readonly settlements: readonly SettlementOutcome[];
}

export class DealService {
  private readonly _store: KvStore;
  private readonly _catalog: ReferenceCatalog;
  private readonly _logger: Logger;
  private readonly _settleWithoutPayments: boolean;
  private readonly _now: () => Date;
  private readonly _settlement: SettlementEngine;

  constructor(store: KvStore, options: DealServiceOptions) {
    this._store = store;
    this._catalog = options.catalog;
    this._logger = options.logger;
    this._settleWithoutPayments = options.settleWithoutPayments ?? false;
    this._now = options.now ?? (() => new Date());
    this._settlement = new SettlementEngine(this._now);
  }

  list(filter: CompanyFilter = {}): Deal[] {
    return this._store.scan(
      DEALS,
      (deal) => filter.company_id === undefined || deal.company_id === filter.company_id,
    );
  }

  get(id: number): Deal {
    const deal = this._store.find(DEALS, id);
    if (deal === undefined) {
      throw new AccountingError("NOT_FOUND", "Deal not found");
    }
    return deal;
  }

  create(input: CreateDealInput): CreateDealResult {
    const now = this._now().toISOString();

    const result = this._store.update((tx) => {
      const details = this._buildDetails(tx, input.details);
      const deal: Deal = {
        id: tx.nextID(DEALS),
        company_id: input.company_id,
        issue_date: input.issue_date,
        due_date: input.due_date,
        type: input.type,
        details,
        payments: (input.payments ?? []).map((payment) => ({
          id: tx.nextID(DEAL_PAYMENTS),
          date: payment.date,
          amount: payment.amount,
          from_walletable_type: payment.from_walletable_type,
          from_walletable_id: payment.from_walletable_id,
        })),
        amount: totalWithVat(details),
        ref_number: input.ref_number,
        partner_id: input.partner_id,
        created_at: now,
        updated_at: now,
      };
      tx.put(DEALS, deal.id, deal);

      const settlements = this._settlement.settleDeal(tx, deal, this._settleWithoutPayments);
      return { deal, settlements };
    });

    for (const outcome of result.settlements) {
      if (outcome.status === "ambiguous") {
        this._logger.warn(outcome, "Settlement skipped: several wallet transactions match");
      } else {
        this._logger.info(outcome, `Settlement ${outcome.status}`);
      }
    }
    return result;
  }

  /**
   * Partial update. New `details` replace the old lines and the amount
   * is recomputed; payments and settlements are left as they are.
   */
  update(id: number, input: UpdateDealInput): Deal {
    return this._store.update((tx) => {
      const current = tx.find(DEALS, id);
      if (current === undefined) {
        throw new AccountingError("NOT_FOUND", "Deal not found");
      }

      const details =
        input.details !== undefined && input.details.length > 0
          ? this._buildDetails(tx, input.details)
          : current.details;

      const updated: Deal = {
        ...current,
        issue_date: input.issue_date ?? current.issue_date,
        due_date: input.due_date ?? current.due_date,
        type: input.type ?? current.type,
        ref_number: input.ref_number ?? current.ref_number,
        partner_id: input.partner_id ?? current.partner_id,
        details,
        amount: totalWithVat(details),
        updated_at: this._now().toISOString(),
      };
      tx.put(DEALS, id, updated);
      return updated;
    });
  }

  delete(id: number): void {
    this._store.update((tx) => {
      if (tx.find(DEALS, id) === undefined) {
        throw new AccountingError("NOT_FOUND", "Deal not found");
      }
      tx.delete(DEALS, id);
    });
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _buildDetails(tx: WriteTransaction, inputs: readonly DealDetailInput[]): DealDetail[] {
    if (inputs.length === 0) {
      throw new AccountingError("INVALID_PARAMETER", "Missing details");
    }
    return inputs.map((detail) => ({
      id: tx.nextID(DEAL_DETAILS),
      account_item_id: detail.account_item_id,
      account_item_name: this._catalog.accountItemName(detail.account_item_id),
      tax_code: detail.tax_code,
      amount: detail.amount,
      vat: computeVat(detail.amount, detail.tax_code),
      description: detail.description,
      item_id: detail.item_id,
      section_id: detail.section_id,
    }));
  }
}
