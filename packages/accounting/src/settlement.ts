/**
 * @acct-emulator/accounting — Settlement engine.
 *
 * Matches a new deal's payment lines to unbooked wallet transactions
 * and marks the matched transaction settled.
 *
 * Matching modes:
 * - walletable: company, walletable type, walletable id, date, |amount|
 * - date_amount: company, date, |amount| (payment names no walletable)
 *
 * A payment settles a transaction only when exactly one candidate
 * exists. Zero candidates (no_match) or several (ambiguous) leave every
 * transaction untouched; the deal is still created.
 *
 * Runs inside the caller's write transaction, so candidates reflect
 * writes staged earlier in the same transaction (including settlements
 * made for earlier payment lines of the same deal).
 */

import type { ReadTransaction, WriteTransaction } from "@acct-emulator/store";
import { WALLET_TXNS } from "./collections.js";
import type { Deal, DealPayment, WalletTxn, WalletableType } from "./types.js";

export type SettlementMode = "walletable" | "date_amount";

export type SettlementStatus = "settled" | "no_match" | "ambiguous";

export interface SettlementCriteria {
  readonly company_id: number;
  readonly date: string;
  readonly amount: number;
  readonly walletable_type?: WalletableType | undefined;
  readonly walletable_id?: number | undefined;
}

export interface SettlementOutcome {
  readonly dealId: number;
  /** Absent when matching on the deal itself (no payment lines) */
  readonly paymentId?: number | undefined;
  readonly mode: SettlementMode;
  readonly status: SettlementStatus;
  readonly candidates: number;
  readonly walletTxnId?: number | undefined;
}

export function settlementMode(criteria: SettlementCriteria): SettlementMode {
  return criteria.walletable_type !== undefined && criteria.walletable_id !== undefined
    ? "walletable"
    : "date_amount";
}

/**
 * Unbooked wallet transactions matching the criteria, in id order.
 */
export function findSettlementCandidates(
  tx: ReadTransaction,
  criteria: SettlementCriteria,
): WalletTxn[] {
  const amount = Math.abs(criteria.amount);
  const byWalletable = settlementMode(criteria) === "walletable";

  return tx.scan(
    WALLET_TXNS,
    (txn) =>
      txn.status === "unbooked" &&
      txn.company_id === criteria.company_id &&
      txn.date === criteria.date &&
      Math.abs(txn.amount) === amount &&
      (!byWalletable ||
        (txn.walletable_type === criteria.walletable_type &&
          txn.walletable_id === criteria.walletable_id)),
  );
}

export class SettlementEngine {
  private readonly _now: () => Date;

  constructor(now: () => Date = () => new Date()) {
    this._now = now;
  }

  /**
   * Settle at most one wallet transaction for the criteria.
   */
  settle(
    tx: WriteTransaction,
    dealId: number,
    criteria: SettlementCriteria,
    paymentId?: number,
  ): SettlementOutcome {
    const candidates = findSettlementCandidates(tx, criteria);
    const base = {
      dealId,
      paymentId,
      mode: settlementMode(criteria),
      candidates: candidates.length,
    };

    const [match] = candidates;
    if (match === undefined) {
      return { ...base, status: "no_match" };
    }
    if (candidates.length > 1) {
      return { ...base, status: "ambiguous" };
    }

    tx.put(WALLET_TXNS, match.id, {
      ...match,
      status: "settled",
      deal_id: dealId,
      updated_at: this._now().toISOString(),
    });
    return { ...base, status: "settled", walletTxnId: match.id };
  }

  /**
   * Run every payment line of a freshly created deal.
   *
   * With `settleWithoutPayments`, a deal with no payment lines is matched
   * on its own issue date and total amount.
   */
  settleDeal(
    tx: WriteTransaction,
    deal: Deal,
    settleWithoutPayments = false,
  ): SettlementOutcome[] {
    if (deal.payments.length === 0) {
      if (!settleWithoutPayments) {
        return [];
      }
      return [
        this.settle(tx, deal.id, {
          company_id: deal.company_id,
          date: deal.issue_date,
          amount: deal.amount,
        }),
      ];
    }

    return deal.payments.map((payment: DealPayment) =>
      this.settle(
        tx,
        deal.id,
        {
          company_id: deal.company_id,
          date: payment.date,
          amount: payment.amount,
          walletable_type: payment.from_walletable_type,
          walletable_id: payment.from_walletable_id,
        },
        payment.id,
      ),
    );
  }
}
