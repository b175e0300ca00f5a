/**
 * Store collections owned by the accounting domain.
 */

import { defineCollection, defineSequence } from "@acct-emulator/store";
import { DealSchema, JournalSchema, ReceiptSchema, WalletTxnSchema } from "./types.js";

export const WALLET_TXNS = defineCollection("wallet_txns", WalletTxnSchema);
export const DEALS = defineCollection("deals", DealSchema);
export const JOURNALS = defineCollection("journals", JournalSchema);
export const RECEIPTS = defineCollection("receipts", ReceiptSchema);

// Line ids are unique across all deals (or journals), not per parent.
export const DEAL_DETAILS = defineSequence("deal_details");
export const DEAL_PAYMENTS = defineSequence("deal_payments");
export const JOURNAL_DETAILS = defineSequence("journal_details");

export const ACCOUNTING_COLLECTIONS = [
  WALLET_TXNS,
  DEALS,
  JOURNALS,
  RECEIPTS,
  DEAL_DETAILS,
  DEAL_PAYMENTS,
  JOURNAL_DETAILS,
] as const;
