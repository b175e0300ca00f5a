/**
 * @acct-emulator/accounting — Accounting domain.
 *
 * Provides:
 * - Record schemas for wallet transactions, deals, journals and receipts
 * - ReferenceCatalog for companies, account items and walletables
 * - Services for each entity, all backed by a KvStore
 * - SettlementEngine linking deal payments to unbooked wallet transactions
 *
 * @packageDocumentation
 */

// Records & inputs
export type {
  WalletableType,
  EntrySide,
  WalletTxnStatus,
  DealType,
  EntryType,
  Company,
  AccountItem,
  Walletable,
  ReferenceData,
  WalletTxn,
  WalletTxnFilter,
  CreateWalletTxnInput,
  UpdateWalletTxnInput,
  DealDetail,
  DealPayment,
  Deal,
  DealDetailInput,
  DealPaymentInput,
  CreateDealInput,
  UpdateDealInput,
  CompanyFilter,
  JournalDetail,
  Journal,
  JournalDetailInput,
  CreateJournalInput,
  Receipt,
  ReceiptUpload,
  CreateReceiptInput,
  AccountingErrorCode,
} from "./types.js";
export {
  WalletableTypeSchema,
  EntrySideSchema,
  WalletTxnStatusSchema,
  DealTypeSchema,
  EntryTypeSchema,
  WalletTxnSchema,
  DealSchema,
  JournalSchema,
  ReceiptSchema,
  ReferenceDataSchema,
  AccountingError,
} from "./types.js";

// Storage
export {
  WALLET_TXNS,
  DEALS,
  JOURNALS,
  RECEIPTS,
  DEAL_DETAILS,
  DEAL_PAYMENTS,
  JOURNAL_DETAILS,
  ACCOUNTING_COLLECTIONS,
} from "./collections.js";

// Reference data
export { ReferenceCatalog, DEFAULT_REFERENCE_DATA_URL } from "./catalog.js";

// Tax
export { computeVat, totalWithVat, TAX_FREE_CODE } from "./tax.js";

// Settlement
export type {
  SettlementMode,
  SettlementStatus,
  SettlementCriteria,
  SettlementOutcome,
} from "./settlement.js";
export { SettlementEngine, findSettlementCandidates, settlementMode } from "./settlement.js";

// Services
export { WalletTxnService, defaultEntrySide } from "./wallet-txns.js";
export { DealService } from "./deals.js";
export type { DealServiceOptions, CreateDealResult } from "./deals.js";
export { JournalService, isBalanced } from "./journals.js";
export { ReceiptService, DEFAULT_RECEIPT_MIME_TYPE } from "./receipts.js";
export type { ReceiptServiceOptions } from "./receipts.js";
