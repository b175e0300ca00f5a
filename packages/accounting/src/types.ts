/**
 * @acct-emulator/accounting — Record schemas and service inputs.
 *
 * Record shapes follow the upstream API's JSON field names (snake_case),
 * so a stored record is also its response body.
 */

import { z } from "zod";

// =============================================================================
// Enumerations
// =============================================================================

export const WalletableTypeSchema = z.enum(["bank_account", "credit_card", "wallet"]);
export type WalletableType = z.infer<typeof WalletableTypeSchema>;

export const EntrySideSchema = z.enum(["income", "expense"]);
export type EntrySide = z.infer<typeof EntrySideSchema>;

export const WalletTxnStatusSchema = z.enum(["unbooked", "settled"]);
export type WalletTxnStatus = z.infer<typeof WalletTxnStatusSchema>;

export const DealTypeSchema = z.enum(["income", "expense"]);
export type DealType = z.infer<typeof DealTypeSchema>;

export const EntryTypeSchema = z.enum(["debit", "credit"]);
export type EntryType = z.infer<typeof EntryTypeSchema>;

export const AccountCategorySchema = z.enum(["asset", "liability", "equity", "income", "expense"]);

const id = z.number().int().positive();

// =============================================================================
// Reference Data
// =============================================================================

export const CompanySchema = z.object({
  id,
  display_name: z.string(),
  name: z.string(),
  name_kana: z.string(),
});
export type Company = z.infer<typeof CompanySchema>;

export const AccountItemSchema = z.object({
  id,
  name: z.string(),
  account_category: AccountCategorySchema,
  default_tax_code: z.number().int(),
});
export type AccountItem = z.infer<typeof AccountItemSchema>;

export const WalletableSchema = z.object({
  id,
  name: z.string(),
  type: WalletableTypeSchema,
  bank_id: id.optional(),
  last_balance: z.number().int(),
  walletable_balance: z.number().int(),
});
export type Walletable = z.infer<typeof WalletableSchema>;

export const ReferenceDataSchema = z.object({
  companies: z.array(CompanySchema),
  account_items: z.array(AccountItemSchema),
  walletables: z.array(WalletableSchema),
});
export type ReferenceData = z.infer<typeof ReferenceDataSchema>;

// =============================================================================
// Wallet Transactions
// =============================================================================

export const WalletTxnSchema = z.object({
  id,
  company_id: id,
  date: z.string(),
  amount: z.number().int(),
  entry_side: EntrySideSchema,
  walletable_type: WalletableTypeSchema,
  walletable_id: id,
  description: z.string(),
  status: WalletTxnStatusSchema,
  deal_id: id.optional(),
  created_at: z.string(),
  updated_at: z.string(),
});
export type WalletTxn = z.infer<typeof WalletTxnSchema>;

export interface WalletTxnFilter {
  readonly company_id?: number | undefined;
  readonly status?: WalletTxnStatus | undefined;
}

export interface CreateWalletTxnInput {
  readonly company_id: number;
  readonly date: string;
  readonly amount: number;
  /** Defaults from the sign of `amount` */
  readonly entry_side?: EntrySide | undefined;
  readonly walletable_type: WalletableType;
  readonly walletable_id: number;
  readonly description?: string | undefined;
}

export interface UpdateWalletTxnInput {
  readonly status?: WalletTxnStatus | undefined;
  readonly deal_id?: number | undefined;
  readonly description?: string | undefined;
}

// =============================================================================
// Deals
// =============================================================================

export const DealDetailSchema = z.object({
  id,
  account_item_id: id,
  account_item_name: z.string(),
  tax_code: z.number().int(),
  amount: z.number().int(),
  vat: z.number().int(),
  description: z.string().optional(),
  item_id: id.optional(),
  section_id: id.optional(),
});
export type DealDetail = z.infer<typeof DealDetailSchema>;

export const DealPaymentSchema = z.object({
  id,
  date: z.string(),
  amount: z.number().int(),
  from_walletable_type: WalletableTypeSchema.optional(),
  from_walletable_id: id.optional(),
});
export type DealPayment = z.infer<typeof DealPaymentSchema>;

export const DealSchema = z.object({
  id,
  company_id: id,
  issue_date: z.string(),
  due_date: z.string().optional(),
  type: DealTypeSchema,
  details: z.array(DealDetailSchema),
  payments: z.array(DealPaymentSchema),
  amount: z.number().int(),
  ref_number: z.string().optional(),
  partner_id: id.optional(),
  created_at: z.string(),
  updated_at: z.string(),
});
export type Deal = z.infer<typeof DealSchema>;

export interface DealDetailInput {
  readonly account_item_id: number;
  readonly tax_code: number;
  readonly amount: number;
  readonly description?: string | undefined;
  readonly item_id?: number | undefined;
  readonly section_id?: number | undefined;
}

export interface DealPaymentInput {
  readonly date: string;
  readonly amount: number;
  readonly from_walletable_type?: WalletableType | undefined;
  readonly from_walletable_id?: number | undefined;
}

export interface CreateDealInput {
  readonly company_id: number;
  readonly issue_date: string;
  readonly due_date?: string | undefined;
  readonly type: DealType;
  readonly details: readonly DealDetailInput[];
  readonly payments?: readonly DealPaymentInput[] | undefined;
  readonly ref_number?: string | undefined;
  readonly partner_id?: number | undefined;
}

export interface UpdateDealInput {
  readonly issue_date?: string | undefined;
  readonly due_date?: string | undefined;
  readonly type?: DealType | undefined;
  readonly ref_number?: string | undefined;
  readonly partner_id?: number | undefined;
  /** Replaces every detail line; VAT and amount are recomputed */
  readonly details?: readonly DealDetailInput[] | undefined;
}

export interface CompanyFilter {
  readonly company_id?: number | undefined;
}

// =============================================================================
// Journals
// =============================================================================

export const JournalDetailSchema = z.object({
  id,
  entry_type: EntryTypeSchema,
  account_item_id: id,
  account_item_name: z.string(),
  tax_code: z.number().int(),
  partner_id: id.optional(),
  amount: z.number().int(),
  vat: z.number().int(),
  description: z.string().optional(),
  item_id: id.optional(),
  section_id: id.optional(),
});
export type JournalDetail = z.infer<typeof JournalDetailSchema>;

export const JournalSchema = z.object({
  id,
  company_id: id,
  issue_date: z.string(),
  details: z.array(JournalDetailSchema),
  created_at: z.string(),
  updated_at: z.string(),
});
export type Journal = z.infer<typeof JournalSchema>;

export interface JournalDetailInput {
  readonly entry_type: EntryType;
  readonly account_item_id: number;
  readonly tax_code?: number | undefined;
  readonly partner_id?: number | undefined;
  readonly amount: number;
  readonly vat?: number | undefined;
  readonly description?: string | undefined;
  readonly item_id?: number | undefined;
  readonly section_id?: number | undefined;
}

export interface CreateJournalInput {
  readonly company_id: number;
  readonly issue_date: string;
  readonly details: readonly JournalDetailInput[];
}

// =============================================================================
// Receipts
// =============================================================================

export const ReceiptSchema = z.object({
  id,
  company_id: id,
  issue_date: z.string(),
  description: z.string(),
  status: z.enum(["unconfirmed", "confirmed"]),
  file_name: z.string(),
  file_path: z.string(),
  mime_type: z.string(),
  file_size: z.number().int().nonnegative(),
  created_at: z.string(),
  updated_at: z.string(),
});
export type Receipt = z.infer<typeof ReceiptSchema>;

export interface ReceiptUpload {
  readonly name: string;
  readonly type: string;
  readonly data: Uint8Array;
}

export interface CreateReceiptInput {
  readonly company_id: number;
  readonly issue_date: string;
  readonly description?: string | undefined;
  readonly file: ReceiptUpload;
}

// =============================================================================
// Errors
// =============================================================================

export type AccountingErrorCode = "NOT_FOUND" | "INVALID_PARAMETER";

export class AccountingError extends Error {
  constructor(
    public readonly code: AccountingErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "AccountingError";
  }
}
