/**
 * Request DTOs with Zod validation schemas.
 *
 * Body schemas take JSON values; query and form schemas take the raw
 * strings Hono hands over and convert them.
 */

import { z } from "zod";
import {
  DealTypeSchema,
  EntrySideSchema,
  EntryTypeSchema,
  WalletTxnStatusSchema,
  WalletableTypeSchema,
} from "@acct-emulator/accounting";
import type { WalletTxnStatus } from "@acct-emulator/accounting";

// =============================================================================
// Shared Schemas
// =============================================================================

export const IdSchema = z.number().int().positive().max(Number.MAX_SAFE_INTEGER);

export const DateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);

/** Decimal string → positive safe integer */
export const IdParamSchema = z.string().regex(/^\d+$/).transform(Number).pipe(IdSchema);

// =============================================================================
// Query DTOs
// =============================================================================

export const CompanyQuerySchema = z.object({
  company_id: IdParamSchema.optional(),
});

export type CompanyQuery = z.infer<typeof CompanyQuerySchema>;

export const RequiredCompanyQuerySchema = z.object({
  company_id: z.string({ required_error: "company_id is required" }).pipe(IdParamSchema),
});

export const WalletablesQuerySchema = RequiredCompanyQuerySchema.extend({
  type: WalletableTypeSchema.optional(),
});

export type WalletablesQuery = z.infer<typeof WalletablesQuerySchema>;

/** `1`/`2` are the numeric aliases of `unbooked`/`settled`. */
export const WalletTxnStatusParamSchema = z
  .enum(["1", "2", "unbooked", "settled"])
  .transform((value): WalletTxnStatus => {
    if (value === "1") {
      return "unbooked";
    }
    if (value === "2") {
      return "settled";
    }
    return value;
  });

export const ListWalletTxnsQuerySchema = CompanyQuerySchema.extend({
  status: WalletTxnStatusParamSchema.optional(),
});

export type ListWalletTxnsQuery = z.infer<typeof ListWalletTxnsQuerySchema>;

// =============================================================================
// Wallet Transaction DTOs
// =============================================================================

export const CreateWalletTxnSchema = z.object({
  company_id: IdSchema,
  date: DateSchema,
  amount: z.number().int(),
  entry_side: EntrySideSchema.optional(),
  walletable_type: WalletableTypeSchema,
  walletable_id: IdSchema,
  description: z.string().optional(),
});

export type CreateWalletTxnDto = z.infer<typeof CreateWalletTxnSchema>;

export const UpdateWalletTxnSchema = z.object({
  status: WalletTxnStatusSchema.optional(),
  deal_id: IdSchema.optional(),
  description: z.string().optional(),
});

export type UpdateWalletTxnDto = z.infer<typeof UpdateWalletTxnSchema>;

// =============================================================================
// Deal DTOs
// =============================================================================

export const DealDetailSchema = z.object({
  account_item_id: IdSchema,
  tax_code: z.number().int().nonnegative().default(0),
  amount: z.number().int(),
  description: z.string().optional(),
  item_id: IdSchema.optional(),
  section_id: IdSchema.optional(),
});

export const DealPaymentSchema = z
  .object({
    date: DateSchema,
    amount: z.number().int(),
    from_walletable_type: WalletableTypeSchema.optional(),
    from_walletable_id: IdSchema.optional(),
  })
  .refine(
    (payment) =>
      (payment.from_walletable_type === undefined) === (payment.from_walletable_id === undefined),
    {
      message: "from_walletable_type and from_walletable_id go together",
      path: ["from_walletable_id"],
    },
  );

export const CreateDealSchema = z.object({
  company_id: IdSchema,
  issue_date: DateSchema,
  due_date: DateSchema.optional(),
  type: DealTypeSchema,
  details: z.array(DealDetailSchema).min(1),
  payments: z.array(DealPaymentSchema).optional(),
  ref_number: z.string().optional(),
  partner_id: IdSchema.optional(),
});

export type CreateDealDto = z.infer<typeof CreateDealSchema>;

export const UpdateDealSchema = z.object({
  issue_date: DateSchema.optional(),
  due_date: DateSchema.optional(),
  type: DealTypeSchema.optional(),
  ref_number: z.string().optional(),
  partner_id: IdSchema.optional(),
  details: z.array(DealDetailSchema).optional(),
});

export type UpdateDealDto = z.infer<typeof UpdateDealSchema>;

// =============================================================================
// Journal DTOs
// =============================================================================

export const JournalDetailSchema = z.object({
  entry_type: EntryTypeSchema,
  account_item_id: IdSchema,
  tax_code: z.number().int().nonnegative().optional(),
  partner_id: IdSchema.optional(),
  amount: z.number().int(),
  vat: z.number().int().optional(),
  description: z.string().optional(),
  item_id: IdSchema.optional(),
  section_id: IdSchema.optional(),
});

export const CreateJournalSchema = z.object({
  company_id: IdSchema,
  issue_date: DateSchema,
  details: z.array(JournalDetailSchema).min(1),
});

export type CreateJournalDto = z.infer<typeof CreateJournalSchema>;

// =============================================================================
// Receipt DTOs
// =============================================================================

/** Text fields of the multipart upload; the file part is checked separately. */
export const CreateReceiptFormSchema = z.object({
  company_id: IdParamSchema,
  issue_date: DateSchema,
  description: z.string().optional(),
});

export type CreateReceiptForm = z.infer<typeof CreateReceiptFormSchema>;
