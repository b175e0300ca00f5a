/**
 * Type barrel — re-exports all public types from @acct-emulator/server.
 */

// DTOs
export {
  IdSchema,
  DateSchema,
  IdParamSchema,
  CompanyQuerySchema,
  RequiredCompanyQuerySchema,
  WalletablesQuerySchema,
  WalletTxnStatusParamSchema,
  ListWalletTxnsQuerySchema,
  CreateWalletTxnSchema,
  UpdateWalletTxnSchema,
  DealDetailSchema,
  DealPaymentSchema,
  CreateDealSchema,
  UpdateDealSchema,
  JournalDetailSchema,
  CreateJournalSchema,
  CreateReceiptFormSchema,
} from "./dto.js";
export type {
  CompanyQuery,
  WalletablesQuery,
  ListWalletTxnsQuery,
  CreateWalletTxnDto,
  UpdateWalletTxnDto,
  CreateDealDto,
  UpdateDealDto,
  CreateJournalDto,
  CreateReceiptForm,
} from "./dto.js";

// Error
export { ApiError, STATUS_BY_CODE, createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ApiErrorStatus, ErrorEnvelope } from "./error.js";

// App env
export type { AppEnv } from "./api-contract.js";
