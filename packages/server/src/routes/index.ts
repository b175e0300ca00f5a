/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createOAuthRoutes } from "./oauth.js";
export type { TokenResponse } from "./oauth.js";
export { createAuthorizeRoutes } from "./authorize.js";
export { createReferenceRoutes } from "./reference.js";
export { createWalletTxnRoutes } from "./wallet-txns.js";
export { createDealRoutes } from "./deals.js";
export { createJournalRoutes } from "./journals.js";
export { createReceiptRoutes, RECEIPT_FILE_FIELD } from "./receipts.js";
