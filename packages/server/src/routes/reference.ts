/**
 * Read-only reference data routes.
 *
 * GET /api/1/companies
 * GET /api/1/account_items?company_id=
 * GET /api/1/walletables?company_id=&type=
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { RequiredCompanyQuerySchema, WalletablesQuerySchema } from "../types/dto.js";
import { parseWith } from "../middleware/validate.js";

export function createReferenceRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/companies", (c) => {
    return c.json({ companies: c.get("emulator").catalog.companies() });
  });

  // Reference data is shared; company_id is required for parity but does not filter.
  routes.get("/account_items", (c) => {
    parseWith(RequiredCompanyQuerySchema, c.req.query());
    return c.json({ account_items: c.get("emulator").catalog.accountItems() });
  });

  routes.get("/walletables", (c) => {
    const query = parseWith(WalletablesQuerySchema, c.req.query());
    return c.json({ walletables: c.get("emulator").catalog.walletables(query.type) });
  });

  return routes;
}
