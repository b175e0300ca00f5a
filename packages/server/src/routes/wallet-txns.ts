/**
 * Wallet transaction routes.
 *
 * GET    /api/1/wallet_txns       — List (company_id, status)
 * POST   /api/1/wallet_txns       — Create (always unbooked)
 * GET    /api/1/wallet_txns/:id   — Get one
 * PUT    /api/1/wallet_txns/:id   — Partial update
 * DELETE /api/1/wallet_txns/:id   — Delete
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  CreateWalletTxnSchema,
  ListWalletTxnsQuerySchema,
  UpdateWalletTxnSchema,
} from "../types/dto.js";
import { parseIdParam, parseJsonBody, parseWith } from "../middleware/validate.js";

const LABEL = "wallet transaction";

export function createWalletTxnRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const query = parseWith(ListWalletTxnsQuerySchema, c.req.query());
    return c.json({ wallet_txns: c.get("emulator").walletTxns.list(query) });
  });

  routes.post("/", async (c) => {
    const body = await parseJsonBody(c, CreateWalletTxnSchema);
    const walletTxn = c.get("emulator").walletTxns.create(body);
    return c.json({ wallet_txn: walletTxn }, 201);
  });

  routes.get("/:id", (c) => {
    const id = parseIdParam(c, LABEL);
    return c.json({ wallet_txn: c.get("emulator").walletTxns.get(id) });
  });

  routes.put("/:id", async (c) => {
    const id = parseIdParam(c, LABEL);
    const body = await parseJsonBody(c, UpdateWalletTxnSchema);
    return c.json({ wallet_txn: c.get("emulator").walletTxns.update(id, body) });
  });

  routes.delete("/:id", (c) => {
    const id = parseIdParam(c, LABEL);
    c.get("emulator").walletTxns.delete(id);
    return c.body(null, 204);
  });

  return routes;
}
