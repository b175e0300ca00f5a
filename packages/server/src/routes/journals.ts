/**
 * Journal routes.
 *
 * GET  /api/1/journals       — List (company_id)
 * POST /api/1/journals       — Create
 * GET  /api/1/journals/:id   — Get one
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { CompanyQuerySchema, CreateJournalSchema } from "../types/dto.js";
import { parseIdParam, parseJsonBody, parseWith } from "../middleware/validate.js";

export function createJournalRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const query = parseWith(CompanyQuerySchema, c.req.query());
    return c.json({ journals: c.get("emulator").journals.list(query) });
  });

  routes.post("/", async (c) => {
    const body = await parseJsonBody(c, CreateJournalSchema);
    return c.json({ journal: c.get("emulator").journals.create(body) }, 201);
  });

  routes.get("/:id", (c) => {
    const id = parseIdParam(c, "journal");
    return c.json({ journal: c.get("emulator").journals.get(id) });
  });

  return routes;
}
