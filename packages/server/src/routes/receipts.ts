/**
 * Receipt routes.
 *
 * GET    /api/1/receipts       — List (company_id)
 * POST   /api/1/receipts       — Multipart upload (company_id, issue_date,
 *                                description?, receipt file)
 * GET    /api/1/receipts/:id   — Get one
 * DELETE /api/1/receipts/:id   — Delete record, then the stored file
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { CompanyQuerySchema, CreateReceiptFormSchema } from "../types/dto.js";
import { ApiError } from "../types/error.js";
import {
  formString,
  parseForm,
  parseIdParam,
  parseWith,
} from "../middleware/validate.js";

const LABEL = "receipt";

/** Name of the multipart file part. */
export const RECEIPT_FILE_FIELD = "receipt";

export function createReceiptRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const query = parseWith(CompanyQuerySchema, c.req.query());
    return c.json({ receipts: c.get("emulator").receipts.list(query) });
  });

  routes.post("/", async (c) => {
    const form = await parseForm(c);
    const fields = parseWith(CreateReceiptFormSchema, {
      company_id: formString(form, "company_id"),
      issue_date: formString(form, "issue_date"),
      description: formString(form, "description"),
    });

    const file = form[RECEIPT_FILE_FIELD];
    if (!(file instanceof File)) {
      throw new ApiError("invalid_parameter", "Missing receipt file");
    }

    const receipt = await c.get("emulator").receipts.create({
      ...fields,
      file: {
        name: file.name,
        type: file.type,
        data: new Uint8Array(await file.arrayBuffer()),
      },
    });
    return c.json({ receipt }, 201);
  });

  routes.get("/:id", (c) => {
    const id = parseIdParam(c, LABEL);
    return c.json({ receipt: c.get("emulator").receipts.get(id) });
  });

  routes.delete("/:id", async (c) => {
    const id = parseIdParam(c, LABEL);
    await c.get("emulator").receipts.delete(id);
    return c.body(null, 204);
  });

  return routes;
}
