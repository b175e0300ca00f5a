/**
 * Request parsing helpers.
 *
 * Each helper throws ApiError so handlers stay linear; the global
 * error handler produces the envelope.
 */

import type { Context } from "hono";
import type { ZodError, ZodIssue, ZodType, ZodTypeDef } from "zod";
import type { AppEnv } from "../types/api-contract.js";
import { IdParamSchema } from "../types/dto.js";
import { ApiError } from "../types/error.js";

/**
 * Human readable description of the first issue: `Missing <field>` for
 * absent required fields and empty required lists, `Invalid <field>`
 * otherwise.
 */
export function describeZodError(error: ZodError): string {
  const issue: ZodIssue | undefined = error.issues[0];
  if (issue === undefined) {
    return "Invalid request";
  }
  const field = issue.path.join(".");

  if (issue.code === "invalid_type" && issue.received === "undefined") {
    return issue.message === "Required" ? `Missing ${field}` : issue.message;
  }
  if (issue.code === "too_small" && issue.type === "array") {
    return `Missing ${field}`;
  }
  return field.length > 0 ? `Invalid ${field}` : issue.message;
}

/** Validate an already-decoded value; failures become 400 invalid_parameter. */
export function parseWith<Output, Input>(
  schema: ZodType<Output, ZodTypeDef, Input>,
  value: unknown,
): Output {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ApiError("invalid_parameter", describeZodError(result.error));
  }
  return result.data;
}

/** Decode and validate a JSON body. Unparsable JSON is 400 invalid_request. */
export async function parseJsonBody<Output, Input>(
  c: Context<AppEnv>,
  schema: ZodType<Output, ZodTypeDef, Input>,
): Promise<Output> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new ApiError("invalid_request", "Failed to parse request body");
  }
  return parseWith(schema, body);
}

/** Parse the `:id` path parameter; `label` names the entity in the error. */
export function parseIdParam(c: Context<AppEnv>, label: string): number {
  const result = IdParamSchema.safeParse(c.req.param("id"));
  if (!result.success) {
    throw new ApiError("invalid_parameter", `Invalid ${label} ID`);
  }
  return result.data;
}

/** Raised by hono/body-limit when a streamed body grows past the limit. */
export function isBodyLimitError(err: unknown): boolean {
  return err instanceof Error && err.name === "BodyLimitError";
}

/** Decode a urlencoded or multipart body. */
export async function parseForm(c: Context<AppEnv>): Promise<Record<string, unknown>> {
  try {
    return await c.req.parseBody();
  } catch (err) {
    if (isBodyLimitError(err)) {
      throw err;
    }
    throw new ApiError("invalid_request", "Failed to parse form");
  }
}

/** A text field of a decoded form, or undefined when absent or a file. */
export function formString(form: Record<string, unknown>, key: string): string | undefined {
  const value = form[key];
  return typeof value === "string" ? value : undefined;
}
