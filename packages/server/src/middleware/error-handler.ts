/**
 * Global error handler.
 *
 * Maps ApiError and the coded errors of the domain packages to
 * `{error, error_description}` envelopes. Anything unrecognized is a
 * 500 whose message is not echoed to the client.
 */

import type { Context, ErrorHandler } from "hono";
import { HTTPException } from "hono/http-exception";
import type { Logger } from "pino";
import { ZodError } from "zod";
import { AccountingError } from "@acct-emulator/accounting";
import { AuthorizationFlowError } from "@acct-emulator/oauth";
import { StoreError } from "@acct-emulator/store";
import type { AppEnv } from "../types/api-contract.js";
import type { ApiErrorCode, ApiErrorStatus } from "../types/error.js";
import { ApiError, STATUS_BY_CODE, createErrorEnvelope } from "../types/error.js";
import { describeZodError, isBodyLimitError } from "./validate.js";

// =============================================================================
// Error → Envelope Mapping
// =============================================================================

interface MappedError {
  readonly status: ApiErrorStatus;
  readonly code: ApiErrorCode;
  readonly description: string;
}

const INTERNAL: MappedError = {
  status: 500,
  code: "server_error",
  description: "Internal server error",
};

function mapped(code: ApiErrorCode, description: string): MappedError {
  return { status: STATUS_BY_CODE[code], code, description };
}

export function mapError(err: Error): MappedError {
  if (err instanceof ApiError) {
    return mapped(err.code, err.message);
  }

  if (err instanceof AccountingError) {
    return err.code === "NOT_FOUND"
      ? mapped("not_found", err.message)
      : mapped("invalid_parameter", err.message);
  }

  if (err instanceof AuthorizationFlowError) {
    switch (err.code) {
      case "INVALID_CREDENTIALS":
      case "INVALID_ONE_TIME_CODE":
        return mapped("unauthorized", err.message);
      case "SESSION_NOT_FOUND":
      case "INVALID_STEP":
        return mapped("invalid_request", err.message);
    }
  }

  if (err instanceof StoreError) {
    // Configuration and I/O failures stay 500
    if (err.code === "NOT_FOUND") {
      return mapped("not_found", "Resource not found");
    }
    if (err.code === "INVALID_KEY") {
      return mapped("invalid_parameter", err.message);
    }
    return INTERNAL;
  }

  if (err instanceof ZodError) {
    return mapped("invalid_parameter", describeZodError(err));
  }

  if (isBodyLimitError(err)) {
    return { status: 413, code: "invalid_request", description: "Request body too large" };
  }

  if (err instanceof HTTPException) {
    if (err.status === 413) {
      return { status: 413, code: "invalid_request", description: "Request body too large" };
    }
    if (err.status === 504) {
      return { status: 504, code: "server_error", description: "Request timed out" };
    }
    if (err.status < 500) {
      return mapped("invalid_request", err.message.length > 0 ? err.message : "Bad request");
    }
  }

  return INTERNAL;
}

// =============================================================================
// Handler
// =============================================================================

/**
 * Create the onError handler. Unexpected failures are logged with the
 * request id before the generic 500 goes out.
 */
export function createErrorHandler(logger: Logger): ErrorHandler<AppEnv> {
  return (err: Error, c: Context<AppEnv>) => {
    const result = mapError(err);
    if (result.status >= 500) {
      logger.error({ err, requestId: c.get("requestId") }, "Request failed");
    }
    return c.json(createErrorEnvelope(result.code, result.description), result.status);
  };
}
