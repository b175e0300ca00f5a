/**
 * Tests for error mapping and the global error handler.
 */

import { describe, it, expect, afterEach } from "vitest";
import { HTTPException } from "hono/http-exception";
import pino from "pino";
import { z } from "zod";
import { AccountingError } from "@acct-emulator/accounting";
import { AuthorizationFlowError } from "@acct-emulator/oauth";
import { StoreError } from "@acct-emulator/store";
import { mapError } from "../../src/middleware/error-handler.js";
import { ApiError } from "../../src/types/error.js";
import { createTestApp } from "../setup.js";
import type { ErrorBody, TestApp } from "../setup.js";

let testApp: TestApp | undefined;

afterEach(() => {
  testApp?.cleanup();
  testApp = undefined;
});

describe("mapError", () => {
  it("keeps ApiError codes and messages", () => {
    expect(mapError(new ApiError("unauthorized", "Nope"))).toEqual({
      status: 401,
      code: "unauthorized",
      description: "Nope",
    });
  });

  it("maps accounting errors by code", () => {
    expect(mapError(new AccountingError("NOT_FOUND", "Deal not found"))).toEqual({
      status: 404,
      code: "not_found",
      description: "Deal not found",
    });
    expect(mapError(new AccountingError("INVALID_PARAMETER", "Missing details")).status).toBe(400);
  });

  it("maps authorization flow errors", () => {
    expect(mapError(new AuthorizationFlowError("INVALID_CREDENTIALS", "bad")).code).toBe("unauthorized");
    expect(mapError(new AuthorizationFlowError("INVALID_ONE_TIME_CODE", "bad")).status).toBe(401);
    expect(mapError(new AuthorizationFlowError("SESSION_NOT_FOUND", "gone")).code).toBe("invalid_request");
    expect(mapError(new AuthorizationFlowError("INVALID_STEP", "order")).status).toBe(400);
  });

  it("maps store errors, hiding internal failures", () => {
    expect(mapError(new StoreError("NOT_FOUND", "Key 9 not found in deals", "deals"))).toEqual({
      status: 404,
      code: "not_found",
      description: "Resource not found",
    });
    expect(mapError(new StoreError("INVALID_KEY", "Key must be positive")).code).toBe("invalid_parameter");
    expect(mapError(new StoreError("IO_ERROR", "disk gone"))).toEqual({
      status: 500,
      code: "server_error",
      description: "Internal server error",
    });
  });

  it("describes zod errors", () => {
    const result = z.object({ amount: z.number() }).safeParse({});
    if (result.success) {
      throw new Error("expected a parse failure");
    }

    expect(mapError(result.error)).toEqual({
      status: 400,
      code: "invalid_parameter",
      description: "Missing amount",
    });
  });

  it("maps body limit and timeout failures", () => {
    const bodyLimit = new Error("Payload Too Large");
    bodyLimit.name = "BodyLimitError";

    expect(mapError(bodyLimit).status).toBe(413);
    expect(mapError(new HTTPException(413)).description).toBe("Request body too large");
    expect(mapError(new HTTPException(504))).toEqual({
      status: 504,
      code: "server_error",
      description: "Request timed out",
    });
    expect(mapError(new HTTPException(400, { message: "Malformed" }))).toEqual({
      status: 400,
      code: "invalid_request",
      description: "Malformed",
    });
  });

  it("treats anything else as an internal error", () => {
    expect(mapError(new TypeError("boom")).description).toBe("Internal server error");
  });
});

describe("createErrorHandler", () => {
  it("returns a generic 500 and logs the failure with its request id", async () => {
    const lines: unknown[] = [];
    const logger = pino(
      { level: "info" },
      {
        write(msg: string) {
          lines.push(JSON.parse(msg));
        },
      },
    );
    testApp = createTestApp({ app: { logger } });
    testApp.app.get("/boom", () => {
      throw new Error("secret detail");
    });

    const res = await testApp.app.request("/boom", { headers: { "X-Request-Id": "req-500" } });

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: "server_error",
      error_description: "Internal server error",
    } satisfies ErrorBody);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({ level: 50, requestId: "req-500", msg: "Request failed" });
  });
});
