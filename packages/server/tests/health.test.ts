/**
 * Tests for the health endpoint and app-wide behavior.
 *
 * Verifies:
 * - GET /health returns 200 with status "ok", no token needed
 * - X-Request-Id is generated or propagated
 * - Unknown routes get a not_found envelope
 */

import { describe, it, expect, afterEach } from "vitest";
import { createTestApp, jsonRequest } from "./setup.js";
import type { ErrorBody, TestApp } from "./setup.js";

let testApp: TestApp | undefined;

afterEach(() => {
  testApp?.cleanup();
  testApp = undefined;
});

describe("GET /health", () => {
  it("returns 200 with status ok", async () => {
    testApp = createTestApp();
    const res = await testApp.app.request("/health");

    expect(res.status).toBe(200);

    const body = (await res.json()) as { status: string; timestamp: string };
    expect(body.status).toBe("ok");
    expect(Number.isNaN(Date.parse(body.timestamp))).toBe(false);
  });

  it("generates an X-Request-Id", async () => {
    testApp = createTestApp();
    const res = await testApp.app.request("/health");

    expect(res.headers.get("X-Request-Id")).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("preserves incoming X-Request-Id", async () => {
    testApp = createTestApp();
    const res = await testApp.app.request(
      jsonRequest("/health", "GET", undefined, { "X-Request-Id": "test-req-123" }),
    );

    expect(res.headers.get("X-Request-Id")).toBe("test-req-123");
  });

  it("reports down once the store is closed", async () => {
    testApp = createTestApp();
    testApp.emulator.close();

    const res = await testApp.app.request("/health");

    expect(res.status).toBe(503);
    expect(((await res.json()) as { status: string }).status).toBe("down");
  });
});

describe("unknown routes", () => {
  it("return a not_found envelope", async () => {
    testApp = createTestApp();
    const res = await testApp.app.request("/nope");

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "not_found", error_description: "Not found" } satisfies ErrorBody);
  });
});
