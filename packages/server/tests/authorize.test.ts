/**
 * Tests for the simulated authorization pages.
 *
 * Verifies:
 * - The three steps render in order and end with a code
 * - Redirect URIs receive code and state; out-of-band shows a page
 * - Wrong credentials or codes are 401; bad sessions and steps are 400
 * - Interpolated values are HTML-escaped
 */

import { describe, it, expect, afterEach } from "vitest";
import { OUT_OF_BAND_REDIRECT_URI } from "@acct-emulator/oauth";
import { createTestApp, formRequest } from "./setup.js";
import type { ErrorBody, TestApp } from "./setup.js";

let testApp: TestApp | undefined;

afterEach(() => {
  testApp?.cleanup();
  testApp = undefined;
});

function sessionIdFrom(page: string): string {
  const match = /name="session_id" value="([^"]+)"/.exec(page);
  if (match?.[1] === undefined) {
    throw new Error("page has no session_id field");
  }
  return match[1];
}

async function startSession(app: TestApp, query: Record<string, string>): Promise<string> {
  const res = await app.app.request(`/oauth/authorize?${new URLSearchParams(query).toString()}`);
  expect(res.status).toBe(200);
  return sessionIdFrom(await res.text());
}

async function passSecondFactor(app: TestApp, sessionId: string): Promise<Response> {
  const login = await app.app.request(
    formRequest("/oauth/authorize/login", {
      session_id: sessionId,
      email: "test@example.com",
      password: "password",
    }),
  );
  expect(login.status).toBe(200);
  return app.app.request(formRequest("/oauth/authorize/2fa", { session_id: sessionId, otp: "123456" }));
}

describe("authorization pages", () => {
  it("walks through login, one-time code and consent to a code page", async () => {
    testApp = createTestApp();
    const first = await testApp.app.request(
      `/oauth/authorize?client_id=sync-job&redirect_uri=${encodeURIComponent(OUT_OF_BAND_REDIRECT_URI)}`,
    );
    expect(first.headers.get("Content-Type")).toMatch(/^text\/html/);
    const firstPage = await first.text();
    expect(firstPage).toContain("STEP 1 / 3");
    const sessionId = sessionIdFrom(firstPage);

    const login = await testApp.app.request(
      formRequest("/oauth/authorize/login", {
        session_id: sessionId,
        email: "test@example.com",
        password: "password",
      }),
    );
    expect(await login.text()).toContain("STEP 2 / 3");

    const consent = await testApp.app.request(
      formRequest("/oauth/authorize/2fa", { session_id: sessionId, otp: "123456" }),
    );
    const consentPage = await consent.text();
    expect(consentPage).toContain("STEP 3 / 3");
    expect(consentPage).toContain("<strong>sync-job</strong>");

    const done = await testApp.app.request(formRequest("/oauth/authorize/confirm", { session_id: sessionId }));
    expect(done.status).toBe(200);
    expect(await done.text()).toMatch(/id="auth-code">AUTH_CODE_[A-Za-z0-9_-]+</);
  });

  it("redirects with code and state when a redirect URI was given", async () => {
    testApp = createTestApp();
    const sessionId = await startSession(testApp, {
      client_id: "sync-job",
      redirect_uri: "http://localhost:9999/callback",
      state: "xyz",
    });
    await passSecondFactor(testApp, sessionId);

    const res = await testApp.app.request(formRequest("/oauth/authorize/confirm", { session_id: sessionId }));

    expect(res.status).toBe(302);
    const location = new URL(res.headers.get("Location") ?? "");
    expect(`${location.origin}${location.pathname}`).toBe("http://localhost:9999/callback");
    expect(location.searchParams.get("code")).toMatch(/^AUTH_CODE_/);
    expect(location.searchParams.get("state")).toBe("xyz");
  });

  it("rejects wrong credentials and keeps the session at step 1", async () => {
    testApp = createTestApp();
    const sessionId = await startSession(testApp, { client_id: "sync-job" });

    const res = await testApp.app.request(
      formRequest("/oauth/authorize/login", {
        session_id: sessionId,
        email: "test@example.com",
        password: "wrong",
      }),
    );

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({
      error: "unauthorized",
      error_description: "Invalid email or password",
    } satisfies ErrorBody);
    expect(testApp.emulator.authorization.getSession(sessionId)?.step).toBe("awaiting_credentials");
  });

  it("rejects a wrong one-time code", async () => {
    testApp = createTestApp();
    const sessionId = await startSession(testApp, { client_id: "sync-job" });
    await testApp.app.request(
      formRequest("/oauth/authorize/login", {
        session_id: sessionId,
        email: "test@example.com",
        password: "password",
      }),
    );

    const res = await testApp.app.request(
      formRequest("/oauth/authorize/2fa", { session_id: sessionId, otp: "000000" }),
    );

    expect(res.status).toBe(401);
    expect(((await res.json()) as ErrorBody).error).toBe("unauthorized");
  });

  it("honours configured credentials", async () => {
    testApp = createTestApp({
      service: { credentials: { email: "dev@example.com", password: "test-secret", oneTimeCode: "654321" } },
    });
    const sessionId = await startSession(testApp, { client_id: "sync-job" });

    const login = await testApp.app.request(
      formRequest("/oauth/authorize/login", {
        session_id: sessionId,
        email: "dev@example.com",
        password: "test-secret",
      }),
    );
    const otp = await testApp.app.request(
      formRequest("/oauth/authorize/2fa", { session_id: sessionId, otp: "654321" }),
    );

    expect(login.status).toBe(200);
    expect(otp.status).toBe(200);
  });

  it("rejects steps taken out of order", async () => {
    testApp = createTestApp();
    const sessionId = await startSession(testApp, { client_id: "sync-job" });

    const res = await testApp.app.request(formRequest("/oauth/authorize/confirm", { session_id: sessionId }));

    expect(res.status).toBe(400);
    expect(((await res.json()) as ErrorBody).error).toBe("invalid_request");
  });

  it("rejects an unknown session", async () => {
    testApp = createTestApp();

    const res = await testApp.app.request(
      formRequest("/oauth/authorize/login", {
        session_id: "missing",
        email: "test@example.com",
        password: "password",
      }),
    );

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "invalid_request",
      error_description: "Authorization session not found or expired",
    } satisfies ErrorBody);
  });

  it("escapes the client id on the consent page", async () => {
    testApp = createTestApp();
    const sessionId = await startSession(testApp, { client_id: "<script>x</script>" });

    const page = await (await passSecondFactor(testApp, sessionId)).text();

    expect(page).toContain("<strong>&lt;script&gt;x&lt;/script&gt;</strong>");
    expect(page).not.toContain("<script>x</script>");
  });
});
