/**
 * Simulated interactive authorization pages.
 *
 * GET  /oauth/authorize          — Step 1 form (starts a session)
 * POST /oauth/authorize/login    — Check email/password, step 2 form
 * POST /oauth/authorize/2fa      — Check one-time code, consent page
 * POST /oauth/authorize/confirm  — Issue the code; redirect or show it
 */

import { Hono } from "hono";
import { buildRedirectUrl } from "@acct-emulator/oauth";
import type { AppEnv } from "../types/api-contract.js";
import { formString, parseForm } from "../middleware/validate.js";
import {
  authorizationCodePage,
  consentPage,
  credentialsPage,
  oneTimeCodePage,
} from "../views/login-pages.js";

export function createAuthorizeRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const session = c.get("emulator").authorization.start({
      clientId: c.req.query("client_id") ?? "",
      redirectUri: c.req.query("redirect_uri"),
      state: c.req.query("state"),
      scope: c.req.query("scope"),
    });
    return c.html(credentialsPage(session.id));
  });

  routes.post("/login", async (c) => {
    const form = await parseForm(c);
    const session = c
      .get("emulator")
      .authorization.submitCredentials(
        formString(form, "session_id") ?? "",
        formString(form, "email") ?? "",
        formString(form, "password") ?? "",
      );
    return c.html(oneTimeCodePage(session.id));
  });

  routes.post("/2fa", async (c) => {
    const form = await parseForm(c);
    const session = c
      .get("emulator")
      .authorization.submitOneTimeCode(formString(form, "session_id") ?? "", formString(form, "otp") ?? "");
    return c.html(consentPage(session.id, session.client_id));
  });

  routes.post("/confirm", async (c) => {
    const form = await parseForm(c);
    const { session, code } = c
      .get("emulator")
      .authorization.confirmConsent(formString(form, "session_id") ?? "");

    const redirectUrl = buildRedirectUrl(session);
    if (redirectUrl !== undefined) {
      return c.redirect(redirectUrl, 302);
    }
    return c.html(authorizationCodePage(code));
  });

  return routes;
}
