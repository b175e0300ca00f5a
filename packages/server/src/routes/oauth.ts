/**
 * OAuth2 token routes.
 *
 * POST /oauth/token   — Issue an access/refresh token pair
 * POST /oauth/revoke  — Revoke an access or refresh token
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ApiError } from "../types/error.js";
import { formString, parseForm } from "../middleware/validate.js";

export interface TokenResponse {
  readonly access_token: string;
  readonly refresh_token: string;
  readonly token_type: "Bearer";
  readonly expires_in: number;
  readonly company_id: number;
}

export function createOAuthRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // Any grant type is accepted; every call mints a fresh pair.
  routes.post("/token", async (c) => {
    const emulator = c.get("emulator");
    const form = await parseForm(c);
    const grantType = formString(form, "grant_type");
    if (grantType === undefined || grantType.length === 0) {
      throw new ApiError("invalid_request", "Missing grant_type");
    }

    const pair = emulator.tokens.issuePair();
    const body: TokenResponse = {
      access_token: pair.accessToken.token,
      refresh_token: pair.refreshToken.token,
      token_type: "Bearer",
      expires_in: pair.expiresIn,
      company_id: emulator.companyId,
    };
    return c.json(body);
  });

  routes.post("/revoke", async (c) => {
    const form = await parseForm(c);
    const token = formString(form, "token") ?? "";
    c.get("emulator").tokens.revoke(token);
    return c.json({});
  });

  return routes;
}
