/**
 * @acct-emulator/oauth — Core types.
 *
 * Tokens are opaque random strings mapped to an absolute expiry.
 * Authorization sessions track one pass through the simulated
 * login pages (credentials → one-time code → consent → code).
 */

import { z } from "zod";
import { defineStringCollection } from "@acct-emulator/store";

// =============================================================================
// Collections
// =============================================================================

/** access token → ISO-8601 expiry */
export const ACCESS_TOKENS = defineStringCollection("access_tokens");

/** refresh token → ISO-8601 expiry */
export const REFRESH_TOKENS = defineStringCollection("refresh_tokens");

/** session id → AuthorizationSession JSON */
export const AUTHORIZATION_SESSIONS = defineStringCollection("authorization_sessions");

/** Everything this package needs declared when the store is opened. */
export const OAUTH_COLLECTIONS = [
  ACCESS_TOKENS,
  REFRESH_TOKENS,
  AUTHORIZATION_SESSIONS,
] as const;

// =============================================================================
// Tokens
// =============================================================================

export interface IssuedToken {
  readonly token: string;
  /** ISO-8601 */
  readonly expiresAt: string;
}

export interface TokenPair {
  readonly accessToken: IssuedToken;
  readonly refreshToken: IssuedToken;
  /** Access token lifetime in seconds */
  readonly expiresIn: number;
}

export interface TokenManagerOptions {
  readonly accessTokenTtlSeconds?: number | undefined;
  readonly refreshTokenTtlSeconds?: number | undefined;
  /** Clock override for tests */
  readonly now?: (() => Date) | undefined;
}

// =============================================================================
// Authorization Sessions
// =============================================================================

export const AuthorizationStepSchema = z.enum([
  "awaiting_credentials",
  "awaiting_second_factor",
  "awaiting_consent",
  "code_issued",
]);

export type AuthorizationStep = z.infer<typeof AuthorizationStepSchema>;

export const AuthorizationSessionSchema = z.object({
  id: z.string().min(1),
  client_id: z.string(),
  redirect_uri: z.string().optional(),
  state: z.string().optional(),
  scope: z.string().optional(),
  step: AuthorizationStepSchema,
  code: z.string().optional(),
  created_at: z.string(),
  expires_at: z.string(),
});

export type AuthorizationSession = z.infer<typeof AuthorizationSessionSchema>;

export interface LoginCredentials {
  readonly email: string;
  readonly password: string;
  /** Six digits */
  readonly oneTimeCode: string;
}

export const DEFAULT_CREDENTIALS: LoginCredentials = {
  email: "test@example.com",
  password: "password",
  oneTimeCode: "123456",
};

export interface StartAuthorizationInput {
  readonly clientId: string;
  readonly redirectUri?: string | undefined;
  readonly state?: string | undefined;
  readonly scope?: string | undefined;
}

export interface AuthorizationFlowOptions {
  readonly credentials?: LoginCredentials | undefined;
  readonly sessionTtlSeconds?: number | undefined;
  readonly now?: (() => Date) | undefined;
}

export interface ConsentResult {
  readonly session: AuthorizationSession;
  readonly code: string;
}

// =============================================================================
// Errors
// =============================================================================

export type AuthorizationFlowErrorCode =
  | "SESSION_NOT_FOUND"
  | "INVALID_CREDENTIALS"
  | "INVALID_ONE_TIME_CODE"
  | "INVALID_STEP";

export class AuthorizationFlowError extends Error {
  constructor(
    public readonly code: AuthorizationFlowErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "AuthorizationFlowError";
  }
}
