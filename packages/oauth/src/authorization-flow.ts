/**
 * @acct-emulator/oauth — Simulated interactive authorization.
 *
 * State machine per session:
 *
 *   awaiting_credentials ──submitCredentials──▶ awaiting_second_factor
 *   awaiting_second_factor ──submitOneTimeCode──▶ awaiting_consent
 *   awaiting_consent ──confirmConsent──▶ code_issued
 *
 * A wrong password or code leaves the session where it was; there is no
 * retry counter. Sessions expire after `sessionTtlSeconds`.
 */

import { randomBytes } from "node:crypto";
import type { KvStore, WriteTransaction } from "@acct-emulator/store";
import type {
  AuthorizationFlowOptions,
  AuthorizationSession,
  AuthorizationStep,
  ConsentResult,
  LoginCredentials,
  StartAuthorizationInput,
} from "./types.js";
import {
  AUTHORIZATION_SESSIONS,
  AuthorizationFlowError,
  AuthorizationSessionSchema,
  DEFAULT_CREDENTIALS,
} from "./types.js";

export const DEFAULT_SESSION_TTL_SECONDS = 600;

/** Redirect URI meaning "show the code on a page". */
export const OUT_OF_BAND_REDIRECT_URI = "urn:ietf:wg:oauth:2.0:oob";

const ONE_TIME_CODE_PATTERN = /^\d{6}$/;

export class AuthorizationFlow {
  private readonly _store: KvStore;
  private readonly _credentials: LoginCredentials;
  private readonly _sessionTtlSeconds: number;
  private readonly _now: () => Date;

  constructor(store: KvStore, options: AuthorizationFlowOptions = {}) {
    this._store = store;
    this._credentials = options.credentials ?? DEFAULT_CREDENTIALS;
    this._sessionTtlSeconds = options.sessionTtlSeconds ?? DEFAULT_SESSION_TTL_SECONDS;
    this._now = options.now ?? (() => new Date());
  }

  start(input: StartAuthorizationInput): AuthorizationSession {
    const now = this._now();
    const session: AuthorizationSession = {
      id: randomBytes(16).toString("base64url"),
      client_id: input.clientId,
      redirect_uri: input.redirectUri,
      state: input.state,
      scope: input.scope,
      step: "awaiting_credentials",
      created_at: now.toISOString(),
      expires_at: new Date(now.getTime() + this._sessionTtlSeconds * 1000).toISOString(),
    };
    this._store.update((tx) => this._save(tx, session));
    return session;
  }

  /** The live session, or undefined if it is unknown or expired. */
  getSession(sessionId: string): AuthorizationSession | undefined {
    if (sessionId.length === 0) {
      return undefined;
    }
    return this._store.update((tx) => this._load(tx, sessionId));
  }

  submitCredentials(sessionId: string, email: string, password: string): AuthorizationSession {
    return this._advance(sessionId, "awaiting_credentials", (session) => {
      if (email !== this._credentials.email || password !== this._credentials.password) {
        throw new AuthorizationFlowError("INVALID_CREDENTIALS", "Invalid email or password");
      }
      return { ...session, step: "awaiting_second_factor" };
    });
  }

  submitOneTimeCode(sessionId: string, code: string): AuthorizationSession {
    return this._advance(sessionId, "awaiting_second_factor", (session) => {
      if (!ONE_TIME_CODE_PATTERN.test(code) || code !== this._credentials.oneTimeCode) {
        throw new AuthorizationFlowError("INVALID_ONE_TIME_CODE", "Invalid one-time code");
      }
      return { ...session, step: "awaiting_consent" };
    });
  }

  confirmConsent(sessionId: string): ConsentResult {
    const session = this._advance(sessionId, "awaiting_consent", (current) => ({
      ...current,
      step: "code_issued",
      code: `AUTH_CODE_${randomBytes(16).toString("base64url")}`,
    }));
    const code = session.code;
    if (code === undefined) {
      throw new AuthorizationFlowError("INVALID_STEP", "No authorization code was issued");
    }
    return { session, code };
  }

  /** Delete every expired session. Returns how many were removed. */
  purgeExpired(): number {
    const now = this._now().getTime();
    return this._store.update((tx) => {
      const expired = tx.scanStrings(AUTHORIZATION_SESSIONS, (json) => {
        const parsed = AuthorizationSessionSchema.safeParse(JSON.parse(json));
        return !parsed.success || Date.parse(parsed.data.expires_at) < now;
      });
      for (const [id] of expired) {
        tx.deleteString(AUTHORIZATION_SESSIONS, id);
      }
      return expired.length;
    });
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _advance(
    sessionId: string,
    expected: AuthorizationStep,
    transition: (session: AuthorizationSession) => AuthorizationSession,
  ): AuthorizationSession {
    const session = this.getSession(sessionId);
    if (session === undefined) {
      throw new AuthorizationFlowError("SESSION_NOT_FOUND", "Authorization session not found or expired");
    }
    if (session.step !== expected) {
      throw new AuthorizationFlowError(
        "INVALID_STEP",
        `Session is at step ${session.step}, expected ${expected}`,
      );
    }

    const next = transition(session);
    this._store.update((tx) => this._save(tx, next));
    return next;
  }

  private _load(tx: WriteTransaction, sessionId: string): AuthorizationSession | undefined {
    const json = tx.findString(AUTHORIZATION_SESSIONS, sessionId);
    if (json === undefined) {
      return undefined;
    }
    const session = AuthorizationSessionSchema.parse(JSON.parse(json));
    if (this._now().getTime() > Date.parse(session.expires_at)) {
      tx.deleteString(AUTHORIZATION_SESSIONS, sessionId);
      return undefined;
    }
    return session;
  }

  private _save(tx: WriteTransaction, session: AuthorizationSession): void {
    tx.putString(AUTHORIZATION_SESSIONS, session.id, JSON.stringify(session));
  }
}

/**
 * Where to send the browser once a code is issued, or undefined when
 * the code should be shown on a page instead.
 */
export function buildRedirectUrl(session: AuthorizationSession): string | undefined {
  const redirectUri = session.redirect_uri;
  if (
    redirectUri === undefined ||
    redirectUri.length === 0 ||
    redirectUri === OUT_OF_BAND_REDIRECT_URI ||
    session.code === undefined ||
    !URL.canParse(redirectUri)
  ) {
    return undefined;
  }

  const url = new URL(redirectUri);
  url.searchParams.set("code", session.code);
  if (session.state !== undefined && session.state.length > 0) {
    url.searchParams.set("state", session.state);
  }
  return url.toString();
}
