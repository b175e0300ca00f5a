/**
 * @acct-emulator/oauth — Bearer and refresh token lifecycle.
 *
 * Tokens expire lazily: an expired token is removed the first time it
 * is looked up. `purgeExpired()` sweeps both collections at once and is
 * meant to run at startup, not on a timer.
 */

import { randomBytes } from "node:crypto";
import type { KvStore, StringCollection, WriteTransaction } from "@acct-emulator/store";
import type { IssuedToken, TokenManagerOptions, TokenPair } from "./types.js";
import { ACCESS_TOKENS, REFRESH_TOKENS } from "./types.js";

export const DEFAULT_ACCESS_TOKEN_TTL_SECONDS = 3600;
export const DEFAULT_REFRESH_TOKEN_TTL_SECONDS = 2592000;

/** 32 random bytes, base64url-encoded. */
export function generateToken(): string {
  return randomBytes(32).toString("base64url");
}

function isExpired(expiresAt: string, now: Date): boolean {
  const expiry = Date.parse(expiresAt);
  return Number.isNaN(expiry) || now.getTime() > expiry;
}

export class TokenManager {
  private readonly _store: KvStore;
  private readonly _accessTtlSeconds: number;
  private readonly _refreshTtlSeconds: number;
  private readonly _now: () => Date;

  constructor(store: KvStore, options: TokenManagerOptions = {}) {
    this._store = store;
    this._accessTtlSeconds = options.accessTokenTtlSeconds ?? DEFAULT_ACCESS_TOKEN_TTL_SECONDS;
    this._refreshTtlSeconds = options.refreshTokenTtlSeconds ?? DEFAULT_REFRESH_TOKEN_TTL_SECONDS;
    this._now = options.now ?? (() => new Date());
  }

  // ─── Issue ──────────────────────────────────────────────────────────

  issueAccessToken(): IssuedToken {
    return this._store.update((tx) => this._issue(tx, ACCESS_TOKENS, this._accessTtlSeconds));
  }

  issueRefreshToken(): IssuedToken {
    return this._store.update((tx) => this._issue(tx, REFRESH_TOKENS, this._refreshTtlSeconds));
  }

  /** Access and refresh token committed together. */
  issuePair(): TokenPair {
    return this._store.update((tx) => ({
      accessToken: this._issue(tx, ACCESS_TOKENS, this._accessTtlSeconds),
      refreshToken: this._issue(tx, REFRESH_TOKENS, this._refreshTtlSeconds),
      expiresIn: this._accessTtlSeconds,
    }));
  }

  // ─── Validate ───────────────────────────────────────────────────────

  /**
   * Whether `token` is a live access token.
   *
   * Unknown tokens cause no write; expired ones are deleted.
   */
  validate(token: string): boolean {
    return this._check(ACCESS_TOKENS, token);
  }

  validateRefreshToken(token: string): boolean {
    return this._check(REFRESH_TOKENS, token);
  }

  // ─── Revoke ─────────────────────────────────────────────────────────

  /**
   * Remove `token` from both collections. Idempotent.
   * Returns whether anything was removed.
   */
  revoke(token: string): boolean {
    if (token.length === 0) {
      return false;
    }
    return this._store.update((tx) => {
      const access = tx.deleteString(ACCESS_TOKENS, token);
      const refresh = tx.deleteString(REFRESH_TOKENS, token);
      return access || refresh;
    });
  }

  /** Delete every expired token. Returns how many were removed. */
  purgeExpired(): number {
    const now = this._now();
    return this._store.update((tx) => {
      let removed = 0;
      for (const collection of [ACCESS_TOKENS, REFRESH_TOKENS]) {
        for (const [token] of tx.scanStrings(collection, (expiresAt) => isExpired(expiresAt, now))) {
          tx.deleteString(collection, token);
          removed++;
        }
      }
      return removed;
    });
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _issue(tx: WriteTransaction, collection: StringCollection, ttlSeconds: number): IssuedToken {
    const token = generateToken();
    const expiresAt = new Date(this._now().getTime() + ttlSeconds * 1000).toISOString();
    tx.putString(collection, token, expiresAt);
    return { token, expiresAt };
  }

  private _check(collection: StringCollection, token: string): boolean {
    if (token.length === 0) {
      return false;
    }
    const now = this._now();
    return this._store.update((tx) => {
      const expiresAt = tx.findString(collection, token);
      if (expiresAt === undefined) {
        return false;
      }
      if (isExpired(expiresAt, now)) {
        tx.deleteString(collection, token);
        return false;
      }
      return true;
    });
  }
}
