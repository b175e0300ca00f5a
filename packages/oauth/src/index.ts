/**
 * @acct-emulator/oauth — Token issuance and simulated authorization.
 *
 * Provides:
 * - TokenManager for opaque access/refresh tokens with lazy expiry
 * - AuthorizationFlow for the three-step login state machine
 *
 * @packageDocumentation
 */

export type {
  IssuedToken,
  TokenPair,
  TokenManagerOptions,
  AuthorizationStep,
  AuthorizationSession,
  LoginCredentials,
  StartAuthorizationInput,
  AuthorizationFlowOptions,
  ConsentResult,
  AuthorizationFlowErrorCode,
} from "./types.js";
export {
  ACCESS_TOKENS,
  REFRESH_TOKENS,
  AUTHORIZATION_SESSIONS,
  OAUTH_COLLECTIONS,
  AuthorizationStepSchema,
  AuthorizationSessionSchema,
  DEFAULT_CREDENTIALS,
  AuthorizationFlowError,
} from "./types.js";

export {
  TokenManager,
  generateToken,
  DEFAULT_ACCESS_TOKEN_TTL_SECONDS,
  DEFAULT_REFRESH_TOKEN_TTL_SECONDS,
} from "./token-manager.js";

export {
  AuthorizationFlow,
  buildRedirectUrl,
  DEFAULT_SESSION_TTL_SECONDS,
  OUT_OF_BAND_REDIRECT_URI,
} from "./authorization-flow.js";
