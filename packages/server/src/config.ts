/**
 * @acct-emulator/server — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import { DEFAULT_CREDENTIALS } from "@acct-emulator/oauth";
import type { LoginCredentials } from "@acct-emulator/oauth";

// =============================================================================
// Schema
// =============================================================================

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1")
  .default("false");

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Storage
  DB_PATH: z.string().min(1).default("./data/emulator.jsonl"),
  UPLOAD_DIR: z.string().min(1).default("./data/receipts"),
  REFERENCE_DATA_PATH: z.string().min(1).optional(),

  // Tokens & login
  ACCESS_TOKEN_TTL_SECONDS: z.coerce.number().int().min(1).default(3600),
  REFRESH_TOKEN_TTL_SECONDS: z.coerce.number().int().min(1).default(2592000),
  AUTH_SESSION_TTL_SECONDS: z.coerce.number().int().min(1).default(600),
  DEFAULT_COMPANY_ID: z.coerce.number().int().positive().default(1),
  LOGIN_EMAIL: z.string().min(1).default(DEFAULT_CREDENTIALS.email),
  LOGIN_PASSWORD: z.string().min(1).default(DEFAULT_CREDENTIALS.password),
  LOGIN_OTP: z
    .string()
    .regex(/^\d{6}$/, "LOGIN_OTP must be six digits")
    .default(DEFAULT_CREDENTIALS.oneTimeCode),

  // Requests
  MAX_UPLOAD_BYTES: z.coerce.number().int().min(1).default(10 * 1024 * 1024),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().min(1).default(60000),

  // Settlement
  SETTLE_WITHOUT_PAYMENTS: booleanFlag,
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

export function loginCredentials(config: AppConfig): LoginCredentials {
  return {
    email: config.LOGIN_EMAIL,
    password: config.LOGIN_PASSWORD,
    oneTimeCode: config.LOGIN_OTP,
  };
}
