/**
 * @acct-emulator/server — HTTP surface of the accounting API emulator.
 *
 * @packageDocumentation
 */

export { createApp, DEFAULT_MAX_UPLOAD_BYTES, DEFAULT_REQUEST_TIMEOUT_MS } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export { loadConfig, loginCredentials, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { EmulatorService, STORE_COLLECTIONS } from "./services/emulator-service.js";
export type { EmulatorServiceConfig, PurgeResult } from "./services/emulator-service.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
