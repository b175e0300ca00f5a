/**
 * Middleware barrel — re-exports all middleware.
 */

export { createErrorHandler, mapError } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware, pinoRequestLog } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { bearerAuthMiddleware } from "./bearer-auth.js";
export {
  describeZodError,
  parseWith,
  parseJsonBody,
  parseIdParam,
  parseForm,
  formString,
  isBodyLimitError,
} from "./validate.js";
