/**
 * Error envelope for API responses.
 *
 * Every error response has the shape
 * `{ "error": "<code>", "error_description": "<human readable>" }`.
 */

// =============================================================================
// Error Codes
// =============================================================================

export type ApiErrorCode =
  | "invalid_parameter"
  | "invalid_request"
  | "unauthorized"
  | "not_found"
  | "server_error";

export type ApiErrorStatus = 400 | 401 | 404 | 413 | 500 | 504;

export const STATUS_BY_CODE: Readonly<Record<ApiErrorCode, ApiErrorStatus>> = {
  invalid_parameter: 400,
  invalid_request: 400,
  unauthorized: 401,
  not_found: 404,
  server_error: 500,
};

// =============================================================================
// Error Response
// =============================================================================

export interface ErrorEnvelope {
  readonly error: ApiErrorCode;
  readonly error_description: string;
}

export function createErrorEnvelope(code: ApiErrorCode, description: string): ErrorEnvelope {
  return { error: code, error_description: description };
}

/**
 * Thrown by route handlers; the global error handler turns it into an
 * envelope with the status for its code.
 */
export class ApiError extends Error {
  constructor(
    public readonly code: ApiErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "ApiError";
  }

  get status(): ApiErrorStatus {
    return STATUS_BY_CODE[this.code];
  }
}
