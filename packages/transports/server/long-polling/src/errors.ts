/**
 * Transport Errors
 *
 * Errors that fault a single long-polling request. Cancellation, timeouts and
 * clean disconnects are not errors and never surface through these classes.
 */

// =============================================================================
// Base Error
// =============================================================================

export abstract class LongPollingError extends Error {
  readonly code: string;
  readonly data?: unknown;

  constructor(code: string, message: string, options?: { readonly cause?: unknown; readonly data?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "LongPollingError";
    this.code = code;
    this.data = options?.data;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LongPollingError);
    }
  }
}

// =============================================================================
// Request Errors
// =============================================================================

/**
 * The request cannot be handled as sent by the client.
 */
export class InvalidRequestError extends LongPollingError {
  constructor(message = "Invalid request", data?: unknown) {
    super("INVALID_REQUEST", message, { data });
    this.name = "InvalidRequestError";
  }
}

/**
 * A value could not be serialized to the response body.
 * Nothing has been written to the response when this is thrown.
 */
export class EncodingError extends LongPollingError {
  constructor(message: string, cause?: unknown) {
    super("ENCODING_FAILED", message, { cause });
    this.name = "EncodingError";
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

/**
 * Transport configuration failed validation.
 */
export class ConfigurationError extends LongPollingError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super("INVALID_CONFIGURATION", `Invalid long-polling configuration: ${issues.join("; ")}`, { data: issues });
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}
