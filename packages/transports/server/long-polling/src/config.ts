import { z } from "zod";

import { ConfigurationError } from "./errors";

// =============================================================================
// Defaults
// =============================================================================

/**
 * Upper bound on messages returned by a single receive. Long-polling requests
 * are short-lived, so buffering this many per poll is acceptable.
 */
export const DEFAULT_MAX_BUFFERED_MESSAGES = 5000;

/**
 * Default delay (ms) the client is told to wait before re-polling.
 */
export const DEFAULT_POLL_DELAY_MS = 0;

// =============================================================================
// Schema
// =============================================================================

export const longPollingConfigSchema = z.object({
  /**
   * Milliseconds the client should wait before re-establishing a poll after
   * data was sent. Also used as the disconnect threshold of a connection.
   */
  pollDelayMs: z.number().int().nonnegative().default(DEFAULT_POLL_DELAY_MS),

  /** Maximum number of messages returned by one receive */
  maxBufferedMessages: z.number().int().positive().default(DEFAULT_MAX_BUFFERED_MESSAGES)
});

export type LongPollingConfig = z.output<typeof longPollingConfigSchema>;
export type LongPollingConfigInput = z.input<typeof longPollingConfigSchema>;

/**
 * Validates configuration and applies defaults.
 *
 * @throws ConfigurationError listing every failing field
 */
export function resolveLongPollingConfig(input: LongPollingConfigInput = {}): LongPollingConfig {
  const result = longPollingConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) => {
        const path = issue.path.map((segment) => String(segment)).join(".");
        return path ? `${path}: ${issue.message}` : issue.message;
      })
    );
  }
  return result.data;
}
