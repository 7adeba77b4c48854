import type { MessageBatch } from "./interfaces";

export const LONG_POLL_DELAY_KEY = "LongPollDelay";

/**
 * Attach long-polling hints to an outgoing batch.
 * Only the metadata record is touched, never the messages.
 */
export function addTransportData(batch: MessageBatch, pollDelayMs: number): void {
  if (pollDelayMs > 0) {
    batch.transportData ??= {};
    batch.transportData[LONG_POLL_DELAY_KEY] = pollDelayMs;
  }
}
