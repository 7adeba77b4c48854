import { InvalidRequestError, type MessageBatch, type TransportConnection } from "pushline-long-polling-server-transport";

export type StoredMessage = {
  readonly id: string;
  readonly payload: unknown;
  readonly timestamp: number;
};

type Waiter = {
  readonly cursor: number;
  readonly maxMessages: number;
  readonly resolve: (batch: MessageBatch<StoredMessage>) => void;
  readonly dispose: () => void;
};

class ConnectionLog {
  // Messages after `offset`; index i holds message id offset + i + 1
  readonly messages: StoredMessage[] = [];
  readonly waiters = new Set<Waiter>();
  offset = 0;
  pendingAbort = false;

  get sequence(): number {
    return this.offset + this.messages.length;
  }

  /** Drop messages the client acknowledged by polling after them */
  trim(cursor: number): void {
    const count = cursor - this.offset;
    if (count <= 0) return;
    this.messages.splice(0, count);
    this.offset = cursor;
  }
}

const parseCursor = (sinceId: string | null): number => {
  if (sinceId === null || sinceId === "") return 0;
  const cursor = Number(sinceId);
  if (!Number.isSafeInteger(cursor) || cursor < 0) {
    throw new InvalidRequestError(`Invalid message id: ${sinceId}`);
  }
  return cursor;
};

/**
 * Per-connection message log with sequential ids.
 *
 * A receive resolves immediately when messages newer than the cursor exist,
 * otherwise it waits for the next publish, an abort or its signal.
 *
 * A connection's log is created by its first receive and dropped by
 * `remove`. Publishing to or aborting a connection that never polled is a
 * no-op. Messages at or below the cursor of a poll are discarded.
 */
export class InMemoryMessageStore {
  private readonly logs = new Map<string, ConnectionLog>();

  /** Number of connections with a log */
  get size(): number {
    return this.logs.size;
  }

  /**
   * @returns the id of the new message, or undefined when the connection has no log
   */
  publish(connectionId: string, payload: unknown): string | undefined {
    const log = this.logs.get(connectionId);
    if (!log) return undefined;
    const stored: StoredMessage = { id: String(log.sequence + 1), payload, timestamp: Date.now() };
    log.messages.push(stored);

    for (const waiter of Array.from(log.waiters)) {
      this.settle(log, waiter, false);
    }

    return stored.id;
  }

  /** The store as seen by the transport of one connection */
  connection(connectionId: string): TransportConnection<StoredMessage> {
    return {
      receive: (sinceId, signal, maxMessages) => this.receive(connectionId, sinceId, signal, maxMessages),
      abort: (id) => this.abort(id)
    };
  }

  receive(connectionId: string, sinceId: string | null, signal: AbortSignal, maxMessages: number): Promise<MessageBatch<StoredMessage>> {
    const log = this.log(connectionId);

    let cursor: number;
    try {
      // Clamped into the retained range
      cursor = Math.max(Math.min(parseCursor(sinceId), log.sequence), log.offset);
    } catch (err) {
      return Promise.reject(err);
    }

    if (sinceId !== null) {
      log.trim(cursor);
    }

    if (log.pendingAbort) {
      log.pendingAbort = false;
      return Promise.resolve(this.batch(log, cursor, maxMessages, true));
    }

    if (cursor < log.sequence || signal.aborted) {
      return Promise.resolve(this.batch(log, cursor, maxMessages, false));
    }

    // Registered before returning so a publish right after this call is seen
    return new Promise((resolve) => {
      const onAbort = (): void => this.settle(log, waiter, false);
      const waiter: Waiter = {
        cursor,
        maxMessages,
        resolve,
        dispose: () => signal.removeEventListener("abort", onAbort)
      };
      log.waiters.add(waiter);
      signal.addEventListener("abort", onAbort, { once: true });
    });
  }

  async abort(connectionId: string): Promise<void> {
    const log = this.logs.get(connectionId);
    if (!log) return;
    if (log.waiters.size === 0) {
      // Nobody is polling right now; the next receive picks it up
      log.pendingAbort = true;
      return;
    }
    for (const waiter of Array.from(log.waiters)) {
      this.settle(log, waiter, true);
    }
  }

  /** Forget a connection's messages */
  remove(connectionId: string): void {
    const log = this.logs.get(connectionId);
    if (!log) return;
    for (const waiter of Array.from(log.waiters)) {
      this.settle(log, waiter, false);
    }
    this.logs.delete(connectionId);
  }

  private log(connectionId: string): ConnectionLog {
    let log = this.logs.get(connectionId);
    if (!log) {
      log = new ConnectionLog();
      this.logs.set(connectionId, log);
    }
    return log;
  }

  private settle(log: ConnectionLog, waiter: Waiter, aborted: boolean): void {
    if (!log.waiters.delete(waiter)) return;
    waiter.dispose();
    waiter.resolve(this.batch(log, waiter.cursor, waiter.maxMessages, aborted));
  }

  private batch(log: ConnectionLog, cursor: number, maxMessages: number, aborted: boolean): MessageBatch<StoredMessage> {
    const start = Math.max(cursor, log.offset);
    const messages = log.messages.slice(start - log.offset, start - log.offset + maxMessages);
    const last = messages[messages.length - 1];
    return {
      messages,
      lastId: last ? last.id : String(start),
      aborted,
      timedOut: false
    };
  }
}
