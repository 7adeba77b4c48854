/**
 * @fileoverview Type Definitions for the Long-Polling Server Transport
 *
 * This module defines the seams between the transport and its collaborators:
 * - Message batches produced by the connection's message store
 * - The message store (TransportConnection) and liveness registry (TransportHeartBeat)
 * - The host request/response pair (HostContext)
 * - Optional lifecycle callbacks supplied by the application layer
 *
 * @module interfaces
 */

// ============================================================================
// Message Batches
// ============================================================================

/**
 * Open mapping of transport-specific hints attached to an outgoing batch.
 */
export type TransportData = Record<string, unknown>;

/**
 * The unit of data returned by one receive operation.
 *
 * Produced by the message store; the transport only touches the flags and
 * `transportData` before serializing it.
 *
 * @template TMessage - Message type held by the store
 */
export interface MessageBatch<TMessage = unknown> {
  /** Messages after the requested id, ordered by message id */
  readonly messages: readonly TMessage[];

  /** Id of the last message in this batch (or the unchanged cursor if empty) */
  readonly lastId: string;

  /** The store observed a clean, client-initiated disconnect */
  aborted: boolean;

  /** The wait ended because the poll was held too long, not because of data */
  timedOut: boolean;

  /** Transport hints for the client (e.g. `LongPollDelay`) */
  transportData?: TransportData;
}

// ============================================================================
// Collaborators
// ============================================================================

/**
 * The connection's message store, seen from one transport.
 */
export interface TransportConnection<TMessage = unknown> {
  /**
   * Wait for messages after `sinceId`.
   *
   * Must register its interest synchronously, before returning, so that a
   * message published right after the call is not missed.
   *
   * @param sinceId - Last id seen by the client, or null on first connect
   * @param signal - Ends the wait; the store then resolves with what it has
   * @param maxMessages - Upper bound on messages in the returned batch
   */
  receive(sinceId: string | null, signal: AbortSignal, maxMessages: number): Promise<MessageBatch<TMessage>>;

  /** Signal a clean disconnect to whoever is waiting on `connectionId` */
  abort(connectionId: string): Promise<void>;
}

/**
 * What the liveness registry sees of a transport.
 */
export interface TrackedTransport {
  readonly connectionId: string;

  /** The request holding the poll is still open */
  readonly isAlive: boolean;

  readonly isTimedOut: boolean;

  /** How long a connection may go unmarked between polls */
  readonly disconnectThresholdMs: number;

  /** End the current wait and report it to the client as timed out */
  timeout(): void;

  /** Raise the disconnect notification and end the current wait */
  disconnect(): Promise<void>;
}

/**
 * Liveness registry shared by all connections.
 */
export interface TransportHeartBeat {
  /**
   * Start tracking a transport.
   * @returns true when the connection id was not tracked before
   */
  addConnection(transport: TrackedTransport): boolean;

  /** Refresh the connection's last-active time */
  markConnection(transport: TrackedTransport): void;

  /** Stop tracking the connection */
  removeConnection(transport: TrackedTransport): void;
}

// ============================================================================
// Host Request / Response
// ============================================================================

export interface HostRequest {
  readonly url: URL;

  /** Query string parameters */
  readonly query: URLSearchParams;

  /** Read the form-encoded request body */
  form(): Promise<URLSearchParams>;
}

export interface HostResponse {
  readonly ended: boolean;
  setContentType(contentType: string): void;
  write(chunk: string): void;
  end(): Promise<void>;
}

/**
 * One incoming request/response pair.
 */
export interface HostContext {
  readonly request: HostRequest;
  readonly response: HostResponse;

  /** Fires on client disconnect or host shutdown */
  readonly signal: AbortSignal;
}

// ============================================================================
// Lifecycle Callbacks
// ============================================================================

/**
 * Optional application-level hooks. Each may be absent.
 */
export interface TransportCallbacks {
  /** Payload submitted by a send request (null when absent) */
  received?: (data: string | null) => Promise<void>;

  /** Every receive; fire-and-forget, failures are logged */
  transportConnected?: () => Promise<void>;

  /** First connect of a connection */
  connected?: () => Promise<void>;

  /** Reconnect after a dropped poll */
  reconnected?: () => Promise<void>;

  /** Clean or detected disconnect, raised at most once per transport */
  disconnected?: () => Promise<void>;

  /** A request faulted; the error still propagates to the host */
  error?: (error: Error) => Promise<void> | void;
}

// ============================================================================
// Request Classification
// ============================================================================

/**
 * What a request asks the transport to do.
 */
export type RequestKind = "send" | "abort" | "connect" | "reconnect" | "poll" | "unrecognized";

/**
 * Per-request receive lifecycle.
 */
export type ReceiveState = "idle" | "registered" | "waiting" | "completed" | "cancelled" | "faulted";
