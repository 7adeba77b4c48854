/**
 * @fileoverview Long-Polling Server Transport
 *
 * Simulates a persistent connection over plain request/response HTTP. Each
 * poll is held open until the connection's message store has something to
 * deliver (or the poll is timed out), answered once, and the client re-polls.
 *
 * ## Request kinds
 *
 * ```
 * .../send       → forward `data` to the application, answer immediately
 * .../abort      → clean client disconnect, delegated to the message store
 * .../connect    → register liveness, first receive (sinceId = null)
 * .../reconnect  → register liveness, receive after `messageId`
 * ...?messageId= → poll: register liveness, receive after `messageId`
 * ```
 *
 * ## Connect ordering
 *
 * On a first connect (and on reconnect) the receive is started *before* the
 * connected/reconnected callback runs, and the request completes only when
 * both have finished. A message the callback publishes is therefore already
 * covered by the pending receive.
 *
 * One transport instance serves one request.
 *
 * @module transport
 */

import { CALLBACK_PARAM, CONNECTION_ID_PARAM, DATA_PARAM, MESSAGE_ID_PARAM, classifyRequest, wantsJsonp } from "./classifier";
import { resolveLongPollingConfig, type LongPollingConfig, type LongPollingConfigInput } from "./config";
import { DefaultJsonSerializer, encodeResponse, isValidJsonpCallback, writeResponse, type JsonSerializer } from "./encoder";
import { InvalidRequestError } from "./errors";
import { interleave } from "./interleave";
import { NoopLogger, toError, type Logger } from "./logger";
import { addTransportData } from "./transport-data";
import type {
  HostContext,
  MessageBatch,
  ReceiveState,
  RequestKind,
  TrackedTransport,
  TransportCallbacks,
  TransportConnection,
  TransportHeartBeat
} from "./interfaces";

// =============================================================================
// Options
// =============================================================================

/**
 * Configuration options for the transport.
 */
export interface LongPollingTransportOptions {
  /** The request/response pair this transport answers */
  readonly context: HostContext;

  /** Liveness registry shared by all connections (required) */
  readonly heartBeat: TransportHeartBeat;

  /** Poll delay and buffering limits; validated on construction */
  readonly config?: LongPollingConfigInput;

  /** Response serializer (default: JSON.stringify) */
  readonly serializer?: JsonSerializer;

  readonly logger?: Logger;
}

// =============================================================================
// Transport Implementation
// =============================================================================

export class LongPollingTransport implements TrackedTransport, TransportCallbacks {
  private readonly context: HostContext;
  private readonly heartBeat: TransportHeartBeat;
  private readonly serializer: JsonSerializer;
  private readonly logger: Logger;
  private readonly config: LongPollingConfig;

  /** Ended by timeout() or disconnect() */
  private readonly connectionEnd = new AbortController();
  private readonly connectionEndSignal: AbortSignal;

  private timedOut = false;
  private disconnectRaised = false;
  private receiveState: ReceiveState = "idle";

  public received?: (data: string | null) => Promise<void>;
  public transportConnected?: () => Promise<void>;
  public connected?: () => Promise<void>;
  public reconnected?: () => Promise<void>;
  public disconnected?: () => Promise<void>;
  public error?: (error: Error) => Promise<void> | void;

  constructor(options: LongPollingTransportOptions) {
    if (!options.heartBeat) {
      throw new Error("LongPollingTransport requires a 'heartBeat' for liveness tracking.");
    }

    this.context = options.context;
    this.heartBeat = options.heartBeat;
    this.serializer = options.serializer ?? new DefaultJsonSerializer();
    this.logger = options.logger ?? new NoopLogger();
    this.config = resolveLongPollingConfig(options.config);

    this.connectionEndSignal = AbortSignal.any([this.context.signal, this.connectionEnd.signal]);
  }

  // ===========================================================================
  // Request Properties
  // ===========================================================================

  get connectionId(): string {
    return this.context.request.query.get(CONNECTION_ID_PARAM) ?? "";
  }

  get kind(): RequestKind {
    return classifyRequest(this.context.request.url.pathname, this.context.request.query);
  }

  get state(): ReceiveState {
    return this.receiveState;
  }

  get isAlive(): boolean {
    return !this.context.signal.aborted && !this.context.response.ended;
  }

  get isTimedOut(): boolean {
    return this.timedOut;
  }

  get disconnectThresholdMs(): number {
    return this.config.pollDelayMs;
  }

  private get messageId(): string | null {
    return this.context.request.query.get(MESSAGE_ID_PARAM);
  }

  private get jsonpCallback(): string | undefined {
    const query = this.context.request.query;
    return wantsJsonp(query) ? (query.get(CALLBACK_PARAM) ?? undefined) : undefined;
  }

  // ===========================================================================
  // Request Processing
  // ===========================================================================

  /**
   * Handle the request this transport was created for.
   *
   * @returns a promise that settles when the request is done, or undefined
   * when the request is not one this transport handles
   */
  processRequest(connection: TransportConnection): Promise<void> | undefined {
    const kind = this.kind;

    if (kind === "unrecognized") {
      this.logger.debug("Ignoring unrecognized long-polling request", {
        component: "long-polling",
        path: this.context.request.url.pathname
      });
      return undefined;
    }

    return this.dispatch(kind, connection).catch(async (err: unknown) => {
      await this.fault(err);
      throw err;
    });
  }

  /**
   * Send a message batch: refresh liveness, attach transport hints, encode.
   */
  async send(batch: MessageBatch): Promise<void> {
    this.logger.debug("Sending response", {
      component: "long-polling",
      connectionId: this.connectionId,
      messageCount: batch.messages.length,
      lastId: batch.lastId,
      timedOut: batch.timedOut,
      aborted: batch.aborted
    });

    addTransportData(batch, this.config.pollDelayMs);
    await this.sendValue(batch);

    this.heartBeat.markConnection(this);
  }

  /**
   * Encode any value as the response body and finalize the response.
   */
  async sendValue(value: unknown): Promise<void> {
    const encoded = encodeResponse(value, this.serializer, this.jsonpCallback);
    await writeResponse(this.context.response, encoded);
  }

  // ===========================================================================
  // Heartbeat Hooks
  // ===========================================================================

  timeout(): void {
    if (this.timedOut) return;
    this.timedOut = true;
    this.connectionEnd.abort(new Error("Long poll timed out"));
  }

  async disconnect(): Promise<void> {
    try {
      await this.raiseDisconnect();
    } finally {
      this.connectionEnd.abort(new Error("Connection disconnected"));
    }
  }

  // ===========================================================================
  // Request Router
  // ===========================================================================

  private async dispatch(kind: Exclude<RequestKind, "unrecognized">, connection: TransportConnection): Promise<void> {
    if (!this.connectionId) {
      throw new InvalidRequestError(`Missing '${CONNECTION_ID_PARAM}' query parameter`);
    }

    const callback = this.jsonpCallback;
    if (callback !== undefined && !isValidJsonpCallback(callback)) {
      throw new InvalidRequestError(`Invalid '${CALLBACK_PARAM}' query parameter`);
    }

    switch (kind) {
      case "send":
        return this.processSendRequest();
      case "abort":
        return connection.abort(this.connectionId);
      case "connect":
        return this.processConnectRequest(connection);
      case "reconnect": {
        const reconnected = this.reconnected;
        if (reconnected) {
          // Completes when the reconnected callback and the receive are both finished
          return interleave(
            (startCallback) => this.processReceiveRequest(connection, startCallback),
            () => reconnected()
          );
        }
        return this.processReceiveRequest(connection);
      }
      case "poll":
        return this.processReceiveRequest(connection);
    }
  }

  // ===========================================================================
  // Send Requests
  // ===========================================================================

  private async processSendRequest(): Promise<void> {
    const { request } = this.context;
    const data = this.jsonpCallback ? request.query.get(DATA_PARAM) : (await request.form()).get(DATA_PARAM);

    this.logger.debug("Receiving data", {
      component: "long-polling",
      connectionId: this.connectionId,
      bytes: data?.length ?? 0
    });

    if (this.received) {
      await this.received(data);
    }
  }

  // ===========================================================================
  // Receive Loop
  // ===========================================================================

  private async processConnectRequest(connection: TransportConnection): Promise<void> {
    const connected = this.connected;
    if (!connected) {
      return this.processReceiveRequest(connection);
    }

    const isNewConnection = this.register();

    // Completes when the connected callback and the receive are both finished
    return interleave(
      (startCallback) => this.receive(connection, startCallback),
      () => (isNewConnection ? connected() : Promise.resolve())
    );
  }

  private async processReceiveRequest(connection: TransportConnection, afterReceiveStarted?: () => void): Promise<void> {
    this.register();
    return this.receive(connection, afterReceiveStarted);
  }

  private register(): boolean {
    const isNewConnection = this.heartBeat.addConnection(this);
    this.receiveState = "registered";
    return isNewConnection;
  }

  private async receive(connection: TransportConnection, afterReceiveStarted?: () => void): Promise<void> {
    this.fireTransportConnected();

    const sinceId = this.kind === "connect" ? null : this.messageId;

    // Suspends until messages arrive, the buffer bound is hit or the wait is ended
    const receiving = connection.receive(sinceId, this.connectionEndSignal, this.config.maxBufferedMessages);
    this.receiveState = "waiting";
    afterReceiveStarted?.();
    const batch = await receiving;

    // A timed-out poll is still answered, unless the client is gone as well
    if (this.context.signal.aborted || (this.connectionEndSignal.aborted && !this.timedOut)) {
      // Client gone or host shutting down: nobody to answer
      this.receiveState = "cancelled";
      this.logger.debug("Receive cancelled", { component: "long-polling", connectionId: this.connectionId });
      return;
    }

    batch.timedOut = this.timedOut;

    if (batch.aborted) {
      // Clean disconnect
      await this.raiseDisconnect();
    }

    await this.send(batch);
    this.receiveState = "completed";
  }

  private fireTransportConnected(): void {
    const transportConnected = this.transportConnected;
    if (!transportConnected) return;

    const connectionId = this.connectionId;
    new Promise<void>((resolve) => resolve(transportConnected())).catch((err: unknown) => {
      this.logger.warn("transportConnected callback failed", {
        component: "long-polling",
        connectionId,
        error: toError(err).message
      });
    });
  }

  private async raiseDisconnect(): Promise<void> {
    if (this.disconnectRaised) return;
    this.disconnectRaised = true;

    this.heartBeat.removeConnection(this);
    if (this.disconnected) {
      await this.disconnected();
    }
  }

  private async fault(err: unknown): Promise<void> {
    this.receiveState = "faulted";
    const error = toError(err);
    this.logger.error("Long-polling request failed", error, {
      component: "long-polling",
      connectionId: this.connectionId
    });
    if (!this.error) return;

    try {
      await this.error(error);
    } catch (callbackErr) {
      this.logger.warn("error callback failed", {
        component: "long-polling",
        connectionId: this.connectionId,
        error: toError(callbackErr).message
      });
    }
  }
}
