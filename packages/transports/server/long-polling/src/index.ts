/**
 * pushline-long-polling-server-transport
 *
 * Long-polling server transport for server-push messaging.
 *
 * ## Overview
 *
 * Clients simulate a persistent connection over plain HTTP by repeatedly
 * polling. The server holds each poll open until the connection's message
 * store has messages (or the poll is timed out), answers with one JSON (or
 * JSONP) message batch, and expects the client to poll again.
 *
 * The message store and the liveness registry are supplied by the host; see
 * `TransportConnection` and `TransportHeartBeat`.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { createServer } from "node:http";
 * import { LongPollingTransport, createNodeHostContext } from "pushline-long-polling-server-transport";
 *
 * createServer((req, res) => {
 *   const transport = new LongPollingTransport({
 *     context: createNodeHostContext(req, res),
 *     heartBeat,
 *     config: { pollDelayMs: 2000 }
 *   });
 *   transport.received = async (data) => app.onMessage(transport.connectionId, data);
 *
 *   const task = transport.processRequest(store.connection(transport.connectionId));
 *   ...
 * });
 * ```
 *
 * @module long-polling-server-transport
 */

// ============================================================================
// Transport
// ============================================================================

export { LongPollingTransport, type LongPollingTransportOptions } from "./transport";

// ============================================================================
// Core Interfaces
// ============================================================================

export type {
  // Message batches
  MessageBatch,
  TransportData,

  // Collaborators
  TransportConnection,
  TransportHeartBeat,
  TrackedTransport,

  // Host
  HostContext,
  HostRequest,
  HostResponse,

  // Callbacks & state
  TransportCallbacks,
  RequestKind,
  ReceiveState
} from "./interfaces";

// ============================================================================
// Building Blocks
// ============================================================================

export { classifyRequest, wantsJsonp, MESSAGE_ID_PARAM, CALLBACK_PARAM, CONNECTION_ID_PARAM, DATA_PARAM } from "./classifier";
export { interleave, whenBoth } from "./interleave";
export {
  DefaultJsonSerializer,
  encodeResponse,
  isValidJsonpCallback,
  writeResponse,
  JSON_MIME_TYPE,
  JSONP_MIME_TYPE,
  type JsonSerializer,
  type EncodedResponse
} from "./encoder";
export { addTransportData, LONG_POLL_DELAY_KEY } from "./transport-data";
export { createNodeHostContext, readFormBody, type NodeHostContextOptions } from "./http";

// ============================================================================
// Configuration, Errors, Logging
// ============================================================================

export {
  resolveLongPollingConfig,
  longPollingConfigSchema,
  DEFAULT_MAX_BUFFERED_MESSAGES,
  DEFAULT_POLL_DELAY_MS,
  type LongPollingConfig,
  type LongPollingConfigInput
} from "./config";
export { LongPollingError, InvalidRequestError, EncodingError, ConfigurationError } from "./errors";
export { NoopLogger, ConsoleLogger, toError, type Logger, type LogContext, type ErrorContext, type LogLevel } from "./logger";
