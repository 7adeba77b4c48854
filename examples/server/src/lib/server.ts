import type { IncomingMessage, RequestListener, ServerResponse } from "node:http";
import { URL } from "node:url";

import {
  InvalidRequestError,
  LongPollingTransport,
  createNodeHostContext,
  toError,
  type LongPollingConfigInput,
  type Logger
} from "pushline-long-polling-server-transport";

import { attachEchoApplication } from "./echo-app";
import type { InMemoryTransportHeartBeat } from "./heartbeat/memory";
import type { InMemoryMessageStore } from "./message-store/memory";

export type RequestListenerOptions = {
  /** Path prefix of the long-polling endpoints (e.g. `/push` → `/push/connect`) */
  readonly endpoint: string;
  readonly store: InMemoryMessageStore;
  readonly heartBeat: InMemoryTransportHeartBeat;
  readonly transport: LongPollingConfigInput;
  readonly shutdownSignal: AbortSignal;
  readonly log: Logger;
};

const sendJson = (res: ServerResponse, statusCode: number, body: unknown): void => {
  res.statusCode = statusCode;
  res.setHeader("Content-Type", "application/json");
  res.end(JSON.stringify(body));
};

/**
 * HTTP entry point: one long-polling transport per request.
 */
export const createRequestListener = (options: RequestListenerOptions): RequestListener => {
  const handleRequest = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

    if (url.pathname === "/health") {
      sendJson(res, 200, { status: "healthy" });
      return;
    }

    if (url.pathname === "/readiness") {
      const ready = !options.shutdownSignal.aborted;
      sendJson(res, ready ? 200 : 503, { status: ready ? "ready" : "not ready", connections: options.heartBeat.size });
      return;
    }

    if (url.pathname !== options.endpoint && !url.pathname.startsWith(`${options.endpoint}/`)) {
      res.statusCode = 404;
      res.end("Not Found");
      return;
    }

    const transport = new LongPollingTransport({
      context: createNodeHostContext(req, res, { shutdownSignal: options.shutdownSignal }),
      heartBeat: options.heartBeat,
      config: options.transport,
      logger: options.log
    });
    attachEchoApplication(transport, options.store, options.log);

    const task = transport.processRequest(options.store.connection(transport.connectionId));
    if (!task) {
      sendJson(res, 400, { error: "Unrecognized long-polling request" });
      return;
    }

    await task;

    if (transport.state === "cancelled") {
      // Host shutting down or client gone: no batch for this poll
      if (!res.writableEnded && !res.destroyed) {
        res.statusCode = 503;
        res.end();
      }
      return;
    }

    // Send and abort requests complete without a body
    if (!res.writableEnded && !res.destroyed) {
      res.statusCode = 200;
      res.end();
    }
  };

  const handleError = (err: unknown, res: ServerResponse): void => {
    const error = toError(err);
    if (!res.writableEnded && !res.destroyed) {
      if (error instanceof InvalidRequestError) {
        sendJson(res, 400, { error: error.message });
      } else {
        sendJson(res, 500, { error: "Internal Server Error" });
      }
    }
    options.log.error("Unhandled request error", error, { component: "server" });
  };

  return (req, res) => {
    handleRequest(req, res).catch((err: unknown) => {
      handleError(err, res);
    });
  };
};
