/**
 * @fileoverview node:http host adapter
 *
 * Builds the HostContext the transport works against from a `node:http`
 * request/response pair.
 *
 * @module http
 */

import type { IncomingMessage, ServerResponse } from "node:http";
import { URL } from "node:url";

import type { HostContext } from "./interfaces";

const FORM_CONTENT_TYPE = "application/x-www-form-urlencoded";

export interface NodeHostContextOptions {
  /** Fires when the host shuts down; folded into the context signal */
  readonly shutdownSignal?: AbortSignal;
}

/**
 * Read a form-encoded request body. Bodies of any other content type yield
 * empty parameters.
 */
export function readFormBody(req: IncomingMessage): Promise<URLSearchParams> {
  return new Promise((resolve, reject) => {
    const contentType = req.headers["content-type"] ?? "";
    const body: Buffer[] = [];

    req.on("data", (chunk: Buffer) => body.push(chunk));
    req.on("end", () => {
      if (!contentType.toLowerCase().startsWith(FORM_CONTENT_TYPE)) {
        resolve(new URLSearchParams());
        return;
      }
      resolve(new URLSearchParams(Buffer.concat(body).toString("utf8")));
    });
    req.on("error", reject);
  });
}

export function createNodeHostContext(req: IncomingMessage, res: ServerResponse, options: NodeHostContextOptions = {}): HostContext {
  const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

  // The client went away before we finished answering
  const disconnect = new AbortController();
  res.on("close", () => {
    if (!res.writableFinished) {
      disconnect.abort(new Error("Client disconnected"));
    }
  });

  const signal = options.shutdownSignal ? AbortSignal.any([disconnect.signal, options.shutdownSignal]) : disconnect.signal;

  let form: Promise<URLSearchParams> | undefined;

  return {
    request: {
      url,
      query: url.searchParams,
      form: () => (form ??= readFormBody(req))
    },
    response: {
      get ended() {
        return res.writableEnded;
      },
      setContentType: (contentType: string) => {
        res.setHeader("Content-Type", contentType);
      },
      write: (chunk: string) => {
        if (res.destroyed) return;
        res.write(chunk);
      },
      end: () =>
        new Promise<void>((resolve) => {
          // Neither event fires again once the socket is gone
          if (res.destroyed || res.writableFinished) {
            resolve();
            return;
          }
          res.once("close", resolve);
          res.end(() => resolve());
        })
    },
    signal
  };
}
