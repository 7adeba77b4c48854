import type { RequestKind } from "./interfaces";

export const MESSAGE_ID_PARAM = "messageId";
export const CALLBACK_PARAM = "callback";
export const CONNECTION_ID_PARAM = "connectionId";
export const DATA_PARAM = "data";

const endsWith = (path: string, suffix: string): boolean => path.toLowerCase().endsWith(suffix);

/**
 * Decide what a request asks for from its path and query alone.
 *
 * `reconnect` and `poll` both require a `messageId` parameter (an empty value
 * counts); a reconnect path without one is unrecognized.
 */
export function classifyRequest(path: string, query: URLSearchParams): RequestKind {
  if (endsWith(path, "/send")) return "send";
  if (endsWith(path, "/abort")) return "abort";
  if (endsWith(path, "/connect")) return "connect";

  if (query.has(MESSAGE_ID_PARAM)) {
    return endsWith(path, "/reconnect") ? "reconnect" : "poll";
  }

  return "unrecognized";
}

/**
 * The client asked for callback-wrapped (JSONP) output.
 */
export function wantsJsonp(query: URLSearchParams): boolean {
  const callback = query.get(CALLBACK_PARAM);
  return callback !== null && callback !== "";
}
