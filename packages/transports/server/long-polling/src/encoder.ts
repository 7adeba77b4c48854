import { EncodingError, InvalidRequestError } from "./errors";
import type { HostResponse } from "./interfaces";

export const JSON_MIME_TYPE = "application/json; charset=UTF-8";
export const JSONP_MIME_TYPE = "text/javascript; charset=UTF-8";

const JSONP_CALLBACK_PATTERN = /^[\w$.]+$/;

/**
 * The callback name can be emitted into a script body as is.
 */
export function isValidJsonpCallback(callback: string): boolean {
  return JSONP_CALLBACK_PATTERN.test(callback);
}

/**
 * Turns a value into its JSON text.
 */
export interface JsonSerializer {
  stringify(value: unknown): string;
}

/**
 * JsonSerializer backed by `JSON.stringify`.
 */
export class DefaultJsonSerializer implements JsonSerializer {
  stringify(value: unknown): string {
    const json = JSON.stringify(value);
    if (json === undefined) {
      throw new TypeError(`Value of type ${typeof value} has no JSON representation`);
    }
    return json;
  }
}

export interface EncodedResponse {
  readonly contentType: string;
  readonly body: string;
}

/**
 * Encode a value as the complete response body.
 *
 * @param jsonpCallback - Wrap the payload as `callback(payload);` when set
 * @throws InvalidRequestError when the callback is not a plain (dotted) identifier
 * @throws EncodingError when the serializer fails
 */
export function encodeResponse(value: unknown, serializer: JsonSerializer, jsonpCallback?: string): EncodedResponse {
  if (jsonpCallback && !isValidJsonpCallback(jsonpCallback)) {
    throw new InvalidRequestError(`Invalid JSONP callback: ${jsonpCallback}`);
  }

  let payload: string;
  try {
    payload = serializer.stringify(value);
  } catch (err) {
    throw new EncodingError("Failed to serialize response", err);
  }

  if (jsonpCallback) {
    return { contentType: JSONP_MIME_TYPE, body: `${jsonpCallback}(${payload});` };
  }
  return { contentType: JSON_MIME_TYPE, body: payload };
}

/**
 * Write an encoded response and finalize the body. Long polling is strictly
 * request/response: nothing can be written after this.
 */
export async function writeResponse(response: HostResponse, encoded: EncodedResponse): Promise<void> {
  response.setContentType(encoded.contentType);
  response.write(encoded.body);
  await response.end();
}
