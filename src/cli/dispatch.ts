import type { Headers } from 'undici';
import type { Resource } from '../core/client.js';
import { UnsupportedMethodError } from '../error/unsupportedMethodError.js';
import { UsageError } from '../error/usageError.js';
import { isEmpty, isJsonObject, type JsonObject, type JsonValue } from '../types/json.js';
import type { BodyMethod, HttpMethod } from '../types/request.js';
import type { SafeWrap, SafeWrapAsync } from '../utils/wrap.js';

/** Stand-in result for a DELETE that answered with an empty body. */
export const NO_CONTENT = Object.freeze({ Response: 'No content' });

/** A request the dispatcher can perform, tagged by method. */
export type RequestKind = { method: 'GET'; query: JsonObject } | { method: BodyMethod; body: JsonValue };

const METHODS: readonly HttpMethod[] = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'];

function isHttpMethod(method: string): method is HttpMethod {
  return METHODS.some((known) => known === method);
}

/**
 * Matches a method name case-insensitively and pairs it with the payload.
 *
 * Fails with {@link UnsupportedMethodError} for unknown methods, and with a {@link UsageError}
 * for a GET whose payload is a list. Other non-mapping GET payloads send no query.
 */
export function toRequestKind(method: string, payload: JsonValue): SafeWrap<Error, RequestKind> {
  const normalized = method.trim().toUpperCase();
  if (!isHttpMethod(normalized)) {
    return [new UnsupportedMethodError(method), null];
  }

  if (normalized !== 'GET') {
    return [null, { method: normalized, body: payload }];
  }

  if (Array.isArray(payload)) {
    return [new UsageError('GET request data must be an object of query parameters, not a list'), null];
  }

  return [null, { method: 'GET', query: isJsonObject(payload) ? payload : {} }];
}

/**
 * Prints the method, resolved URL and session headers of a request about to be sent.
 */
export function printDebug(method: HttpMethod, resource: Resource, headers: Headers, write: (line: string) => void) {
  write(`Method: ${method}`);
  write(`URL: ${resource.url}`);
  write('Headers:');
  for (const [key, value] of headers) {
    write(`    ${key}: ${value}`);
  }
}

/** Inputs for {@link dispatch}. */
export interface DispatchOptions {
  /** Resource the request targets. */
  resource: Resource;
  /** Method name as given on the command line. */
  method: string;
  /** Loaded request payload. */
  payload: JsonValue;
  /** Session headers, shown by the debug output. */
  headers: Headers;
  /** Print request diagnostics before sending. */
  debug?: boolean;
  /** Line writer for the debug output. */
  write: (line: string) => void;
}

/**
 * Performs exactly one request and resolves to its decoded response.
 *
 * A DELETE answered with an empty body resolves to {@link NO_CONTENT}.
 */
export async function dispatch({
  resource,
  method,
  payload,
  headers,
  debug = false,
  write,
}: DispatchOptions): SafeWrapAsync<Error, JsonValue> {
  const [errKind, kind] = toRequestKind(method, payload);
  if (errKind) {
    return [errKind, null];
  }

  if (debug) {
    printDebug(kind.method, resource, headers, write);
  }

  switch (kind.method) {
    case 'GET':
      return resource.get(kind.query);
    case 'POST':
      return resource.post(kind.body);
    case 'PUT':
      return resource.put(kind.body);
    case 'PATCH':
      return resource.patch(kind.body);
    case 'DELETE': {
      const [errDelete, result] = await resource.delete(kind.body);
      if (errDelete) {
        return [errDelete, null];
      }

      return [null, isEmpty(result) ? { ...NO_CONTENT } : result];
    }
  }
}
