import type { Dispatcher, HeadersInit } from 'undici';

/** Header options accepted by the session and per-request calls; `null` removes a header. */
export type HeaderOptions = HeadersInit | Record<string, string | null | undefined>;

/** Methods the client can issue. */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/** Methods that carry a JSON request body. */
export type BodyMethod = Exclude<HttpMethod, 'GET'>;

/**
 * TLS verification mode: `true` checks certificates against the default roots,
 * `false` turns checks off, a string is the path of a CA bundle to check against.
 */
export type VerifyOption = boolean | string;

/** Options to pass in for each fetch request */
export interface FetchOptions {
  /** Headers merged over the session defaults. */
  headers?: HeaderOptions;
  /** Serialized request body. */
  body?: string;
  /** Abort signal to cancel the request. */
  signal?: AbortSignal;
}

/** Options for the low-level fetch transport. */
export interface FetchClientOptions {
  /** Headers sent with every request. */
  headers?: HeaderOptions;
  /** undici dispatcher carrying connection and TLS settings; the global dispatcher when omitted. */
  dispatcher?: Dispatcher;
}
