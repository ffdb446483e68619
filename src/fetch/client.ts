import { fetch, type Headers, type Response } from 'undici';
import { HTTPError } from '../error/httpError.js';
import type { FetchClientOptions, FetchOptions, HttpMethod } from '../types/request.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { mergeHeaderOptions } from './utils.js';

/**
 * Thin wrapper around undici's `fetch` that:
 * - prefixes all requests with a configured base URL,
 * - merges default and per-request headers at call time,
 * - routes every request through the configured dispatcher,
 * - returns error-first tuples via {@link SafeWrapAsync}.
 */
export class FetchClient {
  /** Base URL prepended to all request paths, always ending in `/`. */
  #baseUrl: string;
  /** Default options (headers, dispatcher). */
  #opts: FetchClientOptions;

  /** Creates a new instance of the fetch-client, with a base-url + options */
  constructor(baseUrl: string, opts?: FetchClientOptions) {
    if (!baseUrl.endsWith('/')) {
      baseUrl += '/';
    }

    this.#baseUrl = baseUrl;
    this.#opts = opts ?? {};
  }

  /** Base URL prepended to all request paths. */
  get baseUrl(): string {
    return this.#baseUrl;
  }

  /** Snapshot of the headers sent with every request. */
  get headers(): Headers {
    return mergeHeaderOptions(this.#opts.headers);
  }

  /**
   * Updates default options; headers are merged with the existing ones.
   */
  public config(opts: FetchClientOptions) {
    this.#opts = {
      ...this.#opts,
      ...opts,
      headers: mergeHeaderOptions(this.#opts.headers, opts.headers),
    };
  }

  /**
   * Executes a GET request against the given endpoint; any body is dropped.
   *
   * @param endpoint - Relative endpoint path including its query string (e.g. `products?brand=acme`).
   */
  public get(endpoint: string, opts: Omit<FetchOptions, 'body'> = {}): SafeWrapAsync<Error, Response> {
    return this.#request('GET', endpoint, { ...opts, body: undefined });
  }

  /**
   * Executes a POST request against the given endpoint.
   *
   * @param endpoint - Relative endpoint path (e.g. `products`).
   */
  public post(endpoint: string, opts: FetchOptions = {}): SafeWrapAsync<Error, Response> {
    return this.#request('POST', endpoint, opts);
  }

  /**
   * Executes a PUT request against the given endpoint.
   *
   * @param endpoint - Relative endpoint path (e.g. `products/123`).
   */
  public put(endpoint: string, opts: FetchOptions = {}): SafeWrapAsync<Error, Response> {
    return this.#request('PUT', endpoint, opts);
  }

  /**
   * Executes a PATCH request against the given endpoint.
   *
   * @param endpoint - Relative endpoint path (e.g. `products/123`).
   */
  public patch(endpoint: string, opts: FetchOptions = {}): SafeWrapAsync<Error, Response> {
    return this.#request('PATCH', endpoint, opts);
  }

  /**
   * Executes a DELETE request against the given endpoint, body included.
   *
   * @param endpoint - Relative endpoint path (e.g. `products/123`).
   */
  public delete(endpoint: string, opts: FetchOptions = {}): SafeWrapAsync<Error, Response> {
    return this.#request('DELETE', endpoint, opts);
  }

  /**
   * Joins the base URL and endpoint into a single URL string, stripping a leading
   * slash from the endpoint to avoid `//`.
   */
  public url(endpoint: string): string {
    return `${this.#baseUrl}${endpoint.replace(/^\/+/, '')}`;
  }

  /**
   * Core request implementation used by all HTTP verb helpers.
   *
   * Errors:
   * - Network / fetch errors are wrapped in `Error`, the original kept as `cause`.
   * - Non-2xx responses are wrapped in `HTTPError`.
   */
  async #request(method: HttpMethod, endpoint: string, opts: FetchOptions): SafeWrapAsync<Error, Response> {
    const headers = mergeHeaderOptions(this.#opts.headers, opts.headers);

    const [err, res] = await safeWrapAsync(() =>
      fetch(this.url(endpoint), {
        method,
        headers,
        body: opts.body,
        dispatcher: this.#opts.dispatcher,
        ...(opts.signal && { signal: opts.signal }),
      }),
    );

    if (err) {
      return [new Error(`error wrapping ${method} request in fetchClient`, { cause: err }), null];
    }

    if (!res.ok) {
      return [new HTTPError(res, `error in ${method} request in fetchClient`), null];
    }

    return [null, res];
  }
}
