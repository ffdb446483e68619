import type { Response } from 'undici';
import { FetchClient } from '../fetch/client.js';
import { mergeHeaderOptions } from '../fetch/utils.js';
import type { JsonObject, JsonValue } from '../types/json.js';
import type { BodyMethod, FetchOptions, HttpMethod } from '../types/request.js';
import { getResponseData } from '../utils/getResponseData.js';
import { stringifyJson } from '../utils/json.js';
import { withQuery } from '../utils/query.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import type { Session } from './session.js';

/** Configuration for constructing a {@link ResourceClient}. */
export interface ResourceClientProps {
  /** Server address, e.g. `https://catalog.example.com/api`. `https://` is assumed without a scheme. */
  server: string;
  /** Session supplying headers and the dispatcher. */
  session: Session;
}

/** Resource path as given: a single string, a list of segments, or an id. */
export type ResourcePath = string | number | ReadonlyArray<string | number>;

/**
 * Normalizes a server address into a base URL ending in `/`.
 */
export function resolveBaseUrl(server: string): string {
  let base = server.trim();
  if (!/^[a-z][a-z\d+.-]*:\/\//i.test(base)) {
    base = `https://${base}`;
  }

  return `${base.replace(/\/+$/, '')}/`;
}

/**
 * Splits a resource path into URI-encoded segments, dropping empty ones.
 */
export function toSegments(path: ResourcePath): string[] {
  const parts = typeof path === 'string' || typeof path === 'number' ? [path] : path;

  return parts
    .flatMap((part) => String(part).split('/'))
    .filter(Boolean)
    .map((segment) => encodeURIComponent(segment));
}

/**
 * A single REST resource on the catalog API, addressed by its path below the API root.
 *
 * Verb calls return error-first tuples with the decoded body: `null` for empty responses,
 * parsed JSON, or text when the body is not JSON.
 */
export class Resource {
  /** Transport the resource is reached through. */
  #fetchClient: FetchClient;
  /** Encoded path segments below the API root. */
  #segments: string[];

  /** Creates a resource handle; use {@link ResourceClient.resource} instead. */
  constructor(fetchClient: FetchClient, segments: string[]) {
    this.#fetchClient = fetchClient;
    this.#segments = segments;
  }

  /** Encoded path below the API root, empty for the root itself. */
  get path(): string {
    return this.#segments.join('/');
  }

  /** Fully resolved URL of the resource. */
  get url(): string {
    return this.#fetchClient.url(this.path);
  }

  /** Addresses a resource nested below this one, e.g. `products.child(42)`. */
  child(path: ResourcePath): Resource {
    return new Resource(this.#fetchClient, [...this.#segments, ...toSegments(path)]);
  }

  /** Reads the resource, sending `query` as URL query parameters. */
  get(query?: JsonObject, opts: Omit<FetchOptions, 'body'> = {}): SafeWrapAsync<Error, JsonValue> {
    return this.#execute('GET', () => this.#fetchClient.get(withQuery(this.path, query), opts));
  }

  /** Creates below the resource, sending `body` as JSON. */
  post(body?: JsonValue, opts: Omit<FetchOptions, 'body'> = {}): SafeWrapAsync<Error, JsonValue> {
    return this.#send('POST', body, opts);
  }

  /** Replaces the resource with `body`. */
  put(body?: JsonValue, opts: Omit<FetchOptions, 'body'> = {}): SafeWrapAsync<Error, JsonValue> {
    return this.#send('PUT', body, opts);
  }

  /** Partially updates the resource with `body`. */
  patch(body?: JsonValue, opts: Omit<FetchOptions, 'body'> = {}): SafeWrapAsync<Error, JsonValue> {
    return this.#send('PATCH', body, opts);
  }

  /** Deletes the resource; `body` is sent along when given. */
  delete(body?: JsonValue, opts: Omit<FetchOptions, 'body'> = {}): SafeWrapAsync<Error, JsonValue> {
    return this.#send('DELETE', body, opts);
  }

  /** Serializes the body as JSON and hands it to the matching transport verb. */
  #send(method: BodyMethod, body: JsonValue | undefined, opts: Omit<FetchOptions, 'body'>) {
    const requestOptions: FetchOptions = { ...opts };

    if (body !== undefined) {
      requestOptions.body = stringifyJson(body);
      requestOptions.headers = mergeHeaderOptions({ 'Content-Type': 'application/json' }, opts.headers);
    }

    const verbs = {
      POST: () => this.#fetchClient.post(this.path, requestOptions),
      PUT: () => this.#fetchClient.put(this.path, requestOptions),
      PATCH: () => this.#fetchClient.patch(this.path, requestOptions),
      DELETE: () => this.#fetchClient.delete(this.path, requestOptions),
    } satisfies Record<BodyMethod, () => SafeWrapAsync<Error, Response>>;

    return this.#execute(method, verbs[method]);
  }

  /**
   * Runs a transport call and decodes its body, wrapping failures with the method context.
   */
  async #execute(method: HttpMethod, call: () => SafeWrapAsync<Error, Response>): SafeWrapAsync<Error, JsonValue> {
    const [errReq, response] = await call();
    if (errReq) {
      return [new Error(`error doing request in ${method.toLowerCase()}`, { cause: errReq }), null];
    }

    const [errResponse, data] = await getResponseData(response);
    if (errResponse) {
      return [new Error(`error getting response in ${method}`, { cause: errResponse }), null];
    }

    return [null, data];
  }
}

/**
 * REST client for the catalog API: hands out {@link Resource} handles that share one session.
 *
 * @example
 * const client = new ResourceClient({ server: 'catalog.example.com/api', session });
 * const [err, product] = await client.resource('products').child(42).get();
 */
export class ResourceClient {
  /** Transport shared by every resource. */
  #fetchClient: FetchClient;
  /** Session supplying headers and the dispatcher. */
  #session: Session;

  /** Creates a client for the given server, routing requests through the session. */
  constructor({ server, session }: ResourceClientProps) {
    this.#session = session;
    this.#fetchClient = new FetchClient(resolveBaseUrl(server), {
      headers: session.headers,
      dispatcher: session.dispatcher,
    });
  }

  /** Session supplying headers and the dispatcher. */
  get session(): Session {
    return this.#session;
  }

  /** URL of the API root. */
  get baseUrl(): string {
    return this.#fetchClient.baseUrl;
  }

  /** Addresses a resource by path; the empty path is the API root. */
  resource(path: ResourcePath = ''): Resource {
    return new Resource(this.#fetchClient, toSegments(path));
  }
}
