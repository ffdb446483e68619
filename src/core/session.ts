import { readFile } from 'node:fs/promises';
import { Agent, type Dispatcher, Headers } from 'undici';
import { mergeHeaderOptions } from '../fetch/utils.js';
import type { HeaderOptions, VerifyOption } from '../types/request.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { NAME, VERSION } from '../version.js';

/** Headers every session starts with. */
export const DEFAULT_HEADERS = {
  Accept: 'application/json',
  'User-Agent': `${NAME}/${VERSION}`,
} as const;

/** Options for {@link createSession}. */
export interface SessionOptions {
  /**
   * TLS verification mode, see {@link VerifyOption}.
   * @default true
   */
  verify?: VerifyOption;
  /** Headers merged over {@link DEFAULT_HEADERS}. */
  headers?: HeaderOptions;
  /**
   * Dispatcher to send requests through. When given it is used as is and `verify`
   * is not applied; the caller stays responsible for closing it.
   */
  dispatcher?: Dispatcher;
}

/**
 * Connection state shared by every request of a client: the mutable header map
 * and the undici dispatcher carrying TLS settings.
 */
export class Session {
  /** Headers sent with every request; mutations apply to subsequent requests. */
  readonly headers: Headers;
  /** Dispatcher for requests, `undefined` meaning undici's global one. */
  #dispatcher?: Dispatcher;
  /** Agent created by the session itself, closed with it. */
  #ownedAgent?: Agent;

  /** Creates a session around the given headers and dispatcher. */
  constructor(headers: Headers, dispatcher?: Dispatcher, ownedAgent?: Agent) {
    this.headers = headers;
    this.#dispatcher = dispatcher ?? ownedAgent;
    this.#ownedAgent = ownedAgent;
  }

  /** Dispatcher for requests, `undefined` meaning undici's global one. */
  get dispatcher(): Dispatcher | undefined {
    return this.#dispatcher;
  }

  /** Closes the agent the session created, if any. */
  async close(): Promise<void> {
    await this.#ownedAgent?.close();
  }
}

/**
 * Builds a {@link Session}: default headers plus the given ones, and an undici `Agent`
 * when certificate checks are turned off or pinned to a CA bundle.
 */
export async function createSession({ verify = true, headers, dispatcher }: SessionOptions = {}): SafeWrapAsync<
  Error,
  Session
> {
  const sessionHeaders = mergeHeaderOptions(DEFAULT_HEADERS, headers);

  if (dispatcher || verify === true) {
    return [null, new Session(sessionHeaders, dispatcher)];
  }

  if (verify === false) {
    return [null, new Session(sessionHeaders, undefined, new Agent({ connect: { rejectUnauthorized: false } }))];
  }

  const [errCa, ca] = await safeWrapAsync(() => readFile(verify, 'utf8'));
  if (errCa) {
    return [new Error(`error reading CA bundle ${verify} in createSession`, { cause: errCa }), null];
  }

  return [null, new Session(sessionHeaders, undefined, new Agent({ connect: { ca } }))];
}
