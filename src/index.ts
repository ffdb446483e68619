/**
 * Root entrypoint for catalog-cli: re-exports the REST client, the CLI pipeline and the error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

/**
 * REST client for the catalog API and the resource handles it hands out.
 */
export { Resource, ResourceClient } from './core/client.js';
export type { ResourceClientProps, ResourcePath } from './core/client.js';

/**
 * Shared headers and TLS-aware dispatcher behind a {@link ResourceClient}.
 */
export { createSession, DEFAULT_HEADERS, Session } from './core/session.js';
export type { SessionOptions } from './core/session.js';

/**
 * Runs the command line once and resolves to the exit status.
 */
export { main } from './cli/main.js';
export type { CliIO } from './cli/io.js';

/**
 * Command-line parsing into a frozen {@link Configuration}.
 */
export { parseOptions } from './cli/options.js';
export type { Configuration } from './cli/config.js';

/**
 * Single-request dispatch by method name.
 */
export { dispatch, NO_CONTENT, toRequestKind } from './cli/dispatch.js';
export type { RequestKind } from './cli/dispatch.js';

/** Request payload loading from `--data`, `--file` or standard input. */
export { loadData } from './cli/data.js';

/** JSON rendering with four-space indent and sorted keys. */
export { formatJson } from './cli/output.js';

/**
 * Error representing a non-2xx HTTP response.
 */
export { HTTPError } from './error/httpError.js';

/**
 * Error for invalid command-line input, carrying the exit status.
 */
export { UsageError } from './error/usageError.js';

/**
 * Error raised for a request method the dispatcher cannot handle.
 */
export { UnsupportedMethodError } from './error/unsupportedMethodError.js';

/**
 * Error thrown when validation of options fails.
 */
export { ValidationError } from './error/validationError.js';

/** Recursively unwraps nested causes to find a specific error class. */
export { unwrapErrorType } from './error/unwrapErrorType.js';

/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './error/isErrorType.js';

/** JSON value types exchanged with the API. */
export type { JsonArray, JsonObject, JsonPrimitive, JsonValue } from './types/json.js';

/** Tuple-style `[error, data]` results returned by every call. */
export type { SafeWrap, SafeWrapAsync } from './utils/wrap.js';
