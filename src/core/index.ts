/**
 * Core entrypoint: exports the catalog REST client, its resource handles and the session.
 * @module
 */

/**
 * REST client handing out {@link Resource} handles, plus the helpers it resolves URLs with.
 */
export { Resource, ResourceClient, type ResourceClientProps, type ResourcePath, resolveBaseUrl, toSegments } from './client.js';

/**
 * Shared headers and TLS-aware dispatcher for every request of a client.
 */
export { createSession, DEFAULT_HEADERS, Session, type SessionOptions } from './session.js';
