import type { Response } from 'undici';
import type { JsonValue } from '../types/json.js';
import { parseJson } from './json.js';
import { tryParse } from './tryParse.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Safely extracts and decodes the response body into a tuple-style result.
 *
 * Behavior:
 * - 204 (No Content), 205 (Reset Content) and empty bodies decode to `null`.
 * - A JSON `Content-Type` (`application/json`, `+json`) must parse; a parse failure is an error.
 * - Any other body is parsed as JSON when it is valid JSON, and kept as text otherwise.
 */
export async function getResponseData(response: Response): SafeWrapAsync<Error, JsonValue> {
  // Per HTTP spec, 204 + 205 shouldn't have a body
  if (response.status === 204 || response.status === 205) {
    return [null, null];
  }

  const [errText, text] = await safeWrapAsync(() => response.text());
  if (errText) {
    return [new Error('error reading response body in getResponseData', { cause: errText }), null];
  }

  if (!text) {
    return [null, null];
  }

  const contentType = response.headers.get('Content-Type')?.toLowerCase();
  if (!contentType?.includes('application/json') && !contentType?.includes('+json')) {
    return [null, tryParse(text)];
  }

  const [errJson, json] = safeWrap(() => parseJson(text));
  if (errJson) {
    return [new Error('error parsing json response body in getResponseData', { cause: errJson }), null];
  }

  return [null, json];
}
