import { isLosslessNumber } from 'lossless-json';
import type { JsonObject, JsonValue } from '../types/json.js';
import { stringifyJson } from './json.js';

/** Renders a single query value; nested structures are sent as JSON. */
function stringifyParam(value: JsonValue): string {
  if (isLosslessNumber(value)) {
    return value.toString();
  }

  if (typeof value === 'object' && value !== null) {
    return stringifyJson(value);
  }

  return String(value);
}

/**
 * Encodes a mapping as a URL query string (without the leading `?`).
 *
 * - `null` values are dropped.
 * - Arrays repeat the key once per non-null item.
 * - Objects are JSON encoded; everything else is stringified.
 */
export function encodeQuery(params: JsonObject): string {
  const searchParams = new URLSearchParams();

  for (const [key, value] of Object.entries(params)) {
    if (value === null) {
      continue;
    }

    if (Array.isArray(value)) {
      for (const item of value) {
        if (item !== null) {
          searchParams.append(key, stringifyParam(item));
        }
      }
      continue;
    }

    searchParams.append(key, stringifyParam(value));
  }

  return searchParams.toString();
}

/**
 * Appends an encoded query to a path, when there is anything to append.
 */
export function withQuery(path: string, params?: JsonObject): string {
  const query = params ? encodeQuery(params) : '';
  if (!query) {
    return path;
  }

  return `${path}${path.includes('?') ? '&' : '?'}${query}`;
}
