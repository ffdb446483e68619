import { Headers } from 'undici';
import type { HeaderOptions } from '../types/request.js';

type HeaderValue = string | readonly string[] | null | undefined;

/**
 * Normalizes the different header container shapes into a consistent iterable.
 */
function toEntries(headers?: HeaderOptions): Iterable<readonly [string, HeaderValue]> {
  if (!headers) {
    return [];
  }

  if (headers instanceof Headers) {
    return headers.entries();
  }

  if (Array.isArray(headers)) {
    return headers.map(([key, ...values]): [string, HeaderValue] => [key ?? '', values.join(', ')]);
  }

  return Object.entries(headers);
}

/**
 * Merge global and local headers into a single `Headers` instance, normalizing keys.
 * A `null` or `undefined` value removes the header.
 */
export function mergeHeaderOptions(globalHeaders?: HeaderOptions, localHeaders?: HeaderOptions): Headers {
  const merged = new Headers();

  for (const [key, value] of [...toEntries(globalHeaders), ...toEntries(localHeaders)]) {
    if (!key) {
      continue;
    }

    if (value == null) {
      merged.delete(key);
      continue;
    }

    merged.set(key, typeof value === 'string' ? value : value.join(', '));
  }

  return merged;
}
