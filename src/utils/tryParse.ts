import type { JsonValue } from '../types/json.js';
import { parseJson } from './json.js';
import { safeWrap } from './wrap.js';

/**
 * Attempts to parse a string as JSON.
 *
 * If parsing succeeds, returns the parsed value; otherwise returns the original input unchanged.
 * This function never throws.
 *
 * @param input - The string to parse.
 * @returns The parsed JSON value, or `input` if it isn't valid JSON.
 */
export function tryParse(input: string): JsonValue {
  const [errParsed, parsed] = safeWrap(() => parseJson(input));
  if (errParsed) {
    return input;
  }

  return parsed;
}
