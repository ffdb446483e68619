import { isSafeNumber, LosslessNumber, parse, stringify } from 'lossless-json';
import { isJsonValue, type JsonValue } from '../types/json.js';

function parseNumber(text: string): number | LosslessNumber {
  return isSafeNumber(text) ? Number(text) : new LosslessNumber(text);
}

/**
 * Parses JSON text. Numbers that would lose digits as a `number`, such as ids past 2^53,
 * come back as `LosslessNumber` holding the original text. Throws on malformed input.
 */
export function parseJson(text: string): JsonValue {
  const value = parse(text, null, parseNumber);
  if (!isJsonValue(value)) {
    throw new Error('parsed value is not a JSON value');
  }

  return value;
}

/**
 * Serializes a JSON value compactly, writing lossless numbers as their original digits.
 */
export function stringifyJson(value: JsonValue): string {
  return stringify(value) ?? 'null';
}
