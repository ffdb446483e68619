import { isLosslessNumber, type LosslessNumber } from 'lossless-json';

/**
 * JSON scalar. Numbers a `number` cannot hold exactly stay as {@link LosslessNumber}
 * carrying their source text.
 */
export type JsonPrimitive = string | number | LosslessNumber | boolean | null;

/** JSON array. */
export type JsonArray = JsonValue[];

/** JSON object, a mapping from string keys to JSON values. */
export interface JsonObject {
  [key: string]: JsonValue;
}

/** Any value a JSON document can decode to. */
export type JsonValue = JsonPrimitive | JsonArray | JsonObject;

/** Narrows a JSON value to a mapping (not an array, not null, not a lossless number). */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !isLosslessNumber(value);
}

/** Checks that a decoded value is made of JSON values only. */
export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean' || isLosslessNumber(value)) {
    return true;
  }

  if (typeof value === 'number') {
    return Number.isFinite(value);
  }

  if (Array.isArray(value)) {
    return value.every(isJsonValue);
  }

  if (typeof value === 'object') {
    return Object.values(value).every(isJsonValue);
  }

  return false;
}

/**
 * Whether a value counts as empty: `null`/`undefined`, `''`, `0`, `false`,
 * an empty array or an object without keys.
 */
export function isEmpty(value: unknown): boolean {
  if (value === null || value === undefined || value === '' || value === 0 || value === false) {
    return true;
  }

  if (isLosslessNumber(value)) {
    return false;
  }

  if (Array.isArray(value)) {
    return value.length === 0;
  }

  if (typeof value === 'object') {
    return Object.keys(value).length === 0;
  }

  return Number.isNaN(value);
}
