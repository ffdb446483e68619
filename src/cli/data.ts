import { readFile } from 'node:fs/promises';
import { UsageError } from '../error/usageError.js';
import { isEmpty, isJsonObject, type JsonObject, type JsonValue } from '../types/json.js';
import { parseJson } from '../utils/json.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from '../utils/wrap.js';
import type { Configuration } from './config.js';
import type { CliIO } from './io.js';

/** `--file` value that reads the payload from standard input. */
export const STDIN_PATH = '-';

/**
 * Reads the raw payload text: the file (or standard input for `-`), else the inline data.
 * Resolves to `null` when neither is given.
 */
async function readPayload(
  { data, file }: Pick<Configuration, 'data' | 'file'>,
  { readStdin }: Pick<CliIO, 'readStdin'>,
): SafeWrapAsync<UsageError, string | null> {
  if (file === STDIN_PATH) {
    const [errStdin, text] = await safeWrapAsync(readStdin);
    if (errStdin) {
      return [new UsageError(`error reading request data from standard input: ${errStdin.message}`, { cause: errStdin }), null];
    }

    return [null, text];
  }

  if (file !== undefined) {
    const [errFile, text] = await safeWrapAsync(() => readFile(file, 'utf8'));
    if (errFile) {
      return [new UsageError(`error reading request data from ${file}: ${errFile.message}`, { cause: errFile }), null];
    }

    return [null, text];
  }

  return [null, data || null];
}

/**
 * Rewrites empty query values to `''` so they are still sent; `false` and non-empty values stay.
 */
export function normalizeGetParams(params: JsonObject): JsonObject {
  const normalized: JsonObject = {};
  for (const [key, value] of Object.entries(params)) {
    normalized[key] = value !== false && isEmpty(value) ? '' : value;
  }

  return normalized;
}

/**
 * Loads the request payload from `--file` or `--data`, defaulting to `{}`.
 *
 * Unreadable or malformed input is a {@link UsageError}. For GET requests a mapping payload
 * goes through {@link normalizeGetParams}.
 */
export async function loadData(
  config: Pick<Configuration, 'data' | 'file' | 'method'>,
  io: Pick<CliIO, 'readStdin'>,
): SafeWrapAsync<UsageError, JsonValue> {
  const [errRead, text] = await readPayload(config, io);
  if (errRead) {
    return [errRead, null];
  }

  if (text === null) {
    return [null, {}];
  }

  const [errJson, payload] = safeWrap(() => parseJson(text));
  if (errJson) {
    return [new UsageError(`error parsing request data: ${errJson.message}`, { cause: errJson }), null];
  }

  if (config.method.trim().toUpperCase() === 'GET' && isJsonObject(payload)) {
    return [null, normalizeGetParams(payload)];
  }

  return [null, payload];
}
