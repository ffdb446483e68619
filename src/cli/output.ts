import { isLosslessNumber } from 'lossless-json';
import { isJsonObject, type JsonValue } from '../types/json.js';

const INDENT = '    ';

/** Quotes a string as JSON, writing every character outside printable ASCII as `\uXXXX`. */
function quote(text: string): string {
  return JSON.stringify(text).replace(
    /[\u007f-\uffff]/g,
    (char) => `\\u${char.charCodeAt(0).toString(16).padStart(4, '0')}`,
  );
}

function render(value: JsonValue, depth: number): string {
  const pad = INDENT.repeat(depth);
  const innerPad = INDENT.repeat(depth + 1);

  if (Array.isArray(value)) {
    if (!value.length) {
      return '[]';
    }

    const items = value.map((item) => `${innerPad}${render(item, depth + 1)}`);
    return `[\n${items.join(',\n')}\n${pad}]`;
  }

  if (isJsonObject(value)) {
    const keys = Object.keys(value).sort();
    if (!keys.length) {
      return '{}';
    }

    const entries = keys.map((key) => `${innerPad}${quote(key)}: ${render(value[key], depth + 1)}`);
    return `{\n${entries.join(',\n')}\n${pad}}`;
  }

  if (typeof value === 'string') {
    return quote(value);
  }

  if (isLosslessNumber(value)) {
    return value.toString();
  }

  return JSON.stringify(value);
}

/**
 * Serializes a value as JSON indented by four spaces, with object keys sorted at every depth.
 *
 * Keys are ordered while writing: a rebuilt JavaScript object would list integer-like keys first.
 * Non-ASCII characters are escaped; lossless numbers keep their original digits.
 */
export function formatJson(value: JsonValue): string {
  return render(value, 0);
}
