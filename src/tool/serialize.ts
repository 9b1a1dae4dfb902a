// pattern: Functional Core

/**
 * JSON rendering of tool results for the JSON agent's feedback.
 * Output uses `", "` and `": "` separators and escapes everything outside
 * printable ASCII, so feedback reads the same whatever the result contains.
 */

import { isPlainObject } from '../sandbox/values.ts';

type WithToJSON = { toJSON(): unknown };

function hasToJSON(value: object): value is WithToJSON {
  return 'toJSON' in value && typeof value.toJSON === 'function';
}

export function encodeString(value: string): string {
  let out = '"';
  for (let index = 0; index < value.length; index++) {
    const code = value.charCodeAt(index);
    switch (code) {
      case 0x22:
        out += '\\"';
        break;
      case 0x5c:
        out += '\\\\';
        break;
      case 0x0a:
        out += '\\n';
        break;
      case 0x0d:
        out += '\\r';
        break;
      case 0x09:
        out += '\\t';
        break;
      case 0x08:
        out += '\\b';
        break;
      case 0x0c:
        out += '\\f';
        break;
      default:
        out +=
          code < 0x20 || code > 0x7e
            ? `\\u${code.toString(16).padStart(4, '0')}`
            : value.charAt(index);
    }
  }
  return out + '"';
}

function encodeNumber(value: number): string {
  if (Number.isNaN(value)) return 'NaN';
  if (value === Infinity) return 'Infinity';
  if (value === -Infinity) return '-Infinity';
  return JSON.stringify(value);
}

function encode(value: unknown, seen: Set<object>): string | undefined {
  if (value === null || value === undefined) return 'null';

  switch (typeof value) {
    case 'boolean':
      return value ? 'true' : 'false';
    case 'number':
      return encodeNumber(value);
    case 'string':
      return encodeString(value);
    case 'object':
      break;
    default:
      return undefined;
  }

  if (seen.has(value)) return undefined;

  if (!Array.isArray(value) && !isPlainObject(value)) {
    if (!hasToJSON(value)) return undefined;
    seen.add(value);
    try {
      return encode(value.toJSON(), seen);
    } finally {
      seen.delete(value);
    }
  }

  seen.add(value);
  try {
    const parts: Array<string> = [];

    if (Array.isArray(value)) {
      for (const item of value) {
        const encoded = encode(item, seen);
        if (encoded === undefined) return undefined;
        parts.push(encoded);
      }
      return `[${parts.join(', ')}]`;
    }

    for (const [key, item] of Object.entries(value)) {
      if (item === undefined) continue;
      const encoded = encode(item, seen);
      if (encoded === undefined) return undefined;
      parts.push(`${encodeString(key)}: ${encoded}`);
    }
    return `{${parts.join(', ')}}`;
  } finally {
    seen.delete(value);
  }
}

/**
 * Returns undefined when the value has no JSON form: functions, symbols,
 * bigints, cycles (including a `toJSON` that returns its receiver), and
 * objects that are not plain objects or arrays and have no `toJSON`.
 * Exceptions from getters or `toJSON` propagate.
 */
export function serializeResult(value: unknown): string | undefined {
  return encode(value, new Set());
}
