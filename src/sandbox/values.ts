// pattern: Functional Core

/**
 * Value model of the sandbox language.
 *
 * Sandbox values are plain JavaScript values so they cross the tool boundary
 * without conversion: `null` is None, numbers are int/float, arrays are lists,
 * frozen arrays are tuples, and plain objects with string keys are dicts.
 * Only callables and ranges need wrapper classes.
 */

export type CallableKind = 'builtin' | 'tool' | 'method';

export type NativeCall = (
  args: ReadonlyArray<unknown>,
  kwargs: Readonly<Record<string, unknown>>,
) => unknown;

/** Charges `count` steps against the execution's iteration budget; throws once it is spent. */
export type IterationTick = (count: number) => void;

export class SandboxCallable {
  constructor(
    readonly name: string,
    readonly kind: CallableKind,
    readonly call: NativeCall,
  ) {}
}

export class RangeValue {
  constructor(
    readonly start: number,
    readonly stop: number,
    readonly step: number,
  ) {}

  get length(): number {
    const span = this.step > 0 ? this.stop - this.start : this.start - this.stop;
    return Math.max(0, Math.ceil(span / Math.abs(this.step)));
  }

  at(index: number): number {
    return this.start + index * this.step;
  }

  *[Symbol.iterator](): Iterator<number> {
    for (let index = 0; index < this.length; index++) {
      yield this.at(index);
    }
  }
}

export type Dict = Record<string, unknown>;

export function isPlainObject(value: unknown): value is Dict {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function isTuple(value: unknown): value is ReadonlyArray<unknown> {
  return Array.isArray(value) && Object.isFrozen(value);
}

export function isList(value: unknown): value is Array<unknown> {
  return Array.isArray(value) && !Object.isFrozen(value);
}

export function makeTuple(items: ReadonlyArray<unknown>): ReadonlyArray<unknown> {
  return Object.freeze([...items]);
}

export function makeDict(entries: Iterable<readonly [string, unknown]> = []): Dict {
  const dict: Dict = {};
  for (const [key, value] of entries) {
    setEntry(dict, key, value);
  }
  return dict;
}

/** Own-property read; inherited members such as `constructor` are not dict entries. */
export function getEntry(dict: Dict, key: string): { found: boolean; value: unknown } {
  if (Object.prototype.hasOwnProperty.call(dict, key)) {
    return { found: true, value: dict[key] };
  }
  return { found: false, value: undefined };
}

export function setEntry(dict: Dict, key: string, value: unknown): void {
  Object.defineProperty(dict, key, {
    value,
    writable: true,
    enumerable: true,
    configurable: true,
  });
}

export function typeName(value: unknown): string {
  if (value === null || value === undefined) return 'NoneType';
  switch (typeof value) {
    case 'boolean':
      return 'bool';
    case 'number':
      return Number.isInteger(value) ? 'int' : 'float';
    case 'string':
      return 'str';
    default:
      break;
  }
  if (isTuple(value)) return 'tuple';
  if (Array.isArray(value)) return 'list';
  if (value instanceof RangeValue) return 'range';
  if (value instanceof SandboxCallable) {
    return value.kind === 'tool' ? 'function' : 'builtin_function_or_method';
  }
  if (isPlainObject(value)) return 'dict';
  return 'object';
}

export function truthy(value: unknown): boolean {
  if (value === null || value === undefined) return false;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string') return value.length > 0;
  if (Array.isArray(value)) return value.length > 0;
  if (value instanceof RangeValue) return value.length > 0;
  if (isPlainObject(value)) return Object.keys(value).length > 0;
  return true;
}

function reprNumber(value: number): string {
  if (Number.isNaN(value)) return 'nan';
  if (value === Infinity) return 'inf';
  if (value === -Infinity) return '-inf';
  return String(value).replace(/e([+-])(\d)$/, 'e$10$2');
}

function reprString(value: string): string {
  const quote = value.includes("'") && !value.includes('"') ? '"' : "'";
  let out = quote;
  for (const ch of value) {
    const code = ch.charCodeAt(0);
    if (ch === '\\') out += '\\\\';
    else if (ch === quote) out += `\\${quote}`;
    else if (ch === '\n') out += '\\n';
    else if (ch === '\r') out += '\\r';
    else if (ch === '\t') out += '\\t';
    else if (code < 0x20 || code === 0x7f) out += `\\x${code.toString(16).padStart(2, '0')}`;
    else out += ch;
  }
  return out + quote;
}

function reprValue(value: unknown, seen: Set<object>): string {
  if (value === null || value === undefined) return 'None';
  switch (typeof value) {
    case 'boolean':
      return value ? 'True' : 'False';
    case 'number':
      return reprNumber(value);
    case 'string':
      return reprString(value);
    case 'object':
      break;
    default:
      return `<${typeof value}>`;
  }

  if (value instanceof RangeValue) {
    return value.step === 1
      ? `range(${value.start}, ${value.stop})`
      : `range(${value.start}, ${value.stop}, ${value.step})`;
  }
  if (value instanceof SandboxCallable) {
    switch (value.kind) {
      case 'tool':
        return `<function ${value.name}>`;
      case 'method':
        return `<built-in method ${value.name}>`;
      default:
        return `<built-in function ${value.name}>`;
    }
  }

  if (seen.has(value)) {
    if (Array.isArray(value)) return isTuple(value) ? '(...)' : '[...]';
    return '{...}';
  }
  seen.add(value);
  try {
    if (Array.isArray(value)) {
      const items = value.map((item: unknown) => reprValue(item, seen));
      if (isTuple(value)) {
        return items.length === 1 ? `(${items[0]},)` : `(${items.join(', ')})`;
      }
      return `[${items.join(', ')}]`;
    }
    if (isPlainObject(value)) {
      const entries = Object.entries(value).map(
        ([key, item]) => `${reprString(key)}: ${reprValue(item, seen)}`,
      );
      return `{${entries.join(', ')}}`;
    }
    if ('toJSON' in value && typeof value.toJSON === 'function') {
      const json: unknown = value.toJSON();
      return reprValue(json, seen);
    }
    return `<${typeName(value)} object>`;
  } finally {
    seen.delete(value);
  }
}

export function repr(value: unknown): string {
  return reprValue(value, new Set());
}

export function str(value: unknown): string {
  return typeof value === 'string' ? value : repr(value);
}
