// pattern: Functional Core

/**
 * Safe base library of the sandbox: builtin functions plus the whitelisted
 * methods of str, list, tuple and dict. Anything not listed here does not
 * exist inside the sandbox.
 */

import { SandboxRuntimeError } from './errors.ts';
import { formatTemplate } from './format.ts';
import { binaryOp, equals, iterate, lessThan } from './operators.ts';
import {
  RangeValue,
  SandboxCallable,
  getEntry,
  isList,
  isPlainObject,
  isTuple,
  makeDict,
  makeTuple,
  repr,
  setEntry,
  str,
  truthy,
  typeName,
  type Dict,
  type IterationTick,
  type NativeCall,
} from './values.ts';

type Args = ReadonlyArray<unknown>;
type Kwargs = Readonly<Record<string, unknown>>;

/** A parameter name, or a name with its default. */
type Param = string | readonly [string, unknown];

export type BuiltinHooks = {
  print: (text: string) => void;
  tick: IterationTick;
};

function typeError(message: string): SandboxRuntimeError {
  return new SandboxRuntimeError('TypeError', message);
}

function valueError(message: string): SandboxRuntimeError {
  return new SandboxRuntimeError('ValueError', message);
}

/** Map positional and keyword arguments onto a fixed parameter list. */
function bind(name: string, args: Args, kwargs: Kwargs, params: ReadonlyArray<Param>): Array<unknown> {
  if (args.length > params.length) {
    throw typeError(`${name}() takes at most ${params.length} arguments (${args.length} given)`);
  }
  const names = params.map((param) => (typeof param === 'string' ? param : param[0]));
  for (const key of Object.keys(kwargs)) {
    if (!names.includes(key)) {
      throw typeError(`'${key}' is an invalid keyword argument for ${name}()`);
    }
  }

  return params.map((param, index) => {
    const paramName = names[index] ?? '';
    const keyword = getEntry({ ...kwargs }, paramName);
    if (index < args.length) {
      if (keyword.found) {
        throw typeError(`argument for ${name}() given by name ('${paramName}') and position (${index + 1})`);
      }
      return args[index];
    }
    if (keyword.found) return keyword.value;
    if (typeof param === 'string') {
      throw typeError(`${name}() missing required argument '${paramName}' (pos ${index + 1})`);
    }
    return param[1];
  });
}

function noKeywords(name: string, kwargs: Kwargs): void {
  if (Object.keys(kwargs).length > 0) {
    throw typeError(`${name}() takes no keyword arguments`);
  }
}

function isInt(value: unknown): value is number | boolean {
  return typeof value === 'boolean' || (typeof value === 'number' && Number.isInteger(value));
}

function requireInt(value: unknown): number {
  if (!isInt(value)) {
    throw typeError(`'${typeName(value)}' object cannot be interpreted as an integer`);
  }
  return Number(value);
}

function requireString(name: string, value: unknown): string {
  if (typeof value !== 'string') {
    throw typeError(`${name} argument must be str, not ${typeName(value)}`);
  }
  return value;
}

/** Materialises an iterable, charging each element to the iteration budget. */
function collect(value: unknown, tick: IterationTick): Array<unknown> {
  const items: Array<unknown> = [];
  for (const item of iterate(value)) {
    tick(1);
    items.push(item);
  }
  return items;
}

export async function callValue(fn: unknown, args: Args, kwargs: Kwargs = {}): Promise<unknown> {
  if (!(fn instanceof SandboxCallable)) {
    throw typeError(`'${typeName(fn)}' object is not callable`);
  }
  return await fn.call(args, kwargs);
}

async function keyed(
  items: ReadonlyArray<unknown>,
  key: unknown,
): Promise<Array<{ item: unknown; key: unknown }>> {
  const out: Array<{ item: unknown; key: unknown }> = [];
  for (const item of items) {
    out.push({ item, key: key === null || key === undefined ? item : await callValue(key, [item]) });
  }
  return out;
}

async function sortItems(items: ReadonlyArray<unknown>, key: unknown, reverse: unknown): Promise<Array<unknown>> {
  const entries = await keyed(items, key);
  const direction = truthy(reverse) ? -1 : 1;
  entries.sort((a, b) => {
    if (lessThan(a.key, b.key)) return -direction;
    if (lessThan(b.key, a.key)) return direction;
    return 0;
  });
  return entries.map((entry) => entry.item);
}

async function extreme(name: 'max' | 'min', args: Args, kwargs: Kwargs, tick: IterationTick): Promise<unknown> {
  const [key, fallback] = bind(name, [], kwargs, [['key', null], ['default', undefined]]);
  if (args.length === 0) {
    throw typeError(`${name} expected at least 1 argument, got 0`);
  }
  const items = args.length === 1 ? collect(args[0], tick) : [...args];
  if (items.length === 0) {
    if (fallback !== undefined) return fallback;
    throw valueError(`${name}() arg is an empty sequence`);
  }
  const entries = await keyed(items, key);
  let best = entries[0];
  for (const entry of entries.slice(1)) {
    if (!best) break;
    const better = name === 'max' ? lessThan(best.key, entry.key) : lessThan(entry.key, best.key);
    if (better) best = entry;
  }
  return best?.item;
}

/**
 * Rounds the exact binary value of `value`, so 2.675 (stored just below the
 * tie) goes to 2.67. `toFixed` is exact but breaks ties upward; a true tie
 * steps back to the even neighbour.
 */
function roundHalfEven(value: number, digits: number): number {
  if (!Number.isFinite(value) || digits > 100) return value;
  if (digits < 0) {
    const factor = 10 ** -digits;
    return roundHalfEven(value / factor, 0) * factor;
  }
  const magnitude = Math.abs(value);
  if (magnitude >= 2 ** 52) return value;

  const exact = magnitude.toFixed(100);
  const cut = exact.indexOf('.') + 1 + digits;
  const kept = exact.slice(0, cut);
  let rounded = Number(magnitude.toFixed(digits));
  if (/^50*$/.test(exact.slice(cut)) && Number(kept.replace('.', '').slice(-1)) % 2 === 0) {
    rounded = Number(kept);
  }
  return value < 0 ? -rounded : rounded;
}

function parseInteger(text: string, base: number): number {
  const invalid = valueError(`invalid literal for int() with base ${base}: ${repr(text)}`);
  let body = text.trim().replace(/_/g, '');
  let sign = 1;
  if (body.startsWith('-') || body.startsWith('+')) {
    sign = body.startsWith('-') ? -1 : 1;
    body = body.slice(1);
  }
  let radix = base;
  const prefix = body.slice(0, 2).toLowerCase();
  const prefixes: Record<string, number> = { '0x': 16, '0o': 8, '0b': 2 };
  const prefixed = prefixes[prefix];
  if (prefixed !== undefined && (base === 0 || base === prefixed)) {
    radix = prefixed;
    body = body.slice(2);
  } else if (base === 0) {
    radix = 10;
  }
  if (body === '') throw invalid;
  for (const ch of body.toLowerCase()) {
    const digit = parseInt(ch, 36);
    if (Number.isNaN(digit) || digit >= radix) throw invalid;
  }
  return sign * parseInt(body, radix);
}

function toInt(args: Args, kwargs: Kwargs): number {
  const [value, base] = bind('int', args, kwargs, [['x', 0], ['base', null]]);
  if (base !== null) {
    const radix = requireInt(base);
    if (typeof value !== 'string') {
      throw typeError("int() can't convert non-string with explicit base");
    }
    if (radix !== 0 && (radix < 2 || radix > 36)) {
      throw valueError('int() base must be >= 2 and <= 36, or 0');
    }
    return parseInteger(value, radix);
  }
  if (typeof value === 'boolean') return Number(value);
  if (typeof value === 'number') {
    if (Number.isNaN(value)) throw valueError('cannot convert float NaN to integer');
    if (!Number.isFinite(value)) throw valueError('cannot convert float infinity to integer');
    return Math.trunc(value);
  }
  if (typeof value === 'string') return parseInteger(value, 10);
  throw typeError(
    `int() argument must be a string, a bytes-like object or a real number, not '${typeName(value)}'`,
  );
}

function toFloat(args: Args, kwargs: Kwargs): number {
  noKeywords('float', kwargs);
  const [value] = bind('float', args, {}, [['x', 0]]);
  if (typeof value === 'number' || typeof value === 'boolean') return Number(value);
  if (typeof value === 'string') {
    const text = value.trim().replace(/_/g, '').toLowerCase();
    const special: Record<string, number> = {
      nan: NaN, '+nan': NaN, '-nan': NaN,
      inf: Infinity, '+inf': Infinity, infinity: Infinity, '+infinity': Infinity,
      '-inf': -Infinity, '-infinity': -Infinity,
    };
    const named = special[text];
    if (named !== undefined) return named;
    if (/^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/.test(text)) return Number(text);
    throw valueError(`could not convert string to float: ${repr(value)}`);
  }
  throw typeError(`float() argument must be a string or a real number, not '${typeName(value)}'`);
}

function length(value: unknown): number {
  if (typeof value === 'string') return Array.from(value).length;
  if (Array.isArray(value)) return value.length;
  if (value instanceof RangeValue) return value.length;
  if (isPlainObject(value)) return Object.keys(value).length;
  throw typeError(`object of type '${typeName(value)}' has no len()`);
}

function toDict(args: Args, kwargs: Kwargs, tick: IterationTick): Dict {
  if (args.length > 1) {
    throw typeError(`dict expected at most 1 argument, got ${args.length}`);
  }
  const dict = makeDict();
  const source = args[0];
  if (isPlainObject(source)) {
    for (const [key, value] of Object.entries(source)) setEntry(dict, key, value);
  } else if (source !== undefined) {
    let index = 0;
    for (const pair of iterate(source)) {
      tick(1);
      const items = Array.isArray(pair) || typeof pair === 'string' ? Array.from(iterate(pair)) : null;
      if (!items || items.length !== 2) {
        throw valueError(`dictionary update sequence element #${index} has length ${items?.length ?? 0}; 2 is required`);
      }
      const [key, value] = items;
      if (typeof key !== 'string') {
        throw typeError(`dict keys must be str, not ${typeName(key)}`);
      }
      setEntry(dict, key, value);
      index++;
    }
  }
  for (const [key, value] of Object.entries(kwargs)) setEntry(dict, key, value);
  return dict;
}

function toRange(args: Args, kwargs: Kwargs): RangeValue {
  noKeywords('range', kwargs);
  if (args.length === 0 || args.length > 3) {
    throw typeError(`range expected at least 1 argument, got ${args.length}`);
  }
  const [first, second, third] = args.map(requireInt);
  if (second === undefined) return new RangeValue(0, first ?? 0, 1);
  const step = third ?? 1;
  if (step === 0) throw valueError('range() arg 3 must not be zero');
  return new RangeValue(first ?? 0, second, step);
}

function reversedItems(value: unknown, tick: IterationTick): Array<unknown> {
  if (typeof value === 'string' || Array.isArray(value) || value instanceof RangeValue || isPlainObject(value)) {
    return collect(value, tick).reverse();
  }
  throw typeError(`'${typeName(value)}' object is not reversible`);
}

function sum(args: Args, kwargs: Kwargs, tick: IterationTick): unknown {
  const [iterable, start] = bind('sum', args, kwargs, ['iterable', ['start', 0]]);
  if (typeof start === 'string') {
    throw typeError("sum() can't sum strings [use ''.join(seq) instead]");
  }
  let total: unknown = start;
  for (const item of iterate(iterable)) {
    tick(1);
    total = binaryOp('+', total, item);
  }
  return total;
}

function zip(args: Args, kwargs: Kwargs, tick: IterationTick): Array<unknown> {
  noKeywords('zip', kwargs);
  const columns = args.map((arg) => collect(arg, tick));
  const size = columns.length === 0 ? 0 : Math.min(...columns.map((column) => column.length));
  const rows: Array<unknown> = [];
  for (let index = 0; index < size; index++) {
    rows.push(makeTuple(columns.map((column): unknown => column[index])));
  }
  return rows;
}

export function createBuiltins(hooks: BuiltinHooks): Map<string, SandboxCallable> {
  const { tick } = hooks;
  const table: Record<string, NativeCall> = {
    abs: (args, kwargs) => {
      const [value] = bind('abs', args, kwargs, ['x']);
      if (typeof value !== 'number' && typeof value !== 'boolean') {
        throw typeError(`bad operand type for abs(): '${typeName(value)}'`);
      }
      return Math.abs(Number(value));
    },
    all: (args, kwargs) => {
      const [iterable] = bind('all', args, kwargs, ['iterable']);
      for (const item of iterate(iterable)) {
        tick(1);
        if (!truthy(item)) return false;
      }
      return true;
    },
    any: (args, kwargs) => {
      const [iterable] = bind('any', args, kwargs, ['iterable']);
      for (const item of iterate(iterable)) {
        tick(1);
        if (truthy(item)) return true;
      }
      return false;
    },
    bool: (args, kwargs) => truthy(bind('bool', args, kwargs, [['x', false]])[0]),
    dict: (args, kwargs) => toDict(args, kwargs, tick),
    enumerate: (args, kwargs) => {
      const [iterable, start] = bind('enumerate', args, kwargs, ['iterable', ['start', 0]]);
      const offset = requireInt(start);
      return collect(iterable, tick).map((item, index) => makeTuple([index + offset, item]));
    },
    float: toFloat,
    int: toInt,
    len: (args, kwargs) => {
      noKeywords('len', kwargs);
      if (args.length !== 1) {
        throw typeError(`len() takes exactly one argument (${args.length} given)`);
      }
      return length(args[0]);
    },
    list: (args, kwargs) => {
      const [iterable] = bind('list', args, kwargs, [['iterable', makeTuple([])]]);
      return collect(iterable, tick);
    },
    max: (args, kwargs) => extreme('max', args, kwargs, tick),
    min: (args, kwargs) => extreme('min', args, kwargs, tick),
    print: (args, kwargs) => {
      const [sep, end] = bind('print', [], kwargs, [['sep', ' '], ['end', '\n']]);
      const separator = sep === null ? ' ' : requireString('sep', sep);
      const terminator = end === null ? '\n' : requireString('end', end);
      hooks.print(args.map(str).join(separator) + terminator);
      return null;
    },
    range: toRange,
    repr: (args, kwargs) => repr(bind('repr', args, kwargs, ['obj'])[0]),
    reversed: (args, kwargs) => {
      noKeywords('reversed', kwargs);
      return reversedItems(bind('reversed', args, {}, ['sequence'])[0], tick);
    },
    round: (args, kwargs) => {
      const [number, ndigits] = bind('round', args, kwargs, ['number', ['ndigits', null]]);
      if (typeof number !== 'number' && typeof number !== 'boolean') {
        throw typeError(`type ${typeName(number)} doesn't define __round__ method`);
      }
      if (ndigits === null) {
        const value = Number(number);
        if (!Number.isFinite(value)) {
          throw valueError(`cannot convert float ${Number.isNaN(value) ? 'NaN' : 'infinity'} to integer`);
        }
        return roundHalfEven(value, 0);
      }
      return roundHalfEven(Number(number), requireInt(ndigits));
    },
    sorted: async (args, kwargs) => {
      if (args.length !== 1) {
        throw typeError(`sorted expected 1 argument, got ${args.length}`);
      }
      const [key, reverse] = bind('sorted', [], kwargs, [['key', null], ['reverse', false]]);
      return await sortItems(collect(args[0], tick), key, reverse);
    },
    str: (args, kwargs) => str(bind('str', args, kwargs, [['object', '']])[0]),
    sum: (args, kwargs) => sum(args, kwargs, tick),
    tuple: (args, kwargs) => {
      const [iterable] = bind('tuple', args, kwargs, [['iterable', makeTuple([])]]);
      return makeTuple(collect(iterable, tick));
    },
    zip: (args, kwargs) => zip(args, kwargs, tick),
  };

  return new Map(
    Object.entries(table).map(([name, call]): [string, SandboxCallable] => [
      name,
      new SandboxCallable(name, 'builtin', call),
    ]),
  );
}

// methods

function nullary(name: string, fn: () => unknown): NativeCall {
  return (args, kwargs) => {
    bind(name, args, kwargs, []);
    return fn();
  };
}

function stripChars(value: string, chars: unknown, side: 'both' | 'left' | 'right'): string {
  const set = chars === null || chars === undefined ? null : new Set(requireString('strip', chars));
  const strip = (ch: string | undefined): boolean =>
    ch !== undefined && (set ? set.has(ch) : /\s/.test(ch));
  const characters = Array.from(value);
  let start = 0;
  let end = characters.length;
  if (side !== 'right') while (start < end && strip(characters[start])) start++;
  if (side !== 'left') while (end > start && strip(characters[end - 1])) end--;
  return characters.slice(start, end).join('');
}

function splitString(value: string, sep: unknown, maxsplit: unknown): Array<string> {
  const limit = requireInt(maxsplit);
  if (sep === null || sep === undefined) {
    const parts: Array<string> = [];
    let rest = value.replace(/^\s+/, '');
    while (rest.length > 0) {
      if (limit >= 0 && parts.length === limit) {
        parts.push(rest);
        break;
      }
      const gap = /\s+/.exec(rest);
      if (!gap) {
        parts.push(rest);
        break;
      }
      parts.push(rest.slice(0, gap.index));
      rest = rest.slice(gap.index + gap[0].length);
    }
    return parts;
  }

  const separator = requireString('sep', sep);
  if (separator === '') throw valueError('empty separator');
  const pieces = value.split(separator);
  if (limit < 0 || pieces.length <= limit + 1) return pieces;
  return [...pieces.slice(0, limit), pieces.slice(limit).join(separator)];
}

function countOccurrences(value: string, sub: string): number {
  if (sub === '') return Array.from(value).length + 1;
  return value.split(sub).length - 1;
}

/** Position of `sub` in code points, searching from `start` (negative counts from the end). */
function findSubstring(value: string, sub: string, start: number): number {
  const chars = Array.from(value);
  const needle = Array.from(sub);
  const from = start < 0 ? Math.max(0, start + chars.length) : start;
  for (let index = from; index + needle.length <= chars.length; index++) {
    if (needle.every((ch, offset) => chars[index + offset] === ch)) return index;
  }
  return -1;
}

function matchesAffix(name: string, value: string, affix: unknown, test: (candidate: string) => boolean): boolean {
  if (typeof affix === 'string') return test(affix);
  if (isTuple(affix)) {
    return affix.some((candidate: unknown) => test(requireString(name, candidate)));
  }
  throw typeError(`${name} first arg must be str or a tuple of str, not ${typeName(affix)}`);
}

function stringMethods(value: string, tick: IterationTick): Record<string, NativeCall> {
  return {
    upper: nullary('upper', () => value.toUpperCase()),
    lower: nullary('lower', () => value.toLowerCase()),
    strip: (args, kwargs) => stripChars(value, bind('strip', args, kwargs, [['chars', null]])[0], 'both'),
    lstrip: (args, kwargs) => stripChars(value, bind('lstrip', args, kwargs, [['chars', null]])[0], 'left'),
    rstrip: (args, kwargs) => stripChars(value, bind('rstrip', args, kwargs, [['chars', null]])[0], 'right'),
    split: (args, kwargs) => {
      const [sep, maxsplit] = bind('split', args, kwargs, [['sep', null], ['maxsplit', -1]]);
      return splitString(value, sep, maxsplit);
    },
    splitlines: nullary('splitlines', () => {
      const lines = value.split(/\r\n|\r|\n/);
      if (lines[lines.length - 1] === '') lines.pop();
      return lines;
    }),
    join: (args, kwargs) => {
      const [iterable] = bind('join', args, kwargs, ['iterable']);
      return collect(iterable, tick).map((item, index) => {
        if (typeof item !== 'string') {
          throw typeError(`sequence item ${index}: expected str instance, ${typeName(item)} found`);
        }
        return item;
      }).join(value);
    },
    replace: (args, kwargs) => {
      const [old, replacement, count] = bind('replace', args, kwargs, ['old', 'new', ['count', -1]]);
      const target = requireString('replace', old);
      const joiner = requireString('replace', replacement);
      const limit = requireInt(count);
      const pieces = target === '' ? ['', ...Array.from(value), ''] : value.split(target);
      if (limit < 0 || pieces.length <= limit + 1) return pieces.join(joiner);
      return pieces.slice(0, limit + 1).join(joiner) + target + pieces.slice(limit + 1).join(target);
    },
    startswith: (args, kwargs) => {
      const [prefix] = bind('startswith', args, kwargs, ['prefix']);
      return matchesAffix('startswith', value, prefix, (candidate) => value.startsWith(candidate));
    },
    endswith: (args, kwargs) => {
      const [suffix] = bind('endswith', args, kwargs, ['suffix']);
      return matchesAffix('endswith', value, suffix, (candidate) => value.endsWith(candidate));
    },
    find: (args, kwargs) => {
      const [sub, start] = bind('find', args, kwargs, ['sub', ['start', 0]]);
      return findSubstring(value, requireString('find', sub), requireInt(start));
    },
    index: (args, kwargs) => {
      const [sub, start] = bind('index', args, kwargs, ['sub', ['start', 0]]);
      const found = findSubstring(value, requireString('index', sub), requireInt(start));
      if (found < 0) throw valueError('substring not found');
      return found;
    },
    count: (args, kwargs) => countOccurrences(value, requireString('count', bind('count', args, kwargs, ['sub'])[0])),
    title: nullary('title', () =>
      value.replace(/\p{L}+/gu, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase()),
    ),
    capitalize: nullary('capitalize', () => value.charAt(0).toUpperCase() + value.slice(1).toLowerCase()),
    zfill: (args, kwargs) => {
      const width = requireInt(bind('zfill', args, kwargs, ['width'])[0]);
      const sign = value.startsWith('-') || value.startsWith('+') ? value.charAt(0) : '';
      return sign + value.slice(sign.length).padStart(width - sign.length, '0');
    },
    format: (args, kwargs) => formatTemplate(value, args, kwargs),
    isdigit: nullary('isdigit', () => /^\d+$/.test(value)),
    isalpha: nullary('isalpha', () => /^\p{L}+$/u.test(value)),
  };
}

function sequenceMethods(value: ReadonlyArray<unknown>): Record<string, NativeCall> {
  return {
    index: (args, kwargs) => {
      const [item] = bind('index', args, kwargs, ['value']);
      const found = value.findIndex((candidate: unknown) => equals(candidate, item));
      if (found < 0) throw valueError(`${repr(item)} is not in ${typeName(value)}`);
      return found;
    },
    count: (args, kwargs) => {
      const [item] = bind('count', args, kwargs, ['value']);
      return value.filter((candidate: unknown) => equals(candidate, item)).length;
    },
  };
}

function listMethods(value: Array<unknown>, tick: IterationTick): Record<string, NativeCall> {
  return {
    ...sequenceMethods(value),
    append: (args, kwargs) => {
      value.push(bind('append', args, kwargs, ['object'])[0]);
      return null;
    },
    extend: (args, kwargs) => {
      value.push(...collect(bind('extend', args, kwargs, ['iterable'])[0], tick));
      return null;
    },
    insert: (args, kwargs) => {
      const [index, item] = bind('insert', args, kwargs, ['index', 'object']);
      const raw = requireInt(index);
      const at = raw < 0 ? Math.max(0, raw + value.length) : Math.min(raw, value.length);
      value.splice(at, 0, item);
      return null;
    },
    pop: (args, kwargs) => {
      const [index] = bind('pop', args, kwargs, [['index', -1]]);
      if (value.length === 0) throw new SandboxRuntimeError('IndexError', 'pop from empty list');
      const raw = requireInt(index);
      const at = raw < 0 ? raw + value.length : raw;
      if (at < 0 || at >= value.length) throw new SandboxRuntimeError('IndexError', 'pop index out of range');
      const [removed] = value.splice(at, 1);
      return removed;
    },
    remove: (args, kwargs) => {
      const [item] = bind('remove', args, kwargs, ['value']);
      const found = value.findIndex((candidate) => equals(candidate, item));
      if (found < 0) throw valueError('list.remove(x): x not in list');
      value.splice(found, 1);
      return null;
    },
    sort: async (args, kwargs) => {
      if (args.length > 0) throw typeError('sort() takes no positional arguments');
      const [key, reverse] = bind('sort', [], kwargs, [['key', null], ['reverse', false]]);
      const sorted = await sortItems(value, key, reverse);
      value.splice(0, value.length, ...sorted);
      return null;
    },
    reverse: nullary('reverse', () => {
      value.reverse();
      return null;
    }),
    copy: nullary('copy', () => [...value]),
    clear: nullary('clear', () => {
      value.length = 0;
      return null;
    }),
  };
}

function dictMethods(value: Dict, tick: IterationTick): Record<string, NativeCall> {
  const lookup = (key: unknown): { found: boolean; value: unknown } =>
    typeof key === 'string' ? getEntry(value, key) : { found: false, value: undefined };

  return {
    get: (args, kwargs) => {
      const [key, fallback] = bind('get', args, kwargs, ['key', ['default', null]]);
      const entry = lookup(key);
      return entry.found ? entry.value : fallback;
    },
    keys: nullary('keys', () => Object.keys(value)),
    values: nullary('values', () => Object.values(value)),
    items: nullary('items', () => Object.entries(value).map(([key, item]) => makeTuple([key, item]))),
    pop: (args, kwargs) => {
      const [key, fallback] = bind('pop', args, kwargs, ['key', ['default', undefined]]);
      const entry = lookup(key);
      if (entry.found && typeof key === 'string') {
        Reflect.deleteProperty(value, key);
        return entry.value;
      }
      if (fallback !== undefined) return fallback;
      throw new SandboxRuntimeError('KeyError', repr(key));
    },
    update: (args, kwargs) => {
      const merged = toDict(args, kwargs, tick);
      for (const [key, item] of Object.entries(merged)) setEntry(value, key, item);
      return null;
    },
    copy: nullary('copy', () => makeDict(Object.entries(value))),
    setdefault: (args, kwargs) => {
      const [key, fallback] = bind('setdefault', args, kwargs, ['key', ['default', null]]);
      const entry = lookup(key);
      if (entry.found) return entry.value;
      if (typeof key !== 'string') throw typeError(`dict keys must be str, not ${typeName(key)}`);
      setEntry(value, key, fallback);
      return fallback;
    },
    clear: nullary('clear', () => {
      for (const key of Object.keys(value)) Reflect.deleteProperty(value, key);
      return null;
    }),
  };
}

function methodTable(value: unknown, tick: IterationTick): Record<string, NativeCall> {
  if (typeof value === 'string') return stringMethods(value, tick);
  if (isList(value)) return listMethods(value, tick);
  if (isTuple(value)) return sequenceMethods(value);
  if (isPlainObject(value)) return dictMethods(value, tick);
  return {};
}

/** Attribute access: only whitelisted methods are reachable. */
export function getAttribute(value: unknown, attr: string, tick: IterationTick): SandboxCallable {
  const table = methodTable(value, tick);
  const call = Object.prototype.hasOwnProperty.call(table, attr) ? table[attr] : undefined;
  if (!call) {
    throw new SandboxRuntimeError(
      'AttributeError',
      `'${typeName(value)}' object has no attribute '${attr}'`,
    );
  }
  return new SandboxCallable(attr, 'method', call);
}
