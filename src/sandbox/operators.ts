// pattern: Functional Core

/**
 * Operator semantics for sandbox values: arithmetic, comparison, membership,
 * subscripting and iteration. Errors use the messages a Python programmer
 * would recognise, since they are shown to the model verbatim.
 */

import type { BinaryOperator } from './ast.ts';
import { SandboxRuntimeError } from './errors.ts';
import {
  RangeValue,
  getEntry,
  isList,
  isPlainObject,
  isTuple,
  makeTuple,
  repr,
  setEntry,
  typeName,
  type IterationTick,
} from './values.ts';

type Numeric = number | boolean;

function isNumeric(value: unknown): value is Numeric {
  return typeof value === 'number' || typeof value === 'boolean';
}

function isInt(value: unknown): value is Numeric {
  return typeof value === 'boolean' || (typeof value === 'number' && Number.isInteger(value));
}

function typeError(message: string): SandboxRuntimeError {
  return new SandboxRuntimeError('TypeError', message);
}

function unsupported(op: string, left: unknown, right: unknown): SandboxRuntimeError {
  return typeError(
    `unsupported operand type(s) for ${op}: '${typeName(left)}' and '${typeName(right)}'`,
  );
}

// equality

export function equals(left: unknown, right: unknown): boolean {
  if (isNumeric(left) && isNumeric(right)) return Number(left) === Number(right);
  if (left === undefined) return right === null || right === undefined;
  if (right === undefined) return left === null;
  if (left === right) return true;
  if (Array.isArray(left) && Array.isArray(right)) {
    if (isTuple(left) !== isTuple(right) || left.length !== right.length) return false;
    return left.every((item: unknown, index) => equals(item, right[index]));
  }
  if (left instanceof RangeValue && right instanceof RangeValue) {
    if (left.length !== right.length) return false;
    return left.length === 0 || (left.start === right.start && (left.length === 1 || left.step === right.step));
  }
  if (isPlainObject(left) && isPlainObject(right)) {
    const keys = Object.keys(left);
    if (keys.length !== Object.keys(right).length) return false;
    return keys.every((key) => {
      const other = getEntry(right, key);
      return other.found && equals(left[key], other.value);
    });
  }
  return false;
}

export function identical(left: unknown, right: unknown): boolean {
  const normalize = (value: unknown): unknown => (value === undefined ? null : value);
  return normalize(left) === normalize(right);
}

// ordering

function compareValues(op: string, left: unknown, right: unknown): number {
  if (isNumeric(left) && isNumeric(right)) {
    const a = Number(left);
    const b = Number(right);
    if (Number.isNaN(a) || Number.isNaN(b)) return NaN;
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof left === 'string' && typeof right === 'string') {
    return left < right ? -1 : left > right ? 1 : 0;
  }
  if (Array.isArray(left) && Array.isArray(right) && isTuple(left) === isTuple(right)) {
    const shared = Math.min(left.length, right.length);
    for (let index = 0; index < shared; index++) {
      const a: unknown = left[index];
      const b: unknown = right[index];
      if (!equals(a, b)) return compareValues(op, a, b);
    }
    return left.length - right.length;
  }
  throw typeError(
    `'${op}' not supported between instances of '${typeName(left)}' and '${typeName(right)}'`,
  );
}

/** Ordering used by `sorted`, `min` and `max`. */
export function lessThan(left: unknown, right: unknown): boolean {
  return compareValues('<', left, right) < 0;
}

export function contains(container: unknown, item: unknown): boolean {
  if (typeof container === 'string') {
    if (typeof item !== 'string') {
      throw typeError(`'in <string>' requires string as left operand, not ${typeName(item)}`);
    }
    return container.includes(item);
  }
  if (Array.isArray(container)) {
    return container.some((element: unknown) => equals(element, item));
  }
  if (container instanceof RangeValue) {
    if (!isInt(item)) return false;
    const value = Number(item);
    const offset = value - container.start;
    const index = offset / container.step;
    return Number.isInteger(index) && index >= 0 && index < container.length;
  }
  if (isPlainObject(container)) {
    return typeof item === 'string' && getEntry(container, item).found;
  }
  throw typeError(`argument of type '${typeName(container)}' is not iterable`);
}

export function compare(op: string, left: unknown, right: unknown): boolean {
  switch (op) {
    case '==':
      return equals(left, right);
    case '!=':
      return !equals(left, right);
    case 'is':
      return identical(left, right);
    case 'is not':
      return !identical(left, right);
    case 'in':
      return contains(right, left);
    case 'not in':
      return !contains(right, left);
    case '<':
      return compareValues(op, left, right) < 0;
    case '<=':
      return compareValues(op, left, right) <= 0;
    case '>':
      return compareValues(op, left, right) > 0;
    case '>=':
      return compareValues(op, left, right) >= 0;
    default:
      throw new SandboxRuntimeError('RuntimeError', `unknown comparison ${op}`);
  }
}

// arithmetic

function repeat(sequence: unknown, times: Numeric, tick: IterationTick): unknown {
  const count = Math.max(0, Number(times));
  if (typeof sequence === 'string') {
    tick(sequence.length * count);
    return sequence.repeat(count);
  }
  if (Array.isArray(sequence)) {
    tick(sequence.length * count);
    const items: Array<unknown> = [];
    for (let index = 0; index < count; index++) items.push(...sequence);
    return isTuple(sequence) ? makeTuple(items) : items;
  }
  return undefined;
}

function isSequence(value: unknown): boolean {
  return typeof value === 'string' || Array.isArray(value);
}

function add(left: unknown, right: unknown): unknown {
  if (isNumeric(left) && isNumeric(right)) return Number(left) + Number(right);
  if (typeof left === 'string') {
    if (typeof right === 'string') return left + right;
    throw typeError(`can only concatenate str (not "${typeName(right)}") to str`);
  }
  if (Array.isArray(left)) {
    const kind = typeName(left);
    if (Array.isArray(right) && isTuple(left) === isTuple(right)) {
      const items = [...left, ...right];
      return isTuple(left) ? makeTuple(items) : items;
    }
    throw typeError(`can only concatenate ${kind} (not "${typeName(right)}") to ${kind}`);
  }
  throw unsupported('+', left, right);
}

function multiply(left: unknown, right: unknown, tick: IterationTick): unknown {
  if (isNumeric(left) && isNumeric(right)) return Number(left) * Number(right);
  const [sequence, times] = isSequence(left) ? [left, right] : [right, left];
  if (isSequence(sequence)) {
    if (isInt(times)) return repeat(sequence, times, tick);
    throw typeError(`can't multiply sequence by non-int of type '${typeName(times)}'`);
  }
  throw unsupported('*', left, right);
}

function divide(op: BinaryOperator, left: Numeric, right: Numeric): number {
  const a = Number(left);
  const b = Number(right);
  const integral = isInt(left) && isInt(right);

  if (b === 0) {
    if (op === '/') throw new SandboxRuntimeError('ZeroDivisionError', 'division by zero');
    if (op === '//') {
      throw new SandboxRuntimeError(
        'ZeroDivisionError',
        integral ? 'integer division or modulo by zero' : 'float floor division by zero',
      );
    }
    throw new SandboxRuntimeError(
      'ZeroDivisionError',
      integral ? 'integer modulo by zero' : 'float modulo',
    );
  }

  switch (op) {
    case '/':
      return a / b;
    case '//':
      return Math.floor(a / b);
    default: {
      const remainder = a % b;
      return remainder !== 0 && remainder < 0 !== b < 0 ? remainder + b : remainder;
    }
  }
}

function power(left: Numeric, right: Numeric): number {
  const a = Number(left);
  const b = Number(right);
  if (a === 0 && b < 0) {
    throw new SandboxRuntimeError('ZeroDivisionError', '0.0 cannot be raised to a negative power');
  }
  const result = a ** b;
  if (Number.isNaN(result) && !Number.isNaN(a) && !Number.isNaN(b)) {
    throw new SandboxRuntimeError('ValueError', 'math domain error');
  }
  return result;
}

/**
 * `%` on a string is printf-style formatting; the caller routes that case.
 * Sequence repetition charges each produced element to `tick`.
 */
export function binaryOp(
  op: BinaryOperator,
  left: unknown,
  right: unknown,
  tick: IterationTick = () => undefined,
): unknown {
  switch (op) {
    case '+':
      return add(left, right);
    case '*':
      return multiply(left, right, tick);
    default:
      break;
  }
  if (!isNumeric(left) || !isNumeric(right)) throw unsupported(op, left, right);
  switch (op) {
    case '-':
      return Number(left) - Number(right);
    case '**':
      return power(left, right);
    default:
      return divide(op, left, right);
  }
}

export function unaryOp(op: '-' | '+', operand: unknown): number {
  if (!isNumeric(operand)) {
    throw typeError(`bad operand type for unary ${op}: '${typeName(operand)}'`);
  }
  return op === '-' ? -Number(operand) : Number(operand);
}

// subscripting

export type SliceBounds = {
  lower: unknown;
  upper: unknown;
  step: unknown;
};

function sliceIndex(value: unknown): number | null {
  if (value === null || value === undefined) return null;
  if (isInt(value)) return Number(value);
  throw typeError('slice indices must be integers or None or have an __index__ method');
}

/** Python's slice.indices(): the element positions a slice selects. */
export function sliceIndices(length: number, bounds: SliceBounds): Array<number> {
  const step = sliceIndex(bounds.step) ?? 1;
  if (step === 0) throw new SandboxRuntimeError('ValueError', 'slice step cannot be zero');

  const clamp = (raw: number | null, fallback: number): number => {
    if (raw === null) return fallback;
    if (raw < 0) {
      const shifted = raw + length;
      return shifted < 0 ? (step < 0 ? -1 : 0) : shifted;
    }
    return raw >= length ? (step < 0 ? length - 1 : length) : raw;
  };

  const start = clamp(sliceIndex(bounds.lower), step < 0 ? length - 1 : 0);
  const stop = clamp(sliceIndex(bounds.upper), step < 0 ? -1 : length);
  const indices: Array<number> = [];
  for (let index = start; step > 0 ? index < stop : index > stop; index += step) {
    indices.push(index);
  }
  return indices;
}

export function getSlice(container: unknown, bounds: SliceBounds): unknown {
  if (typeof container === 'string') {
    const chars = Array.from(container);
    return sliceIndices(chars.length, bounds).map((index) => chars[index]).join('');
  }
  if (Array.isArray(container)) {
    const items = sliceIndices(container.length, bounds).map((index): unknown => container[index]);
    return isTuple(container) ? makeTuple(items) : items;
  }
  if (container instanceof RangeValue) {
    const indices = sliceIndices(container.length, bounds);
    const step = container.step * (sliceIndex(bounds.step) ?? 1);
    const first = indices[0];
    const start = first === undefined ? container.start : container.at(first);
    return new RangeValue(start, start + indices.length * step, step);
  }
  throw typeError(`'${typeName(container)}' object is not subscriptable`);
}

function position(container: { length: number }, index: unknown, kind: string): number {
  if (!isInt(index)) {
    const label = kind === 'str' ? 'string indices must be integers' : `${kind} indices must be integers or slices`;
    throw typeError(`${label}, not ${typeName(index)}`);
  }
  const raw = Number(index);
  const resolved = raw < 0 ? raw + container.length : raw;
  if (resolved < 0 || resolved >= container.length) {
    const label = kind === 'str' ? 'string' : kind === 'range' ? 'range object' : kind;
    throw new SandboxRuntimeError('IndexError', `${label} index out of range`);
  }
  return resolved;
}

export function getItem(container: unknown, index: unknown): unknown {
  if (typeof container === 'string') {
    const chars = Array.from(container);
    return chars[position(chars, index, 'str')];
  }
  if (Array.isArray(container)) {
    const value: unknown = container[position(container, index, typeName(container))];
    return value;
  }
  if (container instanceof RangeValue) {
    return container.at(position(container, index, 'range'));
  }
  if (isPlainObject(container)) {
    if (typeof index === 'string') {
      const entry = getEntry(container, index);
      if (entry.found) return entry.value;
    }
    throw new SandboxRuntimeError('KeyError', repr(index));
  }
  throw typeError(`'${typeName(container)}' object is not subscriptable`);
}

export function setItem(container: unknown, index: unknown, value: unknown): void {
  if (isList(container)) {
    if (!isInt(index)) {
      throw typeError(`list indices must be integers or slices, not ${typeName(index)}`);
    }
    const raw = Number(index);
    const resolved = raw < 0 ? raw + container.length : raw;
    if (resolved < 0 || resolved >= container.length) {
      throw new SandboxRuntimeError('IndexError', 'list assignment index out of range');
    }
    container[resolved] = value;
    return;
  }
  if (isPlainObject(container)) {
    if (typeof index !== 'string') {
      throw typeError(`dict keys must be str, not ${typeName(index)}`);
    }
    setEntry(container, index, value);
    return;
  }
  throw typeError(`'${typeName(container)}' object does not support item assignment`);
}

export function setSlice(container: unknown, bounds: SliceBounds, value: unknown): void {
  if (!isList(container)) {
    throw typeError(`'${typeName(container)}' object does not support item assignment`);
  }
  if (bounds.step !== null && bounds.step !== undefined) {
    throw new SandboxRuntimeError('ValueError', 'extended slice assignment is not supported');
  }
  const replacement = Array.from(iterate(value));
  const indices = sliceIndices(container.length, bounds);
  const lower = sliceIndex(bounds.lower) ?? 0;
  const start = indices[0] ?? Math.min(container.length, Math.max(0, lower < 0 ? lower + container.length : lower));
  container.splice(start, indices.length, ...replacement);
}

// iteration

function* iterateList(list: ReadonlyArray<unknown>): Generator<unknown> {
  for (let index = 0; index < list.length; index++) {
    yield list[index];
  }
}

/** Lists are walked by position, so appends during a loop are visited. */
export function iterate(value: unknown): Iterable<unknown> {
  if (typeof value === 'string') return Array.from(value);
  if (Array.isArray(value)) return iterateList(value);
  if (value instanceof RangeValue) return value;
  if (isPlainObject(value)) return Object.keys(value);
  throw typeError(`'${typeName(value)}' object is not iterable`);
}
