// pattern: Functional Core

import { describe, it, expect } from 'vitest';
import { binaryOp, compare, getItem, getSlice, iterate, setItem, setSlice } from './operators.ts';
import { RangeValue, makeTuple } from './values.ts';

const all = { lower: null, upper: null, step: null };

describe('binaryOp', () => {
  it('should floor integer division and modulo toward negative infinity', () => {
    expect(binaryOp('//', -7, 2)).toBe(-4);
    expect(binaryOp('%', -7, 3)).toBe(2);
    expect(binaryOp('%', 7, -3)).toBe(-2);
  });

  it('should concatenate and repeat sequences', () => {
    expect(binaryOp('+', [1], [2])).toEqual([1, 2]);
    expect(binaryOp('*', [1, 2], 2)).toEqual([1, 2, 1, 2]);
    expect(binaryOp('*', 3, 'ab')).toBe('ababab');
  });

  it('should charge repeated elements to the tick hook', () => {
    const ticks: Array<number> = [];

    expect(binaryOp('*', [1, 2], 3, (count) => ticks.push(count))).toEqual([1, 2, 1, 2, 1, 2]);
    expect(binaryOp('*', 'ab', 2, (count) => ticks.push(count))).toBe('abab');
    expect(ticks).toEqual([6, 4]);
  });

  it('should keep tuples and lists apart', () => {
    expect(() => binaryOp('+', makeTuple([1]), [2])).toThrow(
      'can only concatenate tuple (not "list") to tuple',
    );
  });

  it('should reject mixed operand types', () => {
    expect(() => binaryOp('+', 'a', 1)).toThrow('can only concatenate str (not "int") to str');
    expect(() => binaryOp('-', 'a', 1)).toThrow("unsupported operand type(s) for -: 'str' and 'int'");
    expect(() => binaryOp('*', 'ab', 1.5)).toThrow("can't multiply sequence by non-int of type 'float'");
  });

  it('should raise on division by zero', () => {
    expect(() => binaryOp('/', 1, 0)).toThrow('division by zero');
    expect(() => binaryOp('//', 1, 0)).toThrow('integer division or modulo by zero');
    expect(() => binaryOp('%', 1.5, 0)).toThrow('float modulo');
  });
});

describe('compare', () => {
  it('should treat booleans as numbers', () => {
    expect(compare('==', 1, true)).toBe(true);
    expect(compare('<', false, 1)).toBe(true);
  });

  it('should not equate a tuple with a list', () => {
    expect(compare('==', makeTuple([1]), [1])).toBe(false);
    expect(compare('==', makeTuple([1]), makeTuple([1]))).toBe(true);
  });

  it('should compare sequences element by element', () => {
    expect(compare('<', [1, 2], [1, 3])).toBe(true);
    expect(compare('>=', 'b', 'abc')).toBe(true);
  });

  it('should test membership', () => {
    expect(compare('in', 'b', 'abc')).toBe(true);
    expect(compare('in', 'k', { k: 1 })).toBe(true);
    expect(compare('not in', 3, [1, 2])).toBe(true);
  });
});

describe('subscripts', () => {
  it('should index from the end with negative indices', () => {
    expect(getItem('abc', -1)).toBe('c');
    expect(getItem(new RangeValue(0, 10, 2), -1)).toBe(8);
  });

  it('should raise for out-of-range and unsubscriptable values', () => {
    expect(() => getItem([1], 5)).toThrow('list index out of range');
    expect(() => getItem([1], 'a')).toThrow('list indices must be integers or slices, not str');
    expect(() => getItem(5, 0)).toThrow("'int' object is not subscriptable");
  });

  it('should slice with steps', () => {
    expect(getSlice('hello', { ...all, step: -1 })).toBe('olleh');
    expect(getSlice([0, 1, 2, 3, 4], { lower: 1, upper: null, step: 2 })).toEqual([1, 3]);
    expect(getSlice(makeTuple([1, 2, 3]), { lower: -2, upper: null, step: null })).toEqual([2, 3]);
  });

  it('should reject a zero step', () => {
    expect(() => getSlice([1], { ...all, step: 0 })).toThrow('slice step cannot be zero');
  });

  it('should assign items and slices of lists', () => {
    const list: Array<unknown> = [0, 1, 2, 3, 4];
    setSlice(list, { lower: 1, upper: 3, step: null }, ['x']);
    setItem(list, -1, 'end');

    expect(list).toEqual([0, 'x', 3, 'end']);
  });

  it('should refuse item assignment on tuples', () => {
    expect(() => setItem(makeTuple([1]), 0, 2)).toThrow("'tuple' object does not support item assignment");
  });
});

describe('iterate', () => {
  it('should walk dict keys and string code points', () => {
    expect(Array.from(iterate({ a: 1, b: 2 }))).toEqual(['a', 'b']);
    expect(Array.from(iterate('a😀'))).toEqual(['a', '😀']);
  });

  it('should see items appended during iteration', () => {
    const list: Array<unknown> = [1];
    const seen: Array<unknown> = [];
    for (const item of iterate(list)) {
      seen.push(item);
      if (list.length < 3) list.push(Number(item) + 1);
    }

    expect(seen).toEqual([1, 2, 3]);
  });

  it('should reject non-iterables', () => {
    expect(() => iterate(5)).toThrow("'int' object is not iterable");
  });
});
