// pattern: Functional Core

import { describe, it, expect } from 'vitest';
import { serializeResult } from './serialize.ts';

describe('serializeResult', () => {
  it('should use spaced separators', () => {
    expect(serializeResult({ a: 1, b: [true, null, 'x'] })).toBe('{"a": 1, "b": [true, null, "x"]}');
  });

  it('should escape characters outside printable ASCII', () => {
    expect(serializeResult('café\n')).toBe('"caf\\u00e9\\n"');
  });

  it('should render non-finite numbers literally', () => {
    expect(serializeResult([NaN, Infinity, -Infinity])).toBe('[NaN, Infinity, -Infinity]');
  });

  it('should render undefined as null and skip undefined properties', () => {
    expect(serializeResult(undefined)).toBe('null');
    expect(serializeResult({ a: undefined, b: 2 })).toBe('{"b": 2}');
  });

  it('should use toJSON when present', () => {
    expect(serializeResult({ at: new Date(0) })).toBe('{"at": "1970-01-01T00:00:00.000Z"}');
  });

  it('should return undefined for values without a JSON form', () => {
    const cyclic: Record<string, unknown> = {};
    cyclic['self'] = cyclic;

    expect(serializeResult(() => 1)).toBeUndefined();
    expect(serializeResult(new Map([['a', 1]]))).toBeUndefined();
    expect(serializeResult([1n])).toBeUndefined();
    expect(serializeResult(cyclic)).toBeUndefined();
  });

  it('should treat a toJSON that returns its receiver as a cycle', () => {
    class Wrapper {
      toJSON(): unknown {
        return this;
      }
    }

    expect(serializeResult(new Wrapper())).toBeUndefined();
    expect(serializeResult({ wrapped: new Date(0), other: new Date(0) })).toBe(
      '{"wrapped": "1970-01-01T00:00:00.000Z", "other": "1970-01-01T00:00:00.000Z"}',
    );
  });

  it('should allow the same object twice when it is not a cycle', () => {
    const shared = { x: 1 };
    expect(serializeResult([shared, shared])).toBe('[{"x": 1}, {"x": 1}]');
  });
});
