// pattern: Functional Core

import { describe, it, expect } from 'vitest';
import { formatTemplate, formatValue, percentFormat } from './format.ts';
import { makeTuple } from './values.ts';

describe('formatValue', () => {
  it('should fall back to str for an empty spec', () => {
    expect(formatValue([1, 'a'], '')).toBe("[1, 'a']");
  });

  it('should pad and align', () => {
    expect(formatValue('ab', '*^6')).toBe('**ab**');
    expect(formatValue('ab', '4')).toBe('ab  ');
    expect(formatValue(42, '>5')).toBe('   42');
    expect(formatValue(5, '05d')).toBe('00005');
    expect(formatValue(-5, '05d')).toBe('-0005');
  });

  it('should format floats with precision and grouping', () => {
    expect(formatValue(3.14159, '.2f')).toBe('3.14');
    expect(formatValue(1234567.891, ',.2f')).toBe('1,234,567.89');
    expect(formatValue(0.25, '.1%')).toBe('25.0%');
    expect(formatValue(0.0001234, '.3g')).toBe('0.000123');
    expect(formatValue(12345.678, '.2e')).toBe('1.23e+04');
  });

  it('should format integers in other bases', () => {
    expect(formatValue(255, '#x')).toBe('0xff');
    expect(formatValue(255, 'X')).toBe('FF');
    expect(formatValue(5, 'b')).toBe('101');
  });

  it('should honour sign flags', () => {
    expect(formatValue(3, '+d')).toBe('+3');
    expect(formatValue(3, ' d')).toBe(' 3');
  });

  it('should truncate strings to the precision', () => {
    expect(formatValue('abcdef', '.3')).toBe('abc');
  });

  it('should reject codes that do not apply to the type', () => {
    expect(() => formatValue('x', 'f')).toThrow("Unknown format code 'f' for object of type 'str'");
    expect(() => formatValue(1.5, 'd')).toThrow("Unknown format code 'd' for object of type 'float'");
    expect(() => formatValue([1], '>3')).toThrow('unsupported format string passed to list.__format__');
  });
});

describe('formatTemplate', () => {
  it('should fill automatic, numbered, and named fields', () => {
    expect(formatTemplate('{} and {name!r}', ['a'], { name: 'b' })).toBe("a and 'b'");
    expect(formatTemplate('{0}{0}{{}}', ['x'], {})).toBe('xx{}');
    expect(formatTemplate('{:>4}|', [7], {})).toBe('   7|');
  });

  it('should reject missing positional fields', () => {
    expect(() => formatTemplate('{1}', ['a'], {})).toThrow(
      'Replacement index 1 out of range for positional args tuple',
    );
  });

  it('should reject a lone closing brace', () => {
    expect(() => formatTemplate('a}', [], {})).toThrow("Single '}' encountered in format string");
  });
});

describe('percentFormat', () => {
  it('should format a tuple of values', () => {
    expect(percentFormat('%s=%05.1f', makeTuple(['pi', 3.14159]))).toBe('pi=003.1');
  });

  it('should treat a single value as one argument', () => {
    expect(percentFormat('%d%%', 5)).toBe('5%');
    expect(percentFormat('%-4s|', 'ab')).toBe('ab  |');
    expect(percentFormat('%r', 'x')).toBe("'x'");
  });

  it('should look up named fields in a dict', () => {
    expect(percentFormat('%(n)s!', { n: 'x' })).toBe('x!');
  });

  it('should reject a mismatched argument count', () => {
    expect(() => percentFormat('%s %s', makeTuple(['a']))).toThrow(
      'not enough arguments for format string',
    );
    expect(() => percentFormat('%s', makeTuple(['a', 'b']))).toThrow(
      'not all arguments converted during string formatting',
    );
  });
});
