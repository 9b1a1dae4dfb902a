// pattern: Functional Core

/**
 * Format specifications for f-strings, `str.format` and `%` formatting.
 * Covers `[[fill]align][sign][#][0][width][,|_][.precision][type]`.
 */

import { SandboxRuntimeError } from './errors.ts';
import { getEntry, isPlainObject, isTuple, repr, str, typeName } from './values.ts';

type FormatSpec = {
  fill: string;
  align: string | null;
  sign: string;
  alternate: boolean;
  width: number;
  grouping: string | null;
  precision: number | null;
  type: string;
};

const SPEC_PATTERN =
  /^(?:(.)?([<>=^]))?([+\- ])?(#)?(0)?(\d+)?([,_])?(?:\.(\d+))?([bcdeEfFgGnosxX%])?$/s;

function valueError(message: string): SandboxRuntimeError {
  return new SandboxRuntimeError('ValueError', message);
}

function parseSpec(spec: string, value: unknown): FormatSpec {
  const match = SPEC_PATTERN.exec(spec);
  if (!match) {
    throw valueError(`Invalid format specifier '${spec}' for object of type '${typeName(value)}'`);
  }
  const [, fill, align, sign, alternate, zero, width, grouping, precision, type] = match;
  return {
    fill: fill ?? (zero && !align ? '0' : ' '),
    align: align ?? (zero ? '=' : null),
    sign: sign ?? '-',
    alternate: alternate !== undefined,
    width: width ? Number(width) : 0,
    grouping: grouping ?? null,
    precision: precision !== undefined ? Number(precision) : null,
    type: type ?? '',
  };
}

function group(digits: string, separator: string | null): string {
  if (!separator) return digits;
  return digits.replace(/\B(?=(\d{3})+(?!\d))/g, separator);
}

function pad(body: string, sign: string, spec: FormatSpec, defaultAlign: string): string {
  const align = spec.align ?? defaultAlign;
  const missing = spec.width - Array.from(sign + body).length;
  if (missing <= 0) return sign + body;
  const fill = (count: number): string => spec.fill.repeat(count);
  switch (align) {
    case '<':
      return sign + body + fill(missing);
    case '^': {
      const left = Math.floor(missing / 2);
      return fill(left) + sign + body + fill(missing - left);
    }
    case '=':
      return sign + fill(missing) + body;
    default:
      return fill(missing) + sign + body;
  }
}

function exponential(value: number, precision: number, upper: boolean): string {
  const text = value.toExponential(precision).replace(/e([+-])(\d)$/, 'e$10$2');
  return upper ? text.toUpperCase() : text;
}

function general(value: number, precision: number, alternate: boolean): string {
  const digits = precision === 0 ? 1 : precision;
  const exponent = Number(value.toExponential(digits - 1).split('e')[1]);
  let text =
    exponent >= -4 && exponent < digits
      ? value.toFixed(Math.max(0, digits - 1 - exponent))
      : exponential(value, digits - 1, false);
  if (!alternate && text.includes('.')) {
    text = text.replace(/\.?0+(?=e|$)/, '');
  }
  return text;
}

function formatNumber(value: number | boolean, spec: FormatSpec): string {
  const number = Number(value);
  const integral = typeof value === 'boolean' || Number.isInteger(number);
  let type = spec.type;
  if (type === '' || type === 'n') {
    type = integral && spec.precision === null ? 'd' : 'g';
  }
  if ('bcdoxX'.includes(type) && !integral) {
    throw valueError(`Unknown format code '${type}' for object of type 'float'`);
  }

  const negative = number < 0;
  const magnitude = Math.abs(number);
  let body: string;

  if (!Number.isFinite(number)) {
    body = Number.isNaN(number) ? 'nan' : 'inf';
    if (type === 'E' || type === 'F' || type === 'G') body = body.toUpperCase();
  } else {
    switch (type) {
      case 'd':
        body = group(String(magnitude), spec.grouping);
        break;
      case 'b':
      case 'o':
      case 'x':
      case 'X': {
        const radix = type === 'b' ? 2 : type === 'o' ? 8 : 16;
        const prefix = spec.alternate ? `0${type}` : '';
        const digits = magnitude.toString(radix);
        body = prefix + (type === 'X' ? digits.toUpperCase() : digits);
        break;
      }
      case 'c':
        return pad(String.fromCodePoint(magnitude), '', spec, '<');
      case 'e':
      case 'E':
        body = exponential(magnitude, spec.precision ?? 6, type === 'E');
        break;
      case 'f':
      case 'F': {
        const [whole = '', fraction] = magnitude.toFixed(spec.precision ?? 6).split('.');
        body = group(whole, spec.grouping) + (fraction !== undefined ? `.${fraction}` : '');
        break;
      }
      case '%': {
        const [whole = '', fraction] = (magnitude * 100).toFixed(spec.precision ?? 6).split('.');
        body = group(whole, spec.grouping) + (fraction !== undefined ? `.${fraction}` : '') + '%';
        break;
      }
      case 'g':
      case 'G': {
        if (spec.type === '' && spec.precision === null) {
          body = repr(magnitude);
        } else {
          body = general(magnitude, spec.precision ?? 6, spec.alternate);
        }
        const whole = /^\d+/.exec(body)?.[0] ?? '';
        body = group(whole, spec.grouping) + body.slice(whole.length);
        if (type === 'G') body = body.toUpperCase();
        break;
      }
      default:
        throw valueError(`Unknown format code '${type}' for object of type '${typeName(value)}'`);
    }
  }

  const sign = negative ? '-' : spec.sign === '-' ? '' : spec.sign;
  return pad(body, sign, spec, '>');
}

/** format(value, spec) */
export function formatValue(value: unknown, spec: string): string {
  if (spec === '') return str(value);
  const parsed = parseSpec(spec, value);

  if (typeof value === 'number' || (typeof value === 'boolean' && parsed.type !== '')) {
    return formatNumber(value, parsed);
  }
  if (typeof value === 'string' || typeof value === 'boolean') {
    if (parsed.type !== '' && parsed.type !== 's') {
      throw valueError(`Unknown format code '${parsed.type}' for object of type '${typeName(value)}'`);
    }
    if (parsed.align === '=') {
      throw valueError("'=' alignment not allowed in string format specifier");
    }
    const text = str(value);
    const clipped = parsed.precision === null ? text : Array.from(text).slice(0, parsed.precision).join('');
    return pad(clipped, '', parsed, '<');
  }
  throw new SandboxRuntimeError(
    'TypeError',
    `unsupported format string passed to ${typeName(value)}.__format__`,
  );
}

export function convertValue(value: unknown, conversion: 'r' | 's' | null): unknown {
  if (conversion === 'r') return repr(value);
  if (conversion === 's') return str(value);
  return value;
}

/** `str.format`: positional `{}`/`{0}` and keyword `{name}` fields. */
export function formatTemplate(
  template: string,
  args: ReadonlyArray<unknown>,
  kwargs: Readonly<Record<string, unknown>>,
): string {
  let out = '';
  let auto = 0;
  let pos = 0;

  while (pos < template.length) {
    const ch = template.charAt(pos);
    if (ch === '}') {
      if (template.charAt(pos + 1) !== '}') {
        throw valueError("Single '}' encountered in format string");
      }
      out += '}';
      pos += 2;
      continue;
    }
    if (ch !== '{') {
      out += ch;
      pos++;
      continue;
    }
    if (template.charAt(pos + 1) === '{') {
      out += '{';
      pos += 2;
      continue;
    }

    const end = template.indexOf('}', pos);
    if (end < 0) throw valueError("Single '{' encountered in format string");
    const field = template.slice(pos + 1, end);
    pos = end + 1;

    const match = /^([^!:]*)(?:!([rs]))?(?::(.*))?$/s.exec(field);
    if (!match) throw valueError(`invalid format field '${field}'`);
    const [, name = '', conversion, spec = ''] = match;

    let value: unknown;
    if (name === '' || /^\d+$/.test(name)) {
      const index = name === '' ? auto++ : Number(name);
      if (index >= args.length) {
        throw new SandboxRuntimeError(
          'IndexError',
          `Replacement index ${index} out of range for positional args tuple`,
        );
      }
      value = args[index];
    } else {
      const entry = getEntry({ ...kwargs }, name);
      if (!entry.found) throw new SandboxRuntimeError('KeyError', repr(name));
      value = entry.value;
    }

    out += formatValue(convertValue(value, conversion === 'r' || conversion === 's' ? conversion : null), spec);
  }

  return out;
}

const PERCENT_PATTERN = /%(?:\(([^)]*)\))?([-+ 0#]*)(\d+)?(?:\.(\d+))?([sridfFeEgGxXoc%])/g;

/** printf-style `template % values`. */
export function percentFormat(template: string, values: unknown): string {
  const positional = isTuple(values) ? values : [values];
  let next = 0;

  const out = template.replace(
    PERCENT_PATTERN,
    (_match, key: string | undefined, flags: string, width: string | undefined, precision: string | undefined, type: string) => {
      if (type === '%') return '%';

      let value: unknown;
      if (key !== undefined) {
        if (!isPlainObject(values)) {
          throw new SandboxRuntimeError('TypeError', 'format requires a mapping');
        }
        const entry = getEntry(values, key);
        if (!entry.found) throw new SandboxRuntimeError('KeyError', repr(key));
        value = entry.value;
      } else {
        if (next >= positional.length) {
          throw new SandboxRuntimeError('TypeError', 'not enough arguments for format string');
        }
        value = positional[next++];
      }

      const align = flags.includes('-') ? '<' : '';
      const sign = flags.includes('+') ? '+' : flags.includes(' ') ? ' ' : '';
      const zero = flags.includes('0') && !align ? '0' : '';
      const alternate = flags.includes('#') ? '#' : '';
      const size = width ?? '';
      const digits = precision !== undefined ? `.${precision}` : '';

      if (type === 's' || type === 'r') {
        const text = type === 'r' ? repr(value) : str(value);
        return formatValue(text, `${align}${size}${digits}`);
      }
      if (typeof value !== 'number' && typeof value !== 'boolean') {
        throw new SandboxRuntimeError(
          'TypeError',
          `%${type} format: a real number is required, not ${typeName(value)}`,
        );
      }
      const code = type === 'i' ? 'd' : type;
      const number = code === 'd' ? Math.trunc(Number(value)) : Number(value);
      return formatValue(number, `${align}${sign}${alternate}${zero}${size}${digits}${code}`);
    },
  );

  if (!isPlainObject(values) && next < positional.length) {
    throw new SandboxRuntimeError('TypeError', 'not all arguments converted during string formatting');
  }
  return out;
}
