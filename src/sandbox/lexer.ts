// pattern: Functional Core

/**
 * Tokenizer for the sandbox language.
 * Indentation is turned into explicit indent/dedent tokens; newlines inside
 * brackets and after a backslash continuation are not logical line breaks.
 */

import { SandboxSyntaxError } from './errors.ts';

export type Token =
  | { type: 'name'; value: string; line: number }
  | { type: 'number'; value: number; line: number }
  | { type: 'string'; value: string; formatted: boolean; line: number }
  | { type: 'op'; value: string; line: number }
  | { type: 'newline' | 'indent' | 'dedent' | 'eof'; line: number };

const OPERATORS = [
  '**=', '//=', '->', '**', '//', '==', '!=', '<=', '>=', '+=', '-=', '*=', '/=', '%=',
  '+', '-', '*', '/', '%', '<', '>', '=', '(', ')', '[', ']', '{', '}', ',', ':', '.', ';',
];

const CLOSERS: Record<string, string> = { ')': '(', ']': '[', '}': '{' };

const NUMBER = /0[xX][0-9a-fA-F_]+|0[oO][0-7_]+|0[bB][01_]+|(?:\d[\d_]*(?:\.[\d_]*)?|\.\d[\d_]*)(?:[eE][+-]?\d[\d_]*)?/y;
const IDENTIFIER = /[A-Za-z_][A-Za-z0-9_]*/y;
const STRING_PREFIXES = new Set(['r', 'f', 'u', 'b', 'rf', 'fr', 'br', 'rb']);

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function parseNumber(text: string): number {
  const digits = text.replace(/_/g, '');
  const radix = digits.slice(0, 2).toLowerCase();
  if (radix === '0x') return parseInt(digits.slice(2), 16);
  if (radix === '0o') return parseInt(digits.slice(2), 8);
  if (radix === '0b') return parseInt(digits.slice(2), 2);
  return Number(digits);
}

export function tokenize(input: string): Array<Token> {
  const src = input.replace(/\r\n?/g, '\n');
  const tokens: Array<Token> = [];
  const indents: Array<number> = [0];
  const brackets: Array<{ ch: string; line: number }> = [];
  let pos = 0;
  let line = 1;
  let atLineStart = true;

  const currentIndent = (): number => indents[indents.length - 1] ?? 0;

  function readString(prefix: string): Token {
    const lowered = prefix.toLowerCase();
    if (lowered.includes('b')) {
      throw new SandboxSyntaxError('bytes literals are not supported', line);
    }
    const raw = lowered.includes('r');
    const formatted = lowered.includes('f');
    const quote = src.charAt(pos);
    const triple = src.startsWith(quote.repeat(3), pos);
    const startLine = line;
    const unterminated = triple
      ? 'unterminated triple-quoted string literal'
      : 'unterminated string literal';
    let value = '';
    pos += triple ? 3 : 1;

    for (;;) {
      if (pos >= src.length) {
        throw new SandboxSyntaxError(unterminated, startLine);
      }
      const ch = src.charAt(pos);
      if (triple ? src.startsWith(quote.repeat(3), pos) : ch === quote) {
        pos += triple ? 3 : 1;
        break;
      }
      if (ch === '\n') {
        if (!triple) {
          throw new SandboxSyntaxError(unterminated, startLine);
        }
        line++;
        value += ch;
        pos++;
        continue;
      }
      if (ch !== '\\') {
        value += ch;
        pos++;
        continue;
      }

      const next = src.charAt(pos + 1);
      pos += 2;
      if (next === '\n') {
        line++;
        if (raw) value += '\\\n';
        continue;
      }
      if (raw) {
        value += '\\' + next;
        continue;
      }
      switch (next) {
        case 'n': value += '\n'; break;
        case 't': value += '\t'; break;
        case 'r': value += '\r'; break;
        case '0': value += '\0'; break;
        case 'a': value += '\x07'; break;
        case 'b': value += '\b'; break;
        case 'f': value += '\f'; break;
        case 'v': value += '\v'; break;
        case '\\': case "'": case '"': value += next; break;
        case 'x': case 'u': case 'U': {
          const size = next === 'x' ? 2 : next === 'u' ? 4 : 8;
          const hex = src.slice(pos, pos + size);
          if (!/^[0-9a-fA-F]+$/.test(hex) || hex.length !== size) {
            throw new SandboxSyntaxError(`truncated \\${next} escape`, line);
          }
          value += String.fromCodePoint(parseInt(hex, 16));
          pos += size;
          break;
        }
        default:
          value += '\\' + next;
      }
    }

    return { type: 'string', value, formatted, line: startLine };
  }

  while (pos < src.length) {
    if (atLineStart && brackets.length === 0) {
      let width = 0;
      let scan = pos;
      while (scan < src.length) {
        const ch = src.charAt(scan);
        if (ch === ' ') width++;
        else if (ch === '\t') width = (Math.floor(width / 8) + 1) * 8;
        else break;
        scan++;
      }

      const first = src.charAt(scan);
      if (first === '') {
        pos = scan;
        break;
      }
      if (first === '\n') {
        pos = scan + 1;
        line++;
        continue;
      }
      if (first === '#') {
        while (scan < src.length && src.charAt(scan) !== '\n') scan++;
        pos = scan;
        continue;
      }

      pos = scan;
      atLineStart = false;
      if (width > currentIndent()) {
        indents.push(width);
        tokens.push({ type: 'indent', line });
      } else {
        while (width < currentIndent()) {
          indents.pop();
          tokens.push({ type: 'dedent', line });
        }
        if (width !== currentIndent()) {
          throw new SandboxSyntaxError('unindent does not match any outer indentation level', line);
        }
      }
      continue;
    }

    const ch = src.charAt(pos);
    const next = src.charAt(pos + 1);

    if (ch === '\n') {
      pos++;
      if (brackets.length === 0) {
        tokens.push({ type: 'newline', line });
        atLineStart = true;
      }
      line++;
      continue;
    }
    if (ch === ' ' || ch === '\t' || ch === '\f') {
      pos++;
      continue;
    }
    if (ch === '#') {
      while (pos < src.length && src.charAt(pos) !== '\n') pos++;
      continue;
    }
    if (ch === '\\' && next === '\n') {
      pos += 2;
      line++;
      continue;
    }

    if (isDigit(ch) || (ch === '.' && isDigit(next))) {
      NUMBER.lastIndex = pos;
      const match = NUMBER.exec(src);
      const text = match?.[0] ?? ch;
      pos += text.length;
      if (/[A-Za-z0-9_]/.test(src.charAt(pos))) {
        throw new SandboxSyntaxError('invalid decimal literal', line);
      }
      tokens.push({ type: 'number', value: parseNumber(text), line });
      continue;
    }

    IDENTIFIER.lastIndex = pos;
    const ident = IDENTIFIER.exec(src)?.[0];
    if (ident) {
      const after = src.charAt(pos + ident.length);
      if ((after === '"' || after === "'") && STRING_PREFIXES.has(ident.toLowerCase())) {
        pos += ident.length;
        tokens.push(readString(ident));
        continue;
      }
      pos += ident.length;
      tokens.push({ type: 'name', value: ident, line });
      continue;
    }

    if (ch === '"' || ch === "'") {
      tokens.push(readString(''));
      continue;
    }

    const op = OPERATORS.find((candidate) => src.startsWith(candidate, pos));
    if (!op) {
      throw new SandboxSyntaxError(`invalid character '${ch}'`, line);
    }
    if (op === '(' || op === '[' || op === '{') {
      brackets.push({ ch: op, line });
    } else if (op in CLOSERS) {
      const open = brackets.pop();
      if (!open || open.ch !== CLOSERS[op]) {
        throw new SandboxSyntaxError(`unmatched '${op}'`, line);
      }
    }
    pos += op.length;
    tokens.push({ type: 'op', value: op, line });
  }

  const unclosed = brackets[brackets.length - 1];
  if (unclosed) {
    throw new SandboxSyntaxError(`'${unclosed.ch}' was never closed`, unclosed.line);
  }

  const last = tokens[tokens.length - 1];
  if (last && last.type !== 'newline' && last.type !== 'dedent') {
    tokens.push({ type: 'newline', line });
  }
  while (indents.length > 1) {
    indents.pop();
    tokens.push({ type: 'dedent', line });
  }
  tokens.push({ type: 'eof', line });

  return tokens;
}
