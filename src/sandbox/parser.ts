// pattern: Functional Core

/**
 * Recursive descent parser for the sandbox language.
 * Produces the first syntax error only; restriction checks happen later in
 * the policy pass so they can be reported together.
 */

import type {
  BinaryOperator,
  CompareOperator,
  Expr,
  FormattedValue,
  Keyword,
  Program,
  Slice,
  Stmt,
} from './ast.ts';
import { SandboxSyntaxError } from './errors.ts';
import { tokenize, type Token } from './lexer.ts';

const KEYWORDS = new Set([
  'False', 'None', 'True', 'and', 'as', 'assert', 'async', 'await', 'break',
  'class', 'continue', 'def', 'del', 'elif', 'else', 'except', 'finally',
  'for', 'from', 'global', 'if', 'import', 'in', 'is', 'lambda', 'nonlocal',
  'not', 'or', 'pass', 'raise', 'return', 'try', 'while', 'with', 'yield',
]);

const FORBIDDEN_STATEMENTS = new Set([
  'import', 'from', 'def', 'class', 'try', 'with', 'global', 'nonlocal',
  'del', 'raise', 'assert', 'async',
]);

const AUGMENTED: Record<string, BinaryOperator> = {
  '+=': '+',
  '-=': '-',
  '*=': '*',
  '/=': '/',
  '//=': '//',
  '%=': '%',
  '**=': '**',
};

const COMPARISONS = new Set(['==', '!=', '<', '<=', '>', '>=']);

const EXPRESSION_STARTERS = new Set(['(', '[', '{', '-', '+']);

class Parser {
  private index = 0;
  private loopDepth = 0;

  constructor(private readonly tokens: ReadonlyArray<Token>) {}

  private peek(offset = 0): Token {
    const token = this.tokens[this.index + offset] ?? this.tokens[this.tokens.length - 1];
    return token ?? { type: 'eof', line: 1 };
  }

  private next(): Token {
    const token = this.peek();
    if (this.index < this.tokens.length) {
      this.index++;
    }
    return token;
  }

  private isOp(value: string, offset = 0): boolean {
    const token = this.peek(offset);
    return token.type === 'op' && token.value === value;
  }

  private isKeyword(value: string, offset = 0): boolean {
    const token = this.peek(offset);
    return token.type === 'name' && token.value === value;
  }

  private error(token: Token, message = 'invalid syntax'): SandboxSyntaxError {
    return new SandboxSyntaxError(message, token.line);
  }

  private expectOp(value: string): Token {
    if (!this.isOp(value)) {
      throw this.error(this.peek());
    }
    return this.next();
  }

  private expectKeyword(value: string): Token {
    if (!this.isKeyword(value)) {
      throw this.error(this.peek());
    }
    return this.next();
  }

  private expectName(): string {
    const token = this.next();
    if (token.type !== 'name' || KEYWORDS.has(token.value)) {
      throw this.error(token);
    }
    return token.value;
  }

  private expectEndOfStatement(): void {
    const token = this.peek();
    if (token.type === 'newline') {
      this.next();
    } else if (token.type !== 'eof') {
      throw this.error(token);
    }
  }

  private startsExpression(token: Token): boolean {
    switch (token.type) {
      case 'number':
      case 'string':
        return true;
      case 'name':
        return !KEYWORDS.has(token.value) || ['True', 'False', 'None', 'not', 'lambda'].includes(token.value);
      case 'op':
        return EXPRESSION_STARTERS.has(token.value);
      default:
        return false;
    }
  }

  parseProgram(): Program {
    const body: Array<Stmt> = [];
    while (this.peek().type !== 'eof') {
      const token = this.peek();
      if (token.type === 'newline') {
        this.next();
        continue;
      }
      if (token.type === 'indent') {
        throw this.error(token, 'unexpected indent');
      }
      body.push(...this.parseStatement());
    }
    return { body };
  }

  parseStandaloneExpression(): Expr {
    const expr = this.parseTestList();
    this.expectEndOfStatement();
    if (this.peek().type !== 'eof') {
      throw this.error(this.peek());
    }
    return expr;
  }

  private parseStatement(): Array<Stmt> {
    const token = this.peek();
    if (token.type === 'name') {
      switch (token.value) {
        case 'if':
          return [this.parseIf()];
        case 'for':
          return [this.parseFor()];
        case 'while':
          return [this.parseWhile()];
        default:
          if (FORBIDDEN_STATEMENTS.has(token.value)) {
            return [this.parseForbidden()];
          }
      }
    }
    return this.parseSimpleStatements();
  }

  private parseBlock(): Array<Stmt> {
    this.expectOp(':');
    if (this.peek().type !== 'newline') {
      return this.parseSimpleStatements();
    }

    this.next();
    if (this.peek().type !== 'indent') {
      throw this.error(this.peek(), 'expected an indented block');
    }
    this.next();

    const body: Array<Stmt> = [];
    while (this.peek().type !== 'dedent' && this.peek().type !== 'eof') {
      if (this.peek().type === 'newline') {
        this.next();
        continue;
      }
      body.push(...this.parseStatement());
    }
    if (this.peek().type === 'dedent') {
      this.next();
    }
    return body;
  }

  private parseIf(): Stmt {
    const line = this.next().line;
    const test = this.parseTest();
    const body = this.parseBlock();
    let orelse: Array<Stmt> = [];

    if (this.isKeyword('elif')) {
      orelse = [this.parseIf()];
    } else if (this.isKeyword('else')) {
      this.next();
      orelse = this.parseBlock();
    }
    return { kind: 'If', test, body, orelse, line };
  }

  private parseLoopBody(): Array<Stmt> {
    this.loopDepth++;
    try {
      return this.parseBlock();
    } finally {
      this.loopDepth--;
    }
  }

  private parseFor(): Stmt {
    const line = this.next().line;
    const target = this.parseTargetList();
    this.checkAssignable(target);
    this.expectKeyword('in');
    const iter = this.parseTestList();
    const body = this.parseLoopBody();
    if (this.isKeyword('else')) {
      throw this.error(this.peek(), "'else' clauses on loops are not supported");
    }
    return { kind: 'For', target, iter, body, line };
  }

  private parseWhile(): Stmt {
    const line = this.next().line;
    const test = this.parseTest();
    const body = this.parseLoopBody();
    if (this.isKeyword('else')) {
      throw this.error(this.peek(), "'else' clauses on loops are not supported");
    }
    return { kind: 'While', test, body, line };
  }

  private skipStatement(): void {
    let last: Token | undefined;
    while (this.peek().type !== 'newline' && this.peek().type !== 'eof') {
      last = this.next();
    }
    if (this.peek().type === 'newline') {
      this.next();
    }
    if (last?.type === 'op' && last.value === ':' && this.peek().type === 'indent') {
      let depth = 0;
      do {
        const token = this.next();
        if (token.type === 'indent') depth++;
        else if (token.type === 'dedent') depth--;
        else if (token.type === 'eof') return;
      } while (depth > 0);
    }
  }

  private parseForbidden(): Stmt {
    const token = this.next();
    const keyword = token.type === 'name' ? token.value : '';
    this.skipStatement();
    if (keyword === 'try') {
      while (this.isKeyword('except') || this.isKeyword('else') || this.isKeyword('finally')) {
        this.next();
        this.skipStatement();
      }
    }
    return { kind: 'Forbidden', keyword, line: token.line };
  }

  private parseSimpleStatements(): Array<Stmt> {
    const statements = [this.parseSimple()];
    while (this.isOp(';')) {
      this.next();
      const token = this.peek();
      if (token.type === 'newline' || token.type === 'eof') {
        break;
      }
      statements.push(this.parseSimple());
    }
    this.expectEndOfStatement();
    return statements;
  }

  private parseSimple(): Stmt {
    const token = this.peek();

    if (token.type === 'name') {
      switch (token.value) {
        case 'pass':
          this.next();
          return { kind: 'Pass', line: token.line };
        case 'break':
        case 'continue':
          if (this.loopDepth === 0) {
            throw this.error(token, `'${token.value}' outside loop`);
          }
          this.next();
          return { kind: token.value === 'break' ? 'Break' : 'Continue', line: token.line };
        case 'return':
        case 'yield':
        case 'await':
          throw this.error(token, `'${token.value}' outside function`);
        default:
          break;
      }
    }

    const first = this.parseTestList();

    if (this.isOp('=')) {
      const chain: Array<Expr> = [first];
      while (this.isOp('=')) {
        this.next();
        chain.push(this.parseTestList());
      }
      const value = chain.pop() ?? first;
      for (const target of chain) {
        this.checkAssignable(target);
      }
      return { kind: 'Assign', targets: chain, value, line: token.line };
    }

    const following = this.peek();
    if (following.type === 'op' && following.value in AUGMENTED) {
      const op = AUGMENTED[following.value];
      if (
        !op ||
        (first.kind !== 'Name' && first.kind !== 'Subscript' && first.kind !== 'Attribute')
      ) {
        throw this.error(following, 'illegal expression for augmented assignment');
      }
      this.next();
      const value = this.parseTestList();
      return { kind: 'AugAssign', target: first, op, value, line: token.line };
    }

    return { kind: 'Expr', value: first, line: token.line };
  }

  private checkAssignable(target: Expr): void {
    switch (target.kind) {
      case 'Name':
      case 'Subscript':
      case 'Attribute':
        return;
      case 'Tuple':
      case 'List':
        target.elements.forEach((element) => this.checkAssignable(element));
        return;
      case 'Constant':
        throw new SandboxSyntaxError('cannot assign to literal', target.line);
      case 'Call':
        throw new SandboxSyntaxError('cannot assign to function call', target.line);
      default:
        throw new SandboxSyntaxError('cannot assign to expression', target.line);
    }
  }

  private parseTargetList(): Expr {
    const line = this.peek().line;
    const first = this.parseArith();
    if (!this.isOp(',')) {
      return first;
    }
    const elements = [first];
    while (this.isOp(',')) {
      this.next();
      if (!this.startsExpression(this.peek())) break;
      elements.push(this.parseArith());
    }
    return { kind: 'Tuple', elements, line };
  }

  private parseTestList(): Expr {
    const line = this.peek().line;
    const first = this.parseTest();
    if (!this.isOp(',')) {
      return first;
    }
    const elements = [first];
    while (this.isOp(',')) {
      this.next();
      if (!this.startsExpression(this.peek())) break;
      elements.push(this.parseTest());
    }
    return { kind: 'Tuple', elements, line };
  }

  private parseTest(): Expr {
    if (this.isKeyword('lambda')) {
      return this.parseLambda();
    }
    const body = this.parseOrTest();
    if (this.isKeyword('if')) {
      this.next();
      const test = this.parseOrTest();
      this.expectKeyword('else');
      const orelse = this.parseTest();
      return { kind: 'IfExp', test, body, orelse, line: body.line };
    }
    return body;
  }

  private parseLambda(): Expr {
    const line = this.next().line;
    const params: Array<string> = [];
    while (!this.isOp(':')) {
      params.push(this.expectName());
      if (!this.isOp(',')) break;
      this.next();
    }
    this.expectOp(':');
    const body = this.parseTest();
    return { kind: 'Lambda', params, body, line };
  }

  private parseOrTest(): Expr {
    const first = this.parseAndTest();
    if (!this.isKeyword('or')) return first;
    const values = [first];
    while (this.isKeyword('or')) {
      this.next();
      values.push(this.parseAndTest());
    }
    return { kind: 'BoolOp', op: 'or', values, line: first.line };
  }

  private parseAndTest(): Expr {
    const first = this.parseNotTest();
    if (!this.isKeyword('and')) return first;
    const values = [first];
    while (this.isKeyword('and')) {
      this.next();
      values.push(this.parseNotTest());
    }
    return { kind: 'BoolOp', op: 'and', values, line: first.line };
  }

  private parseNotTest(): Expr {
    if (this.isKeyword('not')) {
      const line = this.next().line;
      return { kind: 'UnaryOp', op: 'not', operand: this.parseNotTest(), line };
    }
    return this.parseComparison();
  }

  private readCompareOperator(): CompareOperator | null {
    const token = this.peek();
    if (token.type === 'op' && COMPARISONS.has(token.value)) {
      this.next();
      switch (token.value) {
        case '==': return '==';
        case '!=': return '!=';
        case '<': return '<';
        case '<=': return '<=';
        case '>': return '>';
        default: return '>=';
      }
    }
    if (this.isKeyword('in')) {
      this.next();
      return 'in';
    }
    if (this.isKeyword('not') && this.isKeyword('in', 1)) {
      this.next();
      this.next();
      return 'not in';
    }
    if (this.isKeyword('is')) {
      this.next();
      if (this.isKeyword('not')) {
        this.next();
        return 'is not';
      }
      return 'is';
    }
    return null;
  }

  private parseComparison(): Expr {
    const left = this.parseArith();
    const ops: Array<CompareOperator> = [];
    const comparators: Array<Expr> = [];
    for (let op = this.readCompareOperator(); op; op = this.readCompareOperator()) {
      ops.push(op);
      comparators.push(this.parseArith());
    }
    if (ops.length === 0) return left;
    return { kind: 'Compare', left, ops, comparators, line: left.line };
  }

  private parseArith(): Expr {
    let left = this.parseTerm();
    while (this.isOp('+') || this.isOp('-')) {
      const op: BinaryOperator = this.isOp('+') ? '+' : '-';
      this.next();
      left = { kind: 'BinOp', op, left, right: this.parseTerm(), line: left.line };
    }
    return left;
  }

  private parseTerm(): Expr {
    let left = this.parseFactor();
    for (;;) {
      let op: BinaryOperator;
      if (this.isOp('*')) op = '*';
      else if (this.isOp('/')) op = '/';
      else if (this.isOp('//')) op = '//';
      else if (this.isOp('%')) op = '%';
      else return left;
      this.next();
      left = { kind: 'BinOp', op, left, right: this.parseFactor(), line: left.line };
    }
  }

  private parseFactor(): Expr {
    if (this.isOp('-') || this.isOp('+')) {
      const token = this.next();
      const op = token.type === 'op' && token.value === '-' ? '-' : '+';
      return { kind: 'UnaryOp', op, operand: this.parseFactor(), line: token.line };
    }
    return this.parsePower();
  }

  private parsePower(): Expr {
    const base = this.parseAtomExpr();
    if (this.isOp('**')) {
      this.next();
      return { kind: 'BinOp', op: '**', left: base, right: this.parseFactor(), line: base.line };
    }
    return base;
  }

  private parseAtomExpr(): Expr {
    let expr = this.parseAtom();
    for (;;) {
      if (this.isOp('(')) {
        expr = this.parseCall(expr);
      } else if (this.isOp('[')) {
        this.next();
        const index = this.parseSubscriptIndex();
        this.expectOp(']');
        expr = { kind: 'Subscript', value: expr, index, line: expr.line };
      } else if (this.isOp('.')) {
        this.next();
        const attr = this.expectName();
        expr = { kind: 'Attribute', value: expr, attr, line: expr.line };
      } else {
        return expr;
      }
    }
  }

  private parseCall(func: Expr): Expr {
    this.expectOp('(');
    const args: Array<Expr> = [];
    const keywords: Array<Keyword> = [];

    while (!this.isOp(')')) {
      const token = this.peek();
      if (token.type === 'op' && (token.value === '*' || token.value === '**')) {
        throw this.error(token, 'argument unpacking is not supported');
      }

      if (token.type === 'name' && this.isOp('=', 1)) {
        const name = this.expectName();
        this.next();
        if (keywords.some((keyword) => keyword.name === name)) {
          throw this.error(token, `keyword argument repeated: ${name}`);
        }
        keywords.push({ name, value: this.parseTest() });
      } else {
        if (keywords.length > 0) {
          throw this.error(token, 'positional argument follows keyword argument');
        }
        const arg = this.parseTest();
        if (this.isKeyword('for') && args.length === 0) {
          args.push(this.parseComprehension(arg, ')'));
          return { kind: 'Call', func, args, keywords, line: func.line };
        }
        args.push(arg);
      }

      if (!this.isOp(',')) break;
      this.next();
    }

    this.expectOp(')');
    return { kind: 'Call', func, args, keywords, line: func.line };
  }

  private parseSubscriptIndex(): Expr | Slice {
    let lower: Expr | null = null;
    if (!this.isOp(':')) {
      lower = this.parseTest();
      if (!this.isOp(':')) {
        return lower;
      }
    }
    this.next();
    const upper = this.isOp(']') || this.isOp(':') ? null : this.parseTest();
    let step: Expr | null = null;
    if (this.isOp(':')) {
      this.next();
      if (!this.isOp(']')) {
        step = this.parseTest();
      }
    }
    return { kind: 'Slice', lower, upper, step };
  }

  private parseComprehension(element: Expr, closer: string): Expr {
    this.expectKeyword('for');
    const target = this.parseTargetList();
    this.checkAssignable(target);
    this.expectKeyword('in');
    const iter = this.parseOrTest();
    const conditions: Array<Expr> = [];
    while (this.isKeyword('if')) {
      this.next();
      conditions.push(this.parseOrTest());
    }
    if (this.isKeyword('for')) {
      throw this.error(this.peek(), 'nested comprehensions are not supported');
    }
    this.expectOp(closer);
    return { kind: 'ListComp', element, target, iter, conditions, line: element.line };
  }

  private parseSequence(closer: string, line: number, kind: 'List' | 'Tuple'): Expr {
    const first = this.parseTest();
    if (this.isKeyword('for')) {
      return this.parseComprehension(first, closer);
    }
    if (kind === 'Tuple' && !this.isOp(',')) {
      this.expectOp(closer);
      return first;
    }

    const elements = [first];
    while (this.isOp(',')) {
      this.next();
      if (this.isOp(closer)) break;
      elements.push(this.parseTest());
    }
    this.expectOp(closer);
    return { kind, elements, line };
  }

  private parseDict(line: number): Expr {
    const keys: Array<Expr> = [];
    const values: Array<Expr> = [];
    while (!this.isOp('}')) {
      const key = this.parseTest();
      if (!this.isOp(':')) {
        throw this.error(this.peek(), 'set literals are not supported');
      }
      this.next();
      keys.push(key);
      values.push(this.parseTest());
      if (this.isKeyword('for')) {
        throw this.error(this.peek(), 'dict comprehensions are not supported');
      }
      if (!this.isOp(',')) break;
      this.next();
    }
    this.expectOp('}');
    return { kind: 'Dict', keys, values, line };
  }

  private parseStrings(): Expr {
    const line = this.peek().line;
    const parts: Array<string | FormattedValue> = [];
    let formatted = false;

    for (;;) {
      const token = this.peek();
      if (token.type !== 'string') break;
      this.next();
      if (token.formatted) {
        formatted = true;
        parts.push(...parseFormatted(token.value, token.line));
      } else {
        parts.push(token.value);
      }
    }

    if (!formatted) {
      return { kind: 'Constant', value: parts.join(''), line };
    }

    const merged: Array<string | FormattedValue> = [];
    for (const part of parts) {
      const last = merged[merged.length - 1];
      if (typeof part === 'string' && typeof last === 'string') {
        merged[merged.length - 1] = last + part;
      } else if (part !== '') {
        merged.push(part);
      }
    }
    return { kind: 'FString', parts: merged, line };
  }

  private parseAtom(): Expr {
    const token = this.peek();

    switch (token.type) {
      case 'number':
        this.next();
        return { kind: 'Constant', value: token.value, line: token.line };
      case 'string':
        return this.parseStrings();
      case 'name':
        this.next();
        switch (token.value) {
          case 'True':
            return { kind: 'Constant', value: true, line: token.line };
          case 'False':
            return { kind: 'Constant', value: false, line: token.line };
          case 'None':
            return { kind: 'Constant', value: null, line: token.line };
          default:
            if (KEYWORDS.has(token.value)) {
              throw this.error(token);
            }
            return { kind: 'Name', id: token.value, line: token.line };
        }
      case 'op':
        if (token.value === '(') {
          this.next();
          if (this.isOp(')')) {
            this.next();
            return { kind: 'Tuple', elements: [], line: token.line };
          }
          return this.parseSequence(')', token.line, 'Tuple');
        }
        if (token.value === '[') {
          this.next();
          if (this.isOp(']')) {
            this.next();
            return { kind: 'List', elements: [], line: token.line };
          }
          return this.parseSequence(']', token.line, 'List');
        }
        if (token.value === '{') {
          this.next();
          return this.parseDict(token.line);
        }
        throw this.error(token);
      default:
        throw this.error(token);
    }
  }
}

function parseEmbedded(source: string, line: number): Expr {
  try {
    const tokens = tokenize(source.trim()).map((token) => ({ ...token, line }));
    return new Parser(tokens).parseStandaloneExpression();
  } catch (error) {
    if (error instanceof SandboxSyntaxError) {
      throw new SandboxSyntaxError(`f-string: ${error.message}`, line);
    }
    throw error;
  }
}

/** Split an f-string body into literal text and `{expression!conversion:spec}` fields. */
function parseFormatted(text: string, line: number): Array<string | FormattedValue> {
  const parts: Array<string | FormattedValue> = [];
  let literal = '';
  let index = 0;

  while (index < text.length) {
    const ch = text.charAt(index);

    if (ch === '}') {
      if (text.charAt(index + 1) !== '}') {
        throw new SandboxSyntaxError("f-string: single '}' is not allowed", line);
      }
      literal += '}';
      index += 2;
      continue;
    }
    if (ch !== '{') {
      literal += ch;
      index++;
      continue;
    }
    if (text.charAt(index + 1) === '{') {
      literal += '{';
      index += 2;
      continue;
    }

    let depth = 0;
    let quote = '';
    let bang = -1;
    let colon = -1;
    let end = index + 1;
    for (; end < text.length; end++) {
      const c = text.charAt(end);
      if (quote) {
        if (c === quote) quote = '';
        continue;
      }
      if (c === '"' || c === "'") {
        quote = c;
      } else if (c === '(' || c === '[' || c === '{') {
        depth++;
      } else if (c === ')' || c === ']' || c === '}') {
        if (depth === 0 && c === '}') break;
        depth = Math.max(0, depth - 1);
      } else if (depth === 0 && colon < 0 && bang < 0 && c === '!' && text.charAt(end + 1) !== '=') {
        bang = end;
      } else if (depth === 0 && colon < 0 && c === ':') {
        colon = end;
      }
    }
    if (end >= text.length) {
      throw new SandboxSyntaxError("f-string: expecting '}'", line);
    }

    const exprEnd = bang >= 0 ? bang : colon >= 0 ? colon : end;
    const source = text.slice(index + 1, exprEnd);
    if (!source.trim()) {
      throw new SandboxSyntaxError('f-string: empty expression not allowed', line);
    }

    let conversion: FormattedValue['conversion'] = null;
    if (bang >= 0) {
      const flag = text.slice(bang + 1, colon >= 0 ? colon : end).trim();
      if (flag === 'r' || flag === 'a') conversion = 'r';
      else if (flag === 's') conversion = 's';
      else throw new SandboxSyntaxError('f-string: invalid conversion character', line);
    }

    const spec = colon >= 0 ? text.slice(colon + 1, end) : '';
    if (spec.includes('{')) {
      throw new SandboxSyntaxError('f-string: nested format specifications are not supported', line);
    }

    if (literal) {
      parts.push(literal);
      literal = '';
    }
    parts.push({ value: parseEmbedded(source, line), conversion, spec });
    index = end + 1;
  }

  if (literal) {
    parts.push(literal);
  }
  return parts;
}

export function parse(source: string): Program {
  return new Parser(tokenize(source)).parseProgram();
}
