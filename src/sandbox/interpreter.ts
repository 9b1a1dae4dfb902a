// pattern: Functional Core

/**
 * Tree-walking evaluator for compiled sandbox programs.
 *
 * Name lookup goes comprehension scopes, then session bindings, then the
 * read-only globals (tools over builtins). Every call is awaited, so tool
 * handlers may be asynchronous; calls never overlap.
 */

import type { Expr, Slice, Stmt, Program } from './ast.ts';
import { callValue, getAttribute } from './builtins.ts';
import { SandboxRuntimeError } from './errors.ts';
import { convertValue, formatValue, percentFormat } from './format.ts';
import {
  binaryOp,
  compare,
  getItem,
  getSlice,
  iterate,
  setItem,
  setSlice,
  unaryOp,
  type SliceBounds,
} from './operators.ts';
import { isList, makeDict, makeTuple, setEntry, truthy, typeName, type IterationTick } from './values.ts';

type Signal = 'break' | 'continue' | null;

export type InterpreterOptions = {
  bindings: Map<string, unknown>;
  globals: ReadonlyMap<string, unknown>;
  /** Shared with the builtins so loops, iterating builtins and repetition draw on one budget. */
  tick: IterationTick;
};

class Interpreter {
  private readonly scopes: Array<Map<string, unknown>> = [];

  constructor(private readonly options: InterpreterOptions) {}

  async run(program: Program): Promise<void> {
    await this.execBlock(program.body);
  }

  private tick(): void {
    this.options.tick(1);
  }

  private collect(value: unknown): Array<unknown> {
    const items: Array<unknown> = [];
    for (const item of iterate(value)) {
      this.tick();
      items.push(item);
    }
    return items;
  }

  private async execBlock(body: ReadonlyArray<Stmt>): Promise<Signal> {
    for (const stmt of body) {
      const signal = await this.exec(stmt);
      if (signal) return signal;
    }
    return null;
  }

  private async exec(stmt: Stmt): Promise<Signal> {
    switch (stmt.kind) {
      case 'Expr':
        await this.evaluate(stmt.value);
        return null;
      case 'Assign': {
        const value = await this.evaluate(stmt.value);
        for (const target of stmt.targets) {
          await this.assign(target, value);
        }
        return null;
      }
      case 'AugAssign':
        await this.augAssign(stmt);
        return null;
      case 'If':
        return truthy(await this.evaluate(stmt.test))
          ? await this.execBlock(stmt.body)
          : await this.execBlock(stmt.orelse);
      case 'For': {
        const iterable = iterate(await this.evaluate(stmt.iter));
        for (const item of iterable) {
          this.tick();
          await this.assign(stmt.target, item);
          const signal = await this.execBlock(stmt.body);
          if (signal === 'break') break;
        }
        return null;
      }
      case 'While':
        while (truthy(await this.evaluate(stmt.test))) {
          this.tick();
          const signal = await this.execBlock(stmt.body);
          if (signal === 'break') break;
        }
        return null;
      case 'Break':
        return 'break';
      case 'Continue':
        return 'continue';
      case 'Pass':
        return null;
      case 'Forbidden':
        throw new SandboxRuntimeError('RuntimeError', `"${stmt.keyword}" statements are not allowed`);
    }
  }

  private async augAssign(stmt: Extract<Stmt, { kind: 'AugAssign' }>): Promise<void> {
    const { target } = stmt;
    const apply = async (current: unknown): Promise<unknown> => {
      const operand = await this.evaluate(stmt.value);
      if (stmt.op === '+' && isList(current)) {
        current.push(...this.collect(operand));
        return current;
      }
      return this.binary(stmt.op, current, operand);
    };

    if (target.kind === 'Name') {
      this.store(target.id, await apply(this.lookup(target.id)));
      return;
    }
    if (target.kind === 'Subscript') {
      const container = await this.evaluate(target.value);
      if (target.index.kind === 'Slice') {
        const bounds = await this.sliceBounds(target.index);
        setSlice(container, bounds, await apply(getSlice(container, bounds)));
        return;
      }
      const index = await this.evaluate(target.index);
      setItem(container, index, await apply(getItem(container, index)));
      return;
    }
    throw new SandboxRuntimeError('TypeError', 'illegal expression for augmented assignment');
  }

  private store(name: string, value: unknown, scope?: Map<string, unknown>): void {
    (scope ?? this.options.bindings).set(name, value);
  }

  private lookup(name: string): unknown {
    for (let depth = this.scopes.length - 1; depth >= 0; depth--) {
      const scope = this.scopes[depth];
      if (scope?.has(name)) return scope.get(name);
    }
    if (this.options.bindings.has(name)) return this.options.bindings.get(name);
    if (this.options.globals.has(name)) return this.options.globals.get(name);
    throw new SandboxRuntimeError('NameError', `name '${name}' is not defined`);
  }

  private async assign(target: Expr, value: unknown, scope?: Map<string, unknown>): Promise<void> {
    switch (target.kind) {
      case 'Name':
        this.store(target.id, value, scope);
        return;
      case 'Tuple':
      case 'List': {
        const items = this.collect(value);
        const expected = target.elements.length;
        if (items.length > expected) {
          throw new SandboxRuntimeError('ValueError', `too many values to unpack (expected ${expected})`);
        }
        if (items.length < expected) {
          throw new SandboxRuntimeError(
            'ValueError',
            `not enough values to unpack (expected ${expected}, got ${items.length})`,
          );
        }
        for (const [index, element] of target.elements.entries()) {
          await this.assign(element, items[index], scope);
        }
        return;
      }
      case 'Subscript': {
        const container = await this.evaluate(target.value);
        if (target.index.kind === 'Slice') {
          setSlice(container, await this.sliceBounds(target.index), value);
        } else {
          setItem(container, await this.evaluate(target.index), value);
        }
        return;
      }
      default:
        throw new SandboxRuntimeError('TypeError', `cannot assign to ${target.kind.toLowerCase()}`);
    }
  }

  private async sliceBounds(slice: Slice): Promise<SliceBounds> {
    return {
      lower: slice.lower ? await this.evaluate(slice.lower) : null,
      upper: slice.upper ? await this.evaluate(slice.upper) : null,
      step: slice.step ? await this.evaluate(slice.step) : null,
    };
  }

  private binary(op: Extract<Expr, { kind: 'BinOp' }>['op'], left: unknown, right: unknown): unknown {
    if (op === '%' && typeof left === 'string') {
      return percentFormat(left, right);
    }
    return binaryOp(op, left, right, this.options.tick);
  }

  private async evaluateAll(exprs: ReadonlyArray<Expr>): Promise<Array<unknown>> {
    const values: Array<unknown> = [];
    for (const expr of exprs) {
      values.push(await this.evaluate(expr));
    }
    return values;
  }

  private async evaluate(expr: Expr): Promise<unknown> {
    switch (expr.kind) {
      case 'Constant':
        return expr.value;
      case 'FString': {
        let out = '';
        for (const part of expr.parts) {
          if (typeof part === 'string') {
            out += part;
          } else {
            const value = convertValue(await this.evaluate(part.value), part.conversion);
            out += formatValue(value, part.spec);
          }
        }
        return out;
      }
      case 'Name':
        return this.lookup(expr.id);
      case 'List':
        return await this.evaluateAll(expr.elements);
      case 'Tuple':
        return makeTuple(await this.evaluateAll(expr.elements));
      case 'Dict': {
        const entries: Array<[string, unknown]> = [];
        for (const [index, keyExpr] of expr.keys.entries()) {
          const key = await this.evaluate(keyExpr);
          const valueExpr = expr.values[index];
          const value = valueExpr ? await this.evaluate(valueExpr) : null;
          if (typeof key !== 'string') {
            throw new SandboxRuntimeError('TypeError', `dict keys must be str, not ${typeName(key)}`);
          }
          entries.push([key, value]);
        }
        return makeDict(entries);
      }
      case 'ListComp':
        return await this.listComp(expr);
      case 'BinOp': {
        const left = await this.evaluate(expr.left);
        const right = await this.evaluate(expr.right);
        return this.binary(expr.op, left, right);
      }
      case 'UnaryOp': {
        const operand = await this.evaluate(expr.operand);
        return expr.op === 'not' ? !truthy(operand) : unaryOp(expr.op, operand);
      }
      case 'BoolOp': {
        let value: unknown = null;
        for (const operand of expr.values) {
          value = await this.evaluate(operand);
          if (expr.op === 'and' ? !truthy(value) : truthy(value)) return value;
        }
        return value;
      }
      case 'Compare': {
        let left = await this.evaluate(expr.left);
        for (const [index, op] of expr.ops.entries()) {
          const comparator = expr.comparators[index];
          if (!comparator) break;
          const right = await this.evaluate(comparator);
          if (!compare(op, left, right)) return false;
          left = right;
        }
        return true;
      }
      case 'IfExp':
        return truthy(await this.evaluate(expr.test))
          ? await this.evaluate(expr.body)
          : await this.evaluate(expr.orelse);
      case 'Call': {
        const fn =
          expr.func.kind === 'Attribute'
            ? getAttribute(await this.evaluate(expr.func.value), expr.func.attr, this.options.tick)
            : await this.evaluate(expr.func);
        const args = await this.evaluateAll(expr.args);
        const kwargs = makeDict();
        for (const keyword of expr.keywords) {
          setEntry(kwargs, keyword.name, await this.evaluate(keyword.value));
        }
        const result = await callValue(fn, args, kwargs);
        return result === undefined ? null : result;
      }
      case 'Attribute':
        return getAttribute(await this.evaluate(expr.value), expr.attr, this.options.tick);
      case 'Subscript': {
        const container = await this.evaluate(expr.value);
        if (expr.index.kind === 'Slice') {
          return getSlice(container, await this.sliceBounds(expr.index));
        }
        return getItem(container, await this.evaluate(expr.index));
      }
      case 'Lambda':
        throw new SandboxRuntimeError('RuntimeError', '"lambda" expressions are not allowed');
    }
  }

  private async listComp(expr: Extract<Expr, { kind: 'ListComp' }>): Promise<Array<unknown>> {
    const iterable = iterate(await this.evaluate(expr.iter));
    const scope = new Map<string, unknown>();
    const results: Array<unknown> = [];
    this.scopes.push(scope);
    try {
      for (const item of iterable) {
        this.tick();
        await this.assign(expr.target, item, scope);
        if (await this.passes(expr.conditions)) {
          results.push(await this.evaluate(expr.element));
        }
      }
    } finally {
      this.scopes.pop();
    }
    return results;
  }

  private async passes(conditions: ReadonlyArray<Expr>): Promise<boolean> {
    for (const condition of conditions) {
      if (!truthy(await this.evaluate(condition))) return false;
    }
    return true;
  }
}

export async function execute(program: Program, options: InterpreterOptions): Promise<void> {
  await new Interpreter(options).run(program);
}
