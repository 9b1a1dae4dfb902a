// pattern: Functional Core

/**
 * Restriction checks over a parsed program.
 * Every violation is collected so a single compile reports all of them.
 */

import type { Expr, Slice, Stmt, Program } from './ast.ts';

export type PolicyViolation = {
  line: number;
  message: string;
};

/** Host escape hatches; referencing them at all is a compile error. */
export const FORBIDDEN_NAMES: ReadonlySet<string> = new Set([
  'exec',
  'eval',
  'compile',
  'open',
  'input',
  'breakpoint',
  'getattr',
  'setattr',
  'delattr',
  'hasattr',
  'globals',
  'locals',
  'vars',
  'dir',
  'type',
  'object',
  'memoryview',
  'help',
  'exit',
  'quit',
]);

function describeStatement(keyword: string): string {
  return keyword === 'from' ? 'import' : keyword;
}

export function checkPolicy(program: Program): Array<PolicyViolation> {
  const violations: Array<PolicyViolation> = [];
  const report = (line: number, message: string): void => {
    violations.push({ line, message });
  };

  function checkName(id: string, line: number): void {
    if (id.startsWith('_')) {
      report(line, `"${id}" is an invalid variable name because it starts with "_"`);
    } else if (FORBIDDEN_NAMES.has(id)) {
      report(line, `"${id}" is not allowed in restricted code`);
    }
  }

  function visitSlice(slice: Slice): void {
    for (const part of [slice.lower, slice.upper, slice.step]) {
      if (part) visitExpr(part);
    }
  }

  function visitTarget(target: Expr): void {
    if (target.kind === 'Attribute') {
      report(target.line, 'assignment to attributes is not allowed');
    }
    visitExpr(target);
  }

  function visitExpr(expr: Expr): void {
    switch (expr.kind) {
      case 'Constant':
        return;
      case 'FString':
        for (const part of expr.parts) {
          if (typeof part !== 'string') visitExpr(part.value);
        }
        return;
      case 'Name':
        checkName(expr.id, expr.line);
        return;
      case 'List':
      case 'Tuple':
        expr.elements.forEach(visitExpr);
        return;
      case 'Dict':
        expr.keys.forEach(visitExpr);
        expr.values.forEach(visitExpr);
        return;
      case 'ListComp':
        visitExpr(expr.iter);
        visitTarget(expr.target);
        expr.conditions.forEach(visitExpr);
        visitExpr(expr.element);
        return;
      case 'BinOp':
        visitExpr(expr.left);
        visitExpr(expr.right);
        return;
      case 'UnaryOp':
        visitExpr(expr.operand);
        return;
      case 'BoolOp':
        expr.values.forEach(visitExpr);
        return;
      case 'Compare':
        visitExpr(expr.left);
        expr.comparators.forEach(visitExpr);
        return;
      case 'IfExp':
        visitExpr(expr.body);
        visitExpr(expr.test);
        visitExpr(expr.orelse);
        return;
      case 'Call':
        visitExpr(expr.func);
        expr.args.forEach(visitExpr);
        expr.keywords.forEach((keyword) => visitExpr(keyword.value));
        return;
      case 'Attribute':
        visitExpr(expr.value);
        if (expr.attr.startsWith('_')) {
          report(expr.line, `"${expr.attr}" is an invalid attribute name because it starts with "_".`);
        }
        return;
      case 'Subscript':
        visitExpr(expr.value);
        if (expr.index.kind === 'Slice') visitSlice(expr.index);
        else visitExpr(expr.index);
        return;
      case 'Lambda':
        report(expr.line, '"lambda" expressions are not allowed.');
        return;
    }
  }

  function visitStmt(stmt: Stmt): void {
    switch (stmt.kind) {
      case 'Expr':
        visitExpr(stmt.value);
        return;
      case 'Assign':
        stmt.targets.forEach(visitTarget);
        visitExpr(stmt.value);
        return;
      case 'AugAssign':
        visitTarget(stmt.target);
        visitExpr(stmt.value);
        return;
      case 'If':
        visitExpr(stmt.test);
        stmt.body.forEach(visitStmt);
        stmt.orelse.forEach(visitStmt);
        return;
      case 'For':
        visitTarget(stmt.target);
        visitExpr(stmt.iter);
        stmt.body.forEach(visitStmt);
        return;
      case 'While':
        visitExpr(stmt.test);
        stmt.body.forEach(visitStmt);
        return;
      case 'Forbidden':
        report(stmt.line, `"${describeStatement(stmt.keyword)}" statements are not allowed.`);
        return;
      case 'Break':
      case 'Continue':
      case 'Pass':
        return;
    }
  }

  program.body.forEach(visitStmt);
  return violations;
}
