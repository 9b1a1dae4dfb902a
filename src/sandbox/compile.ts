// pattern: Functional Core

import type { Program } from './ast.ts';
import { SandboxSyntaxError } from './errors.ts';
import { parse } from './parser.ts';
import { checkPolicy } from './policy.ts';

export type CompileResult =
  | { program: Program; errors: [] }
  | { program: null; errors: Array<string> };

/**
 * Parse and policy-check sandbox source.
 * A syntax error stops at the first problem; policy violations are all listed.
 */
export function compileRestricted(source: string): CompileResult {
  let program: Program;
  try {
    program = parse(source);
  } catch (error) {
    if (error instanceof SandboxSyntaxError) {
      return { program: null, errors: [`Line ${error.line}: SyntaxError: ${error.message}`] };
    }
    throw error;
  }

  const violations = checkPolicy(program);
  if (violations.length > 0) {
    return {
      program: null,
      errors: violations.map((violation) => `Line ${violation.line}: ${violation.message}`),
    };
  }

  return { program, errors: [] };
}
