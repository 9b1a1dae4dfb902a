// pattern: Imperative Shell

/**
 * Sandboxed code agent.
 * Runs the single ```python block of a response inside the sandbox session
 * and reports what it printed.
 */

import { compileRestricted } from '../sandbox/compile.ts';
import { SandboxRuntimeError } from '../sandbox/errors.ts';
import { DEFAULT_CAPABILITY_PROFILE, createSandboxSession } from '../sandbox/session.ts';
import { ToolCallError } from '../tool/errors.ts';
import type { ToolRegistry } from '../tool/types.ts';
import { extractPythonBlocks } from './extract.ts';
import { DEFAULT_CODE_SYSTEM_PROMPT, fillTemplate } from './prompts.ts';
import type { Agent, CodeAgentOptions } from './types.ts';

export const DEFAULT_MAX_CODE_SIZE = 51_200;

const encoder = new TextEncoder();

export const CODE_ERRORS = {
  unformatted: 'Error: code block must be formatted as ```python ... ```',
  multipleBlocks: 'Error: multiple code blocks found',
  noPrint: 'Error: No print statement executed in code block.',
  emptyResult: 'Error: result string is empty.',
} as const;

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function createCodeAgent(registry: ToolRegistry, options: CodeAgentOptions = {}): Agent {
  const maxCodeSize = options.maxCodeSize ?? DEFAULT_MAX_CODE_SIZE;
  const session = createSandboxSession(registry, {
    maxLoopIterations: options.maxLoopIterations ?? DEFAULT_CAPABILITY_PROFILE.maxLoopIterations,
    maxOutputSize: options.maxOutputSize ?? DEFAULT_CAPABILITY_PROFILE.maxOutputSize,
    maxToolCallsPerExec: options.maxToolCallsPerExec ?? DEFAULT_CAPABILITY_PROFILE.maxToolCallsPerExec,
  });

  return {
    strategy: 'code',

    async handleResponse(response: string): Promise<string | null> {
      if (!response.includes('```')) {
        return null;
      }
      if (!response.includes('```python')) {
        return CODE_ERRORS.unformatted;
      }

      const blocks = extractPythonBlocks(response);
      const [code] = blocks;
      if (code === undefined) {
        return null;
      }
      if (blocks.length > 1) {
        return CODE_ERRORS.multipleBlocks;
      }
      if (encoder.encode(code).length > maxCodeSize) {
        return `Error: code exceeds max size of ${maxCodeSize} bytes`;
      }

      const compiled = compileRestricted(code);
      if (compiled.program === null) {
        return 'Compilation errors:\n' + compiled.errors.join('\n');
      }

      let output: string | null;
      try {
        ({ output } = await session.run(compiled.program));
      } catch (error) {
        if (!(error instanceof SandboxRuntimeError) && !(error instanceof ToolCallError)) {
          console.warn('[code-agent] execution raised:', error);
        }
        return `Error: ${describeError(error)}`;
      }

      if (output === null) {
        return CODE_ERRORS.noPrint;
      }
      const trimmed = output.trim();
      if (trimmed.length === 0) {
        return CODE_ERRORS.emptyResult;
      }
      return trimmed;
    },

    formatSystemPrompt(template?: string): string {
      return fillTemplate(template ?? DEFAULT_CODE_SYSTEM_PROMPT, registry.generateStubs());
    },

    reset(): void {
      session.reset();
    },
  };
}
