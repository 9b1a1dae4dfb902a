// pattern: Imperative Shell

/**
 * Sandbox session: the bindings that persist across executions within one
 * conversation, plus the per-execution print buffer and resource counters.
 */

import type { ToolRegistry } from '../tool/types.ts';
import type { Program } from './ast.ts';
import { createBuiltins } from './builtins.ts';
import { SandboxRuntimeError } from './errors.ts';
import { execute } from './interpreter.ts';
import { SandboxCallable, type IterationTick } from './values.ts';

const encoder = new TextEncoder();

export type CapabilityProfile = {
  readonly maxLoopIterations: number;
  readonly maxOutputSize: number;
  readonly maxToolCallsPerExec: number;
};

export const DEFAULT_CAPABILITY_PROFILE: CapabilityProfile = {
  maxLoopIterations: 100_000,
  maxOutputSize: 1_048_576,
  maxToolCallsPerExec: 25,
};

/**
 * Output of one execution. `output` is null when print was never called,
 * which is distinct from printing an empty string.
 */
export type ExecutionOutput = {
  output: string | null;
};

export type SandboxSession = {
  /** Runs a compiled program; throws the first runtime error it hits. */
  run(program: Program): Promise<ExecutionOutput>;
  reset(): void;
  readonly bindings: ReadonlyMap<string, unknown>;
};

export function createSandboxSession(
  registry: ToolRegistry,
  profile: CapabilityProfile = DEFAULT_CAPABILITY_PROFILE,
): SandboxSession {
  const bindings = new Map<string, unknown>();

  function buildGlobals(
    onPrint: (text: string) => void,
    onTick: IterationTick,
    onToolCall: () => void,
  ): Map<string, unknown> {
    const globals = new Map<string, unknown>(createBuiltins({ print: onPrint, tick: onTick }));
    for (const name of registry.names()) {
      globals.set(
        name,
        new SandboxCallable(name, 'tool', async (args, kwargs) => {
          onToolCall();
          const result = await registry.invoke(name, args, kwargs);
          return result === undefined ? null : result;
        }),
      );
    }
    return globals;
  }

  return {
    bindings,

    async run(program: Program): Promise<ExecutionOutput> {
      let output: string | null = null;
      let outputBytes = 0;
      let iterations = 0;
      let toolCalls = 0;

      const onPrint = (text: string): void => {
        outputBytes += encoder.encode(text).length;
        if (outputBytes > profile.maxOutputSize) {
          throw new SandboxRuntimeError(
            'RuntimeError',
            `output exceeds max size of ${profile.maxOutputSize} bytes`,
          );
        }
        output = (output ?? '') + text;
      };

      const onTick = (count: number): void => {
        iterations += count;
        if (iterations > profile.maxLoopIterations) {
          throw new SandboxRuntimeError(
            'RuntimeError',
            `loop iteration limit of ${profile.maxLoopIterations} exceeded`,
          );
        }
      };

      const onToolCall = (): void => {
        toolCalls++;
        if (toolCalls > profile.maxToolCallsPerExec) {
          throw new SandboxRuntimeError(
            'RuntimeError',
            `tool call limit of ${profile.maxToolCallsPerExec} exceeded`,
          );
        }
      };

      await execute(program, {
        bindings,
        globals: buildGlobals(onPrint, onTick, onToolCall),
        tick: onTick,
      });

      return { output };
    },

    reset(): void {
      bindings.clear();
    },
  };
}
