// pattern: Imperative Shell

/**
 * JSON function-call agent.
 * Pulls call descriptors out of the model response, dispatches them through
 * the tool registry in order and returns one serialized result per line.
 * A batch is all-or-nothing: the first failing call's error replaces the
 * results of every call before it.
 */

import { serializeResult } from '../tool/serialize.ts';
import type { ToolRegistry } from '../tool/types.ts';
import { extractCallPayloads, type CallTags } from './extract.ts';
import { DEFAULT_CLOSE_TAG, DEFAULT_OPEN_TAG, defaultJsonSystemPrompt, fillTemplate } from './prompts.ts';
import type { Agent, JsonAgentOptions } from './types.ts';

export const JSON_ERRORS = {
  invalidJson: 'Error: invalid JSON format.',
  missingName: 'Error: function call is missing the "name" field.',
  missingParameters: 'Error: function call is missing the "parameters" or "arguments" field.',
  callFailed: 'Error: function call failed',
  notSerializable: 'Error: function call did not return JSON serializable result.',
} as const;

export function unknownFunctionError(name: string): string {
  return `Error: unknown function ${name}.`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readArguments(call: Record<string, unknown>): { found: boolean; value: unknown } {
  for (const key of ['parameters', 'arguments']) {
    if (Object.prototype.hasOwnProperty.call(call, key)) {
      return { found: true, value: call[key] };
    }
  }
  return { found: false, value: undefined };
}

type ParseResult = { ok: true; calls: Array<unknown> } | { ok: false };

function parsePayloads(payloads: ReadonlyArray<string>): ParseResult {
  const calls: Array<unknown> = [];
  for (const payload of payloads) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(payload);
    } catch {
      return { ok: false };
    }
    if (Array.isArray(parsed)) {
      calls.push(...parsed);
    } else {
      calls.push(parsed);
    }
  }
  return { ok: true, calls };
}

export function createJsonAgent(registry: ToolRegistry, options: JsonAgentOptions = {}): Agent {
  const tags: CallTags = {
    openTag: options.openTag ?? DEFAULT_OPEN_TAG,
    closeTag: options.closeTag ?? DEFAULT_CLOSE_TAG,
  };

  async function dispatch(call: unknown): Promise<{ ok: true; line: string } | { ok: false; error: string }> {
    const name = isRecord(call) ? call['name'] : undefined;
    if (!isRecord(call) || typeof name !== 'string') {
      return { ok: false, error: JSON_ERRORS.missingName };
    }
    if (!registry.has(name)) {
      return { ok: false, error: unknownFunctionError(name) };
    }
    const args = readArguments(call);
    if (!args.found) {
      return { ok: false, error: JSON_ERRORS.missingParameters };
    }

    let result: unknown;
    try {
      if (!isRecord(args.value)) {
        throw new TypeError(`${name}() arguments must be an object`);
      }
      result = await registry.invoke(name, [], args.value);
    } catch (error) {
      console.warn(`[json-agent] call to ${name} failed:`, error);
      return { ok: false, error: JSON_ERRORS.callFailed };
    }

    let serialized: string | undefined;
    try {
      serialized = serializeResult(result);
    } catch (error) {
      console.warn(`[json-agent] result of ${name} could not be serialized:`, error);
      serialized = undefined;
    }
    if (serialized === undefined) {
      return { ok: false, error: JSON_ERRORS.notSerializable };
    }
    return { ok: true, line: serialized + '\n' };
  }

  return {
    strategy: 'json',

    async handleResponse(response: string): Promise<string | null> {
      const payloads = extractCallPayloads(response, tags);
      if (payloads === null) {
        return null;
      }

      const parsed = parsePayloads(payloads);
      if (!parsed.ok) {
        return JSON_ERRORS.invalidJson;
      }

      let output = '';
      for (const call of parsed.calls) {
        const outcome = await dispatch(call);
        if (!outcome.ok) {
          return outcome.error;
        }
        output += outcome.line;
      }
      return output;
    },

    formatSystemPrompt(template?: string): string {
      const schemas = registry.toSchemas().map((schema) => JSON.stringify(schema));
      return fillTemplate(template ?? defaultJsonSystemPrompt(tags.openTag, tags.closeTag), schemas.join('\n'));
    },

    reset(): void {
      // no per-conversation state
    },
  };
}
