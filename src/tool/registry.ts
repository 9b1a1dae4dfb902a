// pattern: Imperative Shell

/**
 * ToolRegistry implementation.
 * Normalizes a tool list or name → tool mapping, binds call arguments onto the
 * declared parameter lists, and renders stubs and schemas for the prompt.
 */

import { ToolCallError } from './errors.ts';
import { renderToolBlock, toToolSchema, validateDefinition } from './schema.ts';
import type {
  Tool,
  ToolDefinition,
  ToolRegistry,
  ToolSchema,
  ToolSource,
} from './types.ts';

function isToolList(source: ToolSource): source is ReadonlyArray<Tool> {
  return Array.isArray(source);
}

function formatMissing(names: ReadonlyArray<string>): string {
  const quoted = names.map((name) => `'${name}'`);
  if (quoted.length === 1) {
    return quoted[0] ?? '';
  }
  return `${quoted.slice(0, -1).join(', ')} and ${quoted[quoted.length - 1]}`;
}

export function createToolRegistry(source: ToolSource): ToolRegistry {
  const tools = new Map<string, Tool>();

  const entries: Array<[string, Tool]> = isToolList(source)
    ? source.map((tool): [string, Tool] => [tool.definition.name, tool])
    : Object.entries(source);

  // Map.set keeps the first insertion position and the last value, so a
  // duplicated name stays where it first appeared but uses the later tool.
  for (const [name, tool] of entries) {
    const definition: ToolDefinition =
      name === tool.definition.name ? tool.definition : { ...tool.definition, name };
    validateDefinition(definition);
    tools.set(name, { definition, handler: tool.handler });
  }

  function requireTool(name: string): Tool {
    const tool = tools.get(name);
    if (!tool) {
      throw new ToolCallError(name, `unknown function ${name}`);
    }
    return tool;
  }

  function getDefinitions(): Array<ToolDefinition> {
    return Array.from(tools.values()).map((tool) => tool.definition);
  }

  function bindArguments(
    name: string,
    positional: ReadonlyArray<unknown>,
    keywords: Readonly<Record<string, unknown>>,
  ): Record<string, unknown> {
    const { parameters } = requireTool(name).definition;

    if (positional.length > parameters.length) {
      throw new ToolCallError(
        name,
        `${name}() takes ${parameters.length} positional arguments but ${positional.length} were given`,
      );
    }

    const bound = new Map<string, unknown>();
    positional.forEach((value, index) => {
      const param = parameters[index];
      if (param) {
        bound.set(param.name, value);
      }
    });

    for (const [key, value] of Object.entries(keywords)) {
      if (!parameters.some((param) => param.name === key)) {
        throw new ToolCallError(name, `${name}() got an unexpected keyword argument '${key}'`);
      }
      if (bound.has(key)) {
        throw new ToolCallError(name, `${name}() got multiple values for argument '${key}'`);
      }
      bound.set(key, value);
    }

    const missing = parameters
      .filter((param) => !bound.has(param.name) && param.default === undefined)
      .map((param) => param.name);
    if (missing.length > 0) {
      const noun = missing.length === 1 ? 'argument' : 'arguments';
      throw new ToolCallError(
        name,
        `${name}() missing ${missing.length} required ${noun}: ${formatMissing(missing)}`,
      );
    }

    for (const param of parameters) {
      if (!bound.has(param.name)) {
        bound.set(param.name, param.default);
      }
    }

    return Object.fromEntries(bound);
  }

  return {
    get size(): number {
      return tools.size;
    },

    has(name: string): boolean {
      return tools.has(name);
    },

    get(name: string): Tool | undefined {
      return tools.get(name);
    },

    names(): Array<string> {
      return Array.from(tools.keys());
    },

    getDefinitions,

    bindArguments,

    async invoke(
      name: string,
      positional: ReadonlyArray<unknown>,
      keywords: Readonly<Record<string, unknown>>,
    ): Promise<unknown> {
      const args = bindArguments(name, positional, keywords);
      return await requireTool(name).handler(args);
    },

    generateStubs(): string {
      return renderToolBlock(getDefinitions());
    },

    toSchemas(): Array<ToolSchema> {
      return getDefinitions().map(toToolSchema);
    },
  };
}
