// pattern: Functional Core

/**
 * Tool system types for registration, argument binding, and stub generation.
 * A tool is a declarative definition paired with a handler; the registry and
 * the schema generator only ever look at the definition.
 */

export type ToolParameterType =
  | 'string'
  | 'integer'
  | 'number'
  | 'boolean'
  | 'array'
  | 'object'
  | 'any';

export type ToolParameter = {
  name: string;
  type: ToolParameterType;
  description?: string;
  /** Present means optional. `null` is rendered and passed as `None`. */
  default?: unknown;
};

export type ToolDefinition = {
  name: string;
  description?: string;
  parameters: ReadonlyArray<ToolParameter>;
};

export type ToolHandler = (args: Record<string, unknown>) => unknown;

export type Tool = {
  definition: ToolDefinition;
  handler: ToolHandler;
};

/**
 * Either an ordered list (keyed by each definition's name, last one wins)
 * or an explicit name → tool mapping.
 */
export type ToolSource = ReadonlyArray<Tool> | Readonly<Record<string, Tool>>;

export type ToolPropertySchema = {
  type?: string;
  description?: string;
};

export type ToolSchema = {
  name: string;
  description: string;
  parameters: {
    type: 'object';
    properties: Record<string, ToolPropertySchema>;
    required: Array<string>;
  };
};

export interface ToolRegistry {
  readonly size: number;
  has(name: string): boolean;
  get(name: string): Tool | undefined;
  names(): Array<string>;
  getDefinitions(): Array<ToolDefinition>;
  bindArguments(
    name: string,
    positional: ReadonlyArray<unknown>,
    keywords: Readonly<Record<string, unknown>>,
  ): Record<string, unknown>;
  invoke(
    name: string,
    positional: ReadonlyArray<unknown>,
    keywords: Readonly<Record<string, unknown>>,
  ): Promise<unknown>;
  generateStubs(): string;
  toSchemas(): Array<ToolSchema>;
}
