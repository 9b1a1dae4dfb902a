// pattern: Functional Core

export type {
  ToolParameterType,
  ToolParameter,
  ToolDefinition,
  ToolHandler,
  Tool,
  ToolSource,
  ToolSchema,
  ToolPropertySchema,
  ToolRegistry,
} from './types.ts';

export { createToolRegistry } from './registry.ts';
export { ToolDefinitionError, ToolCallError } from './errors.ts';
export { renderStub, renderToolBlock, toToolSchema } from './schema.ts';
export { serializeResult } from './serialize.ts';
