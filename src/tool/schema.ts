// pattern: Functional Core

/**
 * Renders tool definitions for the model: a pseudo-source stub per tool for
 * the code agent's prompt, and a structured schema per tool for the JSON agent.
 * Both are pure functions of the definition, so the two strategies always
 * describe a registry the same way.
 */

import { z } from 'zod';

import { repr } from '../sandbox/values.ts';
import { ToolDefinitionError } from './errors.ts';
import type {
  ToolDefinition,
  ToolParameter,
  ToolParameterType,
  ToolPropertySchema,
  ToolSchema,
} from './types.ts';

const SOURCE_ANNOTATIONS: Record<ToolParameterType, string> = {
  string: 'str',
  integer: 'int',
  number: 'float',
  boolean: 'bool',
  array: 'list',
  object: 'dict',
  any: 'Any',
};

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

const RESERVED_WORDS = new Set([
  'False', 'None', 'True', 'and', 'as', 'assert', 'async', 'await', 'break',
  'class', 'continue', 'def', 'del', 'elif', 'else', 'except', 'finally',
  'for', 'from', 'global', 'if', 'import', 'in', 'is', 'lambda', 'nonlocal',
  'not', 'or', 'pass', 'raise', 'return', 'try', 'while', 'with', 'yield',
]);

function isParameterType(type: string): type is ToolParameterType {
  return Object.prototype.hasOwnProperty.call(SOURCE_ANNOTATIONS, type);
}

const identifier = (what: string) =>
  z
    .string()
    .regex(IDENTIFIER, `${what} must be an identifier`)
    .refine((name) => !RESERVED_WORDS.has(name), `${what} must not be a reserved word`)
    .refine((name) => !name.startsWith('_'), `${what} must not start with "_"`);

const ToolParameterSchema = z.object({
  name: identifier('parameter name'),
  type: z.string(),
  description: z.string().optional(),
  default: z.unknown().optional(),
});

const ToolDefinitionSchema = z
  .object({
    name: identifier('tool name'),
    description: z.string().optional(),
    parameters: z.array(ToolParameterSchema),
  })
  .superRefine((definition, ctx) => {
    const seen = new Set<string>();
    let sawDefault = false;

    definition.parameters.forEach((param, index) => {
      if (!isParameterType(param.type)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `cannot resolve type "${param.type}" of parameter "${param.name}"`,
          path: ['parameters', index, 'type'],
        });
      }
      if (seen.has(param.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate parameter "${param.name}"`,
          path: ['parameters', index, 'name'],
        });
      }
      seen.add(param.name);

      const hasDefault = param.default !== undefined;
      if (sawDefault && !hasDefault) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `parameter "${param.name}" without a default follows a parameter with a default`,
          path: ['parameters', index, 'default'],
        });
      }
      sawDefault = sawDefault || hasDefault;
    });
  });

/**
 * Check a definition before it enters a registry.
 * Throws ToolDefinitionError listing every problem found.
 */
export function validateDefinition(definition: ToolDefinition): void {
  const result = ToolDefinitionSchema.safeParse(definition);
  if (result.success) {
    return;
  }

  const problems = result.error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
  );
  const label = typeof definition.name === 'string' ? definition.name : '<unnamed>';
  throw new ToolDefinitionError(
    label,
    `invalid tool definition "${label}": ${problems.join('; ')}`,
  );
}

export function formatAnnotation(param: ToolParameter): string {
  const base = SOURCE_ANNOTATIONS[param.type];
  return param.description ? `Annotated[${base}, ${repr(param.description)}]` : base;
}

export function formatParameter(param: ToolParameter): string {
  const declared = `${param.name}: ${formatAnnotation(param)}`;
  return param.default === undefined ? declared : `${declared} = ${repr(param.default)}`;
}

export function formatSignature(definition: ToolDefinition): string {
  return `def ${definition.name}(${definition.parameters.map(formatParameter).join(', ')}):`;
}

export function renderStub(definition: ToolDefinition): string {
  const lines = [formatSignature(definition)];
  const doc = definition.description?.trim();

  if (doc) {
    lines.push('    """');
    for (const line of doc.split('\n')) {
      lines.push(line.trim() ? `    ${line.trimEnd()}` : '');
    }
    lines.push('    """');
  }
  lines.push('    pass');

  return lines.join('\n');
}

export function renderToolBlock(definitions: ReadonlyArray<ToolDefinition>): string {
  return '```python\n' + definitions.map(renderStub).join('\n\n') + '\n```';
}

export function toToolSchema(definition: ToolDefinition): ToolSchema {
  const properties: Record<string, ToolPropertySchema> = {};
  const required: Array<string> = [];

  for (const param of definition.parameters) {
    const property: ToolPropertySchema = {};
    if (param.type !== 'any') {
      property.type = param.type;
    }
    if (param.description) {
      property.description = param.description;
    }
    properties[param.name] = property;

    if (param.default === undefined) {
      required.push(param.name);
    }
  }

  return {
    name: definition.name,
    description: definition.description ?? '',
    parameters: {
      type: 'object',
      properties,
      required,
    },
  };
}
