// pattern: Imperative Shell

import { describe, it, expect } from 'vitest';
import { ToolCallError, ToolDefinitionError } from './errors.ts';
import { createToolRegistry } from './registry.ts';
import type { Tool, ToolDefinition } from './types.ts';

function makeAdd(): Tool {
  return {
    definition: {
      name: 'add',
      description: 'Add two numbers.',
      parameters: [
        { name: 'a', type: 'integer' },
        { name: 'b', type: 'integer', default: 1 },
      ],
    },
    handler: (args) => Number(args['a']) + Number(args['b']),
  };
}

function makeWeather(): Tool {
  return {
    definition: {
      name: 'get_weather',
      description: 'Look up the weather.',
      parameters: [
        { name: 'city', type: 'string', description: "The city's name" },
        { name: 'units', type: 'string', default: 'metric' },
        { name: 'extra', type: 'any', default: null },
      ],
    },
    handler: (args) => ({ city: args['city'], temp: 20 }),
  };
}

describe('ToolRegistry', () => {
  describe('construction', () => {
    it('should keep the order of a tool list', () => {
      const registry = createToolRegistry([makeAdd(), makeWeather()]);

      expect(registry.size).toBe(2);
      expect(registry.names()).toEqual(['add', 'get_weather']);
    });

    it('should describe a list and an equivalent mapping identically', () => {
      const fromList = createToolRegistry([makeAdd(), makeWeather()]);
      const fromRecord = createToolRegistry({ add: makeAdd(), get_weather: makeWeather() });

      expect(fromRecord.generateStubs()).toBe(fromList.generateStubs());
      expect(fromRecord.toSchemas()).toEqual(fromList.toSchemas());
    });

    it('should rename a tool to its mapping key', () => {
      const registry = createToolRegistry({ plus: makeAdd() });

      expect(registry.names()).toEqual(['plus']);
      expect(registry.get('plus')?.definition.name).toBe('plus');
      expect(registry.has('add')).toBe(false);
    });

    it('should let the last duplicate in a list win', () => {
      const second: Tool = {
        definition: { name: 'add', description: 'Second.', parameters: [] },
        handler: () => 'second',
      };
      const registry = createToolRegistry([makeAdd(), makeWeather(), second]);

      expect(registry.names()).toEqual(['add', 'get_weather']);
      expect(registry.get('add')?.definition.description).toBe('Second.');
    });

    it('should reject a parameter type it cannot annotate', () => {
      const definition: ToolDefinition = JSON.parse(
        '{"name":"bad","parameters":[{"name":"x","type":"text"}]}',
      );

      expect(() => createToolRegistry([{ definition, handler: () => null }])).toThrow(
        'invalid tool definition "bad": parameters.0.type: cannot resolve type "text" of parameter "x"',
      );
    });

    it('should reject a required parameter after an optional one', () => {
      const tool: Tool = {
        definition: {
          name: 'bad',
          parameters: [
            { name: 'a', type: 'string', default: 'x' },
            { name: 'b', type: 'string' },
          ],
        },
        handler: () => null,
      };

      expect(() => createToolRegistry([tool])).toThrow(ToolDefinitionError);
      expect(() => createToolRegistry([tool])).toThrow(
        'parameter "b" without a default follows a parameter with a default',
      );
    });

    it('should reject duplicate parameter names', () => {
      const tool: Tool = {
        definition: {
          name: 'bad',
          parameters: [
            { name: 'a', type: 'string' },
            { name: 'a', type: 'integer' },
          ],
        },
        handler: () => null,
      };

      expect(() => createToolRegistry([tool])).toThrow('duplicate parameter "a"');
    });

    it('should reject names that are not identifiers', () => {
      const tool: Tool = {
        definition: { name: 'get-weather', parameters: [] },
        handler: () => null,
      };

      expect(() => createToolRegistry([tool])).toThrow(
        'invalid tool definition "get-weather": name: tool name must be an identifier',
      );
    });
  });

  describe('generateStubs', () => {
    it('should render a fenced stub per tool', () => {
      const registry = createToolRegistry([makeAdd()]);

      expect(registry.generateStubs()).toBe(
        '```python\ndef add(a: int, b: int = 1):\n    """\n    Add two numbers.\n    """\n    pass\n```',
      );
    });

    it('should annotate described parameters and render defaults', () => {
      const registry = createToolRegistry([makeWeather()]);

      expect(registry.generateStubs().split('\n')[1]).toBe(
        `def get_weather(city: Annotated[str, "The city's name"], units: str = 'metric', extra: Any = None):`,
      );
    });

    it('should separate stubs with a blank line', () => {
      const registry = createToolRegistry([
        { definition: { name: 'ping', parameters: [] }, handler: () => 'pong' },
        { definition: { name: 'pong', parameters: [] }, handler: () => 'ping' },
      ]);

      expect(registry.generateStubs()).toBe(
        '```python\ndef ping():\n    pass\n\ndef pong():\n    pass\n```',
      );
    });
  });

  describe('toSchemas', () => {
    it('should describe parameters as an object schema', () => {
      const registry = createToolRegistry([makeWeather()]);

      expect(registry.toSchemas()).toEqual([
        {
          name: 'get_weather',
          description: 'Look up the weather.',
          parameters: {
            type: 'object',
            properties: {
              city: { type: 'string', description: "The city's name" },
              units: { type: 'string' },
              extra: {},
            },
            required: ['city'],
          },
        },
      ]);
    });

    it('should default a missing description to an empty string', () => {
      const registry = createToolRegistry([
        { definition: { name: 'ping', parameters: [] }, handler: () => 'pong' },
      ]);

      expect(registry.toSchemas()[0]?.description).toBe('');
    });
  });

  describe('bindArguments', () => {
    const registry = createToolRegistry([makeAdd()]);

    it('should bind positional and keyword arguments and fill defaults', () => {
      expect(registry.bindArguments('add', [2], {})).toEqual({ a: 2, b: 1 });
      expect(registry.bindArguments('add', [], { b: 5, a: 3 })).toEqual({ a: 3, b: 5 });
    });

    it('should reject too many positional arguments', () => {
      expect(() => registry.bindArguments('add', [1, 2, 3], {})).toThrow(
        'add() takes 2 positional arguments but 3 were given',
      );
    });

    it('should reject unknown keywords', () => {
      expect(() => registry.bindArguments('add', [1], { c: 2 })).toThrow(
        "add() got an unexpected keyword argument 'c'",
      );
    });

    it('should reject a value given twice', () => {
      expect(() => registry.bindArguments('add', [1], { a: 2 })).toThrow(
        "add() got multiple values for argument 'a'",
      );
    });

    it('should list every missing argument', () => {
      const pair = createToolRegistry([
        {
          definition: {
            name: 'pair',
            parameters: [
              { name: 'x', type: 'any' },
              { name: 'y', type: 'any' },
            ],
          },
          handler: () => null,
        },
      ]);

      expect(() => pair.bindArguments('pair', [], {})).toThrow(
        "pair() missing 2 required arguments: 'x' and 'y'",
      );
      expect(() => pair.bindArguments('pair', [1], {})).toThrow(
        "pair() missing 1 required argument: 'y'",
      );
    });

    it('should reject an unknown tool', () => {
      expect(() => registry.bindArguments('nope', [], {})).toThrow(ToolCallError);
    });
  });

  describe('invoke', () => {
    it('should await the handler with bound arguments', async () => {
      const registry = createToolRegistry([
        {
          definition: makeAdd().definition,
          handler: async (args) => Number(args['a']) * 10 + Number(args['b']),
        },
      ]);

      await expect(registry.invoke('add', [4], { b: 2 })).resolves.toBe(42);
    });
  });
});
