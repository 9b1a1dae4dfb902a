// pattern: Imperative Shell

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { createToolRegistry } from '../tool/registry.ts';
import type { ToolRegistry } from '../tool/types.ts';
import { CODE_ERRORS, createCodeAgent } from './code-agent.ts';
import { PromptTemplateError } from './types.ts';

function createRegistry(): ToolRegistry {
  return createToolRegistry([
    {
      definition: {
        name: 'add',
        description: 'Add two numbers.',
        parameters: [
          { name: 'a', type: 'integer' },
          { name: 'b', type: 'integer', default: 1 },
        ],
      },
      handler: async (args) => Number(args['a']) + Number(args['b']),
    },
  ]);
}

function block(code: string): string {
  return 'Here is the next step.\n```python\n' + code + '\n```\n';
}

describe('CodeAgent', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('handleResponse', () => {
    it('should return null for a response without code', async () => {
      const agent = createCodeAgent(createRegistry());

      expect(await agent.handleResponse('The weather is sunny.')).toBeNull();
    });

    it('should return the trimmed printed output', async () => {
      const agent = createCodeAgent(createRegistry());

      expect(await agent.handleResponse(block('x = add(2, b=3)\nprint("sum:", x)'))).toBe('sum: 5');
    });

    it('should reject code blocks without the python tag', async () => {
      const agent = createCodeAgent(createRegistry());

      expect(await agent.handleResponse('```\nprint(1)\n```')).toBe(CODE_ERRORS.unformatted);
      expect(await agent.handleResponse('```js\nconsole.log(1)\n```')).toBe(
        'Error: code block must be formatted as ```python ... ```',
      );
    });

    it('should reject more than one code block', async () => {
      const agent = createCodeAgent(createRegistry());
      const response = '```python\nprint(1)\n```\nthen\n```python\nprint(2)\n```';

      expect(await agent.handleResponse(response)).toBe('Error: multiple code blocks found');
    });

    it('should report code that prints nothing', async () => {
      const agent = createCodeAgent(createRegistry());

      expect(await agent.handleResponse(block('x = 1'))).toBe(
        'Error: No print statement executed in code block.',
      );
    });

    it('should report blank output', async () => {
      const agent = createCodeAgent(createRegistry());

      expect(await agent.handleResponse(block('print("  ")'))).toBe('Error: result string is empty.');
    });

    it('should list every compilation error', async () => {
      const agent = createCodeAgent(createRegistry());

      expect(await agent.handleResponse(block('import os\nprint(_x)'))).toBe(
        'Compilation errors:\n' +
          'Line 2: "import" statements are not allowed.\n' +
          'Line 3: "_x" is an invalid variable name because it starts with "_"',
      );
    });

    it('should report syntax errors', async () => {
      const agent = createCodeAgent(createRegistry());

      expect(await agent.handleResponse(block('print(1'))).toBe(
        "Compilation errors:\nLine 2: SyntaxError: '(' was never closed",
      );
    });

    it('should report runtime errors without logging them', async () => {
      const agent = createCodeAgent(createRegistry());

      expect(await agent.handleResponse(block('print(1 / 0)'))).toBe('Error: division by zero');
      expect(await agent.handleResponse(block('add()'))).toBe(
        "Error: add() missing 1 required argument: 'a'",
      );
      expect(console.warn).not.toHaveBeenCalled();
    });

    it('should reject code over the size limit', async () => {
      const agent = createCodeAgent(createRegistry(), { maxCodeSize: 10 });

      expect(await agent.handleResponse(block('print("hello world")'))).toBe(
        'Error: code exceeds max size of 10 bytes',
      );
    });

    it('should apply the tool call limit', async () => {
      const agent = createCodeAgent(createRegistry(), { maxToolCallsPerExec: 1 });

      expect(await agent.handleResponse(block('print(add(1), add(2))'))).toBe(
        'Error: tool call limit of 1 exceeded',
      );
    });
  });

  describe('session state', () => {
    it('should keep variables between responses', async () => {
      const agent = createCodeAgent(createRegistry());

      expect(await agent.handleResponse(block('x = 21\nprint("stored")'))).toBe('stored');
      expect(await agent.handleResponse(block('print(x * 2)'))).toBe('42');
    });

    it('should forget variables after reset', async () => {
      const agent = createCodeAgent(createRegistry());
      await agent.handleResponse(block('x = 21\nprint("stored")'));
      agent.reset();

      expect(await agent.handleResponse(block('print(x)'))).toBe("Error: name 'x' is not defined");
    });
  });

  describe('formatSystemPrompt', () => {
    it('should substitute the tool stubs', () => {
      const agent = createCodeAgent(createRegistry());

      expect(agent.formatSystemPrompt('Use:\n{functions}')).toBe(
        'Use:\n```python\ndef add(a: int, b: int = 1):\n    """\n    Add two numbers.\n    """\n    pass\n```',
      );
    });

    it('should include the stubs in the default prompt', () => {
      const agent = createCodeAgent(createRegistry());

      expect(agent.formatSystemPrompt()).toContain('def add(a: int, b: int = 1):');
      expect(agent.formatSystemPrompt()).toBe(agent.formatSystemPrompt());
    });

    it('should reject a template without the placeholder', () => {
      const agent = createCodeAgent(createRegistry());

      expect(() => agent.formatSystemPrompt('no functions here')).toThrow(
        'prompt does not contain {functions} placeholder',
      );
      expect(() => agent.formatSystemPrompt('')).toThrow(PromptTemplateError);
    });
  });
});
