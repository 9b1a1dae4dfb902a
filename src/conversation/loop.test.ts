// pattern: Imperative Shell

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { createCodeAgent } from '../agent/code-agent.ts';
import { createJsonAgent } from '../agent/json-agent.ts';
import { parseConfig } from '../config/schema.ts';
import { createToolRegistry } from '../tool/registry.ts';
import type { ToolRegistry } from '../tool/types.ts';
import { runToolLoop, toolLoopOptionsFromConfig, type ChatMessage, type GenerateFn } from './loop.ts';

function createRegistry(): ToolRegistry {
  return createToolRegistry([
    {
      definition: {
        name: 'lookup',
        description: 'Look up a fact.',
        parameters: [{ name: 'key', type: 'string' }],
      },
      handler: (args) => `fact about ${String(args['key'])}`,
    },
  ]);
}

function scripted(replies: Array<string>): { generate: GenerateFn; seen: Array<Array<ChatMessage>> } {
  const seen: Array<Array<ChatMessage>> = [];
  let index = 0;
  const generate: GenerateFn = async (messages) => {
    seen.push([...messages]);
    const reply = replies[Math.min(index, replies.length - 1)] ?? '';
    index++;
    return reply;
  };
  return { generate, seen };
}

describe('runToolLoop', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should return a plain reply after one round', async () => {
    const agent = createJsonAgent(createRegistry());
    const { generate, seen } = scripted(['Hello!']);

    const result = await runToolLoop({ agent, generate }, 'Hi');

    expect(result.reply).toBe('Hello!');
    expect(result.rounds).toBe(1);
    expect(result.maxRoundsReached).toBe(false);
    expect(seen[0]?.map((message) => message.role)).toEqual(['system', 'user']);
    expect(seen[0]?.[0]?.content).toBe(agent.formatSystemPrompt());
  });

  it('should feed tool results back until the model answers', async () => {
    const agent = createJsonAgent(createRegistry());
    const { generate } = scripted([
      '<tool_call>{"name": "lookup", "arguments": {"key": "tides"}}</tool_call>',
      'Tides follow the moon.',
    ]);

    const result = await runToolLoop({ agent, generate }, 'Why are there tides?');

    expect(result.reply).toBe('Tides follow the moon.');
    expect(result.rounds).toBe(2);
    expect(result.messages.slice(2)).toEqual([
      { role: 'assistant', content: '<tool_call>{"name": "lookup", "arguments": {"key": "tides"}}</tool_call>' },
      { role: 'user', content: '"fact about tides"\n' },
      { role: 'assistant', content: 'Tides follow the moon.' },
    ]);
  });

  it('should send feedback under the configured role', async () => {
    const agent = createCodeAgent(createRegistry());
    const { generate } = scripted(['```python\nprint(lookup("rain"))\n```', 'Done.']);

    const result = await runToolLoop({ agent, generate }, 'Rain?', { toolRole: 'tool' });

    expect(result.messages[3]).toEqual({ role: 'tool', content: 'fact about rain' });
  });

  it('should stop after the round limit with a warning reply', async () => {
    const agent = createCodeAgent(createRegistry());
    const { generate } = scripted(['```python\nprint(1)\n```']);

    const result = await runToolLoop({ agent, generate }, 'Loop', { maxToolRounds: 2 });

    const warning = '[Warning: max tool rounds (2) reached. Stopping tool execution.]';
    expect(result.reply).toBe(warning);
    expect(result.rounds).toBe(2);
    expect(result.maxRoundsReached).toBe(true);
    expect(result.messages[result.messages.length - 1]).toEqual({ role: 'assistant', content: warning });
    expect(console.warn).toHaveBeenCalledWith('[conversation] max tool rounds (2) reached');
  });

  it('should take the round limit and feedback role from agent config', async () => {
    const config = parseConfig({ agent: { max_tool_rounds: 1, tool_role: 'tool' } });
    const agent = createCodeAgent(createRegistry());
    const { generate } = scripted(['```python\nprint(lookup("snow"))\n```']);

    const result = await runToolLoop({ agent, generate }, 'Snow?', toolLoopOptionsFromConfig(config.agent));

    expect(toolLoopOptionsFromConfig(config.agent)).toEqual({ maxToolRounds: 1, toolRole: 'tool' });
    expect(result.rounds).toBe(1);
    expect(result.maxRoundsReached).toBe(true);
    expect(result.messages[3]).toEqual({ role: 'tool', content: 'fact about snow' });
  });

  it('should continue from earlier history without a new system prompt', async () => {
    const agent = createJsonAgent(createRegistry());
    const history: Array<ChatMessage> = [
      { role: 'system', content: 'custom system' },
      { role: 'user', content: 'first' },
      { role: 'assistant', content: 'ok' },
    ];
    const { generate, seen } = scripted(['second reply']);

    await runToolLoop({ agent, generate }, 'second', { history });

    expect(seen[0]?.map((message) => message.content)).toEqual(['custom system', 'first', 'ok', 'second']);
    expect(history).toHaveLength(3);
  });

  it('should use a custom system prompt template', async () => {
    const agent = createJsonAgent(createRegistry());
    const { generate, seen } = scripted(['fine']);

    await runToolLoop({ agent, generate }, 'hi', { systemPrompt: 'Tools: {functions}' });

    expect(seen[0]?.[0]?.content).toBe(
      'Tools: {"name":"lookup","description":"Look up a fact.","parameters":{"type":"object","properties":{"key":{"type":"string"}},"required":["key"]}}',
    );
  });
});
