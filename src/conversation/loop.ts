// pattern: Imperative Shell

/**
 * Conversation loop around an agent.
 * Each round asks the model for a response, lets the agent act on it and
 * feeds the agent's feedback back as the next message, until the model
 * answers in plain text or the round budget runs out.
 */

import type { Agent } from '../agent/types.ts';
import type { AgentConfig } from '../config/schema.ts';

export type ChatRole = 'system' | 'user' | 'assistant' | 'tool';

export type ChatMessage = {
  role: ChatRole;
  content: string;
};

/** The model: produces the next assistant text for a message list. */
export type GenerateFn = (messages: ReadonlyArray<ChatMessage>) => Promise<string>;

export type ToolLoopDependencies = {
  agent: Agent;
  generate: GenerateFn;
};

export type ToolLoopOptions = {
  maxToolRounds?: number;
  toolRole?: 'user' | 'tool';
  /** Custom system prompt template; must contain `{functions}`. */
  systemPrompt?: string;
  /** Earlier messages of the same conversation, system prompt included. */
  history?: ReadonlyArray<ChatMessage>;
};

export type ToolLoopResult = {
  reply: string;
  rounds: number;
  maxRoundsReached: boolean;
  messages: Array<ChatMessage>;
};

const DEFAULT_MAX_TOOL_ROUNDS = 20;

/** Round budget and feedback role from the `[agent]` config section. */
export function toolLoopOptionsFromConfig(config: AgentConfig): ToolLoopOptions {
  return {
    maxToolRounds: config.max_tool_rounds,
    toolRole: config.tool_role,
  };
}

export async function runToolLoop(
  deps: ToolLoopDependencies,
  userMessage: string,
  options: ToolLoopOptions = {},
): Promise<ToolLoopResult> {
  const maxRounds = options.maxToolRounds ?? DEFAULT_MAX_TOOL_ROUNDS;
  const toolRole = options.toolRole ?? 'user';

  const messages: Array<ChatMessage> =
    options.history && options.history.length > 0
      ? [...options.history]
      : [{ role: 'system', content: deps.agent.formatSystemPrompt(options.systemPrompt) }];
  messages.push({ role: 'user', content: userMessage });

  let rounds = 0;
  while (rounds < maxRounds) {
    rounds++;

    const response = await deps.generate(messages);
    messages.push({ role: 'assistant', content: response });

    const feedback = await deps.agent.handleResponse(response);
    if (feedback === null) {
      return { reply: response, rounds, maxRoundsReached: false, messages };
    }

    messages.push({ role: toolRole, content: feedback });
  }

  console.warn(`[conversation] max tool rounds (${maxRounds}) reached`);
  const warningMessage = `[Warning: max tool rounds (${maxRounds}) reached. Stopping tool execution.]`;
  messages.push({ role: 'assistant', content: warningMessage });

  return { reply: warningMessage, rounds, maxRoundsReached: true, messages };
}
