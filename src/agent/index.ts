// pattern: Functional Core

/**
 * Agent module exports
 */

export type { Agent, AgentStrategy, CodeAgentOptions, JsonAgentOptions } from './types.ts';
export { PromptTemplateError } from './types.ts';
export { createAgent } from './factory.ts';
export { createCodeAgent } from './code-agent.ts';
export { createJsonAgent } from './json-agent.ts';
export {
  DEFAULT_CODE_SYSTEM_PROMPT,
  FUNCTIONS_PLACEHOLDER,
  defaultJsonSystemPrompt,
} from './prompts.ts';
