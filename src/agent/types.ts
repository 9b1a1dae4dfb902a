// pattern: Functional Core

/**
 * Agent types shared by both dispatch strategies.
 * An agent inspects one model response at a time and returns the feedback
 * for the next turn, or null when the response is plain conversation.
 */

export type AgentStrategy = 'json' | 'code';

export type Agent = {
  readonly strategy: AgentStrategy;
  /** Never rejects; every failure becomes an `Error: ...` feedback string. */
  handleResponse(response: string): Promise<string | null>;
  formatSystemPrompt(template?: string): string;
  reset(): void;
};

export type JsonAgentOptions = {
  openTag?: string;
  closeTag?: string;
};

export type CodeAgentOptions = {
  maxCodeSize?: number;
  maxLoopIterations?: number;
  maxOutputSize?: number;
  maxToolCallsPerExec?: number;
};

export class PromptTemplateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PromptTemplateError';
  }
}
