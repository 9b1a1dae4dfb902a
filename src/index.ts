// pattern: Functional Core

/**
 * Response handling for tool-using language model agents.
 * Two strategies share one tool registry: JSON function calls, and Python
 * code run in an interpreted sandbox.
 */

export * from './tool/index.ts';
export * from './agent/index.ts';
export * from './sandbox/index.ts';
export { loadConfig } from './config/config.ts';
export { ConfigError, parseConfig, type AppConfig, type AgentConfig, type JsonCallConfig, type SandboxConfig } from './config/schema.ts';
export {
  runToolLoop,
  toolLoopOptionsFromConfig,
  type ChatMessage,
  type ChatRole,
  type GenerateFn,
  type ToolLoopDependencies,
  type ToolLoopOptions,
  type ToolLoopResult,
} from './conversation/loop.ts';
