// pattern: Imperative Shell

import { parseConfig, type AppConfig } from '../config/schema.ts';
import { createToolRegistry } from '../tool/registry.ts';
import type { ToolRegistry, ToolSource } from '../tool/types.ts';
import { createCodeAgent } from './code-agent.ts';
import { createJsonAgent } from './json-agent.ts';
import type { Agent, AgentStrategy } from './types.ts';

function isRegistry(tools: ToolSource | ToolRegistry): tools is ToolRegistry {
  return 'generateStubs' in tools && typeof tools.generateStubs === 'function';
}

/**
 * Build the agent for a dispatch strategy, `agent.strategy` from config
 * unless one is given.
 * Tool definitions are validated here, so authoring errors surface at setup.
 */
export function createAgent(
  tools: ToolSource | ToolRegistry,
  config: AppConfig = parseConfig({}),
  strategy: AgentStrategy = config.agent.strategy,
): Agent {
  const registry = isRegistry(tools) ? tools : createToolRegistry(tools);

  switch (strategy) {
    case 'json':
      return createJsonAgent(registry, {
        openTag: config.json.open_tag,
        closeTag: config.json.close_tag,
      });
    case 'code':
      return createCodeAgent(registry, {
        maxCodeSize: config.sandbox.max_code_size,
        maxLoopIterations: config.sandbox.max_loop_iterations,
        maxOutputSize: config.sandbox.max_output_size,
        maxToolCallsPerExec: config.sandbox.max_tool_calls_per_exec,
      });
    default:
      throw new Error(`Unknown agent strategy: ${String(strategy)}`);
  }
}
