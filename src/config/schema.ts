// pattern: Functional Core
import { z } from "zod";

const AgentConfigSchema = z.object({
  strategy: z.enum(["json", "code"]).default("code"),
  tool_role: z.enum(["user", "tool"]).default("user"),
  max_tool_rounds: z.number().int().positive().default(20),
});

const SandboxConfigSchema = z.object({
  max_code_size: z.number().int().positive().default(51200),
  max_output_size: z.number().int().positive().default(1048576),
  max_loop_iterations: z.number().int().positive().default(100000),
  max_tool_calls_per_exec: z.number().int().positive().default(25),
});

const JsonCallConfigSchema = z
  .object({
    open_tag: z.string().min(1).default("<tool_call>"),
    close_tag: z.string().min(1).default("</tool_call>"),
  })
  .superRefine((data, ctx) => {
    if (data.open_tag === data.close_tag) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "close_tag must differ from open_tag", path: ["close_tag"] });
    }
  });

const AppConfigSchema = z.object({
  agent: AgentConfigSchema.default({}),
  sandbox: SandboxConfigSchema.default({}),
  json: JsonCallConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type AgentConfig = z.infer<typeof AgentConfigSchema>;
export type SandboxConfig = z.infer<typeof SandboxConfigSchema>;
export type JsonCallConfig = z.infer<typeof JsonCallConfigSchema>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function parseConfig(raw: unknown): AppConfig {
  const result = AppConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`invalid config: ${issues.join("; ")}`);
  }
  return result.data;
}

export { AppConfigSchema, AgentConfigSchema, SandboxConfigSchema, JsonCallConfigSchema };
