// pattern: Functional Core

import { describe, it, expect } from "vitest";
import { AppConfigSchema, ConfigError, parseConfig } from "./schema.ts";

describe("AppConfigSchema", () => {
  it("should fill every section with defaults", () => {
    const result = AppConfigSchema.parse({});

    expect(result).toEqual({
      agent: { strategy: "code", tool_role: "user", max_tool_rounds: 20 },
      sandbox: {
        max_code_size: 51200,
        max_output_size: 1048576,
        max_loop_iterations: 100000,
        max_tool_calls_per_exec: 25,
      },
      json: { open_tag: "<tool_call>", close_tag: "</tool_call>" },
    });
  });

  it("should keep values that are set", () => {
    const result = AppConfigSchema.parse({
      agent: { strategy: "json", tool_role: "tool" },
      json: { open_tag: "<call>", close_tag: "</call>" },
    });

    expect(result.agent.strategy).toBe("json");
    expect(result.agent.tool_role).toBe("tool");
    expect(result.agent.max_tool_rounds).toBe(20);
    expect(result.json.open_tag).toBe("<call>");
  });

  it("should reject non-positive limits", () => {
    expect(() => AppConfigSchema.parse({ sandbox: { max_code_size: 0 } })).toThrow();
    expect(() => AppConfigSchema.parse({ agent: { max_tool_rounds: 1.5 } })).toThrow();
  });
});

describe("parseConfig", () => {
  it("should name the failing path", () => {
    expect(() => parseConfig({ agent: { strategy: "xml" } })).toThrow(ConfigError);
    expect(() => parseConfig({ agent: { strategy: "xml" } })).toThrow("invalid config: agent.strategy: ");
  });

  it("should reject identical call tags", () => {
    expect(() => parseConfig({ json: { open_tag: "@@", close_tag: "@@" } })).toThrow(
      "invalid config: json.close_tag: close_tag must differ from open_tag",
    );
  });

  it("should reject empty call tags", () => {
    expect(() => parseConfig({ json: { open_tag: "" } })).toThrow("invalid config: json.open_tag: ");
  });
});
