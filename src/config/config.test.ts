// pattern: Imperative Shell

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { loadConfig } from "./config.ts";
import { writeFileSync, unlinkSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

const getTempConfigPath = () =>
  join(tmpdir(), `test-config-${Date.now()}-${Math.random().toString(36).slice(2)}.toml`);

const baseTomlContent = `
[agent]
strategy = "json"
max_tool_rounds = 5

[sandbox]
max_output_size = 4096

[json]
open_tag = "<call>"
close_tag = "</call>"
`;

describe("loadConfig", () => {
  let tempPath: string;

  beforeEach(() => {
    tempPath = getTempConfigPath();
  });

  afterEach(() => {
    delete process.env["TOOLCALL_STRATEGY"];
    delete process.env["TOOLCALL_TOOL_ROLE"];
    delete process.env["TOOLCALL_MAX_TOOL_ROUNDS"];
    try {
      unlinkSync(tempPath);
    } catch {
      // file might not exist
    }
  });

  describe("TOML file", () => {
    it("should read values and default the rest", () => {
      writeFileSync(tempPath, baseTomlContent);

      const config = loadConfig(tempPath);

      expect(config.agent.strategy).toBe("json");
      expect(config.agent.max_tool_rounds).toBe(5);
      expect(config.agent.tool_role).toBe("user");
      expect(config.sandbox.max_output_size).toBe(4096);
      expect(config.sandbox.max_code_size).toBe(51200);
      expect(config.json.open_tag).toBe("<call>");
    });

    it("should throw when an explicit path does not exist", () => {
      expect(() => loadConfig(tempPath)).toThrow(`config file not found: ${tempPath}`);
    });

    it("should throw on malformed TOML", () => {
      writeFileSync(tempPath, "[agent\nstrategy = ");

      expect(() => loadConfig(tempPath)).toThrow(`failed to parse ${tempPath}`);
    });

    it("should throw on invalid values", () => {
      writeFileSync(tempPath, `[agent]\nstrategy = "yaml"\n`);

      expect(() => loadConfig(tempPath)).toThrow("invalid config: agent.strategy");
    });
  });

  describe("environment overrides", () => {
    it("should override the strategy from TOOLCALL_STRATEGY", () => {
      writeFileSync(tempPath, baseTomlContent);
      process.env["TOOLCALL_STRATEGY"] = "code";

      const config = loadConfig(tempPath);

      expect(config.agent.strategy).toBe("code");
      expect(config.agent.max_tool_rounds).toBe(5);
    });

    it("should override the tool role and round limit", () => {
      writeFileSync(tempPath, baseTomlContent);
      process.env["TOOLCALL_TOOL_ROLE"] = "tool";
      process.env["TOOLCALL_MAX_TOOL_ROUNDS"] = "3";

      const config = loadConfig(tempPath);

      expect(config.agent.tool_role).toBe("tool");
      expect(config.agent.max_tool_rounds).toBe(3);
      expect(config.agent.strategy).toBe("json");
    });

    it("should reject a round limit that is not a number", () => {
      writeFileSync(tempPath, baseTomlContent);
      process.env["TOOLCALL_MAX_TOOL_ROUNDS"] = "many";

      expect(() => loadConfig(tempPath)).toThrow("invalid config: agent.max_tool_rounds");
    });
  });
});
