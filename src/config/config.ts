// pattern: Imperative Shell
import TOML from "@iarna/toml";
import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { ConfigError, parseConfig, type AppConfig } from "./schema.ts";

const DEFAULT_CONFIG_PATH = "config.toml";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(parsed: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = parsed[key];
  return isRecord(value) ? { ...value } : {};
}

function readToml(path: string): Record<string, unknown> {
  const raw = readFileSync(path, "utf-8");
  try {
    return TOML.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`failed to parse ${path}: ${reason}`);
  }
}

/**
 * Load config from TOML, then apply environment overrides.
 * Without an explicit path a missing config.toml means all defaults.
 */
export function loadConfig(configPath?: string): AppConfig {
  const resolvedPath = resolve(configPath ?? DEFAULT_CONFIG_PATH);
  if (configPath !== undefined && !existsSync(resolvedPath)) {
    throw new ConfigError(`config file not found: ${resolvedPath}`);
  }
  const parsed = existsSync(resolvedPath) ? readToml(resolvedPath) : {};

  const envOverrides: Record<string, unknown> = {};
  const agent = section(parsed, "agent");
  let agentOverridden = false;

  if (process.env["TOOLCALL_STRATEGY"]) {
    agent["strategy"] = process.env["TOOLCALL_STRATEGY"];
    agentOverridden = true;
  }

  if (process.env["TOOLCALL_TOOL_ROLE"]) {
    agent["tool_role"] = process.env["TOOLCALL_TOOL_ROLE"];
    agentOverridden = true;
  }

  if (process.env["TOOLCALL_MAX_TOOL_ROUNDS"]) {
    agent["max_tool_rounds"] = Number(process.env["TOOLCALL_MAX_TOOL_ROUNDS"]);
    agentOverridden = true;
  }

  if (agentOverridden) {
    envOverrides["agent"] = agent;
  }

  const merged = { ...parsed, ...envOverrides };
  return parseConfig(merged);
}
