import TOML from "@iarna/toml";
import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { AppConfigSchema, type AppConfig } from "./schema.js";

type Env = Record<string, string | undefined>;

const DEFAULT_AZURE_DEPLOYMENT = "gpt-4o-mini";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(parsed: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = parsed[key];
  return isRecord(value) ? { ...value } : {};
}

function readConfigFile(path: string): Record<string, unknown> {
  if (!existsSync(path)) {
    return {};
  }
  return TOML.parse(readFileSync(path, "utf-8"));
}

function applyModelOverrides(model: Record<string, unknown>, env: Env): Record<string, unknown> {
  if (model["provider"] === undefined && (env["AZURE_OPENAI_API_KEY"] || env["AZURE_OPENAI_ENDPOINT"])) {
    model["provider"] = "azure";
  }

  switch (model["provider"]) {
    case "azure":
      model["api_key"] = env["AZURE_OPENAI_API_KEY"] ?? model["api_key"];
      model["base_url"] = env["AZURE_OPENAI_ENDPOINT"] ?? model["base_url"];
      model["api_version"] = env["AZURE_OPENAI_API_VERSION"] ?? model["api_version"];
      model["name"] = env["AZURE_OPENAI_DEPLOYMENT_NAME"] ?? model["name"] ?? DEFAULT_AZURE_DEPLOYMENT;
      break;
    case "openai-compat":
      model["api_key"] = env["OPENAI_API_KEY"] ?? model["api_key"];
      break;
    case "anthropic":
      model["api_key"] = env["ANTHROPIC_API_KEY"] ?? model["api_key"];
      break;
  }

  return model;
}

function applyServerOverrides(server: Record<string, unknown>, env: Env): Record<string, unknown> {
  server["host"] = env["A2A_HOST"] ?? server["host"];
  // PORT is what hosting platforms inject; it wins over A2A_PORT.
  server["port"] = env["PORT"] ?? env["A2A_PORT"] ?? server["port"];
  server["public_url"] = env["PUBLIC_URL"] ?? server["public_url"];
  return server;
}

/**
 * Load config from a TOML file (optional) with environment overrides for
 * secrets and deployment settings. The path defaults to CURRENCY_AGENT_CONFIG,
 * then ./config.toml.
 */
export function loadConfig(configPath?: string, env: Env = process.env): AppConfig {
  const resolvedPath = resolve(configPath ?? env["CURRENCY_AGENT_CONFIG"] ?? "config.toml");
  const parsed = readConfigFile(resolvedPath);

  const merged = {
    ...parsed,
    agent: section(parsed, "agent"),
    model: applyModelOverrides(section(parsed, "model"), env),
    server: applyServerOverrides(section(parsed, "server"), env),
  };

  return AppConfigSchema.parse(merged);
}
