import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import type { SentinelConfig } from "./types.js";
import { getConfigPath } from "./paths.js";
import { parseConfig } from "./schema.js";
import { DEFAULT_POLICY } from "../policy/defaults.js";
import { ConfigError } from "../utils/errors.js";
import { isRecord } from "../utils/types.js";

const ENV_PATTERN = /\$\{env:([A-Z_][A-Z0-9_]*)\}/g;

type Env = Record<string, string | undefined>;

export function substituteEnv(raw: string, env: Env = process.env): string {
  return raw.replace(ENV_PATTERN, (match, varName: string) => {
    const value = env[varName];
    if (value === undefined) {
      throw new ConfigError(`Missing environment variable: ${varName} (referenced as ${match})`);
    }
    return value;
  });
}

/**
 * Fill fields the file leaves unset from the conventional environment
 * variables. Values present in the file always win, except APPROVED_DOMAINS
 * which replaces the approved list outright.
 */
export function applyEnvDefaults(raw: unknown, env: Env = process.env): Record<string, unknown> {
  const root: Record<string, unknown> = isRecord(raw) ? { ...raw } : {};

  const reasoning: Record<string, unknown> = isRecord(root["reasoning"])
    ? { ...root["reasoning"] }
    : {};
  const provider = env["LLM_PROVIDER"]?.trim().toLowerCase();
  if (reasoning["provider"] === undefined && provider) {
    reasoning["provider"] = provider;
  }
  if (reasoning["apiKey"] === undefined && env["OPENAI_API_KEY"]) {
    reasoning["apiKey"] = env["OPENAI_API_KEY"];
  }
  if (reasoning["model"] === undefined) {
    const model = reasoning["provider"] === "ollama" ? env["OLLAMA_MODEL"] : env["OPENAI_MODEL"];
    if (model) reasoning["model"] = model;
  }
  root["reasoning"] = reasoning;

  const approved = env["APPROVED_DOMAINS"];
  if (approved) {
    const domains = approved
      .split(",")
      .map((d) => d.trim())
      .filter(Boolean);
    if (domains.length > 0) {
      const policy = isRecord(root["policy"]) ? root["policy"] : DEFAULT_POLICY;
      root["policy"] = { ...policy, approvedDomains: domains };
    }
  }

  return root;
}

export function loadConfig(path?: string, env: Env = process.env): SentinelConfig {
  const configPath = resolve(path ?? getConfigPath());

  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return parseConfig(applyEnvDefaults({}, env));
    }
    throw new ConfigError(`Cannot read config file ${configPath}`, [], { cause: err });
  }

  const substituted = substituteEnv(content, env);
  let raw: unknown;
  try {
    raw = JSON.parse(substituted);
  } catch (err) {
    throw new ConfigError(
      `Config file ${configPath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  return parseConfig(applyEnvDefaults(raw, env));
}
