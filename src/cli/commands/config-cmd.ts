import { readFileSync } from "node:fs";
import { Command, Option } from "clipanion";
import { applyEnvDefaults, loadConfig, substituteEnv } from "../../config/loader.js";
import { getConfigPath } from "../../config/paths.js";
import { parseConfig } from "../../config/schema.js";
import type { SentinelConfig } from "../../config/types.js";
import { ConfigError, errorMessage } from "../../utils/errors.js";

const REDACTED = "***REDACTED***";

/** Config as JSON with credentials and webhook URLs masked. */
export function redactConfig(config: SentinelConfig): SentinelConfig {
  return {
    ...config,
    reasoning: {
      ...config.reasoning,
      ...(config.reasoning.apiKey ? { apiKey: REDACTED } : {}),
    },
    mitigation: {
      ...config.mitigation,
      ...(config.mitigation.firewallWebhookUrl ? { firewallWebhookUrl: REDACTED } : {}),
      alertWebhooks: config.mitigation.alertWebhooks.map((hook) => ({ ...hook, url: REDACTED })),
    },
  };
}

export class ConfigShowCommand extends Command {
  static override paths = [["config", "show"]];

  static override usage = Command.Usage({
    description: "Show the effective configuration (secrets redacted)",
    examples: [["Show config", "sentinel config show"]],
  });

  config = Option.String("--config,-c", { description: "Path to config file", required: false });

  async execute(): Promise<void> {
    let config: SentinelConfig;
    try {
      config = loadConfig(this.config);
    } catch (err) {
      this.context.stdout.write(`Failed to load config: ${errorMessage(err)}\n`);
      process.exitCode = 1;
      return;
    }

    this.context.stdout.write(JSON.stringify(redactConfig(config), null, 2) + "\n");
  }
}

export class ConfigValidateCommand extends Command {
  static override paths = [["config", "validate"]];

  static override usage = Command.Usage({
    description: "Validate a configuration file",
    examples: [
      ["Validate default config", "sentinel config validate"],
      ["Validate specific file", "sentinel config validate ./my-config.json"],
    ],
  });

  configFile = Option.String({ name: "path", required: false });

  async execute(): Promise<void> {
    const configPath = this.configFile ?? getConfigPath();

    let content: string;
    try {
      content = readFileSync(configPath, "utf-8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        this.context.stdout.write(`Config file not found: ${configPath}\n`);
        process.exitCode = 1;
        return;
      }
      throw err;
    }

    try {
      const raw: unknown = JSON.parse(substituteEnv(content));
      parseConfig(applyEnvDefaults(raw));
      this.context.stdout.write(`Config is valid: ${configPath}\n`);
    } catch (err) {
      const issues = err instanceof ConfigError ? err.issues : [];
      this.context.stdout.write(
        `Config is INVALID: ${configPath}\n` +
          (issues.length > 0 ? issues.map((i) => `  ${i}\n`).join("") : `  ${errorMessage(err)}\n`),
      );
      process.exitCode = 1;
    }
  }
}
