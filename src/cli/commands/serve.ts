import { Command, Option } from "clipanion";
import { startSentinel } from "../../gateway/lifecycle.js";
import { ConfigError } from "../../utils/errors.js";

export class ServeCommand extends Command {
  static override paths = [["serve"]];

  static override usage = Command.Usage({
    description: "Start the HTTP API",
    examples: [
      ["Start with default config", "sentinel serve"],
      ["Start with custom config", "sentinel serve --config ./sentinel.config.json"],
    ],
  });

  config = Option.String("--config,-c", { description: "Path to config file", required: false });

  async execute(): Promise<void> {
    try {
      await startSentinel({ configPath: this.config });
    } catch (err) {
      if (!(err instanceof ConfigError)) throw err;
      this.context.stderr.write(`Failed to start: ${err.message}\n`);
      process.exitCode = 1;
    }
    // The HTTP server keeps the process alive until a shutdown signal
  }
}
