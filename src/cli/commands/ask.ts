import { Command, Option } from "clipanion";
import { createSentinel, type SentinelContext } from "../../gateway/lifecycle.js";
import { ConfigError } from "../../utils/errors.js";

export class AskCommand extends Command {
  static override paths = [["ask"]];

  static override usage = Command.Usage({
    description: "Ask the advisor a question about past incidents",
    examples: [["Ask about a user", "sentinel ask has jdoe been flagged before?"]],
  });

  config = Option.String("--config,-c", { description: "Path to config file", required: false });

  session = Option.String("--session", "cli", { description: "Advisor session id" });

  question = Option.Rest({ required: 1 });

  async execute(): Promise<void> {
    let sentinel: SentinelContext;
    try {
      sentinel = await createSentinel({ configPath: this.config });
    } catch (err) {
      if (!(err instanceof ConfigError)) throw err;
      this.context.stdout.write(`${err.message}\n`);
      process.exitCode = 1;
      return;
    }

    try {
      const reply = await sentinel.advisor.query(this.session, this.question.join(" "));
      this.context.stdout.write(`${reply}\n`);
    } finally {
      await sentinel.close();
    }
  }
}
