import { Command, Option } from "clipanion";
import { loadConfig } from "../../config/loader.js";
import { getSnapshotPath, getStateDir } from "../../config/paths.js";
import type { SentinelConfig } from "../../config/types.js";
import { createLogger } from "../../logging/logger.js";
import { HashingEmbedder } from "../../memory/embedder.js";
import { VectorIndex } from "../../memory/vector-index.js";
import { errorMessage } from "../../utils/errors.js";

export class MemorySearchCommand extends Command {
  static override paths = [["memory", "search"]];

  static override usage = Command.Usage({
    description: "Search the incident memory by similarity",
    examples: [["Find incidents for a user", "sentinel memory search jdoe iban"]],
  });

  config = Option.String("--config,-c", { description: "Path to config file", required: false });

  limit = Option.String("--limit", "5", { description: "Maximum results" });

  text = Option.Rest({ required: 1 });

  async execute(): Promise<void> {
    let config: SentinelConfig;
    try {
      config = loadConfig(this.config);
    } catch (err) {
      this.context.stdout.write(`Failed to load config: ${errorMessage(err)}\n`);
      process.exitCode = 1;
      return;
    }

    const logger = createLogger(config.logging);
    const index = await VectorIndex.open(
      getSnapshotPath(getStateDir(), config.memory.snapshotPath),
      new HashingEmbedder(config.memory.dimension),
      logger,
    );

    const hits = index.search(this.text.join(" "), Number(this.limit) || 5);
    if (hits.length === 0) {
      this.context.stdout.write("No matching incidents.\n");
      return;
    }
    for (const hit of hits) {
      this.context.stdout.write(`${hit.similarity.toFixed(3)}  ${hit.record.summaryText}\n`);
    }
  }
}
