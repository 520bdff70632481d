import { Builtins, Cli } from "clipanion";
import { VERSION } from "../gateway/lifecycle.js";
import { AnalyzeCommand } from "./commands/analyze.js";
import { AskCommand } from "./commands/ask.js";
import { ConfigShowCommand, ConfigValidateCommand } from "./commands/config-cmd.js";
import { IncidentsListCommand } from "./commands/incidents.js";
import { MemorySearchCommand } from "./commands/memory.js";
import { ServeCommand } from "./commands/serve.js";

export function createCli(): Cli {
  const cli = new Cli({
    binaryLabel: "Shadow Sentinel",
    binaryName: "sentinel",
    binaryVersion: VERSION,
  });

  cli.register(Builtins.HelpCommand);
  cli.register(Builtins.VersionCommand);

  // Analysis
  cli.register(AnalyzeCommand);
  cli.register(AskCommand);

  // Server
  cli.register(ServeCommand);

  // Config commands
  cli.register(ConfigShowCommand);
  cli.register(ConfigValidateCommand);

  // State
  cli.register(IncidentsListCommand);
  cli.register(MemorySearchCommand);

  return cli;
}
