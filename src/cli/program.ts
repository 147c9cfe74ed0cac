import { Builtins, Cli } from "clipanion";
import { ConfigShowCommand, ConfigValidateCommand } from "./commands/config-cmd.js";
import {
  UsageBudgetCommand,
  UsageRecordCommand,
  UsageShowCommand,
} from "./commands/usage.js";

export function createCli(): Cli {
  const cli = new Cli({
    binaryLabel: "Tokentab",
    binaryName: "tokentab",
    binaryVersion: "0.1.0",
  });

  cli.register(Builtins.HelpCommand);
  cli.register(Builtins.VersionCommand);

  // Usage commands
  cli.register(UsageShowCommand);
  cli.register(UsageBudgetCommand);
  cli.register(UsageRecordCommand);

  // Config commands
  cli.register(ConfigShowCommand);
  cli.register(ConfigValidateCommand);

  return cli;
}
