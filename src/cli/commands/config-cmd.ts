import { Command, Option } from "clipanion";
import { readFileSync } from "node:fs";
import { loadConfig, substituteEnv } from "../../config/loader.js";
import { getConfigPath, getLogsDir } from "../../config/paths.js";
import { parseConfig } from "../../config/schema.js";
import type { TokentabConfig } from "../../config/types.js";

export class ConfigShowCommand extends Command {
  static override paths = [["config", "show"]];

  static override usage = Command.Usage({
    description: "Show the effective configuration with defaults applied",
    examples: [["Show config", "tokentab config show"]],
  });

  async execute(): Promise<void> {
    let config: TokentabConfig;
    try {
      config = loadConfig();
    } catch (err) {
      this.context.stdout.write(
        `Failed to load config: ${err instanceof Error ? err.message : String(err)}\n`,
      );
      process.exitCode = 1;
      return;
    }

    const effective = { ...config, usage: { ...config.usage, logsDir: getLogsDir(config) } };
    this.context.stdout.write(JSON.stringify(effective, null, 2) + "\n");
  }
}

export class ConfigValidateCommand extends Command {
  static override paths = [["config", "validate"]];

  static override usage = Command.Usage({
    description: "Validate a configuration file",
    examples: [
      ["Validate default config", "tokentab config validate"],
      ["Validate specific file", "tokentab config validate ./my-config.json"],
    ],
  });

  configFile = Option.String({ name: "path", required: false });

  async execute(): Promise<void> {
    const configPath = this.configFile ?? getConfigPath();

    let content: string;
    try {
      content = readFileSync(configPath, "utf-8");
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") {
        this.context.stdout.write(`Config file not found: ${configPath}\n`);
        process.exitCode = 1;
        return;
      }
      throw err;
    }

    try {
      const substituted = substituteEnv(content);
      const raw = JSON.parse(substituted) as unknown;
      const config = parseConfig(raw);
      this.context.stdout.write(`Config is valid: ${configPath}\n`);
      const { allowedUserIds, userBudgets } = config.budget;
      if (
        allowedUserIds !== "*" &&
        userBudgets !== "*" &&
        userBudgets.length < allowedUserIds.length
      ) {
        this.context.stdout.write(
          `  Warning: ${allowedUserIds.length} allowed users but only ${userBudgets.length} budgets; the rest get a zero budget\n`,
        );
      }
    } catch (err) {
      this.context.stdout.write(
        `Config is INVALID: ${configPath}\n` +
          `  ${err instanceof Error ? err.message : String(err)}\n`,
      );
      process.exitCode = 1;
    }
  }
}
