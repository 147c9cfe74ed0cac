import { homedir } from "node:os";
import { join } from "node:path";
import type { TokentabConfig } from "./types.js";

export function getStateDir(): string {
  return process.env["TOKENTAB_STATE_DIR"] ?? join(homedir(), ".tokentab");
}

export function getConfigPath(): string {
  return process.env["TOKENTAB_CONFIG_PATH"] ?? "tokentab.config.json";
}

export function getLogsDir(config: TokentabConfig): string {
  return config.usage.logsDir ?? join(getStateDir(), "usage_logs");
}
