import { readFileSync } from "node:fs";
import { dirname, isAbsolute, resolve } from "node:path";
import type { TokentabConfig } from "./types.js";
import { getConfigPath } from "./paths.js";
import { parseConfig } from "./schema.js";

const ENV_PATTERN = /\$\{env:([A-Z_][A-Z0-9_]*)\}/g;

export function substituteEnv(raw: string): string {
  return raw.replace(ENV_PATTERN, (match, varName: string) => {
    const value = process.env[varName];
    if (value === undefined) {
      throw new Error(`Missing environment variable: ${varName} (referenced as ${match})`);
    }
    return value;
  });
}

/**
 * Loads and validates the config file; a missing file yields the defaults.
 * A relative `usage.logsDir` is taken relative to the config file, so the
 * ledgers stay put whatever directory the bot is started from.
 */
export function loadConfig(path?: string): TokentabConfig {
  const configPath = resolve(path ?? getConfigPath());

  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      return parseConfig({});
    }
    throw err;
  }

  const config = parseConfig(JSON.parse(substituteEnv(content)) as unknown);
  const logsDir = config.usage.logsDir;
  if (logsDir === undefined || isAbsolute(logsDir)) return config;

  return {
    ...config,
    usage: { ...config.usage, logsDir: resolve(dirname(configPath), logsDir) },
  };
}
