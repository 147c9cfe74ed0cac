import pino from "pino";
import type { LoggingConfig } from "../config/types.js";

export type Logger = pino.Logger;

export function createLogger(
  config?: Partial<LoggingConfig>,
  stream?: pino.DestinationStream,
): Logger {
  const level = config?.level ?? "info";

  if (stream) {
    return pino({ level }, stream);
  }

  if (config?.file) {
    return pino({ level }, pino.destination(config.file));
  }

  const isJson = config?.json ?? process.env["NODE_ENV"] === "production";

  const transport = isJson
    ? undefined
    : {
        target: "pino-pretty",
        options: { colorize: true, translateTime: "HH:MM:ss" },
      };

  const options: pino.LoggerOptions = {
    level,
    ...(transport ? { transport } : {}),
  };

  return pino(options);
}
