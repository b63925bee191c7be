import pino, { type Logger } from "pino";
import type { AppConfig } from "../config/env.js";

// stdout is reserved for the MCP stdio transport; logs go to stderr.
const STDERR = 2;

let loggerInstance: Logger | null = null;

export function configureLogger(config: AppConfig["logging"]): Logger {
  loggerInstance = config.pretty
    ? pino({
        level: config.level,
        base: undefined,
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            destination: STDERR,
          },
        },
      })
    : pino({ level: config.level, base: undefined }, pino.destination(STDERR));
  return loggerInstance;
}

export function getLogger(): Logger {
  if (!loggerInstance) {
    loggerInstance = pino(
      { level: process.env.LOG_LEVEL ?? "info", base: undefined },
      pino.destination(STDERR),
    );
  }
  return loggerInstance;
}

export function childLogger(module: string, parent?: Logger): Logger {
  return (parent ?? getLogger()).child({ module });
}
