import pino from "pino";
import type { DestinationStream, Logger } from "pino";

function resolveLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  return process.env.NODE_ENV === "test" ? "silent" : "info";
}

/**
 * Log lines go to stderr; stdout carries only the CLI's own progress output.
 */
export function createLogger(level = resolveLevel(), destination: DestinationStream = process.stderr): Logger {
  const options = {
    level,
    base: {
      service: "letter-miner",
    },
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (process.env.NODE_ENV === "development" && process.stderr.isTTY) {
    return pino({
      ...options,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          destination: 2,
          translateTime: "SYS:standard",
          ignore: "pid,hostname,service",
        },
      },
    });
  }
  return pino(options, destination);
}

export const logger = createLogger();

export function createChildLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}

export type { Logger };
