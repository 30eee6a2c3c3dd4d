import pino, { type Logger } from "pino";

export type { Logger };

/**
 * Create and configure a Pino logger instance
 */
export function createLogger(level: string = "info", pretty: boolean = true): Logger {
  if (pretty) {
    return pino({
      level,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
        },
      },
    });
  }

  // Production logger (JSON format)
  return pino({
    level,
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

// Default logger instance
export const logger = createLogger(
  process.env.LOG_LEVEL || "info",
  process.env.NODE_ENV !== "production" && process.env.NODE_ENV !== "test"
);
