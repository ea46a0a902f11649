import { pino, type Logger } from "pino";

export type { Logger };

export function createLogger(level: string = process.env.LOG_LEVEL || "info"): Logger {
  const pretty = process.env.NODE_ENV !== "production" && process.env.NODE_ENV !== "test";
  return pino({
    name: "message-search",
    level,
    transport: pretty
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            ignore: "pid,hostname",
          },
        }
      : undefined,
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
  });
}
