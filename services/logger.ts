import pino, { type Logger } from "pino";

const LEVELS = new Set(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

const resolveLevel = (): string => {
  const level = process.env.LOG_LEVEL?.trim().toLowerCase();
  return level && LEVELS.has(level) ? level : "info";
};

// stdout belongs to the CLI, so logs always go to stderr
const rootLogger =
  process.env.NODE_ENV === "development"
    ? pino({
        level: resolveLevel(),
        transport: {
          target: "pino-pretty",
          options: {
            destination: 2,
            colorize: true,
            ignore: "pid,hostname",
            translateTime: "yyyy-mm-dd HH:MM:ss.l",
          },
        },
      })
    : pino(
        {
          level: resolveLevel(),
          formatters: {
            level: (label) => ({ level: label }),
          },
          timestamp: pino.stdTimeFunctions.isoTime,
        },
        pino.destination(2)
      );

export const logger = rootLogger;

export type { Logger };

export const createLogger = (module: string): Logger => rootLogger.child({ module });
