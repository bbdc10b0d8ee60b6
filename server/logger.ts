import pino, { type Logger, type LevelWithSilent } from "pino";

export const logger: Logger = pino({
  level: "info",
  base: { service: "catalog" },
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: {
    remove: true,
    paths: ["req.headers.authorization", "req.headers.cookie"],
  },
});

/** Applies the configured level to the root logger. Children created afterwards inherit it. */
export function setLogLevel(level: LevelWithSilent): void {
  logger.level = level;
}

export function componentLogger(component: string): Logger {
  return logger.child({ component });
}
