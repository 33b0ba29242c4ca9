import pino from "pino";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];
const DEFAULT_LOG_LEVEL: LogLevel = "info";

function shouldColorizeLogs(): boolean {
  if (process.env.NO_COLOR === "1" || process.env.NO_COLOR === "true") {
    return false;
  }
  return process.stdout.isTTY === true;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function resolveInitialLevel(): LogLevel {
  const raw = (process.env.RELAY_LOG_LEVEL || DEFAULT_LOG_LEVEL).trim().toLowerCase();
  return isLogLevel(raw) ? raw : DEFAULT_LOG_LEVEL;
}

export const logger = pino({
  level: resolveInitialLevel(),
  transport: {
    target: "pino-pretty",
    options: {
      colorize: shouldColorizeLogs(),
    },
  },
});

export function configureLogger(level?: string): void {
  const normalized = (level || process.env.RELAY_LOG_LEVEL || DEFAULT_LOG_LEVEL)
    .trim()
    .toLowerCase();
  if (isLogLevel(normalized)) {
    logger.level = normalized;
    return;
  }
  logger.warn({ level }, "Invalid logger level in config; keeping current level");
}
