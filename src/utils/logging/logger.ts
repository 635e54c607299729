import pino from "pino";

export type LogLevel = pino.LevelWithSilent;

export type LogContext = {
  requestId?: string;
  toolName?: string;
  command?: string;
  [key: string]: unknown;
};

export type LoggerOptions = {
  level?: string;
  enabled?: boolean;
};

const LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

/**
 * Normalize and validate log level string for pino.
 */
export function normalizeLogLevel(raw: unknown): LogLevel | undefined {
  if (typeof raw !== "string") return undefined;
  const level = raw.trim().toLowerCase();
  return LEVELS.find((l) => l === level);
}

function createLogger(options: LoggerOptions = {}): pino.Logger {
  const fromEnv = normalizeLogLevel(process.env.LOG_LEVEL);
  const level: LogLevel =
    options.enabled === false ? "silent" : fromEnv ?? normalizeLogLevel(options.level) ?? "info";
  return pino(
    {
      level,
      base: { service: "toolbench" },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination(2)
  );
}

let current: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (!current) current = createLogger();
  return current;
}

/**
 * Replace the process logger; called once the config's logging section is known.
 * LOG_LEVEL still wins over the configured level.
 */
export function configureLogger(options: LoggerOptions): pino.Logger {
  current = createLogger(options);
  return current;
}
