export type LogLevel = "debug" | "warn" | "silent";

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, warn: 1, silent: 2 };

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.keys(LEVEL_RANK).includes(value);
}

/**
 * Default level: silent under tests, then LOG_LEVEL, then warn.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  if (env['NODE_ENV'] === "test") return "silent";
  const fromEnv = env['LOG_LEVEL'];
  return isLogLevel(fromEnv) ? fromEnv : "warn";
}

/**
 * Console logger writing `${prefix}${message}`; debug to stdout, warn to stderr.
 */
export function createLogger(prefix: string = "", level: LogLevel = resolveLogLevel()): Logger {
  const enabled = (messageLevel: LogLevel): boolean =>
    level !== "silent" && LEVEL_RANK[messageLevel] >= LEVEL_RANK[level];

  return {
    debug(message, ...args) {
      if (enabled("debug")) console.log(`${prefix}${message}`, ...args);
    },
    warn(message, ...args) {
      if (enabled("warn")) console.warn(`${prefix}${message}`, ...args);
    },
  };
}
