const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = typeof LOG_LEVELS[number];

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Silent under NODE_ENV=test, otherwise LOG_LEVEL when valid, otherwise info.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  if (env['NODE_ENV'] === "test") {
    return "silent";
  }
  const envLevel = env['LOG_LEVEL'];
  return isLogLevel(envLevel) ? envLevel : "info";
}

/**
 * Console-backed logger; debug goes to stdout, warnings to stderr.
 */
export function createLogger(prefix: string = "", level: LogLevel = resolveLogLevel()): Logger {
  const threshold = LOG_LEVELS.indexOf(level);
  const enabled = (messageLevel: LogLevel) => level !== "silent" && threshold <= LOG_LEVELS.indexOf(messageLevel);

  return {
    debug(message, ...args) {
      if (enabled("debug")) {
        console.log(`${prefix}${message}`, ...args);
      }
    },
    warn(message, ...args) {
      if (enabled("warn")) {
        console.warn(`${prefix}${message}`, ...args);
      }
    }
  };
}
