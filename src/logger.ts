import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error";

const levelWeight: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(levelWeight, value);
}

const envLevel = process.env.CPW_LOG_LEVEL?.toLowerCase();
let activeLevel: LogLevel = isLogLevel(envLevel) ? envLevel : "info";

const formatters: Record<LogLevel, (message: string) => string> = {
  debug: message => chalk.gray(`[DEBUG] ${message}`),
  info: message => chalk.blue(`[INFO] ${message}`),
  warn: message => chalk.yellow(`[WARN] ${message}`),
  error: message => chalk.red(`[ERROR] ${message}`)
};

function shouldLog(level: LogLevel): boolean {
  return levelWeight[level] >= levelWeight[activeLevel];
}

/**
 * Set log level for runtime diagnostics.
 *
 * @param level - Desired logging level.
 * @throws Error if level is not recognised.
 */
export function setLogLevel(level: string): void {
  if (!isLogLevel(level)) {
    throw new Error(`Unsupported log level: ${level}`);
  }
  activeLevel = level;
}

/**
 * Emit information-level log entry.
 *
 * Invariant: message must be a human-readable progress summary.
 *
 * @param message - Log message text.
 */
export function info(message: string): void {
  if (shouldLog("info")) {
    console.log(formatters.info(message));
  }
}

/**
 * Emit debug-level log entry.
 *
 * @param message - Detailed diagnostic message.
 */
export function debug(message: string): void {
  if (shouldLog("debug")) {
    console.log(formatters.debug(message));
  }
}

export function warn(message: string): void {
  if (shouldLog("warn")) {
    console.error(formatters.warn(message));
  }
}

/**
 * Emit error-level log entry.
 *
 * @param message - Description of encountered error.
 */
export function error(message: string): void {
  if (shouldLog("error")) {
    console.error(formatters.error(message));
  }
}
