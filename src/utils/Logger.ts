/**
 * Simple structured logger with consistent formatting.
 * Supports log levels, filtering, custom sinks, and module-prefixed output.
 */

export const LogLevel = { DEBUG: 0, INFO: 1, WARN: 2, ERROR: 3 } as const;
export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

export type LogSink = (level: LogLevel, ...args: unknown[]) => void;

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  warning: LogLevel.WARN,
  error: LogLevel.ERROR,
};

/** Parse a level name such as "debug" or "WARN". Returns null for unknown names. */
export function parseLogLevel(name: string | undefined | null): LogLevel | null {
  if (!name) return null;
  return LEVEL_NAMES[name.trim().toLowerCase()] ?? null;
}

const defaultSink: LogSink = (level, ...args) => {
  const fn =
    level === LogLevel.DEBUG
      ? console.debug
      : level === LogLevel.INFO
        ? console.info
        : level === LogLevel.WARN
          ? console.warn
          : console.error;
  fn(...args);
};

function initialLevel(): LogLevel {
  const fromEnv = parseLogLevel(process.env.LOG_LEVEL);
  if (fromEnv !== null) return fromEnv;
  // vitest sets NODE_ENV=test; keep test output quiet unless asked otherwise
  return process.env.NODE_ENV === 'test' ? LogLevel.WARN : LogLevel.INFO;
}

let currentLevel: LogLevel = initialLevel();
let currentSink: LogSink = defaultSink;

export class Logger {
  constructor(private readonly module: string) {}

  /** Set the minimum log level globally. Messages below this level are suppressed. */
  static setLevel(level: LogLevel): void {
    currentLevel = level;
  }

  static getLevel(): LogLevel {
    return currentLevel;
  }

  /** Replace the default console output with a custom sink. */
  static setSink(sink: LogSink | null): void {
    currentSink = sink ?? defaultSink;
  }

  /** Same as `new Logger(context)`. */
  static withContext(context: string): Logger {
    return new Logger(context);
  }

  debug(message: string, ...args: unknown[]): void {
    if (currentLevel > LogLevel.DEBUG) return;
    currentSink(LogLevel.DEBUG, `[${this.module}]`, message, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    if (currentLevel > LogLevel.INFO) return;
    currentSink(LogLevel.INFO, `[${this.module}]`, message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    if (currentLevel > LogLevel.WARN) return;
    currentSink(LogLevel.WARN, `[${this.module}]`, message, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    currentSink(LogLevel.ERROR, `[${this.module}]`, message, ...args);
  }
}
