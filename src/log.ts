/**
 * Console logging for the CLI and the sync loop.
 * Everything goes to stderr: stdout is reserved for the message stream.
 */

const LEVELS = { debug: 10, info: 20, warn: 30, error: 40 } as const;

export type LogLevel = keyof typeof LEVELS;

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVELS, value);
}

export function createLogger(name: string, level: string = process.env.LOG_LEVEL ?? "info"): Logger {
  const threshold = LEVELS[isLogLevel(level) ? level : "info"];
  const write = (lvl: LogLevel) => (message: string) => {
    if (LEVELS[lvl] < threshold) return;
    console.error(`${new Date().toISOString()} ${lvl.toUpperCase()} ${name} ${message}`);
  };
  return {
    debug: write("debug"),
    info: write("info"),
    warn: write("warn"),
    error: write("error"),
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
