/**
 * ReceiptLens – Leveled console logger
 *
 * Debug and info lines are printed only when the logger is enabled;
 * warnings and errors always reach the console.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface ReceiptLensLogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const PREFIX = "[ReceiptLens]";

const SINKS: Record<LogLevel, (message: string, ...args: unknown[]) => void> = {
  // eslint-disable-next-line no-console
  debug: (message, ...args) => console.log(message, ...args),
  // eslint-disable-next-line no-console
  info: (message, ...args) => console.info(message, ...args),
  // eslint-disable-next-line no-console
  warn: (message, ...args) => console.warn(message, ...args),
  // eslint-disable-next-line no-console
  error: (message, ...args) => console.error(message, ...args),
};

const VERBOSE: ReadonlySet<LogLevel> = new Set<LogLevel>(["debug", "info"]);

/**
 * @param enabled – turns on debug and info output
 * @param scope   – component tag printed after the prefix, e.g. "scanner"
 */
export function createLogger(
  enabled: boolean = false,
  scope?: string,
): ReceiptLensLogger {
  const head = scope ? `${PREFIX}[${scope}]` : PREFIX;

  const emit =
    (level: LogLevel) =>
    (message: string, ...args: unknown[]): void => {
      if (!enabled && VERBOSE.has(level)) return;
      const line = `${head}[${level.toUpperCase()}][${new Date().toISOString()}] ${message}`;
      SINKS[level](line, ...args);
    };

  return {
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
  };
}

/** Shared logger with debug/info muted */
export const silentLogger: ReceiptLensLogger = createLogger(false);
