export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogData = Record<string, string | number | boolean | undefined>;

/**
 * Logger interface for structured logging. Library functions accept one and
 * fall back to a console logger at "info".
 */
export interface Logger {
  debug: (message: string, data?: LogData) => void;
  info: (message: string, data?: LogData) => void;
  warn: (message: string, data?: LogData) => void;
  error: (message: string, error?: unknown, data?: LogData) => void;
}

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

function formatData(data?: LogData): string {
  if (!data) return "";
  const parts = Object.entries(data)
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => `${k}=${String(v)}`);
  return parts.length ? ` (${parts.join(", ")})` : "";
}

/**
 * Console logger. debug and info go to stdout, warn and error to stderr.
 */
export const createConsoleLogger = (level: LogLevel = "info", prefix = "[pdb-windows]"): Logger => {
  const enabled = (l: LogLevel) => RANK[l] >= RANK[level];
  return {
    debug: (message, data) => {
      if (enabled("debug")) console.debug(`${prefix} ${message}${formatData(data)}`);
    },
    info: (message, data) => {
      if (enabled("info")) console.info(`${prefix} ${message}${formatData(data)}`);
    },
    warn: (message, data) => {
      if (enabled("warn")) console.warn(`${prefix} ${message}${formatData(data)}`);
    },
    error: (message, error, data) => {
      if (!enabled("error")) return;
      // Always log errors, but keep the stack out unless debugging
      const detail = error instanceof Error ? `: ${enabled("debug") && error.stack ? error.stack : error.message}` : "";
      console.error(`${prefix} ${message}${detail}${formatData(data)}`);
    },
  };
};

let defaultLogger: Logger | null = null;

export const getLogger = (logger?: Logger): Logger => {
  if (logger) return logger;
  if (!defaultLogger) defaultLogger = createConsoleLogger();
  return defaultLogger;
};

export const silentLogger: Logger = createConsoleLogger("silent");
