import { format } from "node:util";

export type Logger = {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
};

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function createLogger(level: LogLevel): Logger {
  const enabled = (target: LogLevel) => LEVEL_RANK[target] >= LEVEL_RANK[level];
  return {
    debug: (...args: unknown[]) => {
      if (enabled("debug")) {
        console.debug("[DEBUG]", format(...args));
      }
    },
    info: (...args: unknown[]) => {
      if (enabled("info")) {
        console.log("[INFO]", format(...args));
      }
    },
    warn: (...args: unknown[]) => {
      if (enabled("warn")) {
        console.warn("[WARN]", format(...args));
      }
    },
    error: (...args: unknown[]) => {
      if (enabled("error")) {
        console.error("[ERROR]", format(...args));
      }
    },
  };
}

export function resolveLogLevel(flags: { debug?: boolean; quiet?: boolean }): LogLevel {
  if (flags.debug) {
    return "debug";
  }
  return flags.quiet ? "warn" : "info";
}

let activeLogger: Logger = createLogger("info");

export function setLogger(logger: Logger): void {
  activeLogger = logger;
}

export function getLogger(): Logger {
  return activeLogger;
}
