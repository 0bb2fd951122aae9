/** Tiny logger wrapper for consistent tags */
export type LogLevel = "debug" | "info" | "warn" | "error";

const ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

let threshold = ORDER.info;

export function setLogLevel(level: LogLevel) {
  threshold = ORDER[level];
}

const on = (level: LogLevel) => ORDER[level] >= threshold;

export const log = {
  debug: (...a: unknown[]) => {
    if (on("debug")) console.debug(new Date().toISOString(), "[DEBUG]", ...a);
  },
  info: (...a: unknown[]) => {
    if (on("info")) console.log(new Date().toISOString(), "[INFO]", ...a);
  },
  warn: (...a: unknown[]) => {
    if (on("warn")) console.warn(new Date().toISOString(), "[WARN]", ...a);
  },
  error: (...a: unknown[]) => {
    if (on("error")) console.error(new Date().toISOString(), "[ERROR]", ...a);
  },
};
