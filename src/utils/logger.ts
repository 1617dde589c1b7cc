export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_RANK, value);
}

function initialLevel(): LogLevel {
  if (process.env.DEBUG === "true") return "debug";
  const fromEnv = (process.env.LOG_LEVEL ?? "").toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : "info";
}

let minLevel: LogLevel = initialLevel();

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

const timestamp = () => new Date().toISOString();

function enabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[minLevel];
}

export const logger = {
  debug(message: string, data?: unknown) {
    if (enabled("debug")) {
      console.log(`[${timestamp()}] DEBUG: ${message}`, data ?? "");
    }
  },
  info(message: string, data?: unknown) {
    if (enabled("info")) {
      console.log(`[${timestamp()}] INFO: ${message}`, data ?? "");
    }
  },
  warn(message: string, data?: unknown) {
    if (enabled("warn")) {
      console.warn(`[${timestamp()}] WARN: ${message}`, data ?? "");
    }
  },
  error(message: string, error?: unknown) {
    console.error(`[${timestamp()}] ERROR: ${message}`, error ?? "");
  },
};
