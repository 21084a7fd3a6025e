type Level = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<Level, number> = { debug: 10, info: 20, warn: 30, error: 40 };

let threshold: Level = process.env.LOG_LEVEL === "debug" ? "debug" : "info";

export function setVerbose(verbose: boolean): void {
  threshold = verbose ? "debug" : "info";
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}

function write(level: Level, scope: string, message: string, meta?: unknown): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;

  const line = `${new Date().toISOString()} [${scope}] ${level.toUpperCase()} ${message}`;
  const sink =
    level === "error" ? console.error :
    level === "warn" ? console.warn : console.log;

  if (meta === undefined) {
    sink(line);
  } else {
    sink(line, meta);
  }
}

export function createLogger(scope: string): Logger {
  return {
    debug: (message, meta) => write("debug", scope, message, meta),
    info: (message, meta) => write("info", scope, message, meta),
    warn: (message, meta) => write("warn", scope, message, meta),
    error: (message, meta) => write("error", scope, message, meta)
  };
}
