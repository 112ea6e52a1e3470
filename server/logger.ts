type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function currentLevel(): LogLevel {
  const raw = (process.env.LOG_LEVEL || "info").toLowerCase();
  return raw === "debug" || raw === "warn" || raw === "error" ? raw : "info";
}

function formattedTime(): string {
  return new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });
}

function write(level: LogLevel, message: string, source: string, meta?: Record<string, unknown>): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel()]) {
    return;
  }
  const line = `${formattedTime()} [${source}] ${message}`;
  const args: unknown[] = meta ? [line, meta] : [line];
  if (level === "error") {
    console.error(...args);
  } else if (level === "warn") {
    console.warn(...args);
  } else {
    console.log(...args);
  }
}

export function log(message: string, source = "express", meta?: Record<string, unknown>): void {
  write("info", message, source, meta);
}

export function logDebug(message: string, source = "express", meta?: Record<string, unknown>): void {
  write("debug", message, source, meta);
}

export function logWarn(message: string, source = "express", meta?: Record<string, unknown>): void {
  write("warn", message, source, meta);
}

export function logError(message: string, source = "express", error?: unknown): void {
  const meta = error === undefined
    ? undefined
    : { error: error instanceof Error ? error.message : String(error) };
  write("error", message, source, meta);
}
