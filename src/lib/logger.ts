export type LogLevel = "log" | "info" | "ok" | "warn" | "err";

export interface InstallLogger {
  /** Start of an action ("==> Installing bun..."). */
  log(message: string): void;
  info(message: string): void;
  ok(message: string): void;
  warn(message: string): void;
  err(message: string): void;
}

export const LOG_GLYPHS: Record<LogLevel, string> = {
  log: "==>",
  info: " ",
  ok: "✓",
  warn: "!",
  err: "✗",
};

export function formatLogLine(level: LogLevel, message: string): string {
  return `${LOG_GLYPHS[level]} ${message}`;
}

export function createLogger(sink: (level: LogLevel, message: string) => void): InstallLogger {
  return {
    log: (message) => sink("log", message),
    info: (message) => sink("info", message),
    ok: (message) => sink("ok", message),
    warn: (message) => sink("warn", message),
    err: (message) => sink("err", message),
  };
}

/** Plain line output for non-interactive terminals. */
export function createConsoleLogger(): InstallLogger {
  return createLogger((level, message) => {
    const line = formatLogLine(level, message);
    if (level === "err") {
      console.error(line);
    } else {
      console.log(line);
    }
  });
}

export function logError(context: string, error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`${context}: ${message}`);
}
