export const logLevels = ["debug", "info", "warn", "error"] as const;
export type LogLevel = typeof logLevels[number];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let currentLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

function timestamp(): string {
  return new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });
}

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

/**
 * Console logger tagged with its source, e.g. `3:04:05 PM [Orchestrator] ...`.
 * Warnings and errors go to stderr so CLI output on stdout stays clean.
 */
export function createLogger(source: string): Logger {
  const emit = (level: LogLevel, message: string, details: unknown[]) => {
    if (LEVEL_RANK[level] < LEVEL_RANK[currentLevel]) return;
    const line = `${timestamp()} [${source}] ${message}`;
    if (level === "warn" || level === "error") {
      console.error(line, ...details);
    } else {
      console.log(line, ...details);
    }
  };

  return {
    debug: (message, ...details) => emit("debug", message, details),
    info: (message, ...details) => emit("info", message, details),
    warn: (message, ...details) => emit("warn", message, details),
    error: (message, ...details) => emit("error", message, details),
  };
}

export function log(message: string, source = "express"): void {
  createLogger(source).info(message);
}
