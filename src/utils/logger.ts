import { mkdirSync, existsSync, appendFileSync } from "fs";
import { join } from "path";

export type LogLevel = "info" | "warn" | "error" | "debug";

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  data?: unknown;
}

export interface Logger {
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
  debug(message: string, data?: unknown): void;
  child(scope: string): Logger;
}

export interface LoggerOptions {
  /** Directory for daily log files; null disables file output. */
  logDir: string | null;
  debug?: boolean;
  /** Suppresses console output (file output is unaffected). */
  silent?: boolean;
}

function serialize(data: unknown): string {
  if (data instanceof Error) {
    return JSON.stringify({ name: data.name, message: data.message });
  }
  try {
    return JSON.stringify(data);
  } catch {
    return String(data);
  }
}

export function formatEntry(entry: LogEntry): string {
  const base = `[${entry.timestamp}] ${entry.level.toUpperCase().padEnd(5)} ${entry.message}`;
  if (entry.data !== undefined) {
    return `${base} ${serialize(entry.data)}`;
  }
  return base;
}

/**
 * Builds the run's logger. Every stage receives it (or a child of it)
 * instead of reaching for a module-level instance.
 */
export function createLogger(options: LoggerOptions, scope?: string): Logger {
  let dirReady = false;

  function writeFile(line: string): void {
    if (!options.logDir) return;
    try {
      if (!dirReady && !existsSync(options.logDir)) {
        mkdirSync(options.logDir, { recursive: true });
      }
      dirReady = true;
      const date = new Date().toISOString().slice(0, 10);
      appendFileSync(join(options.logDir, `pipeline-${date}.log`), line + "\n");
    } catch {
      // Don't fail the pipeline over logging
    }
  }

  function log(level: LogLevel, message: string, data?: unknown): void {
    if (level === "debug" && !options.debug) return;

    const formatted = formatEntry({
      timestamp: new Date().toISOString(),
      level,
      message: scope ? `[${scope}] ${message}` : message,
      data,
    });

    if (!options.silent) {
      switch (level) {
        case "error":
          console.error(formatted);
          break;
        case "warn":
          console.warn(formatted);
          break;
        default:
          console.log(formatted);
      }
    }

    writeFile(formatted);
  }

  return {
    info: (msg, data) => log("info", msg, data),
    warn: (msg, data) => log("warn", msg, data),
    error: (msg, data) => log("error", msg, data),
    debug: (msg, data) => log("debug", msg, data),
    child: (childScope) =>
      createLogger(options, scope ? `${scope}:${childScope}` : childScope),
  };
}
