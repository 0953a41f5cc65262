import { mkdirSync, appendFileSync, existsSync, statSync, renameSync } from "fs";
import { join } from "path";
import { resolveConfigDir } from "../config/index.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(msg: string, ...args: unknown[]): void;
  info(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  error(msg: string, error?: unknown): void;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const LOG_FILENAME = "hotpack.log";
const MAX_LOG_SIZE = 1024 * 1024; // 1 MB

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// ---------------------------------------------------------------------------
// State (singleton)
// ---------------------------------------------------------------------------

let initialized = false;
let minLevel: LogLevel = "info";
let logFile = "";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function parseLogLevel(value: string | undefined): LogLevel {
  if (!value) return "info";
  const lower = value.toLowerCase();
  if (lower === "debug" || lower === "info" || lower === "warn" || lower === "error") {
    return lower;
  }
  return "info";
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
}

function formatError(err: unknown): string {
  if (err instanceof Error) {
    return err.stack ?? `${err.name}: ${err.message}`;
  }
  if (typeof err === "string") {
    return err;
  }
  try {
    return JSON.stringify(err);
  } catch {
    return String(err);
  }
}

function formatArgs(args: unknown[]): string {
  if (args.length === 0) return "";
  return " " + args.map((a) => {
    if (typeof a === "string") return a;
    try {
      return JSON.stringify(a);
    } catch {
      return String(a);
    }
  }).join(" ");
}

function writeLine(line: string): void {
  try {
    appendFileSync(logFile, line + "\n", "utf-8");
  } catch {
    // The logger must never throw.
  }
}

function rotateIfNeeded(): void {
  try {
    if (!existsSync(logFile)) return;
    const stats = statSync(logFile);
    if (stats.size > MAX_LOG_SIZE) {
      // One backup only; an older .log.1 is overwritten.
      renameSync(logFile, `${logFile}.1`);
    }
  } catch {
    // Rotation is best-effort.
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Initialize the logger under `<configDir>/logs`. Subsequent calls are no-ops,
 * so the first caller decides where lines go.
 */
export function initLogger(configDir: string = resolveConfigDir()): void {
  if (initialized) return;
  const logDir = join(configDir, "logs");
  logFile = join(logDir, LOG_FILENAME);
  minLevel = parseLogLevel(process.env.HOTPACK_LOG_LEVEL);
  initialized = true;
  try {
    mkdirSync(logDir, { recursive: true });
    rotateIfNeeded();
  } catch {
    // Without a log directory every write fails and is dropped individually.
  }
}

/**
 * Returns a Logger scoped to the given category. The category appears in
 * each log line between brackets, e.g. `[installer]`.
 */
export function getLogger(category?: string): Logger {
  if (!initialized) {
    initLogger();
  }

  const prefix = category ? ` [${category}]` : "";

  function log(level: LogLevel, msg: string, extra: unknown[]): void {
    if (!shouldLog(level)) return;
    const timestamp = new Date().toISOString();
    writeLine(`[${timestamp}] [${level.toUpperCase()}]${prefix} ${msg}${formatArgs(extra)}`);
  }

  return {
    debug(msg: string, ...args: unknown[]): void {
      log("debug", msg, args);
    },

    info(msg: string, ...args: unknown[]): void {
      log("info", msg, args);
    },

    warn(msg: string, ...args: unknown[]): void {
      log("warn", msg, args);
    },

    error(msg: string, error?: unknown): void {
      if (!shouldLog("error")) return;
      writeLine(`[${new Date().toISOString()}] [ERROR]${prefix} ${msg}`);
      if (error !== undefined) {
        writeLine("  " + formatError(error));
      }
    },
  };
}
