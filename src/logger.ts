import { existsSync, mkdirSync, appendFileSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";

const LOGS_DIR = join(dirname(fileURLToPath(import.meta.url)), "../logs");
const LOG_FILE = join(LOGS_DIR, "app.log");

type LogLevel = "info" | "warn" | "error" | "debug";

const LOG_COLORS: Record<LogLevel, string> = {
  info: "\x1b[36m", // cyan
  warn: "\x1b[33m", // yellow
  error: "\x1b[31m", // red
  debug: "\x1b[90m", // gray
};

const RESET = "\x1b[0m";

const fileLoggingEnabled = process.env.NODE_ENV !== "test";
const debugEnabled = process.env.LOG_LEVEL === "debug";

function getTimestamp(): string {
  return new Date().toLocaleString("en-CA", {
    timeZone: process.env.TZ || "America/Chicago",
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hour12: false,
  });
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) return arg.stack ?? arg.message;
  return typeof arg === "object" ? JSON.stringify(arg) : String(arg);
}

function formatLogEntry(
  level: LogLevel,
  message: string,
  ...args: unknown[]
): string {
  const timestamp = getTimestamp();
  const extraArgs =
    args.length > 0 ? " " + args.map(formatArg).join(" ") : "";
  return `[${timestamp}] [${level.toUpperCase()}] ${message}${extraArgs}`;
}

function writeToFile(entry: string): void {
  if (!fileLoggingEnabled) return;
  try {
    if (!existsSync(LOGS_DIR)) {
      mkdirSync(LOGS_DIR, { recursive: true });
    }
    appendFileSync(LOG_FILE, entry + "\n", "utf-8");
  } catch (error) {
    // The console line is already out; report the file failure there too.
    console.error(`Failed to write ${LOG_FILE}: ${formatArg(error)}`);
  }
}

function log(level: LogLevel, message: string, ...args: unknown[]): void {
  if (level === "debug" && !debugEnabled) return;

  const entry = formatLogEntry(level, message, ...args);
  const color = LOG_COLORS[level];

  if (level === "error") {
    console.error(`${color}${entry}${RESET}`);
  } else if (level === "warn") {
    console.warn(`${color}${entry}${RESET}`);
  } else {
    console.log(`${color}${entry}${RESET}`);
  }

  writeToFile(entry);
}

export const logger = {
  info: (message: string, ...args: unknown[]) => log("info", message, ...args),
  warn: (message: string, ...args: unknown[]) => log("warn", message, ...args),
  error: (message: string, ...args: unknown[]) =>
    log("error", message, ...args),
  debug: (message: string, ...args: unknown[]) =>
    log("debug", message, ...args),
};

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
