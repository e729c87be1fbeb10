import { promises as fsp } from "fs";
import * as os from "os";
import * as path from "path";

const DEFAULT_LOG_FILE = path.join(
  os.homedir(),
  ".claude-switch",
  "logs",
  "switch.log",
);

export enum LogLevel {
  DEBUG = "DEBUG",
  INFO = "INFO",
  WARN = "WARN",
  ERROR = "ERROR",
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_ORDER;
}

function resolveLogFile(): string | undefined {
  const configured = process.env.CLAUDE_SWITCH_LOG_FILE?.trim();
  if (configured) {
    return configured;
  }
  if (process.env.NODE_ENV === "test") {
    return undefined;
  }
  return DEFAULT_LOG_FILE;
}

function resolveThreshold(): LogLevel {
  const configured = process.env.CLAUDE_SWITCH_LOG_LEVEL?.trim().toUpperCase();
  return isLogLevel(configured) ? configured : LogLevel.INFO;
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) {
    return arg.message;
  }
  if (typeof arg === "string") {
    return arg;
  }
  return JSON.stringify(arg) ?? String(arg);
}

async function log(
  level: LogLevel,
  message: string,
  ...args: unknown[]
): Promise<void> {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[resolveThreshold()]) {
    return;
  }

  const timestamp = new Date().toISOString();
  const detail = args.map(formatArg).join(" ");
  const logMessage = `[${timestamp}] [${level}] ${message}${detail ? ` ${detail}` : ""}`;

  if (process.env.CLAUDE_SWITCH_DEBUG) {
    console.error(logMessage);
  }

  const logFile = resolveLogFile();
  if (!logFile) {
    return;
  }

  try {
    await fsp.mkdir(path.dirname(logFile), { recursive: true });
    await fsp.appendFile(logFile, logMessage + "\n", "utf-8");
  } catch {
    // Logging must never break command execution.
  }
}

export const logger = {
  debug: async (message: string, ...args: unknown[]) =>
    await log(LogLevel.DEBUG, message, ...args),
  info: async (message: string, ...args: unknown[]) =>
    await log(LogLevel.INFO, message, ...args),
  warn: async (message: string, ...args: unknown[]) =>
    await log(LogLevel.WARN, message, ...args),
  error: async (message: string, ...args: unknown[]) =>
    await log(LogLevel.ERROR, message, ...args),
};
