import type { LogLevel } from "./validation.js";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let currentLevel: LogLevel = "info";
let installed = false;

type ConsoleMethod = (...args: unknown[]) => void;

// Untouched console methods, captured before any wrapping
const originalConsole: Record<"debug" | "info" | "warn" | "error" | "log", ConsoleMethod> = {
  debug: console.debug.bind(console),
  info: console.info.bind(console),
  warn: console.warn.bind(console),
  error: console.error.bind(console),
  log: console.log.bind(console),
};

export function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[currentLevel];
}

export function formatPrefix(level: LogLevel, now: Date = new Date()): string {
  return `[${now.toISOString()}] [${level.toUpperCase()}]`;
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function levelled(level: LogLevel, write: ConsoleMethod): ConsoleMethod {
  return (...args: unknown[]) => {
    if (shouldLog(level)) {
      write(formatPrefix(level), ...args);
    }
  };
}

/**
 * Route console output through the level filter and timestamp prefix.
 * The server entry point calls this once before anything else logs.
 */
export function installConsoleLogger(level: LogLevel = currentLevel): void {
  currentLevel = level;
  if (installed) return;

  console.debug = levelled("debug", originalConsole.debug);
  console.info = levelled("info", originalConsole.info);
  console.warn = levelled("warn", originalConsole.warn);
  console.error = levelled("error", originalConsole.error);
  // console.log counts as info
  console.log = levelled("info", originalConsole.log);
  installed = true;
}

export function restoreConsole(): void {
  if (!installed) return;
  console.debug = originalConsole.debug;
  console.info = originalConsole.info;
  console.warn = originalConsole.warn;
  console.error = originalConsole.error;
  console.log = originalConsole.log;
  installed = false;
}
