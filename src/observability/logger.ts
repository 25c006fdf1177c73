/**
 * Structured Logger
 *
 * Module-scoped loggers on top of a single pino root. Every module calls
 * createLogger("area.module") once at load time; the level is shared and
 * can be changed at runtime through setGlobalLogLevel.
 */

import { pino, type Logger as PinoLogger } from "pino";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error, context?: LogContext): void;
}

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

function resolveInitialLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
  if (fromEnv && isLogLevel(fromEnv)) {
    return fromEnv;
  }
  // Keep test output readable unless a level is asked for explicitly.
  return process.env.VITEST ? "silent" : "info";
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

const root: PinoLogger = pino({
  level: resolveInitialLevel(),
  base: { service: "growth-coach" },
  timestamp: pino.stdTimeFunctions.isoTime,
});

// pino children copy the level at creation, so they are tracked to follow
// later level changes.
const children = new Set<PinoLogger>();

export function setGlobalLogLevel(level: LogLevel): void {
  root.level = level;
  for (const child of children) {
    child.level = level;
  }
}

class ModuleLogger implements Logger {
  private readonly target: PinoLogger;

  constructor(module: string) {
    this.target = root.child({ module });
    children.add(this.target);
  }

  debug(message: string, context?: LogContext): void {
    this.target.debug(context ?? {}, message);
  }

  info(message: string, context?: LogContext): void {
    this.target.info(context ?? {}, message);
  }

  warn(message: string, context?: LogContext): void {
    this.target.warn(context ?? {}, message);
  }

  error(message: string, error?: Error, context?: LogContext): void {
    this.target.error({ ...(context ?? {}), ...(error ? { err: error } : {}) }, message);
  }
}

export function createLogger(module: string): Logger {
  return new ModuleLogger(module);
}
