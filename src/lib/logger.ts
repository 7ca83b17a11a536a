/**
 * Pipeline logging
 *
 * Prefixed console loggers with one process-wide threshold:
 * - Development builds and Vitest start at "debug"
 * - Production builds start at "warn"
 *
 * Usage:
 *   import { retargetLog } from '../lib/logger';
 *   retargetLog.debug('Bind pose', info);   // hidden above "debug"
 *   retargetLog.warn('Missing Hips bone');
 *
 * Hosts that feed 30+ frames a second usually raise the threshold with
 * setLogLevel("warn") once the rig is bound.
 */

const isDev = import.meta.env?.DEV ?? false;

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let threshold: LogLevel = isDev ? "debug" : "warn";

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

function enabled(level: Exclude<LogLevel, "silent">): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[threshold];
}

function formatMessage(
  prefix: string,
  message: string,
  timestamp: boolean,
): string {
  const ts = timestamp ? `[${new Date().toISOString()}] ` : "";
  return `${ts}[${prefix}] ${message}`;
}

export interface Logger {
  readonly prefix: string;
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  /** Errors carry an ISO timestamp */
  error(message: string, ...args: unknown[]): void;
  /** Sub-logger, prefix "parent:sub" */
  child(subPrefix: string): Logger;
}

export function createLogger(prefix: string): Logger {
  return {
    prefix,

    debug(message, ...args) {
      if (!enabled("debug")) return;
      console.debug(formatMessage(prefix, message, false), ...args);
    },

    info(message, ...args) {
      if (!enabled("info")) return;
      console.info(formatMessage(prefix, message, false), ...args);
    },

    warn(message, ...args) {
      if (!enabled("warn")) return;
      console.warn(formatMessage(prefix, message, false), ...args);
    },

    error(message, ...args) {
      if (!enabled("error")) return;
      console.error(formatMessage(prefix, message, true), ...args);
    },

    child(subPrefix) {
      return createLogger(`${prefix}:${subPrefix}`);
    },
  };
}

// Pipeline stages
export const retargetLog = createLogger("Retarget");
export const smoothingLog = createLogger("Smoothing");
export const rootMotionLog = createLogger("RootMotion");
export const bindingLog = createLogger("Binding");
export const sessionLog = createLogger("Session");
