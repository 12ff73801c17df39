/**
 * Logger utility
 */

import { Logger } from "tslog";
import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import type { ILogObj } from "tslog";

export interface LogLevelFlags {
  info: boolean;
  warning: boolean;
  error: boolean;
  chat: boolean;
  debug: boolean;
  /** Append plain-text lines to this file as well as the console. */
  file?: string;
}

export interface ModuleLogger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

const CHAT_LEVEL_ID = 3;

const flags: LogLevelFlags = {
  info: true,
  warning: true,
  error: true,
  chat: true,
  debug: process.env.LOG_LEVEL === "debug",
  file: process.env.LOG_FILE,
};

let fileSink: ((logObj: ILogObj) => void) | null = buildFileSink(flags.file);

/** Optional file transport: if a log file is set, also append formatted lines. */
function buildFileSink(logFile: string | undefined): ((logObj: ILogObj) => void) | null {
  if (!logFile) return null;

  try {
    mkdirSync(dirname(logFile), { recursive: true });
  } catch {
    // appendFileSync below reports the real problem
  }

  return (logObj: ILogObj) => {
    try {
      const meta = logObj["_meta"];
      const ts =
        typeof meta === "object" && meta !== null && "date" in meta
          ? meta.date
          : new Date().toISOString();
      const parts = Object.values(logObj).filter(
        (v) => typeof v === "string" || typeof v === "number",
      );
      appendFileSync(logFile, `${String(ts)} ${parts.join(" ")}\n`);
    } catch {
      // Swallow write errors to avoid recursive logging
    }
  };
}

export const logger = new Logger<ILogObj>({
  name: "murmur",
  minLevel: 2, // per-level flags decide the rest
  prettyLogTemplate:
    "{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} [{{name}}] ",
  attachedTransports: [(logObj: ILogObj) => fileSink?.(logObj)],
});

const chatLogger = logger.getSubLogger({ name: "chat" });

/**
 * Apply the `logging` section of the config. Loggers created before this call
 * pick up the new flags too.
 */
export function configureLogging(next: Partial<LogLevelFlags>): void {
  Object.assign(flags, next);
  fileSink = buildFileSink(flags.file);
}

export function loggingFlags(): Readonly<LogLevelFlags> {
  return { ...flags };
}

export function createLogger(name: string): ModuleLogger {
  const sub = logger.getSubLogger({ name });
  return {
    debug: (...args) => {
      if (flags.debug) sub.debug(...args);
    },
    info: (...args) => {
      if (flags.info) sub.info(...args);
    },
    warn: (...args) => {
      if (flags.warning) sub.warn(...args);
    },
    error: (...args) => {
      if (flags.error) sub.error(...args);
    },
  };
}

/** Chat transcript line, e.g. "group:20002 alice(10001): hello". */
export function logChat(line: string): void {
  if (flags.chat) chatLogger.log(CHAT_LEVEL_ID, "CHAT", line);
}
