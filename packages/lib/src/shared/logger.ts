/**
 * JSON line logger shared by the admin server, the CLI and the core modules.
 *
 *   const log = createLogger("config-store");
 *   log.info("config file updated", { keys: ["PORT"] });
 *   // => {"ts":"...","level":"info","service":"config-store","msg":"config file updated","extra":{"keys":["PORT"]}}
 *
 * `child()` binds fields (a request id, an environment name) that are merged
 * into the `extra` of every entry it writes.
 *
 * LOG_LEVEL=debug|info|warn|error picks the threshold (default info; DEBUG=1
 * means debug). With LOG_DIR set, entries are also appended to
 * ${LOG_DIR}/hostpanel.log, which is moved to hostpanel.log.1 at 50 MB.
 */

import { appendFileSync, existsSync, mkdirSync, renameSync, statSync } from "node:fs";
import { dirname, join } from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(msg: string, extra?: LogFields): void;
  info(msg: string, extra?: LogFields): void;
  warn(msg: string, extra?: LogFields): void;
  error(msg: string, extra?: LogFields): void;
  child(fields: LogFields): Logger;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export const LOG_FILE_NAME = "hostpanel.log";
const ROTATE_AT_BYTES = 50 * 1024 * 1024;

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY;
}

function threshold(): LogLevel {
  if (process.env.DEBUG === "1") return "debug";
  const raw = process.env.LOG_LEVEL;
  return raw && isLogLevel(raw) ? raw : "info";
}

let logDirReady = false;

function appendToLogFile(dir: string, line: string): void {
  const filePath = join(dir, LOG_FILE_NAME);
  try {
    if (!logDirReady) {
      mkdirSync(dirname(filePath), { recursive: true });
      logDirReady = true;
    }
    if (existsSync(filePath) && statSync(filePath).size >= ROTATE_AT_BYTES) {
      renameSync(filePath, `${filePath}.1`);
    }
    appendFileSync(filePath, line + "\n", "utf8");
  } catch (error) {
    // stderr only; going through emit() again would recurse
    const message = error instanceof Error ? error.message : String(error);
    console.error(JSON.stringify({ ts: new Date().toISOString(), level: "error", service: "logger", msg: "log file write failed", extra: { error: message } }));
  }
}

function emit(level: LogLevel, service: string, msg: string, extra: LogFields): void {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[threshold()]) return;
  const entry: LogFields = { ts: new Date().toISOString(), level, service, msg };
  if (Object.keys(extra).length > 0) entry.extra = extra;
  const line = JSON.stringify(entry);

  if (level === "error") console.error(line);
  else if (level === "warn") console.warn(line);
  else console.log(line);

  const dir = process.env.LOG_DIR;
  if (dir) appendToLogFile(dir, line);
}

function bind(service: string, bound: LogFields): Logger {
  const write = (level: LogLevel) => (msg: string, extra?: LogFields): void => {
    emit(level, service, msg, { ...bound, ...extra });
  };
  return {
    debug: write("debug"),
    info: write("info"),
    warn: write("warn"),
    error: write("error"),
    child: (fields) => bind(service, { ...bound, ...fields }),
  };
}

export function createLogger(service: string): Logger {
  return bind(service, {});
}

/** Forget that the log directory was created. Tests only. */
export function _resetLogDirState(): void {
  logDirReady = false;
}
