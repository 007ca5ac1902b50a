import { existsSync, readFileSync } from "node:fs";
import writeFileAtomic from "write-file-atomic";
import type { ConfigSnapshot, ConfigUpdateResult, ConfigUpdateValue } from "../types.ts";
import { isTruthy } from "../config.ts";
import {
  appendEnvLine,
  detectLineEnding,
  formatEnvLine,
  indexEnvLines,
  joinEnvLines,
  parseEnvContent,
  replaceEnvLine,
  splitEnvLines,
} from "../shared/env.ts";
import { createLogger } from "../shared/logger.ts";

const log = createLogger("config-store");

export { serializeEnvValue as serializeConfigValue } from "../shared/env.ts";

/** Keys the panel may add or rewrite. */
export const EDITABLE_KEYS: ReadonlySet<string> = new Set([
  "PORT",
  "BIND_HOST",
  "SERVICES",
  "MASK_SECRETS",
  "ACTION_TOKEN",
  "SECRET_KEY",
  "MINICONDA_CONDA",
]);

/** Editable keys that are never overwritten with an empty or masked value. */
export const SENSITIVE_KEYS: ReadonlySet<string> = new Set(["ACTION_TOKEN", "SECRET_KEY"]);

/** Keys hidden in the read view while masking is on (compared upper-cased). */
export const MASKED_KEYS: ReadonlySet<string> = new Set(["ACTION_TOKEN", "SECRET_KEY", "PASSWORD", "TOKEN", "API_KEY", "AUTH_TOKEN"]);

/** Keys the running server only picks up on restart. */
export const RESTART_KEYS: ReadonlySet<string> = new Set(["BIND_HOST", "PORT"]);

export const BOOLEAN_KEY = "MASK_SECRETS";

export const MASK_PLACEHOLDER = "••••••••";

export type ApplyConfigUpdatesOptions = {
  path: string;
  examplePath?: string;
  updates: Record<string, ConfigUpdateValue>;
  /** Values the process loaded at startup, consulted when the file lacks a key. */
  loaded?: Record<string, string | undefined>;
  whitelist?: ReadonlySet<string>;
};

function readIfExists(path: string): string | null {
  if (!existsSync(path)) return null;
  return readFileSync(path, "utf8");
}

/** Current key/value pairs of the file, or an empty record when it does not exist. */
export function readConfigValues(path: string): Record<string, string> {
  const content = readIfExists(path);
  return content === null ? {} : parseEnvContent(content);
}

export function maskConfigValues(values: Record<string, string>): Record<string, string> {
  const masked: Record<string, string> = {};
  for (const [key, value] of Object.entries(values)) {
    masked[key] = MASKED_KEYS.has(key.toUpperCase()) ? MASK_PLACEHOLDER : value;
  }
  return masked;
}

export function readConfigSnapshot(path: string, maskSecrets: boolean): ConfigSnapshot {
  const values = readConfigValues(path);
  return { path, values: maskSecrets ? maskConfigValues(values) : values, masked: maskSecrets };
}

function coerceValue(key: string, value: ConfigUpdateValue): string {
  const text = value === null ? "" : String(value);
  if (key === BOOLEAN_KEY) return isTruthy(text) ? "true" : "false";
  return text;
}

/**
 * Merge `updates` into the file at `path`.
 *
 * Only whitelisted keys are touched; untouched lines keep their text, line
 * ending and position, trailing blank lines included. Existing keys are
 * rewritten in place and new keys appended in the file's line ending.
 * A missing file starts from the example template. The result is written
 * through a temporary file renamed over `path`.
 */
export function applyConfigUpdates(options: ApplyConfigUpdatesOptions): ConfigUpdateResult {
  const { path, examplePath, updates, loaded = {} } = options;
  const whitelist = options.whitelist ?? EDITABLE_KEYS;

  const current = readIfExists(path);
  const template = current === null && examplePath ? readIfExists(examplePath) : null;
  const prior = current === null ? {} : parseEnvContent(current);
  const source = current ?? template ?? "";
  const eol = detectLineEnding(source);
  const lines = splitEnvLines(source);
  const index = indexEnvLines(lines);

  const appliedKeys: string[] = [];
  let restartRequired = false;

  for (const [key, raw] of Object.entries(updates)) {
    if (!whitelist.has(key)) continue;
    const value = coerceValue(key, raw);
    if (SENSITIVE_KEYS.has(key) && (value === "" || value === MASK_PLACEHOLDER)) continue;

    if (RESTART_KEYS.has(key)) {
      const previous = prior[key] ?? loaded[key];
      if (value !== previous) restartRequired = true;
    }

    const line = formatEnvLine(key, value);
    const position = index.get(key);
    if (position === undefined) {
      index.set(key, lines.length);
      appendEnvLine(lines, line, eol);
    } else {
      lines[position] = replaceEnvLine(lines[position] ?? "", line);
    }
    appliedKeys.push(key);
  }

  if (appliedKeys.length === 0) {
    if (current === null && template !== null) {
      const content = template.length === 0 ? "" : template.replace(/(\r?\n)+$/, "") + eol;
      writeFileAtomic.sync(path, content, { encoding: "utf8" });
      const bootstrapped = Object.keys(parseEnvContent(template));
      log.info("config file created from template", { path, keys: bootstrapped });
      return { appliedKeys: bootstrapped, restartRequired: false };
    }
    return { appliedKeys: [], restartRequired: false };
  }

  writeFileAtomic.sync(path, joinEnvLines(lines, eol), { encoding: "utf8" });
  log.info("config file updated", { path, keys: appliedKeys, restartRequired });
  return { appliedKeys, restartRequired };
}
