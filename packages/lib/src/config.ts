import { statSync } from "node:fs";
import { homedir } from "node:os";
import { join, resolve } from "node:path";
import type { AppConfig } from "./types.ts";
import { loadDotenvFile } from "./shared/env.ts";
import { createLogger } from "./shared/logger.ts";

const log = createLogger("config");

type RawEnv = Record<string, string | undefined>;

const DEFAULT_CONDA_PATH = "~/miniconda3/bin/conda";
const DEFAULT_PORT = 8080;
const DEFAULT_PROBE_CONCURRENCY = 4;

const TRUTHY_TOKENS = new Set(["1", "true", "yes", "on"]);

export function isTruthy(value: string): boolean {
  return TRUTHY_TOKENS.has(value.trim().toLowerCase());
}

export function expandHome(path: string): string {
  if (path === "~") return homedir();
  if (path.startsWith("~/")) return join(homedir(), path.slice(2));
  return path;
}

function isFile(path: string): boolean {
  try {
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

/** Prefer the configured conda binary; fall back to whatever `conda` PATH resolves to. */
export function resolveCondaBin(configured: string | undefined, fileExists: (path: string) => boolean = isFile): string {
  const candidate = expandHome(configured || DEFAULT_CONDA_PATH);
  return fileExists(candidate) ? candidate : "conda";
}

function positiveInt(name: string, raw: string | undefined, fallback: number, max: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (Number.isInteger(value) && value > 0 && value <= max) return value;
  log.warn("ignoring invalid setting", { name, value: raw, fallback });
  return fallback;
}

/**
 * Build the runtime settings once at startup.
 *
 * Values come from the process environment first and then from the `.env`
 * file in the base directory (the process environment wins).
 */
export function loadConfig(env: RawEnv = process.env, fileExists?: (path: string) => boolean): AppConfig {
  const baseDir = resolve(env.HOSTPANEL_DIR || process.cwd());
  const envPath = join(baseDir, ".env");
  const merged: RawEnv = { ...loadDotenvFile(envPath), ...definedOnly(env) };

  const actionToken = merged.ACTION_TOKEN?.trim();

  return {
    baseDir,
    envPath,
    examplePath: join(baseDir, ".env.example"),
    bindHost: merged.BIND_HOST?.trim() || "127.0.0.1",
    port: positiveInt("PORT", merged.PORT, DEFAULT_PORT, 65535),
    services: merged.SERVICES ?? "",
    maskSecrets: isTruthy(merged.MASK_SECRETS ?? "true"),
    actionToken: actionToken ? actionToken : undefined,
    secretKey: merged.SECRET_KEY || "change-me-in-.env",
    condaBin: resolveCondaBin(merged.MINICONDA_CONDA, fileExists),
    healthProbeConcurrency: positiveInt("HEALTH_PROBE_CONCURRENCY", merged.HEALTH_PROBE_CONCURRENCY, DEFAULT_PROBE_CONCURRENCY, 64),
  };
}

function definedOnly(env: RawEnv): RawEnv {
  const out: RawEnv = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}

/** Values the running process loaded for the keys whose change needs a restart. */
export function loadedRestartValues(config: AppConfig): Record<string, string> {
  return { BIND_HOST: config.bindHost, PORT: String(config.port) };
}
