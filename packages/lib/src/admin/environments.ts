import type { EnvironmentRecord, ToolRunner } from "../types.ts";
import { createLogger } from "../shared/logger.ts";
import { mapWithConcurrency } from "../shared/pool.ts";
import { createValidator } from "../shared/schema.ts";
import { condaEnvListSchema, type CondaEnvList } from "./schemas/conda-env-list.schema.ts";

const log = createLogger("environments");

/** Directory names a base conda install usually lives in. */
export const BASE_INSTALL_DIRS = ["miniconda3", "anaconda3", "miniforge3", "mambaforge"] as const;

export const HEALTH_PROBE_TIMEOUT_MS = 8_000;
const VERSION_BANNER = "Python";

const validateEnvList = createValidator<CondaEnvList>(condaEnvListSchema);

type Listed = { name: string; prefix: string };

export type ListEnvironmentsOptions = {
  concurrency?: number;
};

/**
 * Name of the environment living at `prefix`.
 *
 * `.../envs/<name>` gives `<name>`; a base install directory gives `base`;
 * anything else gives its last path segment.
 */
export function environmentNameFromPrefix(prefix: string): string {
  const parts = prefix.replace(/[\\/]+$/, "").split(/[\\/]/);
  const envsIndex = parts.indexOf("envs");
  if (envsIndex !== -1 && envsIndex + 1 < parts.length && parts[envsIndex + 1]) {
    return parts[envsIndex + 1];
  }
  const last = parts[parts.length - 1];
  if (BASE_INSTALL_DIRS.some((dir) => dir === last)) return "base";
  if (last) return last;
  return prefix || "unknown";
}

function parseJsonListing(stdout: string): Listed[] {
  let data: unknown;
  try {
    data = JSON.parse(stdout);
  } catch (error) {
    log.warn("conda env list --json returned invalid JSON", { error: error instanceof Error ? error.message : String(error) });
    return [];
  }
  const result = validateEnvList(data);
  if (!result.valid) {
    log.warn("conda env list --json has an unexpected shape", { errors: result.errors });
    return [];
  }
  return result.value.envs.map((prefix) => ({ name: environmentNameFromPrefix(prefix), prefix }));
}

/**
 * Parse the plain `conda env list` table:
 *
 *   # conda environments:
 *   base                  *  /home/u/miniconda3
 *   demo                     /home/u/miniconda3/envs/demo
 */
export function parseTextListing(stdout: string): Listed[] {
  const envs: Listed[] = [];
  for (const raw of stdout.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || line.startsWith("#")) continue;
    const parts = line.split(/\s+/);
    if (parts.length < 2) continue;
    envs.push({ name: parts[0], prefix: parts[parts.length - 1] });
  }
  return envs;
}

async function listRaw(conda: ToolRunner): Promise<Listed[]> {
  const structured = await conda(["env", "list", "--json"]);
  if (structured.exitCode === 0) {
    const envs = parseJsonListing(structured.stdout);
    if (envs.length > 0) return envs;
  } else {
    log.warn("conda env list --json failed", { exitCode: structured.exitCode, stderr: structured.stderr });
  }

  const text = await conda(["env", "list"]);
  if (text.exitCode !== 0) {
    log.warn("conda env list failed", { exitCode: text.exitCode, stderr: text.stderr });
    return [];
  }
  return parseTextListing(text.stdout);
}

/** Whether `python -V` runs inside the named environment. */
export async function probeEnvironmentHealth(conda: ToolRunner, name: string): Promise<boolean> {
  const result = await conda(["run", "-n", name, "python", "-V"], HEALTH_PROBE_TIMEOUT_MS);
  const banner = result.stdout || result.stderr;
  return result.exitCode === 0 && banner.startsWith(VERSION_BANNER);
}

/**
 * Installed environments with a health flag each.
 * Returns an empty list when neither listing format can be read.
 */
export async function listEnvironments(conda: ToolRunner, options: ListEnvironmentsOptions = {}): Promise<EnvironmentRecord[]> {
  const envs = await listRaw(conda);
  return mapWithConcurrency(envs, options.concurrency ?? 4, async (env) => ({
    name: env.name,
    prefix: env.prefix,
    healthy: await probeEnvironmentHealth(conda, env.name),
  }));
}
