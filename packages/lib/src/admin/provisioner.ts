import type { CreateEnvironmentOutcome, CreateEnvironmentRequest, ToolRunner } from "../types.ts";
import { tailOutput } from "../command-runner.ts";
import { createLogger } from "../shared/logger.ts";

const log = createLogger("provisioner");

export const DEFAULT_PYTHON_VERSION = "3.11";
export const CREATE_TIMEOUT_MS = 600_000;

const UNSAFE_NAME_CHARS = [" ", "/", "\\", ":"];

export function isValidEnvironmentName(name: string): boolean {
  return name.length > 0 && !UNSAFE_NAME_CHARS.some((ch) => name.includes(ch));
}

function packageList(value: unknown): string[] | null {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) return null;
  const packages: string[] = [];
  for (const item of value) {
    if (typeof item !== "string") return null;
    packages.push(item);
  }
  return packages;
}

/** `conda create` argv for a named environment; extra package specs are appended as given. */
export function buildCreateArgs(name: string, python: string, packages: string[]): string[] {
  return ["create", "-n", name, `python=${python}`, "-y", ...packages];
}

/**
 * Create a conda environment. Bad names and package lists are rejected
 * before conda runs; conda's own failures come back with the last 4000
 * characters of its output.
 */
export async function createEnvironment(conda: ToolRunner, request: CreateEnvironmentRequest): Promise<CreateEnvironmentOutcome> {
  const name = request.name.trim();
  if (!isValidEnvironmentName(name)) {
    return { ok: false, status: 400, error: "Invalid environment name" };
  }
  const packages = packageList(request.packages);
  if (!packages) {
    return { ok: false, status: 400, error: "Invalid package list" };
  }
  const python = request.python?.trim() || DEFAULT_PYTHON_VERSION;

  log.info("creating environment", { name, python, packages });
  const result = await conda(buildCreateArgs(name, python, packages), CREATE_TIMEOUT_MS);
  const ok = result.exitCode === 0;
  if (!ok) {
    log.warn("environment creation failed", { name, exitCode: result.exitCode });
  }
  return {
    ok,
    status: ok ? 200 : 500,
    returncode: result.exitCode,
    stdout: tailOutput(result.stdout),
    stderr: tailOutput(result.stderr),
  };
}
