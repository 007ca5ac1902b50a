import type { ScopedToolRunner, ServiceAction, ServiceActionOutcome, ServiceScope, ServiceSpec, ServiceStatus } from "../types.ts";
import { tailOutput } from "../command-runner.ts";
import { createLogger } from "../shared/logger.ts";

const log = createLogger("services");

export const SERVICE_SCOPES: readonly ServiceScope[] = ["user", "system"] as const;
export const SERVICE_ACTIONS: readonly ServiceAction[] = ["start", "stop", "restart"] as const;

export const STATUS_TIMEOUT_MS = 15_000;
export const ACTION_TIMEOUT_MS = 30_000;

export function isServiceScope(value: string): value is ServiceScope {
  return SERVICE_SCOPES.some((scope) => scope === value);
}

export function isServiceAction(value: string): value is ServiceAction {
  return SERVICE_ACTIONS.some((action) => action === value);
}

/**
 * Parse `SERVICES`, e.g. `comfyui.service, system:nginx.service`.
 * A bare name is a user unit.
 */
export function parseServiceConfig(raw: string): ServiceSpec[] {
  const entries: ServiceSpec[] = [];
  for (const rawItem of raw.split(",")) {
    const item = rawItem.trim();
    if (!item) continue;

    let scope = "user";
    let name = item;
    const colon = item.indexOf(":");
    if (colon !== -1) {
      scope = item.slice(0, colon).trim().toLowerCase() || "user";
      name = item.slice(colon + 1).trim();
    }

    if (!name) {
      log.warn("skipping service entry without a name", { item });
      continue;
    }
    if (!isServiceScope(scope)) {
      log.warn("skipping service entry with unknown scope", { item, scope });
      continue;
    }
    entries.push({ scope, name });
  }
  return entries;
}

export function formatServiceConfig(specs: ServiceSpec[]): string {
  return specs.map((spec) => `${spec.scope}:${spec.name}`).join(",");
}

/** Active state of one unit; query failures fall back to the tool's text or "unknown". */
export async function getServiceStatus(systemctl: ScopedToolRunner, spec: ServiceSpec): Promise<ServiceStatus> {
  const result = await systemctl(spec.scope, ["is-active", spec.name], STATUS_TIMEOUT_MS);
  const status = result.exitCode === 0 ? result.stdout : (result.stdout || result.stderr || "unknown");
  return { scope: spec.scope, name: spec.name, status };
}

export async function listServiceStatuses(systemctl: ScopedToolRunner, specs: ServiceSpec[]): Promise<ServiceStatus[]> {
  const statuses: ServiceStatus[] = [];
  for (const spec of specs) {
    statuses.push(await getServiceStatus(systemctl, spec));
  }
  return statuses;
}

/**
 * Start, stop or restart a unit, then report its state afresh whether or
 * not the action itself succeeded.
 */
export async function applyServiceAction(
  systemctl: ScopedToolRunner,
  scopeInput: string,
  name: string,
  actionInput: string,
): Promise<ServiceActionOutcome> {
  const scope = scopeInput.trim().toLowerCase();
  if (!isServiceScope(scope)) return { ok: false, status: 400, error: "Invalid scope" };
  if (!isServiceAction(actionInput)) return { ok: false, status: 400, error: "Invalid action" };
  if (!name || name.startsWith("-")) return { ok: false, status: 400, error: "Invalid service name" };

  log.info("service action", { scope, name, action: actionInput });
  const result = await systemctl(scope, [actionInput, name], ACTION_TIMEOUT_MS);
  const ok = result.exitCode === 0;
  if (!ok) {
    log.warn("service action failed", { scope, name, action: actionInput, exitCode: result.exitCode });
  }
  const service = await getServiceStatus(systemctl, { scope, name });
  return {
    ok,
    status: ok ? 200 : 500,
    returncode: result.exitCode,
    stdout: tailOutput(result.stdout),
    stderr: tailOutput(result.stderr),
    service,
  };
}
