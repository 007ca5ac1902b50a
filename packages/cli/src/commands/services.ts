import { applyServiceAction, listServiceStatuses, parseServiceConfig } from "@hostpanel/lib/admin/services.ts";
import { dim, error, green, info, log, padColumns, red } from "@hostpanel/lib/ui.ts";
import type { CliContext, ExitCode } from "../types.ts";

function colorStatus(status: string): string {
  if (status === "active") return green(status);
  if (status === "failed") return red(status);
  return status;
}

export async function listServices(ctx: CliContext): Promise<ExitCode> {
  const specs = parseServiceConfig(ctx.config.services);
  if (specs.length === 0) {
    info("No services configured. Set SERVICES in .env.");
    return 0;
  }
  const statuses = await listServiceStatuses(ctx.systemctl, specs);
  const rows = padColumns(statuses.map((status) => [`${status.scope}:${status.name}`, status.status]));
  for (const [label = "", status = ""] of rows) {
    log(`${label}  ${colorStatus(status)}`);
  }
  return 0;
}

export async function serviceAction(ctx: CliContext, action: string, scope: string, name: string): Promise<ExitCode> {
  const outcome = await applyServiceAction(ctx.systemctl, scope, name, action);
  if ("error" in outcome) {
    error(outcome.error);
    return 1;
  }
  log(`${outcome.service.scope}:${outcome.service.name} ${colorStatus(outcome.service.status)}`);
  if (!outcome.ok) {
    error(`systemctl ${action} exited with code ${outcome.returncode}`);
    if (outcome.stderr) log(dim(outcome.stderr));
    return 1;
  }
  return 0;
}
