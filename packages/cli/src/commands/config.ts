import { loadedRestartValues } from "@hostpanel/lib/config.ts";
import { EDITABLE_KEYS, applyConfigUpdates, readConfigSnapshot } from "@hostpanel/lib/admin/config-store.ts";
import { bold, dim, error, green, log, warn } from "@hostpanel/lib/ui.ts";
import type { CliContext, ExitCode } from "../types.ts";

export function showConfig(ctx: CliContext, unmasked: boolean): ExitCode {
  const snapshot = readConfigSnapshot(ctx.config.envPath, ctx.config.maskSecrets && !unmasked);
  log(bold(snapshot.path));
  const entries = Object.entries(snapshot.values);
  if (entries.length === 0) {
    log(dim("(no values)"));
    return 0;
  }
  for (const [key, value] of entries) {
    log(`${key}=${value}`);
  }
  return 0;
}

/** Split `KEY=VALUE` arguments; null when one of them has no `=` or an empty key. */
export function parseAssignments(args: string[]): Record<string, string> | null {
  const updates: Record<string, string> = {};
  for (const arg of args) {
    const eq = arg.indexOf("=");
    if (eq <= 0) return null;
    updates[arg.slice(0, eq).trim()] = arg.slice(eq + 1);
  }
  return updates;
}

export function setConfig(ctx: CliContext, args: string[]): ExitCode {
  const updates = parseAssignments(args);
  if (!updates || args.length === 0) {
    error("Usage: hostpanel config set KEY=VALUE [KEY=VALUE...]");
    return 1;
  }
  const result = applyConfigUpdates({
    path: ctx.config.envPath,
    examplePath: ctx.config.examplePath,
    updates,
    loaded: loadedRestartValues(ctx.config),
  });
  if (result.appliedKeys.length === 0) {
    warn(`Nothing applied. Editable keys: ${[...EDITABLE_KEYS].join(", ")}`);
    return 0;
  }
  log(`${green("✔")} Updated ${result.appliedKeys.join(", ")}`);
  if (result.restartRequired) {
    warn("Restart the admin server for BIND_HOST/PORT changes to take effect.");
  }
  return 0;
}
