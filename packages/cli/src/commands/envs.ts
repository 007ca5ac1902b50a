import { listEnvironments } from "@hostpanel/lib/admin/environments.ts";
import { createEnvironment } from "@hostpanel/lib/admin/provisioner.ts";
import { bold, dim, error, green, info, log, padColumns, red, spinner } from "@hostpanel/lib/ui.ts";
import type { CliContext, ExitCode } from "../types.ts";

export async function listEnvs(ctx: CliContext): Promise<ExitCode> {
  const envs = await listEnvironments(ctx.conda, { concurrency: ctx.config.healthProbeConcurrency });
  if (envs.length === 0) {
    info("No conda environments found.");
    return 0;
  }
  const rows = padColumns(envs.map((env) => [env.name, env.healthy ? "healthy" : "unhealthy", env.prefix]));
  rows.forEach(([name = "", health = "", prefix = ""], index) => {
    const color = envs[index]?.healthy ? green : red;
    log(`${bold(name)}  ${color(health)}  ${dim(prefix)}`);
  });
  return 0;
}

export async function createEnv(ctx: CliContext, name: string, python: string | undefined, packages: string[]): Promise<ExitCode> {
  const progress = spinner(`Creating environment ${name}...`);
  const outcome = await createEnvironment(ctx.conda, { name, python, packages });
  progress.stop();

  if ("error" in outcome) {
    error(outcome.error);
    return 1;
  }
  if (!outcome.ok) {
    error(`conda create exited with code ${outcome.returncode}`);
    if (outcome.stderr) log(dim(outcome.stderr));
    return 1;
  }
  log(`${green("✔")} Environment ${name} created`);
  return 0;
}
