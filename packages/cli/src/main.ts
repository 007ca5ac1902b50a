#!/usr/bin/env tsx
import { readFileSync } from "node:fs";
import { pathToFileURL } from "node:url";
import { parseArgs } from "node:util";
import type { AppConfig, CommandRunner } from "@hostpanel/lib/types.ts";
import { createCondaRunner, createSystemctlRunner, runCommand } from "@hostpanel/lib/command-runner.ts";
import { loadConfig } from "@hostpanel/lib/config.ts";
import { bold, dim, error, log } from "@hostpanel/lib/ui.ts";
import type { CliContext, ExitCode } from "./types.ts";
import { createEnv, listEnvs } from "./commands/envs.ts";
import { listServices, serviceAction } from "./commands/services.ts";
import { setConfig, showConfig } from "./commands/config.ts";

function readVersion(): string {
  const parsed: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf8"));
  if (typeof parsed === "object" && parsed !== null && "version" in parsed && typeof parsed.version === "string") {
    return parsed.version;
  }
  return "0.0.0";
}

const VERSION = readVersion();

function printHelp(): void {
  log(bold("hostpanel") + dim(` v${VERSION}`));
  log("");
  log(bold("Usage:"));
  log("  hostpanel <command> [options]");
  log("");
  log(bold("Commands:"));
  log("  envs                                   List conda environments and their health");
  log("  envs create <name> [--python <ver>] [package...]");
  log("                                         Create a conda environment");
  log("  services                               Show status of the configured services");
  log("  service <start|stop|restart> <scope> <name>");
  log("                                         Control a systemd unit (scope: user|system)");
  log("  config [--unmasked]                    Print the .env values");
  log("  config set KEY=VALUE [KEY=VALUE...]    Update editable .env keys");
  log("  version                                Print version");
  log("  help                                   Show this help");
  log("");
  log(dim("Pass conda options for new environments after --, e.g. envs create ml -- -c conda-forge numpy"));
}

export type ParsedCliArgs = {
  values: Record<string, string | boolean | undefined>;
  positionals: string[];
};

/** Parse flags loosely: unknown `--flag` and `--flag=value` pass through, `--` ends option parsing. */
export function parseCliArgs(args: string[]): ParsedCliArgs {
  const { values, positionals } = parseArgs({
    args,
    options: {
      python: { type: "string" },
      unmasked: { type: "boolean" },
    },
    allowPositionals: true,
    strict: false,
  });
  return { values, positionals };
}

export type CliDeps = {
  loadSettings?: () => AppConfig;
  run?: CommandRunner;
};

function usage(message: string): ExitCode {
  error(message);
  log("Run 'hostpanel help' for usage information.");
  return 1;
}

/** Run one CLI invocation and return its exit status. */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<ExitCode> {
  const [command, ...rest] = argv;

  if (!command || command === "help" || command === "--help" || command === "-h") {
    printHelp();
    return 0;
  }
  if (command === "version" || command === "--version" || command === "-v") {
    log(`hostpanel v${VERSION}`);
    return 0;
  }

  const context = (): CliContext => {
    const config = (deps.loadSettings ?? (() => loadConfig()))();
    const run = deps.run ?? runCommand;
    return { config, conda: createCondaRunner(config.condaBin, run), systemctl: createSystemctlRunner(run) };
  };
  const { values, positionals } = parseCliArgs(rest);

  try {
    switch (command) {
      case "envs": {
        const [subcommand, name, ...packages] = positionals;
        if (subcommand === undefined) return await listEnvs(context());
        if (subcommand !== "create") return usage(`Unknown envs subcommand: ${subcommand}`);
        if (!name) return usage("Usage: hostpanel envs create <name> [--python <ver>] [package...]");
        const python = typeof values.python === "string" ? values.python : undefined;
        return await createEnv(context(), name, python, packages);
      }

      case "services":
        return await listServices(context());

      case "service": {
        const [action, scope, name] = positionals;
        if (!action || !scope || !name) return usage("Usage: hostpanel service <start|stop|restart> <scope> <name>");
        return await serviceAction(context(), action, scope, name);
      }

      case "config": {
        const [subcommand, ...assignments] = positionals;
        if (subcommand === undefined) return showConfig(context(), values.unmasked === true);
        if (subcommand !== "set") return usage(`Unknown config subcommand: ${subcommand}`);
        return setConfig(context(), assignments);
      }

      default:
        return usage(`Unknown command: ${command}`);
    }
  } catch (err) {
    error(err instanceof Error ? err.message : String(err));
    return 1;
  }
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  return script !== undefined && import.meta.url === pathToFileURL(script).href;
}

if (isEntryPoint()) {
  // structured log lines would interleave with command output
  process.env.LOG_LEVEL ??= "warn";
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      error(err instanceof Error ? err.message : String(err));
      process.exitCode = 1;
    },
  );
}
