import type { AppConfig, ScopedToolRunner, ToolRunner } from "@hostpanel/lib/types.ts";

/** What every command needs: the startup settings and the two tool runners. */
export type CliContext = {
  config: AppConfig;
  conda: ToolRunner;
  systemctl: ScopedToolRunner;
};

/** Process exit status a command asks for. */
export type ExitCode = 0 | 1;
