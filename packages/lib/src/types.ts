/** Outcome of a single external command. Timeouts and launch failures are encoded in `exitCode`. */
export type ProcessResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

export type RunOptions = {
  timeoutMs?: number;
  extraEnv?: Record<string, string>;
  cwd?: string;
};

/** Runs argv (binary first) and always resolves with a ProcessResult. */
export type CommandRunner = (args: string[], options?: RunOptions) => Promise<ProcessResult>;

/** A runner already bound to a tool binary; `args` are the tool's own arguments. */
export type ToolRunner = (args: string[], timeoutMs?: number) => Promise<ProcessResult>;

export type ServiceScope = "user" | "system";

export type ServiceAction = "start" | "stop" | "restart";

/** Runs `systemctl` for one scope; the user scope adds `--user`. */
export type ScopedToolRunner = (scope: ServiceScope, args: string[], timeoutMs?: number) => Promise<ProcessResult>;

export type EnvironmentRecord = {
  name: string;
  prefix: string;
  healthy: boolean;
};

export type ServiceSpec = {
  scope: ServiceScope;
  name: string;
};

export type ServiceStatus = {
  scope: ServiceScope;
  name: string;
  status: string;
};

/** Rejected before any process was launched. */
export type ValidationFailure = {
  ok: false;
  status: 400;
  error: string;
};

/** Result of running a tool on behalf of a caller, with bounded output tails. */
export type ToolOutcome = {
  ok: boolean;
  status: 200 | 500;
  returncode: number;
  stdout: string;
  stderr: string;
};

export type CreateEnvironmentRequest = {
  name: string;
  python?: string;
  packages?: unknown;
};

export type CreateEnvironmentOutcome = ValidationFailure | ToolOutcome;

export type ServiceActionOutcome = ValidationFailure | (ToolOutcome & { service: ServiceStatus });

/** Value accepted for a config update before it is coerced to text. */
export type ConfigUpdateValue = string | number | boolean | null;

export type ConfigUpdateResult = {
  appliedKeys: string[];
  restartRequired: boolean;
};

export type ConfigSnapshot = {
  path: string;
  values: Record<string, string>;
  masked: boolean;
};

/** Settings resolved once at startup and passed to every component. */
export type AppConfig = {
  baseDir: string;
  envPath: string;
  examplePath: string;
  bindHost: string;
  port: number;
  services: string;
  maskSecrets: boolean;
  actionToken?: string;
  secretKey: string;
  condaBin: string;
  healthProbeConcurrency: number;
};
