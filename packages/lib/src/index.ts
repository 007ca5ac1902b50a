export {
  CONDA_TOS_ENV,
  NOT_FOUND_EXIT_CODE,
  OUTPUT_TAIL_CHARS,
  TIMEOUT_EXIT_CODE,
  createCondaRunner,
  createSystemctlRunner,
  runCommand,
  tailOutput,
} from "./command-runner.ts";

export { expandHome, isTruthy, loadConfig, loadedRestartValues, resolveCondaBin } from "./config.ts";

export {
  BASE_INSTALL_DIRS,
  environmentNameFromPrefix,
  listEnvironments,
  parseTextListing,
  probeEnvironmentHealth,
} from "./admin/environments.ts";

export { DEFAULT_PYTHON_VERSION, buildCreateArgs, createEnvironment, isValidEnvironmentName } from "./admin/provisioner.ts";

export {
  SERVICE_ACTIONS,
  SERVICE_SCOPES,
  applyServiceAction,
  formatServiceConfig,
  getServiceStatus,
  isServiceAction,
  isServiceScope,
  listServiceStatuses,
  parseServiceConfig,
} from "./admin/services.ts";

export {
  EDITABLE_KEYS,
  MASKED_KEYS,
  MASK_PLACEHOLDER,
  RESTART_KEYS,
  SENSITIVE_KEYS,
  applyConfigUpdates,
  maskConfigValues,
  readConfigSnapshot,
  readConfigValues,
  serializeConfigValue,
} from "./admin/config-store.ts";
export type { ApplyConfigUpdatesOptions } from "./admin/config-store.ts";

export { createValidator, formatValidationErrors } from "./shared/schema.ts";
export type { ValidationResult } from "./shared/schema.ts";
export { mapWithConcurrency } from "./shared/pool.ts";
export { condaEnvListSchema } from "./admin/schemas/conda-env-list.schema.ts";
export type { CondaEnvList } from "./admin/schemas/conda-env-list.schema.ts";
export { createEnvironmentSchema } from "./admin/schemas/create-environment.schema.ts";
export type { CreateEnvironmentPayload } from "./admin/schemas/create-environment.schema.ts";
export { configUpdateSchema } from "./admin/schemas/config-update.schema.ts";
export type { ConfigUpdatePayload } from "./admin/schemas/config-update.schema.ts";

export { createLogger } from "./shared/logger.ts";
export type { Logger, LogLevel } from "./shared/logger.ts";
export { json, errorJson } from "./shared/http.ts";

export type {
  AppConfig,
  CommandRunner,
  ConfigSnapshot,
  ConfigUpdateResult,
  ConfigUpdateValue,
  CreateEnvironmentOutcome,
  CreateEnvironmentRequest,
  EnvironmentRecord,
  ProcessResult,
  RunOptions,
  ScopedToolRunner,
  ServiceAction,
  ServiceActionOutcome,
  ServiceScope,
  ServiceSpec,
  ServiceStatus,
  ToolOutcome,
  ToolRunner,
  ValidationFailure,
} from "./types.ts";
