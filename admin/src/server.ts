import { randomUUID } from "node:crypto";
import type { AppConfig, CommandRunner, ScopedToolRunner, ToolRunner } from "@hostpanel/lib/types.ts";
import { createCondaRunner, createSystemctlRunner, runCommand } from "@hostpanel/lib/command-runner.ts";
import { loadConfig, loadedRestartValues } from "@hostpanel/lib/config.ts";
import { listEnvironments } from "@hostpanel/lib/admin/environments.ts";
import { createEnvironment } from "@hostpanel/lib/admin/provisioner.ts";
import { applyServiceAction, listServiceStatuses, parseServiceConfig } from "@hostpanel/lib/admin/services.ts";
import { applyConfigUpdates, readConfigSnapshot } from "@hostpanel/lib/admin/config-store.ts";
import { createEnvironmentSchema, type CreateEnvironmentPayload } from "@hostpanel/lib/admin/schemas/create-environment.schema.ts";
import { configUpdateSchema, type ConfigUpdatePayload } from "@hostpanel/lib/admin/schemas/config-update.schema.ts";
import { createValidator, formatValidationErrors } from "@hostpanel/lib/shared/schema.ts";
import { errorJson, json } from "@hostpanel/lib/shared/http.ts";
import { createLogger } from "@hostpanel/lib/shared/logger.ts";
import { createTokenAuthorizer, type Authorizer } from "./auth.ts";

const log = createLogger("admin");

export type AdminDeps = {
  /** Settings source; read at creation and again after every applied config write. */
  loadSettings?: () => AppConfig;
  /** Process launcher behind the conda and systemctl runners. */
  run?: CommandRunner;
  /** Replaces the token check built from the live settings. */
  authorize?: Authorizer;
  now?: () => Date;
};

export type AdminHandler = (req: Request) => Promise<Response>;

type LiveState = {
  config: AppConfig;
  conda: ToolRunner;
  systemctl: ScopedToolRunner;
  authorize: Authorizer;
};

type JsonBody = { ok: true; data: unknown } | { ok: false; response: Response };

const SERVICE_ACTION_ROUTE = /^\/api\/services\/([^/]+)\/([^/]+)\/([^/]+)$/;

async function readJsonBody(req: Request): Promise<JsonBody> {
  const text = await req.text();
  if (!text.trim()) return { ok: true, data: {} };
  try {
    return { ok: true, data: JSON.parse(text) };
  } catch {
    return { ok: false, response: json(400, { ok: false, error: "Malformed JSON body" }) };
  }
}

function decodeSegment(segment: string): string | null {
  try {
    return decodeURIComponent(segment);
  } catch {
    return null;
  }
}

/** Send an outcome with its own status code; the code itself stays out of the body. */
function outcomeResponse<T extends { status: number }>(outcome: T): Response {
  const { status, ...body } = outcome;
  return json(status, body);
}

function unauthorized(): Response {
  return json(401, { ok: false, error: "Invalid or missing action token" });
}

export function createAdminHandler(deps: AdminDeps = {}): AdminHandler {
  const loadSettings = deps.loadSettings ?? (() => loadConfig());
  const run = deps.run ?? runCommand;
  const now = deps.now ?? (() => new Date());

  const build = (config: AppConfig): LiveState => ({
    config,
    conda: createCondaRunner(config.condaBin, run),
    systemctl: createSystemctlRunner(run),
    authorize: deps.authorize ?? createTokenAuthorizer(config.actionToken),
  });

  let state = build(loadSettings());
  // BIND_HOST and PORT are bound once; later edits are compared against these.
  const startupValues = loadedRestartValues(state.config);

  const validateCreate = createValidator<CreateEnvironmentPayload>(createEnvironmentSchema);
  const validateUpdate = createValidator<ConfigUpdatePayload>(configUpdateSchema);

  return async (req) => {
    const requestId = req.headers.get("x-request-id") ?? randomUUID();
    const reqLog = log.child({ requestId });
    try {
      const url = new URL(req.url);
      const path = url.pathname;

      if (path === "/health" && req.method === "GET") {
        return json(200, { ok: true, time: now().toISOString() });
      }

      if (path === "/api/conda/envs" && req.method === "GET") {
        const envs = await listEnvironments(state.conda, { concurrency: state.config.healthProbeConcurrency });
        return json(200, { envs });
      }

      if (path === "/api/conda/envs" && req.method === "POST") {
        if (!state.authorize(req)) return unauthorized();
        const body = await readJsonBody(req);
        if (!body.ok) return body.response;
        const payload = validateCreate(body.data);
        if (!payload.valid) return json(400, { ok: false, error: formatValidationErrors(payload.errors) });
        const { name = "", python, packages } = payload.value;
        return outcomeResponse(await createEnvironment(state.conda, { name, python, packages }));
      }

      if (path === "/api/services" && req.method === "GET") {
        const services = await listServiceStatuses(state.systemctl, parseServiceConfig(state.config.services));
        return json(200, { services });
      }

      const serviceRoute = SERVICE_ACTION_ROUTE.exec(path);
      if (serviceRoute && req.method === "POST") {
        if (!state.authorize(req)) return unauthorized();
        const [scope, name, action] = serviceRoute.slice(1).map(decodeSegment);
        if (scope === null || name === null || action === null) {
          return json(400, { ok: false, error: "Invalid service name" });
        }
        return outcomeResponse(await applyServiceAction(state.systemctl, scope, name, action));
      }

      if (path === "/api/envfile" && req.method === "GET") {
        return json(200, readConfigSnapshot(state.config.envPath, state.config.maskSecrets));
      }

      if (path === "/api/envfile" && req.method === "POST") {
        if (!state.authorize(req)) return unauthorized();
        const body = await readJsonBody(req);
        if (!body.ok) return body.response;
        const payload = validateUpdate(body.data);
        if (!payload.valid) return json(400, { ok: false, error: formatValidationErrors(payload.errors) });

        const result = applyConfigUpdates({
          path: state.config.envPath,
          examplePath: state.config.examplePath,
          updates: payload.value,
          loaded: startupValues,
        });
        if (result.appliedKeys.length > 0) {
          state = build(loadSettings());
          reqLog.info("settings reloaded", { keys: result.appliedKeys, restartRequired: result.restartRequired });
        }
        return json(200, { ok: true, applied: result.appliedKeys, restartRequired: result.restartRequired });
      }

      return errorJson(404, "not_found");
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      reqLog.error("internal_error", { error: message });
      return errorJson(500, "internal_error", { message: "An internal error occurred", requestId });
    }
  };
}
