import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadConfig } from "@hostpanel/lib/config.ts";
import type { CommandRunner, ProcessResult } from "@hostpanel/lib/types.ts";
import { createAdminHandler, type AdminDeps } from "./server.ts";

const TOKEN = "test-secret";
const FIXED_TIME = new Date("2026-01-02T03:04:05.000Z");

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "hostpanel-admin-"));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

/** Fake process launcher answering by the full argv; anything else reads as an inactive unit. */
function fakeRun(responses: Record<string, ProcessResult>) {
  const calls: string[] = [];
  const run: CommandRunner = async (args) => {
    const key = args.join(" ");
    calls.push(key);
    return responses[key] ?? { exitCode: 3, stdout: "inactive", stderr: "" };
  };
  return { run, calls };
}

function handlerFor(envContent: string, run: CommandRunner, extra: Partial<AdminDeps> = {}) {
  writeFileSync(join(dir, ".env"), envContent);
  return createAdminHandler({
    loadSettings: () => loadConfig({ HOSTPANEL_DIR: dir }, () => false),
    run,
    now: () => FIXED_TIME,
    ...extra,
  });
}

function post(path: string, body: unknown, headers: Record<string, string> = {}): Request {
  return new Request(`http://localhost${path}`, {
    method: "POST",
    headers: { "content-type": "application/json", ...headers },
    body: typeof body === "string" ? body : JSON.stringify(body),
  });
}

function get(path: string): Request {
  return new Request(`http://localhost${path}`);
}

const DEFAULT_ENV = `SERVICES=user:a.service\nACTION_TOKEN=${TOKEN}\nMASK_SECRETS=true\n`;

describe("read routes", () => {
  it("answers the health check", async () => {
    const handler = handlerFor(DEFAULT_ENV, fakeRun({}).run);
    const res = await handler(get("/health"));
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ok: true, time: "2026-01-02T03:04:05.000Z" });
  });

  it("lists environments with their health", async () => {
    const { run } = fakeRun({
      "conda env list --json": { exitCode: 0, stdout: JSON.stringify({ envs: ["/h/miniconda3", "/h/miniconda3/envs/demo"] }), stderr: "" },
      "conda run -n base python -V": { exitCode: 0, stdout: "Python 3.11.9", stderr: "" },
      "conda run -n demo python -V": { exitCode: 1, stdout: "", stderr: "broken" },
    });
    const res = await handlerFor(DEFAULT_ENV, run)(get("/api/conda/envs"));
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      envs: [
        { name: "base", prefix: "/h/miniconda3", healthy: true },
        { name: "demo", prefix: "/h/miniconda3/envs/demo", healthy: false },
      ],
    });
  });

  it("lists configured services", async () => {
    const { run } = fakeRun({ "systemctl --user is-active a.service": { exitCode: 0, stdout: "active", stderr: "" } });
    const res = await handlerFor(DEFAULT_ENV, run)(get("/api/services"));
    expect(await res.json()).toEqual({ services: [{ scope: "user", name: "a.service", status: "active" }] });
  });

  it("returns the masked config snapshot", async () => {
    const res = await handlerFor(DEFAULT_ENV, fakeRun({}).run)(get("/api/envfile"));
    expect(await res.json()).toEqual({
      path: join(dir, ".env"),
      values: { SERVICES: "user:a.service", ACTION_TOKEN: "••••••••", MASK_SECRETS: "true" },
      masked: true,
    });
  });

  it("answers unknown routes and methods with not_found", async () => {
    const handler = handlerFor(DEFAULT_ENV, fakeRun({}).run);
    for (const req of [get("/nope"), get("/api/services/user/a.service/start"), post("/health", {})]) {
      const res = await handler(req);
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: "not_found" });
    }
  });
});

describe("authorization", () => {
  it("rejects mutating requests without the token", async () => {
    const { run, calls } = fakeRun({});
    const handler = handlerFor(DEFAULT_ENV, run);
    for (const req of [
      post("/api/conda/envs", { name: "ml" }),
      post("/api/services/user/a.service/stop", {}),
      post("/api/envfile", { PORT: 1 }, { "x-action-token": "wrong" }),
      post("/api/envfile", { PORT: 1 }, { authorization: "Basic abc" }),
    ]) {
      const res = await handler(req);
      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({ ok: false, error: "Invalid or missing action token" });
    }
    expect(calls).toEqual([]);
  });

  it("allows everything when no token is configured", async () => {
    const { run } = fakeRun({ "systemctl --user stop a.service": { exitCode: 0, stdout: "", stderr: "" } });
    const res = await handlerFor("SERVICES=a.service\n", run)(post("/api/services/user/a.service/stop", {}));
    expect(res.status).toBe(200);
  });

  it("accepts a bearer token", async () => {
    const { run } = fakeRun({ "systemctl --user stop a.service": { exitCode: 0, stdout: "", stderr: "" } });
    const res = await handlerFor(DEFAULT_ENV, run)(post("/api/services/user/a.service/stop", {}, { authorization: `Bearer ${TOKEN}` }));
    expect(res.status).toBe(200);
  });

  it("honours an injected authorizer", async () => {
    const handler = handlerFor(DEFAULT_ENV, fakeRun({}).run, { authorize: () => false });
    const res = await handler(post("/api/envfile", { PORT: 1 }, { "x-action-token": TOKEN }));
    expect(res.status).toBe(401);
  });
});

describe("POST /api/conda/envs", () => {
  const auth = { "x-action-token": TOKEN };

  it("creates an environment", async () => {
    const { run, calls } = fakeRun({
      "conda create -n ml python=3.12 -y numpy": { exitCode: 0, stdout: "done", stderr: "" },
    });
    const res = await handlerFor(DEFAULT_ENV, run)(post("/api/conda/envs", { name: "ml", python: "3.12", packages: ["numpy"] }, auth));
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ok: true, returncode: 0, stdout: "done", stderr: "" });
    expect(calls).toEqual(["conda create -n ml python=3.12 -y numpy"]);
  });

  it("rejects an invalid name before running conda", async () => {
    const { run, calls } = fakeRun({});
    const handler = handlerFor(DEFAULT_ENV, run);
    for (const body of [{ name: "bad name" }, {}, ""]) {
      const res = await handler(post("/api/conda/envs", body, auth));
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ ok: false, error: "Invalid environment name" });
    }
    expect(calls).toEqual([]);
  });

  it("rejects malformed JSON and payloads that fail the schema", async () => {
    const handler = handlerFor(DEFAULT_ENV, fakeRun({}).run);

    const malformed = await handler(post("/api/conda/envs", "{not json", auth));
    expect(malformed.status).toBe(400);
    expect(await malformed.json()).toEqual({ ok: false, error: "Malformed JSON body" });

    const wrongType = await handler(post("/api/conda/envs", { name: 5 }, auth));
    expect(wrongType.status).toBe(400);
    expect(await wrongType.json()).toEqual({ ok: false, error: "/name must be string" });

    const badPackages = await handler(post("/api/conda/envs", { name: "ml", packages: "numpy" }, auth));
    expect(await badPackages.json()).toEqual({ ok: false, error: "Invalid package list" });
  });

  it("reports a failed creation as 500", async () => {
    const { run } = fakeRun({
      "conda create -n ml python=3.11 -y": { exitCode: 1, stdout: "", stderr: "PackagesNotFoundError" },
    });
    const res = await handlerFor(DEFAULT_ENV, run)(post("/api/conda/envs", { name: "ml" }, auth));
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ ok: false, returncode: 1, stdout: "", stderr: "PackagesNotFoundError" });
  });
});

describe("POST /api/services/:scope/:name/:action", () => {
  const auth = { "x-action-token": TOKEN };

  it("reports a failed action with the fresh status", async () => {
    const { run, calls } = fakeRun({
      "systemctl start foo.service": { exitCode: 1, stdout: "", stderr: "Access denied" },
    });
    const res = await handlerFor(DEFAULT_ENV, run)(post("/api/services/system/foo.service/start", {}, auth));
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      ok: false,
      returncode: 1,
      stdout: "",
      stderr: "Access denied",
      service: { scope: "system", name: "foo.service", status: "inactive" },
    });
    expect(calls).toEqual(["systemctl start foo.service", "systemctl is-active foo.service"]);
  });

  it("validates scope and action", async () => {
    const handler = handlerFor(DEFAULT_ENV, fakeRun({}).run);
    const badScope = await handler(post("/api/services/global/a.service/start", {}, auth));
    expect(badScope.status).toBe(400);
    expect(await badScope.json()).toEqual({ ok: false, error: "Invalid scope" });
    const badAction = await handler(post("/api/services/user/a.service/enable", {}, auth));
    expect(await badAction.json()).toEqual({ ok: false, error: "Invalid action" });
  });

  it("decodes escaped unit names", async () => {
    const { run, calls } = fakeRun({ "systemctl --user restart app@1.service": { exitCode: 0, stdout: "", stderr: "" } });
    const res = await handlerFor(DEFAULT_ENV, run)(post("/api/services/user/app%401.service/restart", {}, auth));
    expect(res.status).toBe(200);
    expect(calls[0]).toBe("systemctl --user restart app@1.service");
  });
});

describe("POST /api/envfile", () => {
  const auth = { "x-action-token": TOKEN };

  it("applies whitelisted keys, reports restart need and reloads live settings", async () => {
    const { run, calls } = fakeRun({});
    const handler = handlerFor(DEFAULT_ENV, run);

    const res = await handler(post("/api/envfile", { SERVICES: "system:b.service", PORT: 9090, IGNORED: "x" }, auth));
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ok: true, applied: ["SERVICES", "PORT"], restartRequired: true });
    expect(readFileSync(join(dir, ".env"), "utf8")).toBe(
      `SERVICES=system:b.service\nACTION_TOKEN=${TOKEN}\nMASK_SECRETS=true\nPORT=9090\n`,
    );

    await handler(get("/api/services"));
    expect(calls).toEqual(["systemctl is-active b.service"]);
  });

  it("picks up a rotated action token", async () => {
    const handler = handlerFor(DEFAULT_ENV, fakeRun({}).run);
    const rotated = await handler(post("/api/envfile", { ACTION_TOKEN: "test-secret-2" }, auth));
    expect(await rotated.json()).toEqual({ ok: true, applied: ["ACTION_TOKEN"], restartRequired: false });

    expect((await handler(post("/api/envfile", { PORT: 8080 }, auth))).status).toBe(401);
    const fresh = await handler(post("/api/envfile", { PORT: 8080 }, { "x-action-token": "test-secret-2" }));
    expect(await fresh.json()).toEqual({ ok: true, applied: ["PORT"], restartRequired: false });
  });

  it("turns masking off after the flag is written", async () => {
    const handler = handlerFor(DEFAULT_ENV, fakeRun({}).run);
    await handler(post("/api/envfile", { MASK_SECRETS: false }, auth));
    const res = await handler(get("/api/envfile"));
    expect(await res.json()).toEqual({
      path: join(dir, ".env"),
      values: { SERVICES: "user:a.service", ACTION_TOKEN: TOKEN, MASK_SECRETS: "false" },
      masked: false,
    });
  });

  it("rejects nested values", async () => {
    const res = await handlerFor(DEFAULT_ENV, fakeRun({}).run)(post("/api/envfile", { SERVICES: ["a"] }, auth));
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ ok: false, error: "/SERVICES must be string,number,boolean,null" });
  });
});

describe("unexpected failures", () => {
  it("answers 500 with the request id", async () => {
    const run: CommandRunner = async () => {
      throw new Error("spawn exploded");
    };
    const handler = handlerFor(DEFAULT_ENV, run);
    const res = await handler(new Request("http://localhost/api/services", { headers: { "x-request-id": "req-1" } }));
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: "internal_error",
      details: { message: "An internal error occurred", requestId: "req-1" },
    });
  });
});
