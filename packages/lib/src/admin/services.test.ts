import { describe, expect, it, vi } from "vitest";
import {
  applyServiceAction,
  formatServiceConfig,
  getServiceStatus,
  listServiceStatuses,
  parseServiceConfig,
} from "./services.ts";
import type { ProcessResult, ScopedToolRunner } from "../types.ts";

function result(exitCode: number, stdout = "", stderr = ""): ProcessResult {
  return { exitCode, stdout, stderr };
}

/** Fake systemctl answering by "<scope> <args...>". */
function fakeSystemctl(responses: Record<string, ProcessResult>) {
  return vi.fn(async (...[scope, args]: Parameters<ScopedToolRunner>): Promise<ProcessResult> => {
    return responses[`${scope} ${args.join(" ")}`] ?? result(3, "inactive");
  });
}

describe("parseServiceConfig", () => {
  it("defaults bare names to the user scope", () => {
    expect(parseServiceConfig("comfyui.service")).toEqual([{ scope: "user", name: "comfyui.service" }]);
  });

  it("trims scope and name and skips empty items", () => {
    expect(parseServiceConfig(" user : a.service ,, SYSTEM:b.service, ,:c.service")).toEqual([
      { scope: "user", name: "a.service" },
      { scope: "system", name: "b.service" },
      { scope: "user", name: "c.service" },
    ]);
  });

  it("splits on the first colon only", () => {
    expect(parseServiceConfig("system:odd:name")).toEqual([{ scope: "system", name: "odd:name" }]);
  });

  it("skips entries without a name or with an unknown scope", () => {
    expect(parseServiceConfig("user:,global:x.service,ok.service")).toEqual([{ scope: "user", name: "ok.service" }]);
  });

  it("returns nothing for an empty string", () => {
    expect(parseServiceConfig("")).toEqual([]);
    expect(parseServiceConfig("  ")).toEqual([]);
  });

  it("re-parses its serialized form to the same specs", () => {
    for (const raw of ["a.service", " user:a , system: b:c ,", "System:x,,y", ""]) {
      const parsed = parseServiceConfig(raw);
      expect(parseServiceConfig(formatServiceConfig(parsed))).toEqual(parsed);
    }
  });
});

describe("getServiceStatus", () => {
  it("reports stdout of a successful query", async () => {
    const systemctl = fakeSystemctl({ "user is-active a.service": result(0, "active") });
    expect(await getServiceStatus(systemctl, { scope: "user", name: "a.service" })).toEqual({ scope: "user", name: "a.service", status: "active" });
    expect(systemctl).toHaveBeenCalledWith("user", ["is-active", "a.service"], 15_000);
  });

  it("falls back to stdout, then stderr, then unknown", async () => {
    const systemctl = fakeSystemctl({
      "system is-active down.service": result(3, "inactive"),
      "system is-active denied.service": result(1, "", "Failed to connect to bus"),
      "system is-active silent.service": result(124, ""),
    });
    const status = (name: string) => getServiceStatus(systemctl, { scope: "system", name }).then((s) => s.status);
    expect(await status("down.service")).toBe("inactive");
    expect(await status("denied.service")).toBe("Failed to connect to bus");
    expect(await status("silent.service")).toBe("unknown");
  });
});

describe("listServiceStatuses", () => {
  it("queries each configured service in order", async () => {
    const systemctl = fakeSystemctl({
      "user is-active a.service": result(0, "active"),
      "system is-active b.service": result(3, "failed"),
    });
    const specs = parseServiceConfig("user:a.service,system:b.service");
    expect(await listServiceStatuses(systemctl, specs)).toEqual([
      { scope: "user", name: "a.service", status: "active" },
      { scope: "system", name: "b.service", status: "failed" },
    ]);
  });
});

describe("applyServiceAction", () => {
  it("rejects an invalid scope before running anything", async () => {
    const systemctl = fakeSystemctl({});
    expect(await applyServiceAction(systemctl, "global", "a.service", "start")).toEqual({ ok: false, status: 400, error: "Invalid scope" });
    expect(systemctl).not.toHaveBeenCalled();
  });

  it("rejects an invalid action", async () => {
    const systemctl = fakeSystemctl({});
    expect(await applyServiceAction(systemctl, "user", "a.service", "enable")).toEqual({ ok: false, status: 400, error: "Invalid action" });
    expect(await applyServiceAction(systemctl, "user", "a.service", "START")).toEqual({ ok: false, status: 400, error: "Invalid action" });
    expect(systemctl).not.toHaveBeenCalled();
  });

  it("rejects names that would read as options", async () => {
    const systemctl = fakeSystemctl({});
    expect(await applyServiceAction(systemctl, "user", "--all", "stop")).toEqual({ ok: false, status: 400, error: "Invalid service name" });
    expect(await applyServiceAction(systemctl, "user", "", "stop")).toEqual({ ok: false, status: 400, error: "Invalid service name" });
  });

  it("runs the action and reports the new state", async () => {
    const systemctl = fakeSystemctl({
      "user restart a.service": result(0),
      "user is-active a.service": result(0, "active"),
    });
    const outcome = await applyServiceAction(systemctl, "User", "a.service", "restart");
    expect(outcome).toEqual({
      ok: true,
      status: 200,
      returncode: 0,
      stdout: "",
      stderr: "",
      service: { scope: "user", name: "a.service", status: "active" },
    });
    expect(systemctl).toHaveBeenNthCalledWith(1, "user", ["restart", "a.service"], 30_000);
    expect(systemctl).toHaveBeenNthCalledWith(2, "user", ["is-active", "a.service"], 15_000);
  });

  it("still reports status when the action fails", async () => {
    const systemctl = fakeSystemctl({
      "system start foo.service": result(1, "", "Access denied"),
      "system is-active foo.service": result(3, "inactive"),
    });
    const outcome = await applyServiceAction(systemctl, "system", "foo.service", "start");
    expect(outcome).toEqual({
      ok: false,
      status: 500,
      returncode: 1,
      stdout: "",
      stderr: "Access denied",
      service: { scope: "system", name: "foo.service", status: "inactive" },
    });
  });
});
