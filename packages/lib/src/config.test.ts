import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { homedir, tmpdir } from "node:os";
import { join } from "node:path";
import { expandHome, isTruthy, loadConfig, loadedRestartValues, resolveCondaBin } from "./config.ts";

describe("isTruthy", () => {
  it("accepts the usual tokens in any case", () => {
    for (const value of ["1", "true", "YES", " On "]) expect(isTruthy(value)).toBe(true);
    for (const value of ["0", "false", "no", "", "enabled"]) expect(isTruthy(value)).toBe(false);
  });
});

describe("resolveCondaBin", () => {
  it("expands ~ and uses the configured binary when it exists", () => {
    const expected = join(homedir(), "tools/conda");
    expect(expandHome("~/tools/conda")).toBe(expected);
    expect(resolveCondaBin("~/tools/conda", (path) => path === expected)).toBe(expected);
  });

  it("falls back to conda on PATH", () => {
    expect(resolveCondaBin("/missing/conda", () => false)).toBe("conda");
    expect(resolveCondaBin(undefined, () => false)).toBe("conda");
  });

  it("defaults to the miniconda install in the home directory", () => {
    const expected = join(homedir(), "miniconda3/bin/conda");
    expect(resolveCondaBin("", (path) => path === expected)).toBe(expected);
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "hostpanel-settings-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("uses defaults when nothing is configured", () => {
    const config = loadConfig({ HOSTPANEL_DIR: dir }, () => false);
    expect(config).toEqual({
      baseDir: dir,
      envPath: join(dir, ".env"),
      examplePath: join(dir, ".env.example"),
      bindHost: "127.0.0.1",
      port: 8080,
      services: "",
      maskSecrets: true,
      actionToken: undefined,
      secretKey: "change-me-in-.env",
      condaBin: "conda",
      healthProbeConcurrency: 4,
    });
  });

  it("reads the .env file and lets the process environment win", () => {
    writeFileSync(
      join(dir, ".env"),
      [
        "PORT=9000",
        "BIND_HOST=0.0.0.0",
        "SERVICES=\"user:a.service, system:b.service\"",
        "MASK_SECRETS=off",
        "ACTION_TOKEN=test-secret",
        "HEALTH_PROBE_CONCURRENCY=2",
      ].join("\n"),
    );
    const config = loadConfig({ HOSTPANEL_DIR: dir, PORT: "9100" }, () => false);
    expect(config.port).toBe(9100);
    expect(config.bindHost).toBe("0.0.0.0");
    expect(config.services).toBe("user:a.service, system:b.service");
    expect(config.maskSecrets).toBe(false);
    expect(config.actionToken).toBe("test-secret");
    expect(config.healthProbeConcurrency).toBe(2);
  });

  it("treats a blank action token as unset", () => {
    const config = loadConfig({ HOSTPANEL_DIR: dir, ACTION_TOKEN: "   " }, () => false);
    expect(config.actionToken).toBeUndefined();
  });

  it("ignores out-of-range numbers", () => {
    const config = loadConfig({ HOSTPANEL_DIR: dir, PORT: "70000", HEALTH_PROBE_CONCURRENCY: "zero" }, () => false);
    expect(config.port).toBe(8080);
    expect(config.healthProbeConcurrency).toBe(4);
  });

  it("exposes the restart-sensitive values as strings", () => {
    const config = loadConfig({ HOSTPANEL_DIR: dir, PORT: "9001", BIND_HOST: "10.0.0.2" }, () => false);
    expect(loadedRestartValues(config)).toEqual({ BIND_HOST: "10.0.0.2", PORT: "9001" });
  });
});
