import { spawn } from "node:child_process";
import { constants } from "node:os";
import { createLogger } from "./shared/logger.ts";
import type { CommandRunner, ProcessResult, ScopedToolRunner, ToolRunner } from "./types.ts";

export type { CommandRunner, ProcessResult, RunOptions, ScopedToolRunner, ToolRunner } from "./types.ts";

const log = createLogger("runner");

export const TIMEOUT_EXIT_CODE = 124;
export const NOT_FOUND_EXIT_CODE = 127;

const DEFAULT_TIMEOUT_MS = 20_000;
const CONDA_TIMEOUT_MS = 30_000;
const SYSTEMCTL_TIMEOUT_MS = 15_000;

/** Caps diagnostic text handed back to callers. */
export const OUTPUT_TAIL_CHARS = 4000;

/** Lets conda run non-interactively on hosts where its terms-of-service prompt was never answered. */
export const CONDA_TOS_ENV: Readonly<Record<string, string>> = { CONDA_PLUGINS_AUTO_ACCEPT_TOS: "yes" };

function signalExitCode(signal: NodeJS.Signals | null): number {
  if (!signal) return 1;
  return 128 + (constants.signals[signal] ?? 0);
}

function formatSeconds(ms: number): string {
  return `${ms / 1000}s`;
}

export function tailOutput(text: string, max = OUTPUT_TAIL_CHARS): string {
  return text.length > max ? text.slice(-max) : text;
}

/**
 * Run argv[0] with the remaining arguments and collect its output.
 *
 * The promise never rejects for the command's own failures: a missing or
 * unlaunchable binary resolves with exit code 127 and a timeout kills the
 * child and resolves with 124 plus whatever output arrived before the kill.
 */
export const runCommand: CommandRunner = (args, options = {}) => {
  const [bin, ...rest] = args;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  if (!bin) {
    return Promise.resolve({ exitCode: NOT_FOUND_EXIT_CODE, stdout: "", stderr: "no command given" });
  }

  return new Promise<ProcessResult>((resolve) => {
    let stdout = "";
    let stderr = "";
    let settled = false;
    let timeoutId: ReturnType<typeof setTimeout> | undefined;

    const finish = (result: ProcessResult) => {
      if (settled) return;
      settled = true;
      if (timeoutId) clearTimeout(timeoutId);
      resolve(result);
    };

    let child: ReturnType<typeof spawn>;
    try {
      child = spawn(bin, rest, {
        cwd: options.cwd,
        env: { ...process.env, ...options.extraEnv },
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.warn("command launch failed", { bin, error: message });
      finish({ exitCode: NOT_FOUND_EXIT_CODE, stdout: "", stderr: message });
      return;
    }

    let spawned = false;
    child.on("spawn", () => {
      spawned = true;
    });
    child.stdin?.end();
    child.stdout?.setEncoding("utf8");
    child.stderr?.setEncoding("utf8");
    child.stdout?.on("data", (chunk: string) => {
      stdout += chunk;
    });
    child.stderr?.on("data", (chunk: string) => {
      stderr += chunk;
    });

    child.on("error", (error) => {
      if (spawned) {
        log.warn("command error after launch", { bin, error: error.message });
        return;
      }
      log.warn("command launch failed", { bin, error: error.message });
      finish({ exitCode: NOT_FOUND_EXIT_CODE, stdout: "", stderr: error.message });
    });

    child.on("close", (code, signal) => {
      finish({
        exitCode: code ?? signalExitCode(signal),
        stdout: stdout.trim(),
        stderr: stderr.trim(),
      });
    });

    timeoutId = setTimeout(() => {
      child.kill("SIGKILL");
      log.warn("command timed out", { bin, timeoutMs });
      finish({
        exitCode: TIMEOUT_EXIT_CODE,
        stdout: stdout.trim(),
        stderr: stderr.trim() || `Command timed out after ${formatSeconds(timeoutMs)}`,
      });
    }, timeoutMs);
  });
};

/** Bind a runner to the conda binary; every call carries the terms-of-service overlay. */
export function createCondaRunner(condaBin: string, run: CommandRunner = runCommand): ToolRunner {
  return (args, timeoutMs = CONDA_TIMEOUT_MS) =>
    run([condaBin, ...args], { timeoutMs, extraEnv: { ...CONDA_TOS_ENV } });
}

export function createSystemctlRunner(run: CommandRunner = runCommand, bin = "systemctl"): ScopedToolRunner {
  return (scope, args, timeoutMs = SYSTEMCTL_TIMEOUT_MS) => {
    const base = scope === "user" ? [bin, "--user"] : [bin];
    return run([...base, ...args], { timeoutMs });
  };
}
