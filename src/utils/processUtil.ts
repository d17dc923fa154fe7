import { spawn, type ChildProcess } from "child_process";
import path from "node:path";
import type { ProcessOutcome } from "../types/CommandResult";
import { buildSearchPath } from "./searchPathUtil";
import { getIsoTime } from "./timeUtil";

export type RunExecutableOptions = {
  cwd?: string;
  timeoutMs?: number;
  extraSearchPaths?: readonly string[];
  env?: NodeJS.ProcessEnv;
};

const errorMessage = (e: unknown) => (e instanceof Error ? e.message : String(e));

/**
 * Run one program without a shell and capture stdout and stderr into a single
 * buffer. The returned promise never rejects: launch errors resolve to a
 * `launch_failed` outcome.
 */
export const runExecutable = async (
  executablePath: string,
  args: readonly string[],
  options?: RunExecutableOptions,
): Promise<ProcessOutcome> => {
  const startedAt = new Date();

  const launchFailed = (error: string): ProcessOutcome => {
    const finishedAt = new Date();
    return {
      kind: "launch_failed",
      error: `Failed to launch ${executablePath}: ${error}`,
      startedAt: getIsoTime(startedAt),
      finishedAt: getIsoTime(finishedAt),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
    };
  };

  if (!path.isAbsolute(executablePath)) {
    return launchFailed("executable path must be absolute");
  }

  return await new Promise<ProcessOutcome>((resolve) => {
    const env: NodeJS.ProcessEnv = {
      ...process.env,
      ...(options?.env ?? {}),
    };
    env.PATH = buildSearchPath(env.PATH, options?.extraSearchPaths);

    let child: ChildProcess;
    try {
      child = spawn(executablePath, [...args], {
        cwd: options?.cwd,
        shell: false,
        stdio: ["ignore", "pipe", "pipe"],
        env,
      });
    } catch (e) {
      resolve(launchFailed(errorMessage(e)));
      return;
    }

    const chunks: string[] = [];
    let timedOut = false;
    let settled = false;

    child.stdout?.setEncoding("utf8");
    child.stderr?.setEncoding("utf8");
    child.stdout?.on("data", (d: string) => chunks.push(d));
    child.stderr?.on("data", (d: string) => chunks.push(d));

    const timeoutMs = options?.timeoutMs;
    let killTimer: NodeJS.Timeout | null = null;
    const timer =
      timeoutMs && timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true;
            chunks.push(`\n[timeout] command exceeded ${timeoutMs}ms`);
            child.kill("SIGTERM");
            killTimer = setTimeout(() => child.kill("SIGKILL"), 1000);
          }, timeoutMs)
        : null;

    const settle = (outcome: ProcessOutcome) => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      if (killTimer) clearTimeout(killTimer);
      resolve(outcome);
    };

    // Spawn errors (ENOENT, EACCES) arrive before any close event.
    child.on("error", (err) => settle(launchFailed(err.message)));

    child.on("close", (exitCode, signal) => {
      const finishedAt = new Date();
      settle({
        kind: "exited",
        exitCode,
        signal: signal ? String(signal) : null,
        output: chunks.join(""),
        timedOut,
        startedAt: getIsoTime(startedAt),
        finishedAt: getIsoTime(finishedAt),
        durationMs: finishedAt.getTime() - startedAt.getTime(),
      });
    });
  });
};
