import { describe, expect, it } from "vitest";
import type { CommandResult, ProcessOutcome } from "../types/CommandResult";
import {
  describeCommandResult,
  NO_OUTPUT_PLACEHOLDER,
  toTerminalResult,
} from "../utils/commandResultUtil";

const timing = {
  startedAt: "2024-01-01T00:00:00.000Z",
  finishedAt: "2024-01-01T00:00:01.000Z",
  durationMs: 1000,
};

const running: CommandResult = {
  status: "running",
  text: "",
  invocationId: "inv_test",
  executablePath: "/bin/ls",
  args: ["-la", "/"],
  startedAt: timing.startedAt,
};

const exited = (
  output: string,
  exitCode: number | null,
  signal: string | null = null,
  timedOut = false,
): ProcessOutcome => ({
  kind: "exited",
  exitCode,
  signal,
  output,
  timedOut,
  ...timing,
});

describe("toTerminalResult", () => {
  it("maps exit code 0 to succeeded", () => {
    const result = toTerminalResult(running, exited("X", 0));
    expect(result).toEqual({
      ...running,
      ...timing,
      status: "succeeded",
      text: "X",
      exitCode: 0,
      timedOut: false,
    });
  });

  it("uses the placeholder for empty output", () => {
    const result = toTerminalResult(running, exited("", 0));
    expect(result.status).toBe("succeeded");
    expect(result.text).toBe(NO_OUTPUT_PLACEHOLDER);
  });

  it("maps a non-zero exit code to failed and keeps the output", () => {
    const result = toTerminalResult(running, exited("fatal: nope", 128));
    expect(result.status).toBe("failed");
    expect(result.exitCode).toBe(128);
    expect(result.text).toBe("fatal: nope");
  });

  it("drops the exit code when the process was killed", () => {
    const result = toTerminalResult(running, exited("partial", null, "SIGTERM", true));
    expect(result.status).toBe("failed");
    expect(result.exitCode).toBeUndefined();
    expect(result.signal).toBe("SIGTERM");
    expect(result.timedOut).toBe(true);
    expect(result.text).toBe("partial");
  });

  it("drops the exit code of a timed-out process that exited on its own", () => {
    const result = toTerminalResult(running, exited("\n[timeout] command exceeded 200ms", 0, null, true));
    expect(result.status).toBe("failed");
    expect(result.exitCode).toBeUndefined();
    expect(result.signal).toBeUndefined();
    expect(result.timedOut).toBe(true);
    expect(describeCommandResult(result)).toBe("\n[timeout] command exceeded 200ms");
  });

  it("maps a launch failure to failed without an exit code", () => {
    const result = toTerminalResult(running, {
      kind: "launch_failed",
      error: "Failed to launch /nope: spawn /nope ENOENT",
      ...timing,
    });
    expect(result.status).toBe("failed");
    expect(result.exitCode).toBeUndefined();
    expect(result.text).toBe("Failed to launch /nope: spawn /nope ENOENT");
  });
});

describe("describeCommandResult", () => {
  it("describes each state", () => {
    expect(describeCommandResult({ status: "idle", text: "" })).toBe("idle");
    expect(describeCommandResult(running)).toBe("running: /bin/ls -la /");
    expect(describeCommandResult({ status: "succeeded", text: "ok", exitCode: 0 })).toBe("ok");
    expect(describeCommandResult({ status: "failed", text: "bad", exitCode: 2 })).toBe(
      "exit code 2\nbad",
    );
    expect(describeCommandResult({ status: "failed", text: "cut", signal: "SIGKILL" })).toBe(
      "terminated by SIGKILL\ncut",
    );
    expect(describeCommandResult({ status: "failed", text: "no such file" })).toBe("no such file");
  });
});
