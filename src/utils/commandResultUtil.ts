import type { CommandResult, ProcessOutcome } from "../types/CommandResult";

export const NO_OUTPUT_PLACEHOLDER = "(no output)";

export const idleResult = (): CommandResult => ({ status: "idle", text: "" });

/**
 * Fold a process outcome into the terminal state of the running invocation.
 * `exitCode` is kept only for a normal exit.
 */
export const toTerminalResult = (running: CommandResult, outcome: ProcessOutcome): CommandResult => {
  const timing = {
    startedAt: outcome.startedAt,
    finishedAt: outcome.finishedAt,
    durationMs: outcome.durationMs,
  };

  if (outcome.kind === "launch_failed") {
    return {
      ...running,
      ...timing,
      status: "failed",
      text: outcome.error,
    };
  }

  const text = outcome.output.length > 0 ? outcome.output : NO_OUTPUT_PLACEHOLDER;

  // A timed-out child may still exit with its own code after SIGTERM.
  if (outcome.exitCode === null || outcome.timedOut) {
    return {
      ...running,
      ...timing,
      status: "failed",
      text,
      signal: outcome.signal ?? undefined,
      timedOut: outcome.timedOut,
    };
  }

  return {
    ...running,
    ...timing,
    status: outcome.exitCode === 0 ? "succeeded" : "failed",
    text,
    exitCode: outcome.exitCode,
    timedOut: false,
  };
};

export const describeCommandResult = (result: CommandResult): string => {
  switch (result.status) {
    case "idle":
      return "idle";
    case "running":
      return `running: ${[result.executablePath ?? "", ...(result.args ?? [])].join(" ").trim()}`;
    case "succeeded":
      return result.text;
    case "failed":
      if (result.exitCode !== undefined) return `exit code ${result.exitCode}\n${result.text}`;
      if (result.signal) return `terminated by ${result.signal}\n${result.text}`;
      return result.text;
  }
};
