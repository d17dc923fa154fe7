export type CommandStatus = "idle" | "running" | "succeeded" | "failed";

export type CommandResult = {
  status: CommandStatus;
  text: string;
  exitCode?: number; // only when the process terminated normally
  invocationId?: string;
  executablePath?: string;
  args?: string[];
  signal?: string;
  timedOut?: boolean;
  startedAt?: string;
  finishedAt?: string;
  durationMs?: number;
};

type OutcomeTiming = {
  startedAt: string;
  finishedAt: string;
  durationMs: number;
};

export type ProcessOutcome =
  | (OutcomeTiming & {
      kind: "exited";
      exitCode: number | null;
      signal: string | null;
      output: string;
      timedOut: boolean;
    })
  | (OutcomeTiming & {
      kind: "launch_failed";
      error: string;
    });
