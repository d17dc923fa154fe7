import type { CommandResult, ProcessOutcome } from "../types/CommandResult";
import { idleResult, toTerminalResult } from "../utils/commandResultUtil";
import { issueId } from "../utils/idUtil";
import { runExecutable, type RunExecutableOptions } from "../utils/processUtil";
import { getIsoTime } from "../utils/timeUtil";

export type CommandRunner = (
  executablePath: string,
  args: readonly string[],
  options?: RunExecutableOptions,
) => Promise<ProcessOutcome>;

export type SurfaceListener = (result: CommandResult, surfaceId: string) => void;

export type SurfaceCommand = {
  executablePath: string;
  args: readonly string[];
};

export type DispatchResult =
  | { ok: true; invocationId: string; completion: Promise<CommandResult> }
  | { ok: false; error: "SURFACE_BUSY"; current: CommandResult };

export type DisplaySurface = {
  id: string;
  title: string;
  subtitle?: string;
  current: () => CommandResult;
  isTriggerEnabled: () => boolean;
  dispatch: (command: SurfaceCommand, options?: RunExecutableOptions) => DispatchResult;
  subscribe: (listener: SurfaceListener) => () => void;
};

const errorMessage = (e: unknown) => (e instanceof Error ? e.message : String(e));

/**
 * A presentation unit owning a single result slot. The slot is written only
 * here: `running` synchronously on dispatch, the terminal state once the
 * runner's promise settles. At most one invocation is in flight.
 */
export const createDisplaySurface = ({
  id,
  title,
  subtitle,
  runner = runExecutable,
}: {
  id: string;
  title: string;
  subtitle?: string;
  runner?: CommandRunner;
}): DisplaySurface => {
  let slot: CommandResult = idleResult();
  const listeners = new Set<SurfaceListener>();

  const commit = (next: CommandResult) => {
    slot = next;
    for (const listener of listeners) {
      try {
        listener(next, id);
      } catch (e) {
        console.error(`Surface listener failed (${id}): ${errorMessage(e)}`);
      }
    }
  };

  const dispatch = (command: SurfaceCommand, options?: RunExecutableOptions): DispatchResult => {
    if (slot.status === "running") {
      return { ok: false, error: "SURFACE_BUSY", current: slot };
    }

    const invocationId = issueId("inv");
    const running: CommandResult = {
      status: "running",
      text: "",
      invocationId,
      executablePath: command.executablePath,
      args: [...command.args],
      startedAt: getIsoTime(),
    };
    commit(running);

    const completion = (async (): Promise<CommandResult> => {
      let terminal: CommandResult;
      try {
        const outcome = await runner(command.executablePath, command.args, options);
        terminal = toTerminalResult(running, outcome);
      } catch (e) {
        terminal = {
          ...running,
          status: "failed",
          text: `Failed to run ${command.executablePath}: ${errorMessage(e)}`,
          finishedAt: getIsoTime(),
        };
      }

      if (slot.invocationId === invocationId) commit(terminal);
      return terminal;
    })();

    return { ok: true, invocationId, completion };
  };

  return {
    id,
    title,
    subtitle,
    current: () => slot,
    isTriggerEnabled: () => slot.status !== "running",
    dispatch,
    subscribe: (listener) => {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
  };
};
