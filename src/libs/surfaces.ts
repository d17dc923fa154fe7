import type { CommandResult } from "../types/CommandResult";
import { issueId } from "../utils/idUtil";
import { getIsoTime } from "../utils/timeUtil";
import { createDisplaySurface, type CommandRunner, type DisplaySurface } from "./displaySurface";
import { addActivityEvent } from "./state";

export const surfaces = new Map<string, DisplaySurface>();

const defaultSurfaceDefinitions = [
  { id: "helloWorldCool", title: "Hello World Cool", subtitle: "Built without an IDE" },
  { id: "helloFullScreen", title: "Hello World" },
];

const describeTransition = (result: CommandResult) => {
  const commandLine = [result.executablePath ?? "", ...(result.args ?? [])].join(" ").trim();
  switch (result.status) {
    case "running":
      return { action: "command_started", detail: commandLine };
    case "succeeded":
      return { action: "command_succeeded", detail: `${commandLine} exit=0` };
    default:
      return {
        action: "command_failed",
        detail:
          result.exitCode !== undefined
            ? `${commandLine} exit=${result.exitCode}`
            : `${commandLine} ${result.signal ? `signal=${result.signal}` : result.text}`,
      };
  }
};

export const recordSurfaceTransition = (result: CommandResult, surfaceId: string) => {
  if (result.status === "idle") return;
  const { action, detail } = describeTransition(result);
  addActivityEvent({
    id: issueId("evt"),
    timestamp: getIsoTime(),
    type: "command",
    action,
    detail,
    surfaceId,
    invocationId: result.invocationId,
  });
};

export const registerSurface = (surface: DisplaySurface) => {
  surface.subscribe(recordSurfaceTransition);
  surfaces.set(surface.id, surface);
  return surface;
};

export const registerDefaultSurfaces = (runner?: CommandRunner): DisplaySurface[] =>
  defaultSurfaceDefinitions.map((definition) => registerSurface(createDisplaySurface({ ...definition, runner })));

export const findSurface = (surfaceId: string): DisplaySurface | undefined => surfaces.get(surfaceId);
