import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { findCommandPreset } from "../libs/commandPresets";
import { state } from "../libs/state";
import { findSurface } from "../libs/surfaces";
import { describeCommandResult } from "../utils/commandResultUtil";

export const handleRunCommand = async ({
  surfaceId,
  commandKey,
  wait = true,
}: {
  surfaceId: string;
  commandKey: string;
  wait?: boolean;
}) => {
  const surface = findSurface(surfaceId);
  if (!surface) {
    return {
      content: [{ type: "text" as const, text: `Surface not found: ${surfaceId}` }],
      structuredContent: { ok: false as const, error: "SURFACE_NOT_FOUND", surfaceId },
      isError: true,
    };
  }

  const preset = findCommandPreset(commandKey);
  if (!preset) {
    return {
      content: [{ type: "text" as const, text: `Command not found: ${commandKey}` }],
      structuredContent: { ok: false as const, error: "COMMAND_NOT_FOUND", commandKey },
      isError: true,
    };
  }

  const { timeoutMs, extraSearchPaths, workingDirectory } = state.settings;
  const dispatched = surface.dispatch(preset, {
    cwd: workingDirectory,
    timeoutMs,
    extraSearchPaths,
  });

  if (!dispatched.ok) {
    return {
      content: [{ type: "text" as const, text: `Surface is busy: ${surfaceId}` }],
      structuredContent: {
        ok: false as const,
        error: dispatched.error,
        surfaceId,
        result: dispatched.current,
      },
      isError: true,
    };
  }

  if (!wait) {
    const running = surface.current();
    return {
      content: [{ type: "text" as const, text: describeCommandResult(running) }],
      structuredContent: { ok: true as const, surfaceId, commandKey, result: running },
    };
  }

  const result = await dispatched.completion;
  return {
    content: [{ type: "text" as const, text: describeCommandResult(result) }],
    structuredContent: {
      ok: result.status === "succeeded",
      surfaceId,
      commandKey,
      result,
    },
    isError: result.status !== "succeeded",
  };
};

export const registerRunCommandTool = (server: McpServer) =>
  server.registerTool(
    "runCommand",
    {
      title: "runCommand",
      description:
        "Run a fixed command on a display surface. The surface accepts one command at a time.",
      inputSchema: {
        surfaceId: z.string().min(1),
        commandKey: z.string().min(1),
        wait: z.boolean().default(true),
      },
    },
    async (args) => await handleRunCommand(args),
  );
