import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { findSurface } from "../libs/surfaces";
import { describeCommandResult } from "../utils/commandResultUtil";

export const handleGetCommandResult = async ({ surfaceId }: { surfaceId: string }) => {
  const surface = findSurface(surfaceId);
  if (!surface) {
    return {
      content: [{ type: "text" as const, text: `Surface not found: ${surfaceId}` }],
      structuredContent: { ok: false as const, error: "SURFACE_NOT_FOUND", surfaceId },
      isError: true,
    };
  }

  const result = surface.current();
  return {
    content: [{ type: "text" as const, text: `${surfaceId}: ${describeCommandResult(result)}` }],
    structuredContent: {
      ok: true as const,
      surfaceId,
      triggerEnabled: surface.isTriggerEnabled(),
      result,
    },
  };
};

export const registerGetCommandResultTool = (server: McpServer) =>
  server.registerTool(
    "getCommandResult",
    {
      title: "getCommandResult",
      description: "Get the current command result of a display surface.",
      inputSchema: {
        surfaceId: z.string().min(1),
      },
    },
    async ({ surfaceId }) => await handleGetCommandResult({ surfaceId }),
  );
