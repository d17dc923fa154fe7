import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { surfaces } from "../libs/surfaces";

export const handlePing = async ({ message }: { message?: string }) => {
  const busy = [...surfaces.values()].filter((s) => !s.isTriggerEnabled()).length;
  return {
    content: [
      {
        type: "text" as const,
        text: `${message ? `pong: ${message}` : "pong"} (surfaces=${surfaces.size}, busy=${busy})`,
      },
    ],
  };
};

export const registerPingTool = (server: McpServer) =>
  server.registerTool(
    "ping",
    {
      title: "ping",
      description: "Health check. Returns 'pong' with surface counts and an optional message.",
      inputSchema: { message: z.string().optional() },
    },
    async ({ message }) => await handlePing({ message }),
  );
