import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { state } from "../libs/state";
import type { ActivityEventType } from "../types/ActivityEvent";

export const handleActivityLog = async ({
  surfaceId,
  invocationId,
  type,
  action,
  format = "json",
  limit = 50,
}: {
  surfaceId?: string;
  invocationId?: string;
  type?: ActivityEventType;
  action?: string;
  format?: "json" | "lines";
  limit?: number;
}) => {
  let events = state.activityLog;

  if (surfaceId) {
    events = events.filter((e) => e.surfaceId === surfaceId);
  }
  if (invocationId) {
    events = events.filter((e) => e.invocationId === invocationId);
  }
  if (type) {
    events = events.filter((e) => e.type === type);
  }
  if (action) {
    const actionFilter = action.toLowerCase();
    events = events.filter((e) => e.action.toLowerCase().includes(actionFilter));
  }

  const sliced = events.slice(Math.max(0, events.length - limit));
  const lines =
    format === "lines"
      ? sliced.map(
          (e) =>
            `[${e.timestamp}] ${e.type} ${e.action} ${e.surfaceId ? `surface=${e.surfaceId} ` : ""}${e.detail}`,
        )
      : undefined;

  return {
    content: [
      {
        type: "text" as const,
        text: format === "lines" ? lines?.join("\n") || "" : `events=${sliced.length}`,
      },
    ],
    structuredContent: {
      count: sliced.length,
      events: sliced,
      ...(format === "lines" ? { lines } : {}),
    },
  };
};

export const registerActivityLogTool = (server: McpServer) =>
  server.registerTool(
    "activityLog",
    {
      title: "activityLog",
      description: "Inspect command and system activity.",
      inputSchema: {
        surfaceId: z.string().optional(),
        invocationId: z.string().optional(),
        type: z.enum(["command", "system"]).optional(),
        action: z.string().optional(),
        format: z.enum(["json", "lines"]).default("json"),
        limit: z.number().int().min(1).max(500).default(50),
      },
    },
    async (args) => await handleActivityLog(args),
  );
