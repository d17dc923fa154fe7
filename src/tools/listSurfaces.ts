import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { commandPresets } from "../libs/commandPresets";
import { surfaces } from "../libs/surfaces";

export const handleListSurfaces = async () => {
  const list = [...surfaces.values()].map((s) => ({
    id: s.id,
    title: s.title,
    subtitle: s.subtitle,
    status: s.current().status,
    triggerEnabled: s.isTriggerEnabled(),
  }));
  const commands = Object.values(commandPresets).map((p) => ({
    key: p.key,
    description: p.description,
    commandLine: [p.executablePath, ...p.args].join(" "),
  }));

  return {
    content: [
      {
        type: "text" as const,
        text: list.map((s) => `${s.id}: ${s.title} [${s.status}]`).join("\n") || "no surfaces",
      },
    ],
    structuredContent: { surfaces: list, commands },
  };
};

export const registerListSurfacesTool = (server: McpServer) =>
  server.registerTool(
    "listSurfaces",
    {
      title: "listSurfaces",
      description: "List display surfaces and the commands they can run.",
      inputSchema: {},
    },
    async () => await handleListSurfaces(),
  );
