import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { registerDefaultSurfaces } from "./libs/surfaces";
import { activityLogFilePath } from "./utils/activityPersistence";
import { handleReloadSettings } from "./tools/reloadSettings";

// -------------------------
// Server
// -------------------------
const server = new McpServer({ name: "hello-runner", version: "0.1.0" });

// -------------------------
// Tools
// -------------------------
import {
  registerPingTool,
  registerListSurfacesTool,
  registerRunCommandTool,
  registerGetCommandResultTool,
  registerActivityLogTool,
  registerReloadSettingsTool,
} from "./tools";

registerPingTool(server);
registerListSurfacesTool(server);
registerRunCommandTool(server);
registerGetCommandResultTool(server);
registerActivityLogTool(server);
registerReloadSettingsTool(server);

async function loadSettings() {
  const loaded = await handleReloadSettings({});
  if (loaded.structuredContent.ok) {
    console.error(`Settings loaded: ${loaded.structuredContent.path ?? "defaults"}`);
  } else {
    console.error(`Settings not loaded, using defaults: ${loaded.structuredContent.message}`);
  }
}

// -------------------------
// Main
// -------------------------
async function main() {
  console.error("hello-runner starting (stdio) ...");
  await loadSettings();
  const registered = registerDefaultSurfaces();
  console.error(`Surfaces: ${registered.map((s) => s.id).join(", ")}`);
  console.error(`Activity log: ${activityLogFilePath}`);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("hello-runner has connected");
}

main().catch((err) => {
  console.error("Fatal:", err);
  process.exit(1);
});
