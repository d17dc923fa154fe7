import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { addActivityEvent, state } from "../libs/state";
import { issueId } from "../utils/idUtil";
import { loadRunnerSettings } from "../utils/settingsUtil";
import { getIsoTime } from "../utils/timeUtil";

const errorMessage = (e: unknown) => (e instanceof Error ? e.message : String(e));

export const handleReloadSettings = async (
  { settingsFile }: { settingsFile?: string },
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
) => {
  const before = state.settings;
  const lookupEnv = settingsFile ? { ...env, HELLO_RUNNER_SETTINGS_FILE: settingsFile } : env;

  try {
    const loaded = await loadRunnerSettings(cwd, lookupEnv);
    state.settings = loaded.settings;

    addActivityEvent({
      id: issueId("evt"),
      timestamp: getIsoTime(),
      type: "system",
      action: "settings_loaded",
      detail: `timeoutMs=${loaded.settings.timeoutMs} from ${loaded.path ?? "defaults"}`,
    });

    return {
      content: [{ type: "text" as const, text: `settings loaded from ${loaded.path ?? "defaults"}` }],
      structuredContent: {
        ok: true as const,
        path: loaded.path,
        before,
        after: loaded.settings,
      },
    };
  } catch (e) {
    return {
      content: [{ type: "text" as const, text: `reload failed: ${errorMessage(e)}` }],
      structuredContent: {
        ok: false as const,
        error: "RELOAD_FAILED",
        message: errorMessage(e),
      },
      isError: true,
    };
  }
};

export const registerReloadSettingsTool = (server: McpServer) =>
  server.registerTool(
    "reloadSettings",
    {
      title: "reloadSettings",
      description:
        "Reload runner settings (timeout, extra search paths, working directory) without restarting the server. Running commands keep the settings they started with.",
      inputSchema: {
        settingsFile: z.string().optional(),
      },
    },
    async ({ settingsFile }) => await handleReloadSettings({ settingsFile }),
  );
