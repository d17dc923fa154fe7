export { registerPingTool } from "./ping";
export { registerListSurfacesTool } from "./listSurfaces";
export { registerRunCommandTool } from "./runCommand";
export { registerGetCommandResultTool } from "./getCommandResult";
export { registerActivityLogTool } from "./activityLog";
export { registerReloadSettingsTool } from "./reloadSettings";
