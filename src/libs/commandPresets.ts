import type { CommandPreset } from "../types/CommandPreset";

export const commandPresets: Record<string, CommandPreset> = {
  listRoot: {
    key: "listRoot",
    description: "List the root directory.",
    executablePath: "/bin/ls",
    args: ["-la", "/"],
  },
  gitStatus: {
    key: "gitStatus",
    description: "Show git status of the working directory.",
    executablePath: "/usr/bin/git",
    args: ["status"],
  },
};

export const findCommandPreset = (key: string): CommandPreset | undefined =>
  Object.prototype.hasOwnProperty.call(commandPresets, key) ? commandPresets[key] : undefined;
