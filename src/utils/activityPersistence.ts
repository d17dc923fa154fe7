import { appendFile, mkdir } from "node:fs/promises";
import path from "node:path";
import type { ActivityEvent } from "../types/ActivityEvent";
import { resolveActivityLogPath } from "./settingsUtil";

export const activityLogFilePath = resolveActivityLogPath(process.cwd());

let reportedWriteFailure = false;

export const appendActivityEvent = async (
  event: ActivityEvent,
  filePath: string = activityLogFilePath,
): Promise<void> => {
  try {
    await mkdir(path.dirname(filePath), { recursive: true });
    await appendFile(filePath, `${JSON.stringify(event)}\n`, "utf8");
  } catch (e) {
    // Non-fatal; report the first failure only.
    if (reportedWriteFailure) return;
    reportedWriteFailure = true;
    console.error(`Activity log not writable (${filePath}): ${String(e)}`);
  }
};
