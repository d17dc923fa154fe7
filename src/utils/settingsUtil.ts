import { readFile, stat } from "node:fs/promises";
import path from "node:path";
import YAML from "yaml";
import { z } from "zod";

export const runnerSettingsSchema = z.object({
  timeoutMs: z.number().int().min(0).max(3_600_000).default(0),
  extraSearchPaths: z.array(z.string().min(1)).default([]),
  workingDirectory: z.string().min(1).optional(),
});

export type RunnerSettings = z.infer<typeof runnerSettingsSchema>;

export const defaultRunnerSettings: RunnerSettings = runnerSettingsSchema.parse({});

const existsFile = async (p: string) => {
  try {
    const s = await stat(p);
    return s.isFile();
  } catch {
    return false;
  }
};

const resolveSettingsPath = async (cwd: string, filePath?: string) => {
  if (filePath && filePath.trim().length > 0) {
    return path.isAbsolute(filePath) ? filePath : path.resolve(cwd, filePath);
  }

  const workdirSettings = path.resolve(cwd, "settings/runner.yaml");
  if (await existsFile(workdirSettings)) return workdirSettings;

  return null;
};

/** `HELLO_RUNNER_ACTIVITY_LOG_FILE`, else `<cwd>/logs/activity.ndjson`. */
export const resolveActivityLogPath = (cwd: string, env: NodeJS.ProcessEnv = process.env) => {
  const configured = env.HELLO_RUNNER_ACTIVITY_LOG_FILE?.trim();
  if (!configured) return path.join(cwd, "logs", "activity.ndjson");
  return path.resolve(cwd, configured);
};

const parseTimeoutOverride = (raw: string | undefined): number | undefined => {
  if (raw === undefined || raw.trim().length === 0) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`HELLO_RUNNER_TIMEOUT_MS must be a non-negative integer, got=${raw}`);
  }
  return value;
};

/**
 * Resolve runner settings from `HELLO_RUNNER_SETTINGS_FILE`, then
 * `<cwd>/settings/runner.yaml`, then the defaults. `HELLO_RUNNER_TIMEOUT_MS`
 * wins over the file.
 */
export const loadRunnerSettings = async (
  cwd: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<{ path: string | null; settings: RunnerSettings }> => {
  const targetPath = await resolveSettingsPath(cwd, env.HELLO_RUNNER_SETTINGS_FILE);

  let raw: unknown = {};
  if (targetPath) {
    const text = await readFile(targetPath, "utf8");
    raw = YAML.parse(text) ?? {};
  }

  const parsed = runnerSettingsSchema.parse(raw);
  const timeoutOverride = parseTimeoutOverride(env.HELLO_RUNNER_TIMEOUT_MS);

  const settings: RunnerSettings = {
    ...parsed,
    timeoutMs: timeoutOverride ?? parsed.timeoutMs,
    workingDirectory: parsed.workingDirectory
      ? path.resolve(cwd, parsed.workingDirectory)
      : undefined,
  };

  return { path: targetPath, settings };
};
