import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { state } from "../libs/state";
import { handleReloadSettings } from "../tools/reloadSettings";
import { defaultRunnerSettings } from "../utils/settingsUtil";

describe("reloadSettings", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "hello-runner-reload-"));
    state.settings = defaultRunnerSettings;
    state.activityLog = [];
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
    state.settings = defaultRunnerSettings;
    state.activityLog = [];
  });

  it("applies the settings file and records the reload", async () => {
    await mkdir(path.join(dir, "settings"));
    await writeFile(path.join(dir, "settings", "runner.yaml"), "timeoutMs: 900\n", "utf8");

    const result = await handleReloadSettings({}, dir, {});

    expect(result.structuredContent.ok).toBe(true);
    expect(state.settings.timeoutMs).toBe(900);
    expect(state.activityLog.map((e) => e.action)).toEqual(["settings_loaded"]);
    expect(state.activityLog[0].detail).toBe(
      `timeoutMs=900 from ${path.join(dir, "settings", "runner.yaml")}`,
    );
  });

  it("keeps the current settings when the reload fails", async () => {
    state.settings = { timeoutMs: 300, extraSearchPaths: [] };

    const result = await handleReloadSettings({ settingsFile: "absent.yaml" }, dir, {});

    expect(result.isError).toBe(true);
    expect(result.structuredContent.ok).toBe(false);
    expect(state.settings.timeoutMs).toBe(300);
    expect(state.activityLog).toEqual([]);
  });
});
