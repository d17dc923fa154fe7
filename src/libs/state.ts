import type { ActivityEvent } from "../types/ActivityEvent";
import { appendActivityEvent } from "../utils/activityPersistence";
import { defaultRunnerSettings, type RunnerSettings } from "../utils/settingsUtil";

const ACTIVITY_LOG_LIMIT = 500;

type AppState = {
  settings: RunnerSettings;
  activityLog: ActivityEvent[];
};

export const state: AppState = {
  settings: defaultRunnerSettings,
  activityLog: [],
};

export const addActivityEvent = (event: ActivityEvent) => {
  state.activityLog.push(event);
  if (state.activityLog.length > ACTIVITY_LOG_LIMIT) {
    state.activityLog.splice(0, state.activityLog.length - ACTIVITY_LOG_LIMIT);
  }
  void appendActivityEvent(event);
};
