import os from "node:os";
import path from "node:path";
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/tests/**/*.test.ts"],
    environment: "node",
    testTimeout: 15_000,
    env: {
      HELLO_RUNNER_ACTIVITY_LOG_FILE: path.join(os.tmpdir(), "hello-runner-tests", "activity.ndjson"),
    },
  },
});
