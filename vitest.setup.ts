/**
 * Vitest Global Setup
 *
 * Runs before each test file. Keeps tests hermetic (no credential picked up
 * from the shell) and resets the config cache so vi.stubEnv() calls are seen
 * by the config module.
 */

import { beforeAll, beforeEach } from "vitest";
import { _resetConfigCache } from "./src/config/index.js";

process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? "silent";
delete process.env.OPENAI_API_KEY;
delete process.env.DD_AGENT_HOST;

beforeAll(() => {
  _resetConfigCache();
});

beforeEach(() => {
  _resetConfigCache();
});
