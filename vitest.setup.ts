/**
 * Vitest Global Setup
 *
 * Resets the config cache before each test file and each test so that
 * vi.stubEnv() calls are picked up by the lazily parsed config module.
 */

import { beforeAll, beforeEach } from "vitest";
import { _resetConfigCache } from "./src/config/index.js";

// Keep pino quiet unless a test opts in
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? "silent";

beforeAll(() => {
  _resetConfigCache();
});

beforeEach(() => {
  _resetConfigCache();
});
