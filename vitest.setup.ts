/**
 * Vitest Global Setup
 *
 * Resets the config cache before each test so that vi.stubEnv() calls made
 * in a test (or at file level) are picked up by the lazily parsed config.
 */

import { beforeAll, beforeEach } from "vitest";
import { _resetConfigCache } from "./src/config/index.js";

process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? "silent";

beforeAll(() => {
  _resetConfigCache();
});

beforeEach(() => {
  _resetConfigCache();
});
