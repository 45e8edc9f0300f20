import { afterAll, afterEach, vi } from "vitest";

import { setVerbose } from "../src/globals.js";
import { resetLogger } from "../src/logging/logger.js";
import { withIsolatedTestHome } from "./test-env.js";

const testEnv = withIsolatedTestHome();
afterAll(() => testEnv.cleanup());

afterEach(() => {
  resetLogger();
  setVerbose(false);
  // Guard against leaked fake timers across test files/workers.
  vi.useRealTimers();
});
