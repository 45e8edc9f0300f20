import { afterEach, describe, expect, it } from "vitest";

import { isVerbose, setVerbose } from "./globals.js";
import { getResolvedLoggerSettings } from "./logging/logger.js";

describe("globals", () => {
  afterEach(() => {
    setVerbose(false);
  });

  it("toggles the verbose flag", () => {
    setVerbose(true);
    expect(isVerbose()).toBe(true);
    setVerbose(false);
    expect(isVerbose()).toBe(false);
  });

  it("raises diagnostic logging to debug while verbose", () => {
    expect(getResolvedLoggerSettings().level).toBe("warn");
    setVerbose(true);
    expect(getResolvedLoggerSettings().level).toBe("debug");
  });
});
