import { describe, expect, it } from "vitest";

import { resolveConfigPath, resolveDefaultConfigPath, resolveUserPath } from "./paths.js";

const home = () => "/home/tester";

describe("config paths", () => {
  it("prefers XDG_CONFIG_HOME for the default location", () => {
    expect(resolveDefaultConfigPath({ XDG_CONFIG_HOME: "/xdg" }, home)).toBe(
      "/xdg/loglens/config.json5",
    );
    expect(resolveDefaultConfigPath({}, home)).toBe("/home/tester/.config/loglens/config.json5");
  });

  it("expands ~ in user paths", () => {
    expect(resolveUserPath("~/logs/cfg.json5", home)).toBe("/home/tester/logs/cfg.json5");
  });

  it("treats a requested or LOGLENS_CONFIG path as explicit", () => {
    expect(resolveConfigPath("/etc/loglens.json5", {}, home)).toEqual({
      path: "/etc/loglens.json5",
      explicit: true,
    });
    expect(resolveConfigPath(undefined, { LOGLENS_CONFIG: "~/x.json5" }, home)).toEqual({
      path: "/home/tester/x.json5",
      explicit: true,
    });
    expect(resolveConfigPath(undefined, {}, home)).toEqual({
      path: "/home/tester/.config/loglens/config.json5",
      explicit: false,
    });
  });
});
