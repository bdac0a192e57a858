import path from "node:path";
import { describe, expect, it } from "vitest";
import {
  expandHomePrefix,
  resolveConfigPath,
  resolveRequiredHomeDir,
  resolveStateDir,
  resolveUserPath,
} from "./paths.js";

const home = () => "/home/tester";

describe("resolveStateDir", () => {
  it("defaults to ~/.restamp", () => {
    expect(resolveStateDir({}, home)).toBe(path.join("/home/tester", ".restamp"));
  });

  it("honors RESTAMP_STATE_DIR with a tilde", () => {
    expect(resolveStateDir({ RESTAMP_STATE_DIR: "~/state" }, home)).toBe(
      path.resolve("/home/tester", "state"),
    );
  });

  it("honors RESTAMP_HOME", () => {
    expect(resolveStateDir({ RESTAMP_HOME: "/srv/restamp" }, home)).toBe(
      path.join("/srv/restamp", ".restamp"),
    );
  });
});

describe("resolveConfigPath", () => {
  it("defaults to restamp.json in the state dir", () => {
    expect(resolveConfigPath({}, home)).toBe(
      path.join("/home/tester", ".restamp", "restamp.json"),
    );
  });

  it("follows RESTAMP_STATE_DIR", () => {
    expect(resolveConfigPath({ RESTAMP_STATE_DIR: "/var/lib/restamp" }, home)).toBe(
      path.join("/var/lib/restamp", "restamp.json"),
    );
  });

  it("prefers RESTAMP_CONFIG_PATH", () => {
    expect(
      resolveConfigPath(
        { RESTAMP_CONFIG_PATH: " /etc/restamp.json5 ", RESTAMP_STATE_DIR: "/ignored" },
        home,
      ),
    ).toBe("/etc/restamp.json5");
  });
});

describe("path helpers", () => {
  it("expands a bare tilde and tilde paths only", () => {
    expect(expandHomePrefix("~", home)).toBe("/home/tester");
    expect(expandHomePrefix("~/Pictures", home)).toBe(path.join("/home/tester", "Pictures"));
    expect(expandHomePrefix("~other/x", home)).toBe("~other/x");
  });

  it("returns an empty string for blank input", () => {
    expect(resolveUserPath("   ", {}, home)).toBe("");
  });

  it("throws when no home directory is known", () => {
    expect(() => resolveRequiredHomeDir({}, () => "")).toThrow(
      "Unable to resolve home directory; set RESTAMP_HOME",
    );
  });
});
