import { describe, expect, it } from "vitest";

import { readXdgEnvironment, resolveHomeDir } from "./environment";

describe("readXdgEnvironment", () => {
  it("keeps recognized variables and drops the rest", () => {
    expect(
      readXdgEnvironment({
        XDG_CONFIG_HOME: "/conf",
        XDG_DATA_DIRS: "",
        HOME: "/home/t",
        PATH: "/usr/bin",
      }),
    ).toEqual({ XDG_CONFIG_HOME: "/conf", XDG_DATA_DIRS: "", HOME: "/home/t" });
  });

  it("leaves unset variables undefined", () => {
    const environment = readXdgEnvironment({});
    expect(environment.XDG_RUNTIME_DIR).toBeUndefined();
    expect(environment.HOME).toBeUndefined();
  });
});

describe("resolveHomeDir", () => {
  it("reads HOME on posix platforms", () => {
    expect(resolveHomeDir({ HOME: "/home/t", USERPROFILE: "C:\\Users\\t" }, "linux")).toBe(
      "/home/t",
    );
    expect(resolveHomeDir({ HOME: "/Users/t" }, "darwin")).toBe("/Users/t");
  });

  it("reads USERPROFILE on win32", () => {
    expect(resolveHomeDir({ HOME: "/home/t", USERPROFILE: "C:\\Users\\t" }, "win32")).toBe(
      "C:\\Users\\t",
    );
  });

  it("returns null for a missing or empty home", () => {
    expect(resolveHomeDir({}, "linux")).toBeNull();
    expect(resolveHomeDir({ HOME: "" }, "linux")).toBeNull();
    expect(resolveHomeDir({ HOME: "/home/t" }, "win32")).toBeNull();
  });
});
