import { describe, expect, it } from "vitest";
import { homedir } from "node:os";
import { resolve } from "node:path";
import { DEFAULT_ROOT_PATH } from "./defaults.js";
import { expandHomePath, resolveRootPath, resolveUnderRoot } from "./paths.js";

describe("expandHomePath", () => {
  it('expands "~" to the current home directory', () => {
    expect(expandHomePath("~")).toBe(homedir());
  });

  it('expands "~/" prefixes to the current home directory', () => {
    expect(expandHomePath("~/blob-tier-migrator/audit")).toBe(
      resolve(homedir(), "blob-tier-migrator/audit"),
    );
  });

  it("leaves non-home paths unchanged", () => {
    expect(expandHomePath("/tmp/sandbox")).toBe("/tmp/sandbox");
  });
});

describe("resolveRootPath", () => {
  it("returns default root path when no input is provided", () => {
    expect(resolveRootPath()).toBe(resolve(DEFAULT_ROOT_PATH));
  });

  it("passes through absolute paths", () => {
    expect(resolveRootPath("/tmp/migrator")).toBe("/tmp/migrator");
  });

  it("resolves relative paths to absolute", () => {
    expect(resolveRootPath("relative/migrator")).toBe(
      resolve("relative/migrator"),
    );
  });
});

describe("resolveUnderRoot", () => {
  it("joins relative paths onto the root", () => {
    expect(resolveUnderRoot("/srv/migrator", "audit")).toBe("/srv/migrator/audit");
  });

  it("keeps absolute and home paths", () => {
    expect(resolveUnderRoot("/srv/migrator", "/var/audit")).toBe("/var/audit");
    expect(resolveUnderRoot("/srv/migrator", "~/audit")).toBe(
      resolve(homedir(), "audit"),
    );
  });
});
