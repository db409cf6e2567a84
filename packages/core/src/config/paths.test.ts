import { describe, expect, it } from "vitest";
import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { expandHomePath, resolveConfiguredPath } from "./paths.js";

describe("expandHomePath", () => {
  it("expands a bare tilde", () => {
    expect(expandHomePath("~", "/home/jd")).toBe("/home/jd");
  });

  it("expands a tilde before a separator", () => {
    expect(expandHomePath("~/Documents", "/home/jd")).toBe("/home/jd/Documents");
  });

  it("defaults to the current user's home", () => {
    expect(expandHomePath("~/Documents")).toBe(homedir() + "/Documents");
  });

  it("leaves other tildes alone", () => {
    expect(expandHomePath("~jd/Documents", "/home/jd")).toBe("~jd/Documents");
    expect(expandHomePath("/tmp/~/jd", "/home/jd")).toBe("/tmp/~/jd");
  });
});

describe("resolveConfiguredPath", () => {
  it("keeps absolute paths", () => {
    expect(resolveConfiguredPath("/srv/jd", "/etc/jdex")).toBe("/srv/jd");
  });

  it("resolves relative paths against the base", () => {
    expect(resolveConfiguredPath("index.json", "/etc/jdex")).toBe("/etc/jdex/index.json");
  });

  it("resolves relative paths against the working directory by default", () => {
    expect(resolveConfiguredPath("jd")).toBe(resolve("jd"));
  });

  it("expands the home directory before resolving", () => {
    expect(resolveConfiguredPath("~/.config/jdex/index.json", "/etc/jdex")).toBe(
      join(homedir(), ".config/jdex/index.json"),
    );
  });
});
