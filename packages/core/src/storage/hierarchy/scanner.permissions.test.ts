import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { rm } from "node:fs/promises";
import { join } from "node:path";
import { createTempDir, makeFolders, silentLogger } from "../../test-utils/jd-tree.js";
import { scanRoot } from "./scanner.js";

// Permission bits are ignored when tests run as root, so unreadable folders
// are simulated at the readdir boundary.
const { denied } = vi.hoisted(() => ({ denied: new Set<string>() }));

vi.mock("node:fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs/promises")>();
  const readdir = actual.readdir as (...args: unknown[]) => Promise<unknown>;
  return {
    ...actual,
    readdir: async (...args: unknown[]) => {
      const path = String(args[0]);
      if (denied.has(path)) {
        throw Object.assign(new Error(`EACCES: permission denied, scandir '${path}'`), {
          code: "EACCES",
        });
      }
      return readdir(...args);
    },
  };
});

describe("scanRoot with unreadable folders", () => {
  let root: string;
  const logger = silentLogger();

  beforeEach(async () => {
    root = await createTempDir("scanner-permissions-test");
    await makeFolders(root, [
      "10-19 Life admin/11 Me/11.01 Inbox",
      "10-19 Life admin/12 House/12.01 Insurance",
      "20-29 Work/21 Clients/21.01 Acme",
    ]);
  });

  afterEach(async () => {
    denied.clear();
    await rm(root, { recursive: true, force: true });
  });

  it("skips an unreadable category and keeps scanning", async () => {
    const locked = join(root, "10-19 Life admin", "11 Me");
    denied.add(locked);

    const report = await scanRoot({ root, logger });

    expect(report.skipped).toEqual([
      { path: locked, reason: "permission-denied", message: "Permission denied" },
    ]);
    // The folder itself is known, its contents are not
    expect(report.index.areas["10-19"].categories["11"].ids).toEqual({});
    expect(report.index.areas["10-19"].categories["12"].ids).toEqual({
      "12.01": { name: "12.01 Insurance" },
    });
    expect(report.counts).toEqual({ areas: 2, categories: 3, ids: 2 });
  });

  it("returns an empty index when the root itself is unreadable", async () => {
    denied.add(root);

    const report = await scanRoot({ root, logger });

    expect(report.index).toEqual({ areas: {} });
    expect(report.skipped.map((s) => s.reason)).toEqual(["permission-denied"]);
  });
});
