/**
 * Fixtures for tests that need an index or a folder tree on disk.
 */

import { mkdir, mkdtemp } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import pino, { type Logger } from "pino";
import type { JdIndex } from "../schemas/jd-index.js";

/**
 * Two areas: "10-19 Life admin" with categories 11 and 12, and "20-29 Work"
 * with an empty category 21. Category 11 has a section divider at 11.10.
 */
export function sampleIndex(): JdIndex {
  return {
    areas: {
      "10-19": {
        name: "10-19 Life admin",
        categories: {
          "11": {
            name: "11 Me",
            ids: {
              "11.01": { name: "11.01 Health Records" },
              "11.02": { name: "11.02 Other Healthcare" },
              "11.05": { name: "11.05 Passport" },
              "11.10": { name: "11.10 ■ Travel", section: true },
              "11.11": { name: "11.11 Visas" },
            },
          },
          "12": {
            name: "12 House",
            ids: {
              "12.01": { name: "12.01 Insurance" },
            },
          },
        },
      },
      "20-29": {
        name: "20-29 Work",
        categories: {
          "21": { name: "21 Clients", ids: {} },
        },
      },
    },
  };
}

/** A small index: one area, two categories, three ids. */
export function smallIndex(): JdIndex {
  return {
    areas: {
      "10-19": {
        name: "10-19 Life admin",
        categories: {
          "12": {
            name: "12 House",
            ids: { "12.01": { name: "12.01 Insurance" } },
          },
          "11": {
            name: "11 Me",
            ids: {
              "11.02": { name: "11.02 Bank" },
              "11.01": { name: "11.01 Inbox" },
            },
          },
        },
      },
    },
  };
}

export async function createTempDir(prefix: string): Promise<string> {
  return mkdtemp(join(tmpdir(), `${prefix}-`));
}

/** Creates each relative folder path (and its parents) under root. */
export async function makeFolders(root: string, paths: string[]): Promise<void> {
  for (const path of paths) {
    await mkdir(join(root, path), { recursive: true });
  }
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
