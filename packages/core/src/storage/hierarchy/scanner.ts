import type { Dirent } from "node:fs";
import { readdir, stat } from "node:fs/promises";
import { join } from "node:path";
import type { Logger } from "pino";
import { NotFoundError, PermissionDeniedError } from "../../errors/catalog.js";
import { categoryInArea, categoryOfId, type Level } from "../../codes/parse.js";
import { isSectionName, malformedAreaCode, matchLevelPattern } from "../../codes/match.js";
import type { Area, Category, IdEntry, JdIndex } from "../../schemas/jd-index.js";
import { countIndex, emptyIndex, type IndexCounts } from "../index/model.js";
import { saveIndex, type IndexStoreOptions } from "../index/store.js";

export type SkipReason =
  | "permission-denied"
  | "invalid-area-range"
  | "category-out-of-range"
  | "id-prefix-mismatch"
  | "duplicate-code";

export interface SkippedPath {
  path: string;
  reason: SkipReason;
  message: string;
}

export interface ScanOptions {
  root: string;
  logger: Logger;
}

export interface ScanReport {
  root: string;
  index: JdIndex;
  counts: IndexCounts;
  skipped: SkippedPath[];
}

export interface RebuildOptions extends ScanOptions, IndexStoreOptions {}

export interface RebuildReport extends ScanReport {
  indexPath: string;
  sizeBytes: number;
}

const UNREADABLE = new Set(["EACCES", "EPERM"]);

class ScanContext {
  readonly skipped: SkippedPath[] = [];

  constructor(readonly logger: Logger) {}

  skip(path: string, reason: SkipReason, message: string): void {
    this.logger.warn({ path, reason }, message);
    this.skipped.push({ path, reason, message });
  }

  /** Child folder names in ascending order, or null when unreadable. */
  async listFolders(dir: string): Promise<string[] | null> {
    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (err: unknown) {
      const code = (err as NodeJS.ErrnoException).code;
      if (code !== undefined && UNREADABLE.has(code)) {
        const denied = new PermissionDeniedError({ path: dir, cause: code });
        this.skip(dir, "permission-denied", denied.message);
        return null;
      }
      if (code === "ENOENT") {
        // Removed while the scan was running
        this.logger.debug({ path: dir }, "Folder vanished during scan");
        return null;
      }
      throw err;
    }

    const folders: string[] = [];
    for (const entry of entries) {
      if (entry.isDirectory()) {
        folders.push(entry.name);
      } else if (entry.isSymbolicLink() && (await isDirectoryLink(join(dir, entry.name)))) {
        folders.push(entry.name);
      }
    }
    return folders.sort();
  }

  /** Matches a folder name against the level expected at this depth. */
  classify(dir: string, name: string, level: Level): string | null {
    const match = matchLevelPattern(name);
    if (match?.level === level) {
      return match.code;
    }
    if (level === "area" && malformedAreaCode(name) !== null) {
      this.skip(join(dir, name), "invalid-area-range", "Area range must span ten numbers");
    } else {
      this.logger.debug({ path: join(dir, name), level }, "Ignoring folder outside the numbering");
    }
    return null;
  }
}

async function isDirectoryLink(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    // Dangling link
    return false;
  }
}

async function assertRoot(root: string): Promise<void> {
  try {
    const stats = await stat(root);
    if (stats.isDirectory()) return;
  } catch (err: unknown) {
    if ((err as NodeJS.ErrnoException).code !== "ENOENT") throw err;
  }
  throw new NotFoundError({ path: root, reason: "root folder does not exist" });
}

/**
 * Walks root → areas → categories → ids and derives a fresh index from the
 * folder names. Folders that break the numbering (a category outside its
 * area, an ID outside its category, a repeated code) and unreadable folders
 * are skipped and reported; they never abort the scan.
 */
export async function scanRoot(options: ScanOptions): Promise<ScanReport> {
  const { root, logger } = options;
  await assertRoot(root);

  const ctx = new ScanContext(logger);
  const index = emptyIndex();

  for (const areaName of (await ctx.listFolders(root)) ?? []) {
    const areaCode = ctx.classify(root, areaName, "area");
    if (areaCode === null) continue;

    const areaPath = join(root, areaName);
    if (index.areas[areaCode] !== undefined) {
      ctx.skip(areaPath, "duplicate-code", `Area ${areaCode} already indexed`);
      continue;
    }
    const area: Area = { name: areaName, categories: {} };
    index.areas[areaCode] = area;
    logger.debug({ path: areaPath, code: areaCode }, "Scanning area");

    for (const categoryName of (await ctx.listFolders(areaPath)) ?? []) {
      const categoryCode = ctx.classify(areaPath, categoryName, "category");
      if (categoryCode === null) continue;

      const categoryPath = join(areaPath, categoryName);
      if (!categoryInArea(categoryCode, areaCode)) {
        ctx.skip(
          categoryPath,
          "category-out-of-range",
          `Category ${categoryCode} is outside area ${areaCode}`,
        );
        continue;
      }
      if (area.categories[categoryCode] !== undefined) {
        ctx.skip(categoryPath, "duplicate-code", `Category ${categoryCode} already indexed`);
        continue;
      }
      const category: Category = { name: categoryName, ids: {} };
      area.categories[categoryCode] = category;

      for (const idName of (await ctx.listFolders(categoryPath)) ?? []) {
        const idCode = ctx.classify(categoryPath, idName, "id");
        if (idCode === null) continue;

        const idPath = join(categoryPath, idName);
        if (categoryOfId(idCode) !== categoryCode) {
          ctx.skip(idPath, "id-prefix-mismatch", `ID ${idCode} is outside category ${categoryCode}`);
          continue;
        }
        if (category.ids[idCode] !== undefined) {
          ctx.skip(idPath, "duplicate-code", `ID ${idCode} already indexed`);
          continue;
        }
        const entry: IdEntry = isSectionName(idName)
          ? { name: idName, section: true }
          : { name: idName };
        category.ids[idCode] = entry;
      }
    }
  }

  return { root, index, counts: countIndex(index), skipped: ctx.skipped };
}

/**
 * Full rebuild: scan, then unconditionally replace the persisted index.
 */
export async function rebuildIndex(options: RebuildOptions): Promise<RebuildReport> {
  const report = await scanRoot(options);
  const saved = await saveIndex(options, report.index);

  options.logger.info(
    { ...report.counts, skipped: report.skipped.length, indexPath: saved.path },
    "Index rebuilt",
  );

  return { ...report, indexPath: saved.path, sizeBytes: saved.sizeBytes };
}
