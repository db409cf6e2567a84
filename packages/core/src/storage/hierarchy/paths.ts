import type { Dirent } from "node:fs";
import { readdir } from "node:fs/promises";
import { isAbsolute, join, relative, resolve, sep } from "node:path";
import { NotFoundError } from "../../errors/catalog.js";
import {
  LEVELS,
  categoryInArea,
  categoryOfId,
  completeChain,
  parseCode,
  type CodeChain,
} from "../../codes/parse.js";
import { folderNameFor, hasCodePrefix, matchLevelPattern } from "../../codes/match.js";
import type { Category, IdEntry, JdIndex } from "../../schemas/jd-index.js";
import { findArea } from "../index/model.js";

/**
 * Absolute folder path of the deepest code in the chain. Paths are derived
 * from the index names alone; the filesystem is not consulted.
 *
 * Throws NotFoundError when any level is missing from the index, or when the
 * id is a section divider (dividers have no folder of their own).
 */
export function resolvePath(index: JdIndex, root: string, chain: CodeChain): string {
  const parsed = completeChain(chain);

  const area = findArea(index, parsed.area);
  if (!area) {
    throw new NotFoundError({ code: parsed.area, level: "area" });
  }
  const segments = [folderNameFor(parsed.area, area.name)];

  if (parsed.category !== undefined) {
    const category: Category | undefined = area.categories[parsed.category];
    if (!category) {
      throw new NotFoundError({ code: parsed.category, level: "category" });
    }
    segments.push(folderNameFor(parsed.category, category.name));

    if (parsed.id !== undefined) {
      const entry: IdEntry | undefined = category.ids[parsed.id];
      if (!entry) {
        throw new NotFoundError({ code: parsed.id, level: "id" });
      }
      if (entry.section) {
        throw new NotFoundError({
          code: parsed.id,
          level: "id",
          reason: "section dividers have no folder",
        });
      }
      segments.push(folderNameFor(parsed.id, entry.name));
    }
  }

  return join(root, ...segments);
}

/** resolvePath for a single area, category or id code. */
export function resolveCode(index: JdIndex, root: string, code: string): string {
  const { area, category, id } = parseCode(code);
  return resolvePath(index, root, { area, category, id });
}

/**
 * The inverse of resolvePath: which JD codes a path inside the root belongs
 * to. Anything below an ID folder belongs to that ID. Returns null for paths
 * outside the root or outside the numbering.
 */
export function locatePath(root: string, path: string): CodeChain | null {
  const rel = relative(resolve(root), resolve(path));
  if (rel === "" || rel.startsWith("..") || isAbsolute(rel)) {
    return null;
  }

  const chain: CodeChain = {};
  const segments = rel.split(sep).slice(0, LEVELS.length);
  for (const [depth, segment] of segments.entries()) {
    const match = matchLevelPattern(segment);
    if (!match || match.level !== LEVELS[depth]) break;

    if (match.level === "area") {
      chain.area = match.code;
    } else if (match.level === "category") {
      if (chain.area === undefined || !categoryInArea(match.code, chain.area)) break;
      chain.category = match.code;
    } else {
      if (chain.category !== categoryOfId(match.code)) break;
      chain.id = match.code;
    }
  }

  return chain.area === undefined ? null : chain;
}

/**
 * Finds the child folder of `parentDir` whose name starts with `code` and a
 * space. Returns null when the parent does not exist or nothing matches.
 */
export async function findFolderByCode(
  parentDir: string,
  code: string,
): Promise<string | null> {
  let entries: Dirent[];
  try {
    entries = await readdir(parentDir, { withFileTypes: true });
  } catch (err: unknown) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      return null;
    }
    throw err;
  }

  const match = entries
    .filter((entry) => entry.isDirectory() && hasCodePrefix(code, entry.name))
    .map((entry) => entry.name)
    .sort()[0];

  return match === undefined ? null : join(parentDir, match);
}
