import { InvalidNameError } from "../errors/catalog.js";
import { isAreaCode, type Level } from "./parse.js";

const AREA_FOLDER_RE = /^(\d0-\d9)\s+(.*)$/;
const CATEGORY_FOLDER_RE = /^(\d{2})\s+(.*)$/;
const ID_FOLDER_RE = /^(\d{2}\.\d{2})\s+(.*)$/;

/** Marks an ID folder as a section divider, e.g. "11.10 ■ Finances". */
export const SECTION_MARKER = "■";
const SECTION_MARKER_RE = /■\s*/g;

export interface LevelMatch {
  level: Level;
  code: string;
  /** Folder name without its code prefix */
  label: string;
}

/**
 * Classifies a folder name by its numeric prefix. Area folders whose range is
 * not ten contiguous numbers ("10-29 Misc") do not match; see
 * {@link malformedAreaCode}.
 */
export function matchLevelPattern(folderName: string): LevelMatch | null {
  const area = AREA_FOLDER_RE.exec(folderName);
  if (area) {
    return isAreaCode(area[1])
      ? { level: "area", code: area[1], label: area[2] }
      : null;
  }

  const id = ID_FOLDER_RE.exec(folderName);
  if (id) {
    return { level: "id", code: id[1], label: id[2] };
  }

  const category = CATEGORY_FOLDER_RE.exec(folderName);
  if (category) {
    return { level: "category", code: category[1], label: category[2] };
  }

  return null;
}

/** Returns the range of a folder that looks like an area but spans the wrong numbers. */
export function malformedAreaCode(folderName: string): string | null {
  const area = AREA_FOLDER_RE.exec(folderName);
  return area && !isAreaCode(area[1]) ? area[1] : null;
}

export function hasCodePrefix(code: string, name: string): boolean {
  return name.startsWith(code) && /^\s/.test(name.slice(code.length));
}

/** "11.01 Inbox" → "Inbox"; names without the prefix are returned as-is. */
export function stripCodePrefix(code: string, name: string): string {
  return hasCodePrefix(code, name) ? name.slice(code.length).trimStart() : name;
}

/**
 * On-disk folder name for a code: "<code> <name>". A name that already carries
 * the code prefix is returned unchanged, so applying this twice is a no-op.
 */
export function folderNameFor(code: string, name: string): string {
  if (hasCodePrefix(code, name)) {
    return name;
  }
  if (!isFolderNameFor(code, name)) {
    throw new InvalidNameError({ code, name });
  }
  return `${code} ${name.trim()}`;
}

/** Whether {@link folderNameFor} can turn `name` into a folder name for `code`. */
export function isFolderNameFor(code: string, name: string): boolean {
  if (hasCodePrefix(code, name)) return true;
  const trimmed = name.trim();
  return trimmed !== "" && trimmed !== code;
}

export function isSectionName(name: string): boolean {
  return name.includes(SECTION_MARKER);
}

/** Display form of a section divider name. */
export function sectionLabel(name: string): string {
  return name.replace(SECTION_MARKER_RE, "").trim();
}
