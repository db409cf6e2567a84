import { NotFoundError, SlotTakenError } from "../../errors/catalog.js";
import { areaForCategory, categoryOfId, sequenceOf, formatIdCode } from "../../codes/parse.js";
import { isSectionName, sectionLabel } from "../../codes/match.js";
import type { Area, Category, IdEntry, JdIndex } from "../../schemas/jd-index.js";

export interface IndexCounts {
  areas: number;
  categories: number;
  ids: number;
}

export interface CategoryLocation {
  areaCode: string;
  area: Area;
  categoryCode: string;
  category: Category;
}

export interface IdLocation extends CategoryLocation {
  idCode: string;
  entry: IdEntry;
}

export function emptyIndex(): JdIndex {
  return { areas: {} };
}

export function countIndex(index: JdIndex): IndexCounts {
  const counts: IndexCounts = { areas: 0, categories: 0, ids: 0 };
  for (const area of Object.values(index.areas)) {
    counts.areas++;
    for (const category of Object.values(area.categories)) {
      counts.categories++;
      counts.ids += Object.keys(category.ids).length;
    }
  }
  return counts;
}

/** Record entries in ascending code order. */
export function sortedEntries<T>(record: Record<string, T>): Array<[string, T]> {
  return Object.entries(record).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

export function findArea(index: JdIndex, areaCode: string): Area | null {
  const area: Area | undefined = index.areas[areaCode];
  return area ?? null;
}

export function findCategory(
  index: JdIndex,
  categoryCode: string,
): CategoryLocation | null {
  const areaCode = areaForCategory(categoryCode);
  const area = findArea(index, areaCode);
  const category: Category | undefined = area?.categories[categoryCode];
  if (!area || !category) return null;
  return { areaCode, area, categoryCode, category };
}

export function findId(index: JdIndex, idCode: string): IdLocation | null {
  const location = findCategory(index, categoryOfId(idCode));
  const entry: IdEntry | undefined = location?.category.ids[idCode];
  if (!location || !entry) return null;
  return { ...location, idCode, entry };
}

/**
 * Returns a new index with one ID added under its category. Used to patch the
 * cache after a folder has been created, without waiting for a rebuild.
 */
export function addIdEntry(index: JdIndex, idCode: string, name: string): JdIndex {
  const location = findCategory(index, categoryOfId(idCode));
  if (!location) {
    throw new NotFoundError({ code: categoryOfId(idCode), level: "category" });
  }
  const { areaCode, area, categoryCode, category } = location;
  if (category.ids[idCode] !== undefined) {
    throw new SlotTakenError({ code: idCode, name: category.ids[idCode].name });
  }

  const entry: IdEntry = isSectionName(name) ? { name, section: true } : { name };

  return {
    ...index,
    areas: {
      ...index.areas,
      [areaCode]: {
        ...area,
        categories: {
          ...area.categories,
          [categoryCode]: {
            ...category,
            ids: { ...category.ids, [idCode]: entry },
          },
        },
      },
    },
  };
}

/**
 * Name of the section divider heading an ID's decade: 11.14 sits under 11.10
 * when 11.10 is a section. IDs 00–09 never have one.
 */
export function sectionFor(category: Category, idCode: string): string | null {
  const decade = Math.floor(sequenceOf(idCode) / 10) * 10;
  if (decade === 0) return null;

  const header: IdEntry | undefined =
    category.ids[formatIdCode(categoryOfId(idCode), decade)];
  return header?.section ? sectionLabel(header.name) : null;
}
