import {
  CategoryFullError,
  InvalidCodeError,
  NotFoundError,
  SlotTakenError,
} from "../errors/catalog.js";
import {
  MAX_SEQUENCE,
  categoryOfId,
  formatIdCode,
  isCategoryCode,
  isIdCode,
  sequenceOf,
} from "../codes/parse.js";
import { sectionLabel } from "../codes/match.js";
import type { Category, IdEntry, JdIndex } from "../schemas/jd-index.js";
import { findCategory, sortedEntries } from "../storage/index/model.js";

export type SlotKind = "append" | "gap" | "section";

export interface SlotCandidate {
  code: string;
  kind: SlotKind;
  /** Section divider the slot falls under, for "section" candidates */
  section?: string;
}

export interface SlotProposal {
  categoryCode: string;
  /** Occupied sequence numbers, ascending; section dividers included */
  used: number[];
  /** Next number after the highest one in use */
  append: string | null;
  /** Smallest free number below the highest one in use */
  gap: string | null;
  /** First free number in each decade headed by a section divider */
  sections: SlotCandidate[];
  /** Every distinct suggestion above, in code order */
  candidates: SlotCandidate[];
}

const SLOT_COUNT = MAX_SEQUENCE + 1;

export function usedSequences(category: Category): number[] {
  return Object.keys(category.ids)
    .map(sequenceOf)
    .sort((a, b) => a - b);
}

function requireCategory(index: JdIndex, categoryCode: string): Category {
  if (!isCategoryCode(categoryCode)) {
    throw new InvalidCodeError({ code: categoryCode, level: "category" });
  }
  const location = findCategory(index, categoryCode);
  if (!location) {
    throw new NotFoundError({ code: categoryCode, level: "category" });
  }
  return location.category;
}

function firstFree(taken: Set<number>, from: number, to: number): number | null {
  for (let n = from; n <= to; n++) {
    if (!taken.has(n)) return n;
  }
  return null;
}

/**
 * Suggests where a new ID could go. Both the slot after the high-water mark
 * and the lowest gap below it are offered; the choice is the user's. XX.00 is
 * only suggested once every other number is taken.
 */
export function proposeSlots(index: JdIndex, categoryCode: string): SlotProposal {
  const category = requireCategory(index, categoryCode);
  const used = usedSequences(category);
  const taken = new Set(used);

  if (taken.size >= SLOT_COUNT) {
    throw new CategoryFullError({ code: categoryCode, used: taken.size });
  }

  const high = used.length > 0 ? used[used.length - 1] : 0;
  const appendAt = high < MAX_SEQUENCE ? high + 1 : null;
  let gapAt = firstFree(taken, 1, high - 1);
  if (appendAt === null && gapAt === null) {
    gapAt = firstFree(taken, 0, 0);
  }

  const sections: SlotCandidate[] = [];
  for (const [idCode, entry] of sortedEntries<IdEntry>(category.ids)) {
    if (!entry.section) continue;
    const start = sequenceOf(idCode);
    const decadeEnd = Math.floor(start / 10) * 10 + 9;
    const free = firstFree(taken, start + 1, decadeEnd);
    if (free !== null) {
      sections.push({
        code: formatIdCode(categoryCode, free),
        kind: "section",
        section: sectionLabel(entry.name),
      });
    }
  }

  const append = appendAt === null ? null : formatIdCode(categoryCode, appendAt);
  const gap = gapAt === null ? null : formatIdCode(categoryCode, gapAt);

  const byCode = new Map<string, SlotCandidate>();
  if (append) byCode.set(append, { code: append, kind: "append" });
  if (gap) byCode.set(gap, { code: gap, kind: "gap" });
  for (const candidate of sections) {
    if (!byCode.has(candidate.code)) byCode.set(candidate.code, candidate);
  }
  const candidates = [...byCode.values()].sort((a, b) =>
    a.code < b.code ? -1 : a.code > b.code ? 1 : 0,
  );

  return { categoryCode, used, append, gap, sections, candidates };
}

/**
 * Checks a chosen code against the index as it is now. Run this against a
 * freshly loaded index right before creating the folder.
 */
export function confirmSlot(index: JdIndex, categoryCode: string, idCode: string): string {
  if (!isIdCode(idCode) || categoryOfId(idCode) !== categoryCode) {
    throw new InvalidCodeError({ code: idCode, category: categoryCode });
  }
  const category = requireCategory(index, categoryCode);

  const existing: IdEntry | undefined = category.ids[idCode];
  if (existing) {
    throw new SlotTakenError({ code: idCode, name: existing.name });
  }
  return idCode;
}
