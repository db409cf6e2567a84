import { InvalidCodeError } from "../errors/catalog.js";

export type Level = "area" | "category" | "id";

/** Fixed presentation order of levels. */
export const LEVELS: readonly Level[] = ["area", "category", "id"];

// "10-19": both ends share the tens digit, so an area spans exactly ten numbers
const AREA_CODE_RE = /^(\d)0-(?:\1)9$/;
const CATEGORY_CODE_RE = /^\d{2}$/;
const ID_CODE_RE = /^\d{2}\.\d{2}$/;

export const MAX_SEQUENCE = 99;

export interface CodeChain {
  area?: string;
  category?: string;
  id?: string;
}

export interface ParsedCode {
  level: Level;
  code: string;
  area: string;
  category?: string;
  id?: string;
}

export function isAreaCode(code: string): boolean {
  return AREA_CODE_RE.test(code);
}

export function isCategoryCode(code: string): boolean {
  return CATEGORY_CODE_RE.test(code);
}

export function isIdCode(code: string): boolean {
  return ID_CODE_RE.test(code);
}

export function levelOf(code: string): Level | null {
  if (isAreaCode(code)) return "area";
  if (isCategoryCode(code)) return "category";
  if (isIdCode(code)) return "id";
  return null;
}

/** "11" → "10-19" */
export function areaForCategory(categoryCode: string): string {
  const tens = categoryCode[0];
  return `${tens}0-${tens}9`;
}

export function categoryInArea(categoryCode: string, areaCode: string): boolean {
  return areaForCategory(categoryCode) === areaCode;
}

/** "11.04" → "11" */
export function categoryOfId(idCode: string): string {
  return idCode.slice(0, 2);
}

/** "11.04" → 4 */
export function sequenceOf(idCode: string): number {
  return Number(idCode.slice(3));
}

/** ("11", 4) → "11.04" */
export function formatIdCode(categoryCode: string, sequence: number): string {
  return `${categoryCode}.${String(sequence).padStart(2, "0")}`;
}

/**
 * Expands a single code into its full ancestor chain. The area of a category
 * follows from its tens digit, so every code names exactly one chain.
 */
export function parseCode(input: string): ParsedCode {
  const code = input.trim();

  if (isAreaCode(code)) {
    return { level: "area", code, area: code };
  }
  if (isCategoryCode(code)) {
    return { level: "category", code, area: areaForCategory(code), category: code };
  }
  if (isIdCode(code)) {
    const category = categoryOfId(code);
    return {
      level: "id",
      code,
      area: areaForCategory(category),
      category,
      id: code,
    };
  }

  throw new InvalidCodeError({ code: input });
}

/**
 * Completes a partial chain from its deepest code and rejects chains whose
 * codes disagree with each other.
 */
export function completeChain(chain: CodeChain): ParsedCode {
  const deepest = chain.id ?? chain.category ?? chain.area;
  if (deepest === undefined) {
    throw new InvalidCodeError({ chain, reason: "no code given" });
  }

  const parsed = parseCode(deepest);
  const expectedLevel: Level =
    chain.id !== undefined ? "id" : chain.category !== undefined ? "category" : "area";
  if (parsed.level !== expectedLevel) {
    throw new InvalidCodeError({ chain, reason: `expected ${expectedLevel} code` });
  }
  if (chain.category !== undefined && chain.category !== parsed.category) {
    throw new InvalidCodeError({ chain, reason: "category does not match id" });
  }
  if (chain.area !== undefined && chain.area !== parsed.area) {
    throw new InvalidCodeError({ chain, reason: "area does not contain category" });
  }

  return parsed;
}
