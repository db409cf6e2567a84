import { LEVELS, type Level } from "../codes/parse.js";
import { sectionLabel, stripCodePrefix } from "../codes/match.js";
import type { JdIndex } from "../schemas/jd-index.js";
import { sectionFor, sortedEntries } from "../storage/index/model.js";
import { resolvePath } from "../storage/hierarchy/paths.js";

/** How a result matched, strongest first. */
export type MatchKind = "code" | "prefix" | "substring" | "words" | "listing";

const MATCH_ORDER: Record<MatchKind, number> = {
  code: 0,
  prefix: 1,
  substring: 2,
  words: 3,
  listing: 4,
};

export interface IndexNode {
  level: Level;
  code: string;
  name: string;
  area: string;
  category?: string;
  id?: string;
  section: boolean;
  /** Names of the ancestors, then the section heading an ID, if any */
  breadcrumb: string[];
}

export interface SearchResult extends IndexNode {
  /** Name for display; section markers removed */
  label: string;
  /** Absolute folder path, null for section dividers */
  path: string | null;
  match: MatchKind;
}

export interface SearchOptions {
  query?: string;
  /** Restrict to one level; all levels otherwise, grouped area → category → id */
  level?: Level;
  root: string;
  /** Stop after this many results */
  limit?: number;
}

/** Every node of one level, in ascending code order. */
export function collectNodes(index: JdIndex, level: Level): IndexNode[] {
  const nodes: IndexNode[] = [];

  for (const [areaCode, area] of sortedEntries(index.areas)) {
    if (level === "area") {
      nodes.push({
        level,
        code: areaCode,
        name: area.name,
        area: areaCode,
        section: false,
        breadcrumb: [],
      });
      continue;
    }

    for (const [categoryCode, category] of sortedEntries(area.categories)) {
      if (level === "category") {
        nodes.push({
          level,
          code: categoryCode,
          name: category.name,
          area: areaCode,
          category: categoryCode,
          section: false,
          breadcrumb: [area.name],
        });
        continue;
      }

      for (const [idCode, entry] of sortedEntries(category.ids)) {
        const section = entry.section === true;
        const heading = section ? null : sectionFor(category, idCode);
        nodes.push({
          level,
          code: idCode,
          name: entry.name,
          area: areaCode,
          category: categoryCode,
          id: idCode,
          section,
          breadcrumb: heading
            ? [area.name, category.name, heading]
            : [area.name, category.name],
        });
      }
    }
  }

  // Categories and ids come out grouped by parent; codes order them globally
  return nodes.sort((a, b) => (a.code < b.code ? -1 : a.code > b.code ? 1 : 0));
}

/**
 * Case-insensitive match of a lowercased query against a node's code and
 * name. Multi-word queries also match when every word appears in the name.
 */
export function matchNode(node: IndexNode, query: string): MatchKind | null {
  const code = node.code.toLowerCase();
  const name = node.name.toLowerCase();

  if (code === query) return "code";

  const bare = stripCodePrefix(code, name);
  if (bare.startsWith(query) || name.startsWith(query)) return "prefix";

  if (name.includes(query) || code.includes(query)) return "substring";

  const words = query.split(/\s+/);
  if (words.length > 1 && words.every((word) => name.includes(word))) {
    return "words";
  }
  return null;
}

export function toResult(
  index: JdIndex,
  root: string,
  node: IndexNode,
  match: MatchKind,
): SearchResult {
  return {
    ...node,
    label: node.section ? sectionLabel(node.name) : node.name,
    path: node.section
      ? null
      : resolvePath(index, root, { area: node.area, category: node.category, id: node.id }),
    match,
  };
}

/**
 * Ranked search over the cached hierarchy. Results are produced lazily, one
 * level at a time. An empty query lists every node (section dividers
 * included); a text query never matches section dividers.
 */
export function* searchIndex(
  index: JdIndex,
  options: SearchOptions,
): Generator<SearchResult, void, undefined> {
  const query = (options.query ?? "").trim().toLowerCase();
  const levels = options.level ? [options.level] : LEVELS;
  const limit = options.limit ?? Number.POSITIVE_INFINITY;

  let emitted = 0;
  for (const level of levels) {
    if (emitted >= limit) return;

    const nodes = collectNodes(index, level);
    const matches: Array<{ node: IndexNode; match: MatchKind }> = [];
    for (const node of nodes) {
      if (query === "") {
        matches.push({ node, match: "listing" });
        continue;
      }
      if (node.section) continue;
      const match = matchNode(node, query);
      if (match) matches.push({ node, match });
    }

    // Stable: equal ranks keep ascending code order
    matches.sort((a, b) => MATCH_ORDER[a.match] - MATCH_ORDER[b.match]);

    for (const { node, match } of matches) {
      yield toResult(index, options.root, node, match);
      emitted++;
      if (emitted >= limit) return;
    }
  }
}
