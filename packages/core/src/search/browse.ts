import { NotFoundError } from "../errors/catalog.js";
import { isAreaCode, isIdCode, categoryOfId } from "../codes/parse.js";
import type { JdIndex } from "../schemas/jd-index.js";
import {
  collectNodes,
  searchIndex,
  toResult,
  type IndexNode,
  type SearchResult,
} from "./engine.js";

export type BrowseKind = "areas" | "area" | "category" | "id" | "search";

export interface BrowseView {
  kind: BrowseKind;
  query: string;
  /** The node being looked into; its parent is where "back" leads */
  parent: SearchResult | null;
  results: SearchResult[];
}

export interface BrowseOptions {
  query?: string;
  root: string;
  limit?: number;
}

const CATEGORY_QUERY_RE = /^(\d{2})\.?$/;

/**
 * Navigation over the index:
 *
 *   ""       → all areas
 *   "10-19"  → categories of that area
 *   "11"     → ids of that category (also "11.")
 *   "11.01"  → that id
 *   text     → ranked search across all levels
 */
export function browseIndex(index: JdIndex, options: BrowseOptions): BrowseView {
  const query = (options.query ?? "").trim();
  const { root } = options;

  const listing = (node: IndexNode): SearchResult => toResult(index, root, node, "listing");
  const find = (level: IndexNode["level"], code: string): IndexNode => {
    const node = collectNodes(index, level).find((n) => n.code === code);
    if (!node) throw new NotFoundError({ code, level });
    return node;
  };

  if (query === "") {
    return {
      kind: "areas",
      query,
      parent: null,
      results: collectNodes(index, "area").map(listing),
    };
  }

  if (isAreaCode(query)) {
    const area = find("area", query);
    return {
      kind: "area",
      query,
      parent: listing(area),
      results: collectNodes(index, "category")
        .filter((node) => node.area === area.code)
        .map(listing),
    };
  }

  const categoryQuery = CATEGORY_QUERY_RE.exec(query);
  if (categoryQuery) {
    const category = find("category", categoryQuery[1]);
    return {
      kind: "category",
      query,
      parent: listing(category),
      results: collectNodes(index, "id")
        .filter((node) => node.category === category.code)
        .map(listing),
    };
  }

  if (isIdCode(query)) {
    const category = find("category", categoryOfId(query));
    const id = find("id", query);
    return {
      kind: "id",
      query,
      parent: listing(category),
      results: [listing(id)],
    };
  }

  return {
    kind: "search",
    query,
    parent: null,
    results: [...searchIndex(index, { query, root, limit: options.limit })],
  };
}
