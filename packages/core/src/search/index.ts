export {
  searchIndex,
  collectNodes,
  matchNode,
  toResult,
  type MatchKind,
  type IndexNode,
  type SearchResult,
  type SearchOptions,
} from "./engine.js";
export {
  browseIndex,
  type BrowseKind,
  type BrowseView,
  type BrowseOptions,
} from "./browse.js";
