export {
  LEVELS,
  MAX_SEQUENCE,
  isAreaCode,
  isCategoryCode,
  isIdCode,
  levelOf,
  areaForCategory,
  categoryInArea,
  categoryOfId,
  sequenceOf,
  formatIdCode,
  parseCode,
  completeChain,
  type Level,
  type CodeChain,
  type ParsedCode,
} from "./parse.js";

export {
  SECTION_MARKER,
  matchLevelPattern,
  malformedAreaCode,
  hasCodePrefix,
  stripCodePrefix,
  folderNameFor,
  isFolderNameFor,
  isSectionName,
  sectionLabel,
  type LevelMatch,
} from "./match.js";
