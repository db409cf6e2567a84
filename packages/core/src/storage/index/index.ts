export {
  loadIndex,
  loadIndexOrNull,
  saveIndex,
  type IndexStoreOptions,
  type SaveResult,
} from './store.js'

export {
  emptyIndex,
  countIndex,
  sortedEntries,
  findArea,
  findCategory,
  findId,
  addIdEntry,
  sectionFor,
  type IndexCounts,
  type CategoryLocation,
  type IdLocation,
} from './model.js'
