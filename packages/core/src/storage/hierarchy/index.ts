export {
  resolvePath,
  resolveCode,
  locatePath,
  findFolderByCode,
} from './paths.js'

export {
  scanRoot,
  rebuildIndex,
  type ScanOptions,
  type ScanReport,
  type RebuildOptions,
  type RebuildReport,
  type SkippedPath,
  type SkipReason,
} from './scanner.js'
