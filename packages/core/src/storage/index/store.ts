import { mkdir, readFile, writeFile, rename, stat } from 'node:fs/promises'
import { dirname } from 'node:path'
import { randomUUID } from 'node:crypto'
import { IndexCorruptError, IndexMissingError } from '../../errors/catalog.js'
import { JdIndexSchema, type JdIndex } from '../../schemas/jd-index.js'

export interface IndexStoreOptions {
  indexPath: string
}

export interface SaveResult {
  path: string
  sizeBytes: number
}

/**
 * Read and validate the persisted index.
 * Throws IndexMissingError when there is no file, IndexCorruptError when it
 * cannot be used as-is. Neither case is repaired here.
 */
export async function loadIndex(options: IndexStoreOptions): Promise<JdIndex> {
  const path = options.indexPath

  let content: string
  try {
    content = await readFile(path, 'utf-8')
  } catch (err: unknown) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new IndexMissingError({ path })
    }
    throw err
  }

  if (content.trim() === '') {
    throw new IndexCorruptError({ path, reason: 'empty file' })
  }

  let raw: unknown
  try {
    raw = JSON.parse(content)
  } catch (err: unknown) {
    throw new IndexCorruptError({
      path,
      reason: err instanceof Error ? err.message : String(err),
    })
  }

  const result = JdIndexSchema.safeParse(raw)
  if (!result.success) {
    throw new IndexCorruptError({
      path,
      issues: result.error.issues.map(
        (issue) => `${issue.path.map(String).join('.')}: ${issue.message}`,
      ),
    })
  }
  return result.data
}

/** Like loadIndex, but a missing index is `null` rather than an error. */
export async function loadIndexOrNull(options: IndexStoreOptions): Promise<JdIndex | null> {
  try {
    return await loadIndex(options)
  } catch (err: unknown) {
    if (err instanceof IndexMissingError) return null
    throw err
  }
}

/** Atomic write: validate, mkdir -p, write temp file, rename */
export async function saveIndex(
  options: IndexStoreOptions,
  index: JdIndex,
): Promise<SaveResult> {
  const validated = JdIndexSchema.parse(index)
  const path = options.indexPath

  await mkdir(dirname(path), { recursive: true })

  const content = JSON.stringify(validated, null, 2) + '\n'
  const tempPath = path + '.tmp.' + randomUUID()

  await writeFile(tempPath, content, 'utf-8')
  await rename(tempPath, path)

  const stats = await stat(path)
  return { path, sizeBytes: stats.size }
}
