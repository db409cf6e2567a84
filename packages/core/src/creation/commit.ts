import { mkdir } from "node:fs/promises";
import { basename, dirname } from "node:path";
import type { Logger } from "pino";
import { NotFoundError, SlotTakenError } from "../errors/catalog.js";
import type { JdIndex } from "../schemas/jd-index.js";
import { addIdEntry } from "../storage/index/model.js";
import { loadIndex, saveIndex, type IndexStoreOptions } from "../storage/index/store.js";
import { findFolderByCode } from "../storage/hierarchy/paths.js";
import { confirmSlot } from "../allocator/slots.js";
import type { CreationRequest } from "./session.js";

/** Makes the directory for a new ID. */
export interface FolderCreator {
  createFolder(path: string): Promise<void>;
}

export const fsFolderCreator: FolderCreator = {
  async createFolder(path) {
    try {
      await mkdir(path);
    } catch (err: unknown) {
      if ((err as NodeJS.ErrnoException).code === "EEXIST") {
        throw new SlotTakenError({ path, reason: "folder already exists" });
      }
      throw err;
    }
  },
};

export interface CommitOptions extends IndexStoreOptions {
  logger: Logger;
  creator?: FolderCreator;
}

export interface CommitResult {
  idCode: string;
  path: string;
  index: JdIndex;
}

/**
 * Final step of creation. The slot is checked again against the index as it
 * is on disk now, since the one the session was built from may be stale.
 * After the folder exists the new ID is added to the cached index.
 */
export async function commitCreation(
  request: CreationRequest,
  options: CommitOptions,
): Promise<CommitResult> {
  const { logger } = options;
  const creator = options.creator ?? fsFolderCreator;

  const fresh = await loadIndex(options);
  confirmSlot(fresh, request.categoryCode, request.idCode);

  const onDisk = await findFolderByCode(dirname(request.parentPath), request.categoryCode);
  if (onDisk === null || basename(onDisk) !== basename(request.parentPath)) {
    throw new NotFoundError({
      path: request.parentPath,
      code: request.categoryCode,
      reason: "category folder is missing on disk, rebuild the index",
    });
  }

  await creator.createFolder(request.path);

  const index = addIdEntry(fresh, request.idCode, request.folderName);
  await saveIndex(options, index);

  logger.info({ code: request.idCode, path: request.path }, "Created folder");
  return { idCode: request.idCode, path: request.path, index };
}
