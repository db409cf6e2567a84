import { join, sep } from "node:path";
import { z } from "zod";
import { CategoryFullError, InvalidCodeError, InvalidNameError } from "../errors/catalog.js";
import { categoryOfId } from "../codes/parse.js";
import { folderNameFor } from "../codes/match.js";
import { CategoryCodeSchema, IdCodeSchema, type JdIndex } from "../schemas/jd-index.js";
import { resolvePath } from "../storage/hierarchy/paths.js";
import { collectNodes } from "../search/engine.js";
import { confirmSlot, proposeSlots, type SlotProposal } from "../allocator/slots.js";

/**
 * State carried from one creation step to the next. Each step may run in a
 * separate process, so the session is plain data that can be serialized.
 */
export const CreationSessionSchema = z
  .object({
    categoryCode: CategoryCodeSchema,
    proposedSlot: IdCodeSchema.optional(),
  })
  .refine(
    (s) => s.proposedSlot === undefined || categoryOfId(s.proposedSlot) === s.categoryCode,
    { message: "Slot must belong to the chosen category", path: ["proposedSlot"] },
  );

export type CreationSession = z.infer<typeof CreationSessionSchema>;

export interface CategoryChoice {
  code: string;
  name: string;
  area: string;
  path: string;
  /** Suggested slot, null when the category is full */
  next: string | null;
  full: boolean;
}

export interface CreationRequest {
  categoryCode: string;
  idCode: string;
  folderName: string;
  /** The category folder */
  parentPath: string;
  path: string;
}

/** Step 1: categories a new ID can go into, filtered by name. */
export function listCreationCategories(
  index: JdIndex,
  root: string,
  query = "",
): CategoryChoice[] {
  const needle = query.trim().toLowerCase();

  return collectNodes(index, "category")
    .filter((node) => node.name.toLowerCase().includes(needle))
    .map((node) => {
      let next: string | null;
      try {
        const proposal = proposeSlots(index, node.code);
        next = proposal.append ?? proposal.gap;
      } catch (err: unknown) {
        if (!(err instanceof CategoryFullError)) throw err;
        next = null;
      }
      return {
        code: node.code,
        name: node.name,
        area: node.area,
        path: resolvePath(index, root, { category: node.code }),
        next,
        full: next === null,
      };
    });
}

/** Step 2: open a session for a category and propose slots. */
export function startCreation(
  index: JdIndex,
  categoryCode: string,
): { session: CreationSession; proposal: SlotProposal } {
  const proposal = proposeSlots(index, categoryCode);
  return { session: { categoryCode }, proposal };
}

/** Step 2, continued: record the slot the user picked. */
export function chooseSlot(
  index: JdIndex,
  session: CreationSession,
  idCode: string,
): CreationSession {
  confirmSlot(index, session.categoryCode, idCode);
  return { ...session, proposedSlot: idCode };
}

/** Step 3: turn the session and a folder name into a concrete request. */
export function prepareCreation(
  index: JdIndex,
  root: string,
  session: CreationSession,
  name: string,
): CreationRequest {
  const idCode = session.proposedSlot;
  if (idCode === undefined) {
    throw new InvalidCodeError({ category: session.categoryCode, reason: "no slot chosen" });
  }
  if (name.includes(sep) || name.includes("/")) {
    throw new InvalidNameError({ code: idCode, name, reason: "name contains a path separator" });
  }

  const folderName = folderNameFor(idCode, name);
  const parentPath = resolvePath(index, root, { category: session.categoryCode });

  return {
    categoryCode: session.categoryCode,
    idCode,
    folderName,
    parentPath,
    path: join(parentPath, folderName),
  };
}
