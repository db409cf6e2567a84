import type { Logger } from "pino";
import type { Config } from "@jdex/core/schemas";
import type { Level } from "@jdex/core/codes";
import { InvalidCodeError } from "@jdex/core/errors";
import { categoryOfId, isIdCode } from "@jdex/core/codes";
import { loadIndex } from "@jdex/core/storage/index";
import { rebuildIndex, resolveCode } from "@jdex/core/storage/hierarchy";
import { browseIndex, searchIndex } from "@jdex/core/search";
import {
  CreationSessionSchema,
  chooseSlot,
  commitCreation,
  listCreationCategories,
  prepareCreation,
  startCreation,
  type CreationSession,
  type FolderCreator,
} from "@jdex/core/creation";
import type { Command } from "./args.js";

export interface CommandContext {
  config: Config;
  logger: Logger;
  creator?: FolderCreator;
}

type NewCommand = Extract<Command, { name: "new" }>;

/** Browsing is never truncated; only text queries are capped. */
function limitFor(config: Config, query: string): number | undefined {
  return query.trim() === "" ? undefined : config.search.maxResults;
}

async function build({ config, logger }: CommandContext) {
  const report = await rebuildIndex({
    root: config.root,
    indexPath: config.indexPath,
    logger,
  });
  return {
    root: report.root,
    indexPath: report.indexPath,
    sizeBytes: report.sizeBytes,
    counts: report.counts,
    skipped: report.skipped,
  };
}

async function browse({ config }: CommandContext, query: string) {
  const index = await loadIndex(config);
  return browseIndex(index, {
    query,
    root: config.root,
    limit: limitFor(config, query),
  });
}

async function search({ config }: CommandContext, query: string, level?: Level) {
  const index = await loadIndex(config);
  const items = searchIndex(index, {
    query,
    level,
    root: config.root,
    limit: limitFor(config, query),
  });
  return { query, level: level ?? null, items: [...items] };
}

async function path({ config }: CommandContext, code: string) {
  const index = await loadIndex(config);
  return { code, path: resolveCode(index, config.root, code) };
}

function readSession(categoryCode: string, proposedSlot: string | undefined): CreationSession {
  const result = CreationSessionSchema.safeParse({ categoryCode, proposedSlot });
  if (!result.success) {
    throw new InvalidCodeError({
      category: categoryCode,
      slot: proposedSlot,
      issues: result.error.issues.map((issue) => issue.message),
    });
  }
  return result.data;
}

/**
 * Creation runs one step per invocation; the session travels through the
 * flags. No --category lists categories, no --slot proposes slots, no name
 * confirms the slot, and a name creates the folder.
 */
async function create({ config, logger, creator }: CommandContext, command: NewCommand) {
  const index = await loadIndex(config);

  let categoryCode = command.category;
  if (categoryCode === undefined && command.slot !== undefined) {
    if (!isIdCode(command.slot)) {
      throw new InvalidCodeError({ code: command.slot, level: "id" });
    }
    categoryCode = categoryOfId(command.slot);
  }
  if (categoryCode === undefined) {
    return {
      step: "category",
      categories: listCreationCategories(index, config.root, command.text),
    };
  }

  const session = readSession(categoryCode, command.slot);
  if (session.proposedSlot === undefined) {
    const { proposal } = startCreation(index, session.categoryCode);
    return { step: "slot", session, proposal };
  }

  const chosen = chooseSlot(index, session, session.proposedSlot);
  if (command.text.trim() === "") {
    return { step: "name", session: chosen };
  }

  const request = prepareCreation(index, config.root, chosen, command.text);
  const result = await commitCreation(request, {
    indexPath: config.indexPath,
    logger,
    creator,
  });
  return { step: "created", code: result.idCode, path: result.path };
}

export async function runCommand(command: Command, context: CommandContext): Promise<unknown> {
  switch (command.name) {
    case "build":
      return build(context);
    case "browse":
      return browse(context, command.query);
    case "search":
      return search(context, command.query, command.level);
    case "path":
      return path(context, command.code);
    case "new":
      return create(context, command);
    case "help":
      return null;
  }
}
