import { parseArgs } from "node:util";
import { z } from "zod";
import type { Level } from "@jdex/core/codes";
import { UsageError } from "./errors.js";

export type Command =
  | { name: "build" }
  | { name: "browse"; query: string }
  | { name: "search"; query: string; level?: Level }
  | { name: "path"; code: string }
  | { name: "new"; category?: string; slot?: string; text: string }
  | { name: "help" };

export interface CommandLine {
  command: Command;
  configPath?: string;
}

export const USAGE = `Usage: jdex <command> [options]

Commands:
  build                         Rescan the root folder and rewrite the index
  browse [query]                List areas, an area's categories, a category's IDs, or search
  search [query] [--level L]    Ranked search, optionally restricted to area|category|id
  path <code>                   Print the folder of an area, category or ID
  new [--category NN] [--slot NN.NN] [name...]
                                Create an ID folder, one step per call

Options:
  -c, --config <path>           Config file (default ~/.config/jdex/config.json)
  -h, --help                    Show this help
`;

const LevelOption = z.enum(["area", "category", "id"]);

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        config: { type: "string", short: "c" },
        level: { type: "string", short: "l" },
        category: { type: "string" },
        slot: { type: "string" },
        help: { type: "boolean", short: "h" },
      },
      allowPositionals: true,
      strict: true,
    });
  } catch (err: unknown) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
}

function parseLevel(value: string): Level {
  const result = LevelOption.safeParse(value);
  if (!result.success) {
    throw new UsageError(`Unknown level: ${value}`, {
      option: "level",
      allowed: LevelOption.options,
    });
  }
  return result.data;
}

export function parseCommandLine(argv: string[]): CommandLine {
  const { values, positionals } = readArgs(argv);
  const [name = "help", ...rest] = positionals;
  const configPath = values.config;

  if (values.help) {
    return { command: { name: "help" }, configPath };
  }
  if (values.level !== undefined && name !== "search") {
    throw new UsageError("--level only applies to search", { command: name });
  }
  if ((values.category !== undefined || values.slot !== undefined) && name !== "new") {
    throw new UsageError("--category and --slot only apply to new", { command: name });
  }

  const text = rest.join(" ");
  switch (name) {
    case "build":
      if (rest.length > 0) {
        throw new UsageError("build takes no arguments", { arguments: rest });
      }
      return { command: { name }, configPath };
    case "browse":
      return { command: { name, query: text }, configPath };
    case "search": {
      const command: Command =
        values.level === undefined
          ? { name, query: text }
          : { name, query: text, level: parseLevel(values.level) };
      return { command, configPath };
    }
    case "path":
      if (rest.length !== 1) {
        throw new UsageError("path takes exactly one code", { arguments: rest });
      }
      return { command: { name, code: rest[0] }, configPath };
    case "new":
      return {
        command: { name, category: values.category, slot: values.slot, text },
        configPath,
      };
    case "help":
      return { command: { name }, configPath };
    default:
      throw new UsageError(`Unknown command: ${name}`, { command: name });
  }
}
