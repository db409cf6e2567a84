import type { Logger } from "pino";
import { loadConfig } from "@jdex/core/config";
import { createLogger } from "@jdex/core/logger";
import { DEFAULTS, type LoggingConfig } from "@jdex/core/schemas";
import { IndexCorruptError, JdexError, isRecoverable } from "@jdex/core/errors";
import type { FolderCreator } from "@jdex/core/creation";
import { USAGE, parseCommandLine } from "./args.js";
import { runCommand } from "./commands.js";

export interface CliDeps {
  stdout: { write(chunk: string): unknown };
  /** Defaults to process.env */
  env?: NodeJS.ProcessEnv;
  createLogger?: (config: LoggingConfig) => Logger;
  creator?: FolderCreator;
}

function hintFor(err: JdexError): string | null {
  if (isRecoverable(err)) return "Run `jdex build` to create the index";
  if (err instanceof IndexCorruptError) return "Run `jdex build` to rebuild the index";
  return null;
}

function errorItem(err: JdexError): Record<string, unknown> {
  const hint = hintFor(err);
  return { ...err.toJSON(), ...(hint !== null && { hint }) };
}

/**
 * Runs one command and writes its JSON result to stdout. Known failures are
 * written as an error item; anything else is logged. Returns the exit code.
 */
export async function runCli(argv: string[], deps: CliDeps): Promise<number> {
  const makeLogger = deps.createLogger ?? createLogger;
  const print = (value: unknown) => {
    deps.stdout.write(JSON.stringify(value, null, 2) + "\n");
  };

  let logger: Logger | undefined;
  try {
    const { command, configPath } = parseCommandLine(argv);
    if (command.name === "help") {
      deps.stdout.write(USAGE);
      return 0;
    }

    const config = await loadConfig({ configPath, env: deps.env });
    logger = makeLogger(config.logging);
    logger.debug({ command: command.name, root: config.root }, "Running command");

    print(await runCommand(command, { config, logger, creator: deps.creator }));
    return 0;
  } catch (err: unknown) {
    if (err instanceof JdexError) {
      print(errorItem(err));
      return 1;
    }
    (logger ?? makeLogger(DEFAULTS.logging)).error({ err }, "Command failed");
    print({
      error: {
        errorCode: "INTERNAL_ERROR",
        message: err instanceof Error ? err.message : String(err),
      },
    });
    return 1;
  }
}
