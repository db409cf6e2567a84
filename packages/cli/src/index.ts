export { runCli, type CliDeps } from "./run.js";
export { runCommand, type CommandContext } from "./commands.js";
export { parseCommandLine, USAGE, type Command, type CommandLine } from "./args.js";
export { UsageError } from "./errors.js";
