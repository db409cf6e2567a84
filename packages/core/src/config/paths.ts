import { homedir } from "node:os";
import { resolve } from "node:path";

const HOME_PREFIX = /^~(?=$|[\\/])/;

/** Replaces a leading "~" (alone or before a separator) with `home`. */
export function expandHomePath(input: string, home: string = homedir()): string {
  return HOME_PREFIX.test(input) ? home + input.slice(1) : input;
}

/**
 * Absolute form of a configured path. Relative paths are taken from `base`,
 * which for values read from config.json is the directory of that file.
 */
export function resolveConfiguredPath(input: string, base: string = process.cwd()): string {
  return resolve(base, expandHomePath(input));
}
