import { join } from "node:path";
import { homedir } from "node:os";

export const DEFAULT_CONFIG_DIR = join(homedir(), ".config", "jdex");
export const DEFAULT_CONFIG_PATH = join(DEFAULT_CONFIG_DIR, "config.json");

/** Environment variables that override the config file. */
export const ENV_ROOT = "JD_ROOT";
export const ENV_INDEX = "JD_INDEX";
export const ENV_LOG_LEVEL = "JDEX_LOG_LEVEL";
