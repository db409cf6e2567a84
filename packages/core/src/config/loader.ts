import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname, join } from "node:path";
import { ConfigSchema, LogLevel, type Config } from "../schemas/config.js";
import {
  DEFAULT_CONFIG_DIR,
  ENV_INDEX,
  ENV_LOG_LEVEL,
  ENV_ROOT,
} from "./defaults.js";
import { resolveConfiguredPath } from "./paths.js";

export interface LoadConfigOptions {
  configPath?: string;
  configDir?: string;
  /** Defaults to process.env */
  env?: NodeJS.ProcessEnv;
}

function configPathFor(options?: LoadConfigOptions): string {
  return (
    options?.configPath ??
    join(options?.configDir ?? DEFAULT_CONFIG_DIR, "config.json")
  );
}

/**
 * Loads config.json, fills in defaults, applies environment overrides and
 * returns a config whose `root` and `indexPath` are absolute.
 */
export async function loadConfig(options?: LoadConfigOptions): Promise<Config> {
  const configPath = configPathFor(options);

  let raw: string | undefined;
  try {
    raw = await readFile(configPath, "utf-8");
  } catch (err: unknown) {
    if (
      err instanceof Error &&
      "code" in err &&
      (err as NodeJS.ErrnoException).code === "ENOENT"
    ) {
      // Missing file, defaults apply
    } else {
      throw err;
    }
  }

  const parsed: unknown = raw !== undefined ? JSON.parse(raw) : {};
  const config = ConfigSchema.parse(parsed);

  // Write back so that defaults are visible and editable in config.json
  const serialized = JSON.stringify(config, null, 2) + "\n";
  if (serialized !== raw) {
    await mkdir(dirname(configPath), { recursive: true });
    await writeFile(configPath, serialized);
  }

  return applyEnvironment(config, options?.env ?? process.env, dirname(configPath));
}

/** Environment values are relative to the working directory, file values to the file. */
function pathSetting(fromEnv: string | undefined, fromFile: string, configDir: string): string {
  return fromEnv ? resolveConfiguredPath(fromEnv) : resolveConfiguredPath(fromFile, configDir);
}

function applyEnvironment(
  config: Config,
  env: NodeJS.ProcessEnv,
  configDir: string,
): Config {
  const level = env[ENV_LOG_LEVEL]
    ? LogLevel.parse(env[ENV_LOG_LEVEL])
    : config.logging.level;

  return {
    ...config,
    root: pathSetting(env[ENV_ROOT], config.root, configDir),
    indexPath: pathSetting(env[ENV_INDEX], config.indexPath, configDir),
    logging: { ...config.logging, level },
  };
}

export async function saveConfig(
  config: Config,
  options?: LoadConfigOptions,
): Promise<void> {
  const configPath = configPathFor(options);
  await mkdir(dirname(configPath), { recursive: true });
  await writeFile(configPath, JSON.stringify(config, null, 2) + "\n", "utf-8");
}
