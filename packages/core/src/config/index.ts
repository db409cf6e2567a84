export {
  DEFAULT_CONFIG_DIR,
  DEFAULT_CONFIG_PATH,
  ENV_ROOT,
  ENV_INDEX,
  ENV_LOG_LEVEL,
} from "./defaults.js";
export { loadConfig, saveConfig, type LoadConfigOptions } from "./loader.js";
export { expandHomePath, resolveConfiguredPath } from "./paths.js";
