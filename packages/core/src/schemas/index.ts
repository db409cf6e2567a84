export {
  DEFAULTS,
  LogLevel,
  ConfigSchema,
  type Config,
  type LoggingConfig,
  type SearchConfig,
} from "./config.js";
export {
  AreaCodeSchema,
  CategoryCodeSchema,
  IdCodeSchema,
  IdEntrySchema,
  CategorySchema,
  AreaSchema,
  JdIndexSchema,
  type IdEntry,
  type Category,
  type Area,
  type JdIndex,
} from "./jd-index.js";
