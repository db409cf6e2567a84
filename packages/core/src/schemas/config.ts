import { z } from "zod";

export const DEFAULTS = {
  root: "~/Documents",
  indexPath: "~/.config/jdex/index.json",
  logging: {
    level: "info" as const,
    pretty: false,
  },
  search: {
    maxResults: 50,
  },
};

export const LogLevel = z.enum(["fatal", "error", "warn", "info", "debug"]);

export const ConfigSchema = z.object({
  root: z
    .string()
    .min(1)
    .default(DEFAULTS.root)
    .describe("Root folder of the Johnny Decimal hierarchy"),
  indexPath: z
    .string()
    .min(1)
    .default(DEFAULTS.indexPath)
    .describe("Where the cached index document lives"),
  logging: z
    .object({
      level: LogLevel.default(DEFAULTS.logging.level),
      pretty: z.boolean().default(DEFAULTS.logging.pretty),
    })
    .default(DEFAULTS.logging),
  search: z
    .object({
      maxResults: z
        .number()
        .int()
        .positive()
        .default(DEFAULTS.search.maxResults),
    })
    .default(DEFAULTS.search),
});

export type Config = z.infer<typeof ConfigSchema>;
export type LoggingConfig = Config["logging"];
export type SearchConfig = Config["search"];
