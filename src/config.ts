import { z } from "zod";
import { ConfigError } from "./errors";
import { type LogLevel, logLevels } from "./logger";

export const DEFAULT_FILE_PATH = "movies.xlsx";
export const DEFAULT_SHEET_NAME = "title.basics";

/** Blank environment values count as unset. */
const optionalText = z.preprocess(
  (value) =>
    typeof value === "string" && value.trim() === "" ? undefined : value,
  z.string().trim().optional(),
);

const envSchema = z.object({
  MOVIES_FILE_PATH: optionalText,
  MOVIES_LOG_LEVEL: z.preprocess(
    (value) =>
      typeof value === "string" && value.trim() !== ""
        ? value.trim().toLowerCase()
        : undefined,
    z.enum(logLevels).default("warn"),
  ),
  MOVIES_SHEET_NAME: optionalText,
});

export interface Config {
  filePath: string;
  logLevel: LogLevel;
  sheetName: string;
}

export interface ConfigOverrides {
  file?: string;
  sheet?: string;
}

/**
 * Resolves the run configuration: command-line flags first, then the
 * environment, then the defaults.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv,
  overrides: ConfigOverrides = {},
): Config {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`${issue.path.join(".")}: ${issue.message}`);
  }

  const { MOVIES_FILE_PATH, MOVIES_LOG_LEVEL, MOVIES_SHEET_NAME } =
    parsed.data;

  return {
    filePath: overrides.file ?? MOVIES_FILE_PATH ?? DEFAULT_FILE_PATH,
    logLevel: MOVIES_LOG_LEVEL,
    sheetName: overrides.sheet ?? MOVIES_SHEET_NAME ?? DEFAULT_SHEET_NAME,
  };
}
