import { Command, CommanderError, InvalidArgumentError } from "commander";
import { type Config, loadConfig } from "./config";
import {
  averageRuntimeForYear,
  genreStats,
  topRatedByYear,
  yearReport,
} from "./data/data";
import { loadMovies } from "./data/loader";
import type { MoviesData } from "./data/types";
import { ConfigError, LoadError } from "./errors";
import { createLogger } from "./logger";
import {
  renderGenreReport,
  renderRuntimeReport,
  renderTopRated,
  renderYearReport,
} from "./reports";

export const ExitCode = {
  ConfigError: 2,
  LoadError: 3,
  Ok: 0,
  Usage: 1,
} as const;

export interface CliOptions {
  file?: string;
  genreReport?: string;
  runtimeReport?: number;
  sheet?: string;
  votesReport?: number;
  yearReport?: number;
}

export interface CliIO {
  stderr: (line: string) => void;
  stdout: (line: string) => void;
}

const processIO: CliIO = {
  stderr: (line) => process.stderr.write(`${line}\n`),
  stdout: (line) => process.stdout.write(`${line}\n`),
};

export function parseYear(value: string): number {
  const year = Number(value);
  if (!/^-?\d+$/.test(value.trim()) || !Number.isSafeInteger(year)) {
    throw new InvalidArgumentError("Year must be an integer.");
  }
  return year;
}

export function createProgram(io: CliIO = processIO): Command {
  return new Command()
    .name("movie-reports")
    .description("Generate movie reports from dataset.")
    .version("0.1.0")
    .option(
      "-r, --year-report <year>",
      "highest/lowest rating and average runtime for the given year",
      parseYear,
    )
    .option(
      "-g, --genre-report <genre>",
      "number of movies and average rating for the given genre",
    )
    .option(
      "-v, --votes-report <year>",
      "top 10 rated movies of the given year, votes shown as likes",
      parseYear,
    )
    .option(
      "-m, --runtime-report <year>",
      "average runtime for the given year",
      parseYear,
    )
    .option("-f, --file <path>", "dataset file (overrides MOVIES_FILE_PATH)")
    .option("-s, --sheet <name>", "worksheet name (overrides MOVIES_SHEET_NAME)")
    .exitOverride()
    .configureOutput({
      writeErr: (text) => io.stderr(text.trimEnd()),
      writeOut: (text) => io.stdout(text.trimEnd()),
    });
}

/**
 * Runs every requested report against the loaded dataset, in a fixed order.
 */
export function printReports(
  movies: MoviesData,
  options: CliOptions,
  print: (line: string) => void,
): void {
  const sections: string[][] = [];

  if (options.yearReport !== undefined) {
    sections.push(renderYearReport(yearReport(movies, options.yearReport)));
  }
  if (options.runtimeReport !== undefined) {
    sections.push(
      renderRuntimeReport(averageRuntimeForYear(movies, options.runtimeReport)),
    );
  }
  if (options.genreReport !== undefined) {
    sections.push(renderGenreReport(genreStats(movies, options.genreReport)));
  }
  if (options.votesReport !== undefined) {
    sections.push(renderTopRated(topRatedByYear(movies, options.votesReport)));
  }

  sections.flat().forEach((line) => print(line));
}

/**
 * Parses `args` (without the node and script entries), loads the dataset and
 * prints the requested reports. Resolves to the process exit code.
 */
export async function run(
  args: readonly string[],
  env: NodeJS.ProcessEnv,
  io: CliIO = processIO,
): Promise<number> {
  const program = createProgram(io);

  try {
    program.parse([...args], { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    throw err;
  }

  const options = program.opts<CliOptions>();

  if (
    options.yearReport === undefined &&
    options.genreReport === undefined &&
    options.votesReport === undefined &&
    options.runtimeReport === undefined
  ) {
    io.stderr("At least one report option must be provided. Use -h for help.");
    return ExitCode.Usage;
  }

  let config: Config;
  try {
    config = loadConfig(env, { file: options.file, sheet: options.sheet });
  } catch (err) {
    if (err instanceof ConfigError) {
      io.stderr(`Invalid configuration: ${err.message}`);
      return ExitCode.ConfigError;
    }
    throw err;
  }

  const logger = createLogger(config.logLevel, io.stderr);

  let movies: MoviesData;
  try {
    movies = await loadMovies(config.filePath, {
      logger,
      sheetName: config.sheetName,
    });
  } catch (err) {
    if (err instanceof LoadError) {
      logger.debug(`Load failed with ${err.code} for ${err.path}`);
      io.stderr(`Failed to load data: ${err.message}`);
      return ExitCode.LoadError;
    }
    throw err;
  }

  printReports(movies, options, io.stdout);
  return ExitCode.Ok;
}
