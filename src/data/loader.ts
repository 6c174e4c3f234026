import { readFile, stat } from "node:fs/promises";
import { extname } from "node:path";
import { errorMessage, LoadError } from "../errors";
import { createLogger, type Logger } from "../logger";
import { readParquetRows, toArrayBuffer } from "./parquet";
import { hasRequiredColumns, toMovies } from "./schema";
import { readSpreadsheetRows } from "./spreadsheet";
import type { MoviesData, RawRow } from "./types";

export interface LoadOptions {
  logger?: Logger;
  sheetName: string;
}

type DatasetFormat = "parquet" | "spreadsheet";

export function detectFormat(filePath: string): DatasetFormat {
  return extname(filePath).toLowerCase() === ".parquet"
    ? "parquet"
    : "spreadsheet";
}

async function readBytes(filePath: string): Promise<Buffer> {
  try {
    const info = await stat(filePath);
    if (!info.isFile()) {
      throw new LoadError(
        "FILE_NOT_FOUND",
        filePath,
        `Not a file: ${filePath}`,
      );
    }
    return await readFile(filePath);
  } catch (err) {
    if (err instanceof LoadError) throw err;
    throw new LoadError(
      "FILE_NOT_FOUND",
      filePath,
      `File not found: ${filePath}`,
      { cause: err },
    );
  }
}

async function decodeRows(
  filePath: string,
  bytes: Buffer,
  format: DatasetFormat,
  sheetName: string,
): Promise<{ headers: string[]; rows: RawRow[] }> {
  try {
    if (format === "parquet") {
      const rows = await readParquetRows(toArrayBuffer(bytes));
      return { headers: rows.length > 0 ? Object.keys(rows[0]) : [], rows };
    }
    return readSpreadsheetRows(bytes, sheetName);
  } catch (err) {
    throw new LoadError(
      "FORMAT_ERROR",
      filePath,
      `Cannot read ${filePath}: ${errorMessage(err)}`,
      { cause: err },
    );
  }
}

/**
 * Loads the movie dataset at `filePath` into memory, one record per row in
 * file order. Parquet files are decoded with hyparquet, everything else as a
 * spreadsheet.
 *
 * @throws LoadError with code FILE_NOT_FOUND or FORMAT_ERROR
 */
export async function loadMovies(
  filePath: string,
  { logger = createLogger(), sheetName }: LoadOptions,
): Promise<MoviesData> {
  const format = detectFormat(filePath);
  const bytes = await readBytes(filePath);
  logger.debug(`Reading ${bytes.byteLength} bytes of ${format} from ${filePath}`);

  const { headers, rows } = await decodeRows(
    filePath,
    bytes,
    format,
    sheetName,
  );

  // An empty Parquet file has no rows to take headers from; nothing to check.
  const headerless = format === "parquet" && rows.length === 0;
  if (!headerless && !hasRequiredColumns(headers)) {
    const found = headers.join(", ") || "none";
    throw new LoadError(
      "FORMAT_ERROR",
      filePath,
      `Missing title or year column in ${filePath} (found: ${found})`,
    );
  }

  const movies = toMovies(rows);
  logger.debug(`Loaded ${movies.length} movies`);
  return movies;
}
