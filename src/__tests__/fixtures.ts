import { writeFileSync } from "node:fs";
import { join } from "node:path";
import { parquetWriteBuffer } from "hyparquet-writer";
import * as XLSX from "xlsx";
import type { Movie, RawRow } from "../data/types";

export function movie(overrides: Partial<Movie> = {}): Movie {
  return {
    genres: [],
    id: "",
    numVotes: null,
    rating: null,
    runtimeMinutes: null,
    startYear: null,
    title: "Untitled",
    titleType: "movie",
    ...overrides,
  };
}

/** Writes an .xlsx workbook with one sheet per entry and returns its path. */
export function writeWorkbook(
  dir: string,
  fileName: string,
  sheets: Record<string, RawRow[]>,
): string {
  const workbook = XLSX.utils.book_new();
  for (const [name, rows] of Object.entries(sheets)) {
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.json_to_sheet(rows), name);
  }
  const filePath = join(dir, fileName);
  writeFileSync(filePath, XLSX.write(workbook, { bookType: "xlsx", type: "buffer" }));
  return filePath;
}

export function writeText(dir: string, fileName: string, content: string): string {
  const filePath = join(dir, fileName);
  writeFileSync(filePath, content);
  return filePath;
}

/** Writes a Parquet file with one column per entry and returns its path. */
export function writeParquet(
  dir: string,
  fileName: string,
  columns: Record<string, string[] | number[] | bigint[]>,
): string {
  const buffer = parquetWriteBuffer({
    columnData: Object.entries(columns).map(([name, data]) => ({ data, name })),
  });
  const filePath = join(dir, fileName);
  writeFileSync(filePath, new Uint8Array(buffer));
  return filePath;
}
