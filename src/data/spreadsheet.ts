import * as XLSX from "xlsx";
import type { RawRow } from "./types";

interface SheetRows {
  headers: string[];
  rows: RawRow[];
  sheetName: string;
}

/**
 * Picks the requested sheet, or the only sheet of a single-sheet workbook
 * (CSV input always decodes to one sheet named "Sheet1").
 */
export function selectSheetName(
  sheetNames: readonly string[],
  requested: string,
): null | string {
  if (sheetNames.includes(requested)) return requested;
  if (sheetNames.length === 1) return sheetNames[0];
  return null;
}

/** Header cells are matched trimmed, so row keys must be too. */
function trimKeys(row: RawRow): RawRow {
  return Object.fromEntries(
    Object.entries(row).map(([key, value]) => [key.trim(), value]),
  );
}

/**
 * Decodes spreadsheet bytes (xlsx, xls, ods, csv...) into header-keyed rows.
 * Throws when the bytes are not a workbook or the sheet cannot be found.
 */
export function readSpreadsheetRows(
  data: Uint8Array,
  requestedSheet: string,
): SheetRows {
  const workbook = XLSX.read(data, { type: "buffer" });
  const sheetName = selectSheetName(workbook.SheetNames, requestedSheet);

  if (sheetName === null) {
    const available = workbook.SheetNames.join(", ");
    throw new Error(
      `Worksheet named '${requestedSheet}' not found (available: ${available})`,
    );
  }

  const sheet = workbook.Sheets[sheetName];
  const [headerRow = []] = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    blankrows: false,
    header: 1,
  });
  const headers = headerRow
    .filter((cell) => cell !== null && cell !== undefined)
    .map((cell) => String(cell).trim());

  const rows = XLSX.utils
    .sheet_to_json<RawRow>(sheet, { blankrows: false, defval: null })
    .map(trimKeys);

  return { headers, rows, sheetName };
}
