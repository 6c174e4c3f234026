import { parquetReadObjects } from "hyparquet";
import { compressors } from "hyparquet-compressors";
import type { RawRow } from "./types";

/**
 * Decodes a whole Parquet file into row objects keyed by column name.
 * INT64 columns come back as bigint; the row schema coerces them.
 */
export async function readParquetRows(buf: ArrayBuffer): Promise<RawRow[]> {
  return await parquetReadObjects({ compressors, file: buf });
}

/** Copies a Node buffer view into a standalone ArrayBuffer. */
export function toArrayBuffer(data: Uint8Array): ArrayBuffer {
  const out = new ArrayBuffer(data.byteLength);
  new Uint8Array(out).set(data);
  return out;
}
