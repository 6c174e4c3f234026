import { z } from "zod";
import type { Movie, RawRow } from "./types";

/**
 * Header names accepted for each field, in order of preference.
 * IMDb dumps use the camelCase names, hand-made sheets the short ones.
 */
const columnAliases = {
  genres: ["genres", "genre"],
  id: ["id", "tconst"],
  numVotes: ["numVotes", "votes"],
  rating: ["rating", "averageRating"],
  runtimeMinutes: ["runtimeMinutes", "runtime"],
  startYear: ["startYear", "year"],
  title: ["originalTitle", "primaryTitle", "title"],
  titleType: ["titleType"],
} as const satisfies Record<keyof Movie, readonly string[]>;

const requiredFields = [
  "title",
  "startYear",
] as const satisfies readonly (keyof Movie)[];

/** Unparsable values become null rather than failing the row. */
function toNumber(value: unknown): null | number {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "bigint") {
    return Number(value);
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (trimmed === "") return null;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function toText(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "string") return value.trim();
  if (
    typeof value === "number" ||
    typeof value === "bigint" ||
    typeof value === "boolean"
  ) {
    return String(value);
  }
  return "";
}

const numeric = z.unknown().transform(toNumber);

const integer = numeric.transform((value) =>
  value === null ? null : Math.trunc(value),
);

const text = z.unknown().transform(toText);

const genreList = z
  .unknown()
  .transform((value) =>
    typeof value === "string"
      ? value
          .split(",")
          .map((genre) => genre.trim())
          .filter((genre) => genre.length > 0)
      : [],
  );

const titleCandidates = z
  .array(z.unknown())
  .transform((values) => values.map(toText).find((title) => title !== "") ?? "");

const movieRowSchema = z.object({
  genres: genreList,
  id: text,
  numVotes: integer,
  rating: numeric,
  runtimeMinutes: numeric,
  startYear: integer,
  title: titleCandidates,
  titleType: text,
});

function firstPresent(row: RawRow, names: readonly string[]): unknown {
  for (const name of names) {
    if (name in row) return row[name];
  }
  return undefined;
}

/**
 * Whether the header row names a column for every field the reports need.
 */
export function hasRequiredColumns(headers: readonly string[]): boolean {
  const present = new Set(headers);
  return requiredFields.every((field) =>
    columnAliases[field].some((name) => present.has(name)),
  );
}

/**
 * Coerces one raw row (as decoded from the file) into a movie record.
 */
export function toMovie(row: RawRow): Movie {
  return movieRowSchema.parse({
    genres: firstPresent(row, columnAliases.genres),
    id: firstPresent(row, columnAliases.id),
    numVotes: firstPresent(row, columnAliases.numVotes),
    rating: firstPresent(row, columnAliases.rating),
    runtimeMinutes: firstPresent(row, columnAliases.runtimeMinutes),
    startYear: firstPresent(row, columnAliases.startYear),
    title: columnAliases.title.map((name) => row[name]),
    titleType: firstPresent(row, columnAliases.titleType),
  });
}

export function toMovies(rows: readonly RawRow[]): Movie[] {
  return rows.map(toMovie);
}
