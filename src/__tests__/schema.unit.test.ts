import { describe, expect, it } from "vitest";
import { hasRequiredColumns, toMovie } from "../data/schema";

describe("toMovie", () => {
  it("should read IMDb style columns", () => {
    expect(
      toMovie({
        genres: "Drama,Romance",
        id: "tt0000001",
        numVotes: 1520,
        originalTitle: "Alpha",
        primaryTitle: "Alpha (US)",
        rating: 7.4,
        runtimeMinutes: 118,
        startYear: 1999,
        titleType: "movie",
      }),
    ).toEqual({
      genres: ["Drama", "Romance"],
      id: "tt0000001",
      numVotes: 1520,
      rating: 7.4,
      runtimeMinutes: 118,
      startYear: 1999,
      title: "Alpha",
      titleType: "movie",
    });
  });

  it("should accept the short column names", () => {
    const result = toMovie({
      genre: "Comedy",
      rating: "6.5",
      runtime: "92",
      title: "Beta",
      votes: "40",
      year: "2004",
    });

    expect(result).toMatchObject({
      genres: ["Comedy"],
      numVotes: 40,
      rating: 6.5,
      runtimeMinutes: 92,
      startYear: 2004,
      title: "Beta",
    });
  });

  it("should turn unparsable numbers into null", () => {
    const result = toMovie({
      numVotes: "",
      rating: "n/a",
      runtimeMinutes: "\\N",
      startYear: null,
      title: "Gamma",
    });

    expect(result.numVotes).toBeNull();
    expect(result.rating).toBeNull();
    expect(result.runtimeMinutes).toBeNull();
    expect(result.startYear).toBeNull();
  });

  it("should convert bigint columns and truncate integer fields", () => {
    const result = toMovie({ numVotes: 12n, startYear: 1999.7, title: "Delta" });

    expect(result.numVotes).toBe(12);
    expect(result.startYear).toBe(1999);
  });

  it("should fall back to the primary title when the original is blank", () => {
    expect(toMovie({ originalTitle: null, primaryTitle: "Epsilon" }).title).toBe(
      "Epsilon",
    );
  });

  it("should drop blank genre entries", () => {
    expect(toMovie({ genres: " Drama , ,Crime", title: "Zeta" }).genres).toEqual([
      "Drama",
      "Crime",
    ]);
  });

  it("should default missing text fields to empty strings", () => {
    const result = toMovie({});

    expect(result.id).toBe("");
    expect(result.title).toBe("");
    expect(result.titleType).toBe("");
    expect(result.genres).toEqual([]);
  });
});

describe("hasRequiredColumns", () => {
  it("should require a title and a year column under any alias", () => {
    expect(hasRequiredColumns(["primaryTitle", "startYear"])).toBe(true);
    expect(hasRequiredColumns(["title", "year", "rating"])).toBe(true);
    expect(hasRequiredColumns(["title", "rating"])).toBe(false);
    expect(hasRequiredColumns([])).toBe(false);
  });
});
