import { mean } from "../utils";
import type {
  GenreStats,
  Movie,
  RatedMovie,
  ReportResult,
  TopRatedMovie,
  YearRatingExtremes,
  YearReport,
} from "./types";

/** Number of movies in the votes report. */
export const TOP_RATED_LIMIT = 10;

/** Longest likes bar, in units. */
export const LIKES_BAR_WIDTH = 80;

function isRated(movie: Movie): movie is RatedMovie {
  return movie.rating !== null;
}

function ratedMoviesOfYear(movies: readonly Movie[], year: number): RatedMovie[] {
  return movies.filter(isRated).filter((movie) => movie.startYear === year);
}

function noMoviesForYear(year: number): { message: string; type: "empty" } {
  return { message: `No movies found for year ${year}`, type: "empty" };
}

/**
 * Highest and lowest rated movies of a year.
 *
 * Equal ratings are settled by vote count (more votes wins on both ends),
 * then by position in the dataset.
 */
export function yearRatingExtremes(
  movies: readonly Movie[],
  year: number,
): ReportResult<YearRatingExtremes> {
  const rated = ratedMoviesOfYear(movies, year);

  if (rated.length === 0) {
    return noMoviesForYear(year);
  }

  let highest = rated[0];
  let lowest = rated[0];

  for (const movie of rated.slice(1)) {
    const votes = movie.numVotes ?? 0;

    if (
      movie.rating > highest.rating ||
      (movie.rating === highest.rating && votes > (highest.numVotes ?? 0))
    ) {
      highest = movie;
    }
    if (
      movie.rating < lowest.rating ||
      (movie.rating === lowest.rating && votes > (lowest.numVotes ?? 0))
    ) {
      lowest = movie;
    }
  }

  return { type: "ok", value: { highest, lowest } };
}

/**
 * Mean runtime of the year's movies that have one.
 */
export function averageRuntimeForYear(
  movies: readonly Movie[],
  year: number,
): ReportResult<number> {
  const runtimes = movies
    .filter((movie) => movie.startYear === year)
    .flatMap((movie) =>
      movie.runtimeMinutes === null ? [] : [movie.runtimeMinutes],
    );

  if (runtimes.length === 0) {
    return noMoviesForYear(year);
  }

  return { type: "ok", value: mean(runtimes) };
}

/**
 * The -r report: rating extremes plus the average runtime of the same rated
 * movies. A year with rated movies but no runtimes reports an average of 0.
 */
export function yearReport(
  movies: readonly Movie[],
  year: number,
): ReportResult<YearReport> {
  const extremes = yearRatingExtremes(movies, year);

  if (extremes.type === "empty") {
    return extremes;
  }

  const runtime = averageRuntimeForYear(ratedMoviesOfYear(movies, year), year);
  const avgRuntime = runtime.type === "ok" ? runtime.value : 0;

  return { type: "ok", value: { ...extremes.value, avgRuntime } };
}

/**
 * Count and mean rating of the rated movies listing `genreName` among their
 * genres. Matching ignores case and surrounding whitespace.
 */
export function genreStats(
  movies: readonly Movie[],
  genreName: string,
): ReportResult<GenreStats> {
  const wanted = genreName.trim().toLowerCase();

  const genreMovies = movies
    .filter(isRated)
    .filter((movie) =>
      movie.genres.some((genre) => genre.toLowerCase() === wanted),
    );

  if (genreMovies.length === 0) {
    return { message: `No movies found for genre '${genreName}'`, type: "empty" };
  }

  return {
    type: "ok",
    value: {
      avgRating: mean(genreMovies.map((movie) => movie.rating)),
      genre: genreName,
      movieCount: genreMovies.length,
    },
  };
}

/**
 * Scales a vote count onto the likes bar. `referenceVotes` is the vote count
 * of the top-ranked movie, which fills at most `LIKES_BAR_WIDTH` units; other
 * movies are capped at the same width and any voted movie gets at least one.
 */
export function likesFor(votes: number, referenceVotes: number): number {
  if (votes <= 0) return 0;
  const divisor = Math.max(1, Math.ceil(referenceVotes / LIKES_BAR_WIDTH));
  return Math.min(LIKES_BAR_WIDTH, Math.ceil(votes / divisor));
}

/**
 * Best rated movies of a year that received votes, ordered by rating then
 * vote count (both descending), with dataset order breaking full ties.
 */
export function topRatedByYear(
  movies: readonly Movie[],
  year: number,
  limit = TOP_RATED_LIMIT,
): ReportResult<TopRatedMovie[]> {
  const voted = ratedMoviesOfYear(movies, year).filter(
    (movie) => (movie.numVotes ?? 0) > 0,
  );

  if (voted.length === 0) {
    return noMoviesForYear(year);
  }

  const top = [...voted]
    .sort(
      (a, b) => b.rating - a.rating || (b.numVotes ?? 0) - (a.numVotes ?? 0),
    )
    .slice(0, limit);

  const referenceVotes = top[0].numVotes ?? 0;

  return {
    type: "ok",
    value: top.map((movie) => {
      const votes = movie.numVotes ?? 0;
      return { likes: likesFor(votes, referenceVotes), movie, votes };
    }),
  };
}
