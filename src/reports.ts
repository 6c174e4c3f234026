import type {
  GenreStats,
  ReportResult,
  TopRatedMovie,
  YearReport,
} from "./data/types";
import { formatDecimal } from "./utils";

export const LIKE_SYMBOL = "😀";

function render<T>(
  result: ReportResult<T>,
  renderValue: (value: T) => string[],
): string[] {
  switch (result.type) {
    case "empty":
      return [result.message];
    case "ok":
      return renderValue(result.value);
  }
}

export function renderYearReport(result: ReportResult<YearReport>): string[] {
  return render(result, ({ avgRuntime, highest, lowest }) => [
    `Highest rating: ${formatDecimal(highest.rating)} - ${highest.title}`,
    `Lowest rating: ${formatDecimal(lowest.rating)} - ${lowest.title}`,
    `Average mean minutes: ${formatDecimal(avgRuntime)}`,
  ]);
}

export function renderRuntimeReport(result: ReportResult<number>): string[] {
  return render(result, (avgRuntime) => [
    `Average mean minutes: ${formatDecimal(avgRuntime)}`,
  ]);
}

export function renderGenreReport(result: ReportResult<GenreStats>): string[] {
  return render(result, ({ avgRating, movieCount }) => [
    `Movies found: ${movieCount}`,
    `Average mean rating: ${formatDecimal(avgRating)}`,
  ]);
}

/** Two lines per movie: the title, then its likes bar and vote count. */
export function renderTopRated(result: ReportResult<TopRatedMovie[]>): string[] {
  return render(result, (entries) =>
    entries.flatMap(({ likes, movie, votes }) => [
      movie.title,
      `${LIKE_SYMBOL.repeat(likes)} ${votes}`,
    ]),
  );
}
