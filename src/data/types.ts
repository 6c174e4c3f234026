export interface Movie {
  genres: string[];
  id: string;
  numVotes: null | number;
  rating: null | number;
  runtimeMinutes: null | number;
  startYear: null | number;
  title: string;
  titleType: string;
}

/** A movie known to carry a rating. */
export type RatedMovie = Movie & { rating: number };

export type MoviesData = Movie[];

export type RawRow = Record<string, unknown>;

export type ReportResult<T> =
  | { message: string; type: "empty" }
  | { type: "ok"; value: T };

export interface YearRatingExtremes {
  highest: RatedMovie;
  lowest: RatedMovie;
}

export interface YearReport extends YearRatingExtremes {
  avgRuntime: number;
}

export interface GenreStats {
  avgRating: number;
  genre: string;
  movieCount: number;
}

export interface TopRatedMovie {
  likes: number;
  movie: RatedMovie;
  votes: number;
}
