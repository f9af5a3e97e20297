import type { DatabaseConnection, SqlParam } from '../../types/database.js';
import type { MediaFields, MediaType } from '../../types/models.js';
import type { TMDBMovie, TMDBTvShow } from '../../types/providers/tmdb.js';

/**
 * Columns written when a media row is created or refreshed
 */
export const MEDIA_WRITE_COLUMNS = [
  'tmdb_id',
  'media_type',
  'title',
  'original_title',
  'overview',
  'poster_path',
  'backdrop_path',
  'release_date',
  'popularity',
  'vote_average',
  'vote_count',
  'original_language',
  'runtime',
  'budget',
  'revenue',
  'number_of_seasons',
  'number_of_episodes',
  'episode_run_time',
  'status',
  'first_air_date',
  'last_air_date',
] as const;

export type MediaWriteColumn = (typeof MEDIA_WRITE_COLUMNS)[number];

/**
 * Columns a TMDB refresh may overwrite; identity columns stay fixed
 */
export const MEDIA_REFRESH_COLUMNS: readonly MediaWriteColumn[] = MEDIA_WRITE_COLUMNS.filter(
  column => column !== 'tmdb_id' && column !== 'media_type'
);

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Normalize a YYYY-MM-DD string; anything else (including impossible
 * calendar dates such as 2023-02-30) becomes null.
 */
export function parseReleaseDate(value: string | null | undefined): string | null {
  if (!value) {
    return null;
  }
  const match = DATE_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }

  const [, year, month, day] = match;
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  if (
    date.getUTCFullYear() !== Number(year) ||
    date.getUTCMonth() !== Number(month) - 1 ||
    date.getUTCDate() !== Number(day)
  ) {
    return null;
  }
  return `${year}-${month}-${day}`;
}

export function buildMovieFields(movie: TMDBMovie): MediaFields {
  return {
    tmdbId: movie.id,
    mediaType: 'MOVIE',
    title: movie.title,
    originalTitle: movie.original_title ?? '',
    overview: movie.overview ?? '',
    posterPath: movie.poster_path ?? '',
    backdropPath: movie.backdrop_path ?? '',
    releaseDate: parseReleaseDate(movie.release_date),
    popularity: movie.popularity ?? 0,
    voteAverage: movie.vote_average ?? 0,
    voteCount: movie.vote_count ?? 0,
    originalLanguage: movie.original_language ?? '',
    runtime: movie.runtime ?? null,
    budget: movie.budget ?? 0,
    revenue: movie.revenue ?? 0,
  };
}

/**
 * Shows keep their first air date as the release date as well
 */
export function buildTvShowFields(show: TMDBTvShow): MediaFields {
  const firstAirDate = parseReleaseDate(show.first_air_date);
  const [episodeRunTime] = show.episode_run_time ?? [];

  return {
    tmdbId: show.id,
    mediaType: 'TV_SHOW',
    title: show.name,
    originalTitle: show.original_name ?? '',
    overview: show.overview ?? '',
    posterPath: show.poster_path ?? '',
    backdropPath: show.backdrop_path ?? '',
    releaseDate: firstAirDate,
    popularity: show.popularity ?? 0,
    voteAverage: show.vote_average ?? 0,
    voteCount: show.vote_count ?? 0,
    originalLanguage: show.original_language ?? '',
    numberOfSeasons: show.number_of_seasons ?? 0,
    numberOfEpisodes: show.number_of_episodes ?? 0,
    episodeRunTime: episodeRunTime ?? null,
    status: show.status ?? '',
    firstAirDate,
    lastAirDate: parseReleaseDate(show.last_air_date),
  };
}

export interface ManualMediaFields {
  title: string;
  mediaType: MediaType;
  originalTitle?: string | undefined;
  originalLanguage?: string | undefined;
  overview?: string | undefined;
  releaseDate?: string | null | undefined;
}

/**
 * Fields for a user-entered record. No TMDB id; numeric metadata is zero.
 */
export function buildManualFields(input: ManualMediaFields): MediaFields {
  const base = {
    tmdbId: null,
    title: input.title,
    originalTitle: input.originalTitle ?? '',
    overview: input.overview ?? '',
    posterPath: '',
    backdropPath: '',
    releaseDate: parseReleaseDate(input.releaseDate),
    popularity: 0,
    voteAverage: 0,
    voteCount: 0,
    originalLanguage: input.originalLanguage ?? '',
  };

  if (input.mediaType === 'MOVIE') {
    return { ...base, mediaType: 'MOVIE', runtime: null, budget: null, revenue: null };
  }

  return {
    ...base,
    mediaType: 'TV_SHOW',
    numberOfSeasons: null,
    numberOfEpisodes: null,
    episodeRunTime: null,
    status: null,
    firstAirDate: base.releaseDate,
    lastAirDate: null,
  };
}

/**
 * Flatten fields to column values; columns of the other media type are NULL
 */
export function toColumnValues(fields: MediaFields): Record<MediaWriteColumn, SqlParam> {
  const common = {
    tmdb_id: fields.tmdbId,
    media_type: fields.mediaType,
    title: fields.title,
    original_title: fields.originalTitle,
    overview: fields.overview,
    poster_path: fields.posterPath,
    backdrop_path: fields.backdropPath,
    release_date: fields.releaseDate,
    popularity: fields.popularity,
    vote_average: fields.voteAverage,
    vote_count: fields.voteCount,
    original_language: fields.originalLanguage,
  };

  if (fields.mediaType === 'MOVIE') {
    return {
      ...common,
      runtime: fields.runtime,
      budget: fields.budget,
      revenue: fields.revenue,
      number_of_seasons: null,
      number_of_episodes: null,
      episode_run_time: null,
      status: null,
      first_air_date: null,
      last_air_date: null,
    };
  }

  return {
    ...common,
    runtime: null,
    budget: null,
    revenue: null,
    number_of_seasons: fields.numberOfSeasons,
    number_of_episodes: fields.numberOfEpisodes,
    episode_run_time: fields.episodeRunTime,
    status: fields.status,
    first_air_date: fields.firstAirDate,
    last_air_date: fields.lastAirDate,
  };
}

/**
 * Insert a media row on the given connection and return its id
 */
export async function insertMedia(conn: DatabaseConnection, fields: MediaFields): Promise<number> {
  const values = toColumnValues(fields);
  const placeholders = MEDIA_WRITE_COLUMNS.map(() => '?').join(', ');

  const result = await conn.execute(
    `INSERT INTO media (${MEDIA_WRITE_COLUMNS.join(', ')}) VALUES (${placeholders})`,
    MEDIA_WRITE_COLUMNS.map(column => values[column])
  );
  return Number(result.insertId);
}
