/**
 * TMDB API Response Types
 * Based on TMDB API v3 documentation
 * @see https://developer.themoviedb.org/reference/intro/getting-started
 *
 * Only the fields this application reads are declared.
 */

// ============================================
// Common Types
// ============================================

export interface TMDBImage {
  aspect_ratio: number;
  file_path: string;
  height: number;
  width: number;
  iso_639_1: string | null;
  vote_average: number;
  vote_count: number;
}

export interface TMDBImages {
  id: number;
  backdrops: TMDBImage[];
  posters: TMDBImage[];
  logos?: TMDBImage[];
}

export interface TMDBGenre {
  id: number;
  name: string;
}

export interface TMDBExternalIds {
  id?: number;
  imdb_id?: string | null;
  tvdb_id?: number | null;
  wikidata_id?: string | null;
}

// ============================================
// Cast & Crew
// ============================================

export interface TMDBCastMember {
  id: number;
  name: string;
  character?: string;
  profile_path: string | null;
  order?: number;
}

export interface TMDBCrewMember {
  id: number;
  name: string;
  department?: string;
  job?: string;
  profile_path?: string | null;
}

export interface TMDBCredits {
  id?: number;
  cast: TMDBCastMember[];
  crew: TMDBCrewMember[];
}

// ============================================
// Movies
// ============================================

export interface TMDBMovieSearchResult {
  id: number;
  title: string;
  original_title?: string;
  overview?: string;
  poster_path: string | null;
  backdrop_path: string | null;
  release_date?: string;
  popularity?: number;
  vote_average?: number;
  vote_count?: number;
  original_language?: string;
  genre_ids?: number[];
}

export interface TMDBMovie {
  id: number;
  imdb_id?: string | null;
  title: string;
  original_title?: string;
  overview?: string | null;
  poster_path?: string | null;
  backdrop_path?: string | null;
  release_date?: string;
  popularity?: number;
  vote_average?: number;
  vote_count?: number;
  original_language?: string;
  runtime?: number | null;
  budget?: number;
  revenue?: number;
  genres?: TMDBGenre[];
  tagline?: string | null;
  status?: string;
}

// ============================================
// TV
// ============================================

export interface TMDBTvSearchResult {
  id: number;
  name: string;
  original_name?: string;
  overview?: string;
  poster_path: string | null;
  backdrop_path: string | null;
  first_air_date?: string;
  popularity?: number;
  vote_average?: number;
  vote_count?: number;
  original_language?: string;
  genre_ids?: number[];
}

export interface TMDBCreator {
  id: number;
  name: string;
  profile_path?: string | null;
}

export interface TMDBTvShow {
  id: number;
  name: string;
  original_name?: string;
  overview?: string | null;
  poster_path?: string | null;
  backdrop_path?: string | null;
  first_air_date?: string | null;
  last_air_date?: string | null;
  popularity?: number;
  vote_average?: number;
  vote_count?: number;
  original_language?: string;
  number_of_seasons?: number;
  number_of_episodes?: number;
  episode_run_time?: number[];
  status?: string;
  genres?: TMDBGenre[];
  created_by?: TMDBCreator[];
}

// ============================================
// Search
// ============================================

export interface TMDBPagedResponse<T> {
  page: number;
  results: T[];
  total_pages: number;
  total_results: number;
}

export type TMDBMovieSearchResponse = TMDBPagedResponse<TMDBMovieSearchResult>;
export type TMDBTvSearchResponse = TMDBPagedResponse<TMDBTvSearchResult>;

export interface TMDBSearchOptions {
  query: string;
  page?: number;
  language?: string;
  includeAdult?: boolean;
}

/**
 * Path segment TMDB uses for each media kind
 */
export type TMDBMediaKind = 'movie' | 'tv';
