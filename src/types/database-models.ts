/**
 * Database Row Type Definitions
 *
 * Typed interfaces for table rows as sqlite3 returns them: snake_case,
 * booleans as 0/1, timestamps as 'YYYY-MM-DD HH:MM:SS' UTC strings.
 */

import { MediaType, WatchStatus } from './models.js';

export type SqliteBoolean = 0 | 1;

export interface UserRow {
  id: number;
  username: string;
  email: string;
  nickname: string;
  password_hash: string;
  is_2fa_enabled: SqliteBoolean;
  created_at: string;
  updated_at: string;
}

export interface AuthTokenRow {
  id: number;
  user_id: number;
  token_hash: string;
  expires_at: string;
  created_at: string;
}

export interface MediaRow {
  id: number;
  tmdb_id: number | null;
  media_type: MediaType;
  title: string;
  original_title: string;
  overview: string;
  poster_path: string;
  backdrop_path: string;
  release_date: string | null;
  popularity: number;
  vote_average: number;
  vote_count: number;
  original_language: string;
  runtime: number | null;
  budget: number | null;
  revenue: number | null;
  number_of_seasons: number | null;
  number_of_episodes: number | null;
  episode_run_time: number | null;
  status: string | null;
  first_air_date: string | null;
  last_air_date: string | null;
  created_at: string;
  updated_at: string;
}

export interface ListRow {
  id: number;
  user_id: number;
  name: string;
  is_public: SqliteBoolean;
  created_at: string;
  updated_at: string;
}

export interface ListItemRow {
  id: number;
  list_id: number;
  media_id: number;
  position: number;
  status: WatchStatus;
  added_at: string;
}

/**
 * list_items joined with media; media columns prefixed with m_
 */
export interface ListItemMediaRow extends ListItemRow {
  m_id: number;
  m_tmdb_id: number | null;
  m_media_type: MediaType;
  m_title: string;
  m_original_title: string;
  m_overview: string;
  m_poster_path: string;
  m_backdrop_path: string;
  m_release_date: string | null;
  m_popularity: number;
  m_vote_average: number;
  m_vote_count: number;
  m_original_language: string;
  m_runtime: number | null;
  m_budget: number | null;
  m_revenue: number | null;
  m_number_of_seasons: number | null;
  m_number_of_episodes: number | null;
  m_episode_run_time: number | null;
  m_status: string | null;
  m_first_air_date: string | null;
  m_last_air_date: string | null;
  m_created_at: string;
  m_updated_at: string;
}

export interface WatchedEpisodeRow {
  id: number;
  user_id: number;
  tv_show_id: number;
  season_number: number;
  episode_number: number;
  watched_at: string;
}

export interface WatchedEpisodeShowRow extends WatchedEpisodeRow {
  show_title: string;
  show_poster_path: string;
}

export interface PublicProfileRow {
  id: number;
  user_id: number;
  bio: string;
  avatar_url: string;
  is_visible: SqliteBoolean;
  show_watched_episodes: SqliteBoolean;
  show_lists: SqliteBoolean;
  created_at: string;
  updated_at: string;
}

export interface CountRow {
  count: number;
}
