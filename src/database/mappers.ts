import {
  List,
  ListItem,
  ListItemWithMedia,
  Media,
  PublicProfile,
  User,
  WatchedEpisode,
  WatchedEpisodeWithShow,
} from '../types/models.js';
import {
  ListItemMediaRow,
  ListItemRow,
  ListRow,
  MediaRow,
  PublicProfileRow,
  UserRow,
  WatchedEpisodeRow,
  WatchedEpisodeShowRow,
} from '../types/database-models.js';

const MEDIA_COLUMNS = [
  'id',
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
  'created_at',
  'updated_at',
] as const;

/**
 * SELECT list for media joined as `m`, aliased to the ListItemMediaRow shape
 */
export const PREFIXED_MEDIA_COLUMNS = MEDIA_COLUMNS.map(column => `m.${column} AS m_${column}`).join(
  ', '
);

/**
 * Parse a SQLite CURRENT_TIMESTAMP value (UTC, no zone suffix)
 */
export function parseTimestamp(value: string): Date {
  return new Date(`${value.replace(' ', 'T')}Z`);
}

/**
 * Format a Date the way CURRENT_TIMESTAMP does, so stored values compare as text
 */
export function toSqliteTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

export function mapRowToUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    nickname: row.nickname,
    is2faEnabled: row.is_2fa_enabled === 1,
    createdAt: parseTimestamp(row.created_at),
    updatedAt: parseTimestamp(row.updated_at),
  };
}

export function mapRowToMedia(row: MediaRow): Media {
  const base = {
    id: row.id,
    tmdbId: row.tmdb_id,
    title: row.title,
    originalTitle: row.original_title,
    overview: row.overview,
    posterPath: row.poster_path,
    backdropPath: row.backdrop_path,
    releaseDate: row.release_date,
    popularity: row.popularity,
    voteAverage: row.vote_average,
    voteCount: row.vote_count,
    originalLanguage: row.original_language,
    createdAt: parseTimestamp(row.created_at),
    updatedAt: parseTimestamp(row.updated_at),
  };

  if (row.media_type === 'MOVIE') {
    return {
      ...base,
      mediaType: 'MOVIE',
      runtime: row.runtime,
      budget: row.budget,
      revenue: row.revenue,
    };
  }

  return {
    ...base,
    mediaType: 'TV_SHOW',
    numberOfSeasons: row.number_of_seasons,
    numberOfEpisodes: row.number_of_episodes,
    episodeRunTime: row.episode_run_time,
    status: row.status,
    firstAirDate: row.first_air_date,
    lastAirDate: row.last_air_date,
  };
}

export function mapRowToList(row: ListRow): List {
  return {
    id: row.id,
    userId: row.user_id,
    name: row.name,
    isPublic: row.is_public === 1,
    createdAt: parseTimestamp(row.created_at),
    updatedAt: parseTimestamp(row.updated_at),
  };
}

export function mapRowToListItem(row: ListItemRow): ListItem {
  return {
    id: row.id,
    listId: row.list_id,
    mediaId: row.media_id,
    position: row.position,
    status: row.status,
    addedAt: parseTimestamp(row.added_at),
  };
}

export function mapRowToListItemWithMedia(row: ListItemMediaRow): ListItemWithMedia {
  return {
    ...mapRowToListItem(row),
    media: mapRowToMedia({
      id: row.m_id,
      tmdb_id: row.m_tmdb_id,
      media_type: row.m_media_type,
      title: row.m_title,
      original_title: row.m_original_title,
      overview: row.m_overview,
      poster_path: row.m_poster_path,
      backdrop_path: row.m_backdrop_path,
      release_date: row.m_release_date,
      popularity: row.m_popularity,
      vote_average: row.m_vote_average,
      vote_count: row.m_vote_count,
      original_language: row.m_original_language,
      runtime: row.m_runtime,
      budget: row.m_budget,
      revenue: row.m_revenue,
      number_of_seasons: row.m_number_of_seasons,
      number_of_episodes: row.m_number_of_episodes,
      episode_run_time: row.m_episode_run_time,
      status: row.m_status,
      first_air_date: row.m_first_air_date,
      last_air_date: row.m_last_air_date,
      created_at: row.m_created_at,
      updated_at: row.m_updated_at,
    }),
  };
}

export function mapRowToWatchedEpisode(row: WatchedEpisodeRow): WatchedEpisode {
  return {
    id: row.id,
    userId: row.user_id,
    tvShowId: row.tv_show_id,
    seasonNumber: row.season_number,
    episodeNumber: row.episode_number,
    watchedAt: parseTimestamp(row.watched_at),
  };
}

export function mapRowToWatchedEpisodeWithShow(row: WatchedEpisodeShowRow): WatchedEpisodeWithShow {
  return {
    ...mapRowToWatchedEpisode(row),
    showTitle: row.show_title,
    showPosterPath: row.show_poster_path,
  };
}

export function mapRowToPublicProfile(row: PublicProfileRow): PublicProfile {
  return {
    id: row.id,
    userId: row.user_id,
    bio: row.bio,
    avatarUrl: row.avatar_url,
    isVisible: row.is_visible === 1,
    showWatchedEpisodes: row.show_watched_episodes === 1,
    showLists: row.show_lists === 1,
    createdAt: parseTimestamp(row.created_at),
    updatedAt: parseTimestamp(row.updated_at),
  };
}
