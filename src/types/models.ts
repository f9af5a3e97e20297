export const MEDIA_TYPES = ['MOVIE', 'TV_SHOW'] as const;
export type MediaType = (typeof MEDIA_TYPES)[number];

export const WATCH_STATUSES = ['PLANNED', 'IN_PROGRESS', 'WATCHED'] as const;
export type WatchStatus = (typeof WATCH_STATUSES)[number];

// ============================================
// Identity
// ============================================

/**
 * The acting or owning user; services only need the id
 */
export type UserRef = Pick<User, 'id'>;

export interface User {
  id: number;
  username: string;
  email: string;
  nickname: string;
  is2faEnabled: boolean;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Fields of another user visible on their public profile
 */
export interface PublicUser {
  nickname: string;
  createdAt: Date;
}

// ============================================
// Catalog
// ============================================

interface MediaBase {
  id: number;
  /** External catalog id; null for manually entered media */
  tmdbId: number | null;
  title: string;
  originalTitle: string;
  overview: string;
  posterPath: string;
  backdropPath: string;
  /** YYYY-MM-DD (first air date for shows) */
  releaseDate: string | null;
  popularity: number;
  voteAverage: number;
  voteCount: number;
  originalLanguage: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface Movie extends MediaBase {
  mediaType: 'MOVIE';
  runtime: number | null;
  budget: number | null;
  revenue: number | null;
}

export interface TvShow extends MediaBase {
  mediaType: 'TV_SHOW';
  numberOfSeasons: number | null;
  numberOfEpisodes: number | null;
  episodeRunTime: number | null;
  status: string | null;
  firstAirDate: string | null;
  lastAirDate: string | null;
}

export type Media = Movie | TvShow;

/**
 * Column values for a new or refreshed media row, before it has an id
 */
export type MediaFields =
  | Omit<Movie, 'id' | 'createdAt' | 'updatedAt'>
  | Omit<TvShow, 'id' | 'createdAt' | 'updatedAt'>;

// ============================================
// Lists
// ============================================

export interface List {
  id: number;
  userId: number;
  name: string;
  isPublic: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface ListItem {
  id: number;
  listId: number;
  mediaId: number;
  position: number;
  status: WatchStatus;
  addedAt: Date;
}

export interface ListItemWithMedia extends ListItem {
  media: Media;
}

// ============================================
// Watch tracking
// ============================================

export interface WatchedEpisode {
  id: number;
  userId: number;
  tvShowId: number;
  seasonNumber: number;
  episodeNumber: number;
  watchedAt: Date;
}

export interface WatchedEpisodeWithShow extends WatchedEpisode {
  showTitle: string;
  showPosterPath: string;
}

export interface WatchProgress {
  watchedEpisodes: number;
  totalEpisodes: number;
  progressPercentage: number;
}

export type WatchHistoryEntry =
  | {
      type: 'episode';
      title: string;
      timestamp: Date;
      mediaId: number;
      posterPath: string;
      seasonNumber: number;
      episodeNumber: number;
    }
  | {
      type: 'movie';
      title: string;
      timestamp: Date;
      mediaId: number;
      posterPath: string;
      listItemId: number;
    };

// ============================================
// Profiles
// ============================================

export interface PublicProfile {
  id: number;
  userId: number;
  bio: string;
  avatarUrl: string;
  isVisible: boolean;
  showWatchedEpisodes: boolean;
  showLists: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface PublicProfileView {
  profile: PublicProfile;
  user: PublicUser;
  lists: List[];
  recentEpisodes: WatchedEpisodeWithShow[];
  totalLists: number;
  totalWatched: number;
}
