import { DatabaseManager } from '../../database/DatabaseManager.js';
import { mapRowToMedia } from '../../database/mappers.js';
import { TMDBClient } from '../providers/tmdb/TMDBClient.js';
import { MediaEnrichmentService } from '../enrichment/MediaEnrichmentService.js';
import { logger } from '../../middleware/logging.js';
import { LIMITS } from '../../config/constants.js';
import { buildUpdateQuery } from '../../utils/sqlBuilder.js';
import {
  MEDIA_REFRESH_COLUMNS,
  type ManualMediaFields,
  buildManualFields,
  buildMovieFields,
  buildTvShowFields,
  insertMedia,
  parseReleaseDate,
  toColumnValues,
} from './mediaFactory.js';
import type { DatabaseConnection } from '../../types/database.js';
import type { MediaRow } from '../../types/database-models.js';
import type { Media, MediaFields, MediaType, UserRef } from '../../types/models.js';
import type {
  TMDBMediaKind,
  TMDBMovieSearchResult,
  TMDBTvSearchResult,
} from '../../types/providers/tmdb.js';
import {
  ConfigurationError,
  DuplicateEntryError,
  ResourceNotFoundError,
  ValidationError,
} from '../../errors/index.js';

export const SEARCH_SORTS = ['relevance', 'title', 'rating', 'date'] as const;
export type SearchSort = (typeof SEARCH_SORTS)[number];

export const BROWSE_SORTS = ['newest', 'title', '-title', 'rating', '-rating'] as const;
export type BrowseSort = (typeof BROWSE_SORTS)[number];

const BROWSE_ORDER: Record<BrowseSort, string> = {
  newest: 'created_at DESC, id DESC',
  title: 'title ASC, id ASC',
  '-title': 'title DESC, id DESC',
  rating: 'vote_average ASC, id ASC',
  '-rating': 'vote_average DESC, id DESC',
};

/**
 * A TMDB search hit, normalized across movies and shows
 */
export interface MediaSearchResult {
  tmdbId: number;
  mediaType: TMDBMediaKind;
  title: string;
  originalTitle: string;
  overview: string;
  posterPath: string | null;
  backdropPath: string | null;
  releaseDate: string | null;
  rating: number;
  popularity: number;
  directors?: string[];
  cast?: string[];
}

export interface SearchOptions {
  type?: TMDBMediaKind | undefined;
  enrich?: boolean | undefined;
  sort?: SearchSort | undefined;
}

export interface BrowseOptions {
  type?: TMDBMediaKind | undefined;
  sort?: BrowseSort | undefined;
}

function fromMovieResult(result: TMDBMovieSearchResult): MediaSearchResult {
  return {
    tmdbId: result.id,
    mediaType: 'movie',
    title: result.title,
    originalTitle: result.original_title ?? '',
    overview: result.overview ?? '',
    posterPath: result.poster_path,
    backdropPath: result.backdrop_path,
    releaseDate: result.release_date || null,
    rating: result.vote_average ?? 0,
    popularity: result.popularity ?? 0,
  };
}

function fromTvResult(result: TMDBTvSearchResult): MediaSearchResult {
  return {
    tmdbId: result.id,
    mediaType: 'tv',
    title: result.name,
    originalTitle: result.original_name ?? '',
    overview: result.overview ?? '',
    posterPath: result.poster_path,
    backdropPath: result.backdrop_path,
    releaseDate: result.first_air_date || null,
    rating: result.vote_average ?? 0,
    popularity: result.popularity ?? 0,
  };
}

/**
 * Relevance keeps TMDB's order (movies first when both kinds are searched)
 */
export function sortSearchResults(results: MediaSearchResult[], sort: SearchSort): MediaSearchResult[] {
  const sorted = [...results];
  switch (sort) {
    case 'title':
      return sorted.sort((a, b) => a.title.toLowerCase().localeCompare(b.title.toLowerCase()));
    case 'rating':
      return sorted.sort((a, b) => b.rating - a.rating);
    case 'date':
      return sorted.sort((a, b) => (b.releaseDate ?? '').localeCompare(a.releaseDate ?? ''));
    default:
      return sorted;
  }
}

/**
 * MediaService
 *
 * The local catalog. Records come from TMDB (by id and type) or from manual
 * entry; a TMDB id is stored at most once, whatever its media type.
 */
export class MediaService {
  constructor(
    private readonly db: DatabaseManager,
    private readonly tmdb: TMDBClient | null,
    private readonly enrichment: MediaEnrichmentService
  ) {}

  async getMediaById(id: number): Promise<Media> {
    const row = await this.db.get<MediaRow>('SELECT * FROM media WHERE id = ?', [id]);
    if (!row) {
      throw new ResourceNotFoundError('media', id, undefined, {
        service: 'MediaService',
        operation: 'getMediaById',
      });
    }
    return mapRowToMedia(row);
  }

  async findByTmdbId(tmdbId: number): Promise<Media | null> {
    const row = await this.db.get<MediaRow>('SELECT * FROM media WHERE tmdb_id = ?', [tmdbId]);
    return row ? mapRowToMedia(row) : null;
  }

  /**
   * Returns the stored record when the id was imported before. An id already
   * held by the other media type is a conflict (409), not a second record.
   */
  async createMediaFromTmdb(tmdbId: number, mediaType: MediaType): Promise<Media> {
    const existing = await this.findByTmdbId(tmdbId);
    if (existing) {
      return this.assertSameType(existing, mediaType);
    }

    const fields = await this.fetchFields(tmdbId, mediaType, 'createMediaFromTmdb');

    const media = await this.db.transaction(async conn => {
      // Another request may have imported it while details were loading
      const row = await conn.get<MediaRow>('SELECT * FROM media WHERE tmdb_id = ?', [tmdbId]);
      if (row) {
        return this.assertSameType(mapRowToMedia(row), mediaType);
      }

      const id = await insertMedia(conn, fields);
      return this.requireMedia(conn, id, 'createMediaFromTmdb');
    });

    logger.info('Media imported from TMDB', { mediaId: media.id, tmdbId, mediaType });
    return media;
  }

  async createManualMedia(input: ManualMediaFields): Promise<Media> {
    const title = input.title.trim();
    if (!title) {
      throw new ValidationError('Title is required', {
        service: 'MediaService',
        operation: 'createManualMedia',
      });
    }
    if (input.releaseDate && parseReleaseDate(input.releaseDate) === null) {
      throw new ValidationError('Release date must be a valid YYYY-MM-DD date', {
        service: 'MediaService',
        operation: 'createManualMedia',
        metadata: { releaseDate: input.releaseDate },
      });
    }

    const fields = buildManualFields({ ...input, title });
    const media = await this.db.transaction(async conn => {
      const id = await insertMedia(conn, fields);
      return this.requireMedia(conn, id, 'createManualMedia');
    });

    logger.info('Manual media created', { mediaId: media.id, mediaType: media.mediaType });
    return media;
  }

  /**
   * Overwrite stored metadata with current TMDB values
   */
  async updateMediaMetadata(media: Media): Promise<Media> {
    if (media.tmdbId === null) {
      throw new ValidationError('Media has no TMDB id to refresh from', {
        service: 'MediaService',
        operation: 'updateMediaMetadata',
        entityType: 'media',
        entityId: media.id,
      });
    }

    const fields = await this.fetchFields(media.tmdbId, media.mediaType, 'updateMediaMetadata');
    const values = toColumnValues(fields);

    return this.db.transaction(async conn => {
      await this.requireMedia(conn, media.id, 'updateMediaMetadata');

      const { query, values: params } = buildUpdateQuery(
        'media',
        MEDIA_REFRESH_COLUMNS,
        values,
        'id = ?',
        [media.id],
        { touchColumn: 'updated_at' }
      );
      await conn.execute(query, params);

      return this.requireMedia(conn, media.id, 'updateMediaMetadata');
    });
  }

  async searchMedia(query: string, options: SearchOptions = {}): Promise<MediaSearchResult[]> {
    const tmdb = this.requireClient('searchMedia');
    let results: MediaSearchResult[] = [];

    if (options.type !== 'tv') {
      const movies = await tmdb.searchMovies({ query });
      results.push(...movies.results.map(fromMovieResult));
    }
    if (options.type !== 'movie') {
      const shows = await tmdb.searchTvShows({ query });
      results.push(...shows.results.map(fromTvResult));
    }

    if (options.enrich) {
      results = await Promise.all(results.map(result => this.enrichSearchResult(result)));
    }

    return sortSearchResults(results, options.sort ?? 'relevance');
  }

  /**
   * Distinct media across all of the user's lists
   */
  async browseUserMedia(user: UserRef, options: BrowseOptions = {}): Promise<Media[]> {
    const params: Array<number | string> = [user.id];
    let typeFilter = '';
    if (options.type) {
      typeFilter = 'AND media_type = ?';
      params.push(options.type === 'movie' ? 'MOVIE' : 'TV_SHOW');
    }
    params.push(LIMITS.BROWSE_MEDIA);

    const rows = await this.db.query<MediaRow>(
      `SELECT * FROM media
       WHERE id IN (
         SELECT li.media_id FROM list_items li
         INNER JOIN lists l ON l.id = li.list_id
         WHERE l.user_id = ?
       ) ${typeFilter}
       ORDER BY ${BROWSE_ORDER[options.sort ?? 'newest']}
       LIMIT ?`,
      params
    );
    return rows.map(mapRowToMedia);
  }

  // ============================================
  // Private helpers
  // ============================================

  private async enrichSearchResult(result: MediaSearchResult): Promise<MediaSearchResult> {
    const extra = await this.enrichment.enrichSearchResult(result.mediaType, result.tmdbId);
    if (!extra) {
      return result;
    }
    return {
      ...result,
      directors: extra.directors,
      cast: extra.cast,
      posterPath: extra.posterPath ?? result.posterPath,
      backdropPath: extra.backdropPath ?? result.backdropPath,
    };
  }

  private async fetchFields(tmdbId: number, mediaType: MediaType, operation: string): Promise<MediaFields> {
    const tmdb = this.requireClient(operation);
    return mediaType === 'MOVIE'
      ? buildMovieFields(await tmdb.getMovieDetails(tmdbId))
      : buildTvShowFields(await tmdb.getTvDetails(tmdbId));
  }

  private assertSameType(media: Media, mediaType: MediaType): Media {
    if (media.mediaType !== mediaType) {
      throw new DuplicateEntryError(
        'media',
        `TMDB id ${media.tmdbId} is already stored as ${media.mediaType}`,
        {
          service: 'MediaService',
          operation: 'createMediaFromTmdb',
          entityType: 'media',
          entityId: media.id,
          metadata: { requestedType: mediaType },
        }
      );
    }
    return media;
  }

  private requireClient(operation: string): TMDBClient {
    if (!this.tmdb) {
      throw new ConfigurationError('TMDB_API_KEY', 'TMDB API key is not configured', {
        service: 'MediaService',
        operation,
      });
    }
    return this.tmdb;
  }

  private async requireMedia(conn: DatabaseConnection, id: number, operation: string): Promise<Media> {
    const row = await conn.get<MediaRow>('SELECT * FROM media WHERE id = ?', [id]);
    if (!row) {
      throw new ResourceNotFoundError('media', id, undefined, {
        service: 'MediaService',
        operation,
      });
    }
    return mapRowToMedia(row);
  }
}
