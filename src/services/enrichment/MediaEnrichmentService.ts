import { TMDBClient } from '../providers/tmdb/TMDBClient.js';
import { logger } from '../../middleware/logging.js';
import { LIMITS } from '../../config/constants.js';
import { ConfigurationError } from '../../errors/index.js';
import { getErrorMessage } from '../../utils/errorHandling.js';
import type { Media, MediaType } from '../../types/models.js';
import type {
  TMDBCastMember,
  TMDBCredits,
  TMDBMediaKind,
} from '../../types/providers/tmdb.js';

export interface CastCredit {
  name: string;
  character: string | null;
  profilePath: string | null;
}

/**
 * Live data layered over a stored media record when it is displayed
 */
export interface MediaEnrichment {
  posterPath: string | null;
  backdropPath: string | null;
  rating: number;
  imdbId: string | null;
  genres: string[];
  directors: string[];
  cast: CastCredit[];
}

/**
 * Credits and artwork attached to a search hit
 */
export interface SearchEnrichment {
  directors: string[];
  cast: string[];
  posterPath: string | null;
  backdropPath: string | null;
}

interface RemoteDetailsBase {
  id: number;
  title: string;
  overview: string | null;
  posterPath: string | null;
  backdropPath: string | null;
  voteAverage: number | null;
  genres: string[];
  directors: string[];
  cast: CastCredit[];
  imdbId: string | null;
}

export type RemoteMediaDetails =
  | (RemoteDetailsBase & {
      mediaType: 'movie';
      releaseDate: string | null;
      runtime: number | null;
      budget: number | null;
      revenue: number | null;
    })
  | (RemoteDetailsBase & {
      mediaType: 'tv';
      firstAirDate: string | null;
      numberOfSeasons: number | null;
      numberOfEpisodes: number | null;
    });

export function toTmdbKind(mediaType: MediaType): TMDBMediaKind {
  return mediaType === 'MOVIE' ? 'movie' : 'tv';
}

function directorsFromCrew(credits: TMDBCredits, limit: number): string[] {
  return credits.crew
    .filter(member => member.job === 'Director')
    .map(member => member.name)
    .slice(0, limit);
}

function toCastCredit(member: TMDBCastMember): CastCredit {
  return {
    name: member.name,
    character: member.character ?? null,
    profilePath: member.profile_path,
  };
}

/**
 * MediaEnrichmentService
 *
 * Decorates stored media with live TMDB data. Enrichment is best-effort:
 * enrich() and enrichSearchResult() log provider failures and resolve to null,
 * so a TMDB outage never fails the list or episode request around them.
 * Without an API key the client is null and nothing is enriched.
 */
export class MediaEnrichmentService {
  constructor(private readonly tmdb: TMDBClient | null) {}

  async enrich(media: Media): Promise<MediaEnrichment | null> {
    if (!this.tmdb || media.tmdbId === null) {
      return null;
    }
    const tmdb = this.tmdb;
    const tmdbId = media.tmdbId;

    try {
      const kind = toTmdbKind(media.mediaType);
      const [details, credits, externalIds] = await Promise.all([
        kind === 'movie' ? tmdb.getMovieDetails(tmdbId) : tmdb.getTvDetails(tmdbId),
        kind === 'movie' ? tmdb.getMovieCredits(tmdbId) : tmdb.getTvCredits(tmdbId),
        tmdb.getExternalIds(kind, tmdbId),
      ]);

      return {
        posterPath: details.poster_path ?? null,
        backdropPath: details.backdrop_path ?? null,
        rating: details.vote_average ?? 0,
        imdbId: externalIds.imdb_id ?? null,
        genres: (details.genres ?? []).map(genre => genre.name),
        directors: directorsFromCrew(credits, LIMITS.ENRICHMENT_DIRECTORS),
        cast: credits.cast.slice(0, LIMITS.ENRICHMENT_CAST).map(toCastCredit),
      };
    } catch (error) {
      logger.warn('Failed to fetch TMDB data for media', {
        mediaId: media.id,
        tmdbId,
        error: getErrorMessage(error),
      });
      return null;
    }
  }

  /**
   * Enrichment per item, in input order
   */
  async enrichMany(media: Media[]): Promise<Array<MediaEnrichment | null>> {
    return Promise.all(media.map(entry => this.enrich(entry)));
  }

  /**
   * Directors, top cast and first poster (or backdrop) for a search hit
   */
  async enrichSearchResult(kind: TMDBMediaKind, tmdbId: number): Promise<SearchEnrichment | null> {
    if (!this.tmdb) {
      return null;
    }
    const tmdb = this.tmdb;

    try {
      const credits =
        kind === 'movie' ? await tmdb.getMovieCredits(tmdbId) : await tmdb.getTvCredits(tmdbId);
      const images =
        kind === 'movie' ? await tmdb.getMovieImages(tmdbId) : await tmdb.getTvImages(tmdbId);

      const [poster] = images.posters;
      const [backdrop] = images.backdrops;

      return {
        directors: directorsFromCrew(credits, LIMITS.SEARCH_DIRECTORS),
        cast: credits.cast.slice(0, LIMITS.SEARCH_CAST).map(member => member.name),
        posterPath: poster ? poster.file_path : null,
        backdropPath: !poster && backdrop ? backdrop.file_path : null,
      };
    } catch (error) {
      logger.warn('Failed to enrich search result', {
        kind,
        tmdbId,
        error: getErrorMessage(error),
      });
      return null;
    }
  }

  /**
   * Live details for the media details endpoint. Unlike enrich(), provider
   * errors propagate to the caller.
   */
  async getRemoteDetails(kind: TMDBMediaKind, tmdbId: number): Promise<RemoteMediaDetails> {
    const tmdb = this.requireClient();

    if (kind === 'movie') {
      const [details, credits, externalIds] = await Promise.all([
        tmdb.getMovieDetails(tmdbId),
        tmdb.getMovieCredits(tmdbId),
        tmdb.getExternalIds('movie', tmdbId),
      ]);

      return {
        mediaType: 'movie',
        id: details.id,
        title: details.title,
        overview: details.overview ?? null,
        posterPath: details.poster_path ?? null,
        backdropPath: details.backdrop_path ?? null,
        voteAverage: details.vote_average ?? null,
        releaseDate: details.release_date ?? null,
        runtime: details.runtime ?? null,
        budget: details.budget ?? null,
        revenue: details.revenue ?? null,
        genres: (details.genres ?? []).map(genre => genre.name),
        directors: directorsFromCrew(credits, LIMITS.DETAILS_DIRECTORS),
        cast: credits.cast.slice(0, LIMITS.DETAILS_CAST).map(toCastCredit),
        imdbId: externalIds.imdb_id ?? null,
      };
    }

    const [details, credits, externalIds] = await Promise.all([
      tmdb.getTvDetails(tmdbId),
      tmdb.getTvCredits(tmdbId),
      tmdb.getExternalIds('tv', tmdbId),
    ]);

    return {
      mediaType: 'tv',
      id: details.id,
      title: details.name,
      overview: details.overview ?? null,
      posterPath: details.poster_path ?? null,
      backdropPath: details.backdrop_path ?? null,
      voteAverage: details.vote_average ?? null,
      firstAirDate: details.first_air_date ?? null,
      numberOfSeasons: details.number_of_seasons ?? null,
      numberOfEpisodes: details.number_of_episodes ?? null,
      genres: (details.genres ?? []).map(genre => genre.name),
      // Shows credit their creators rather than a director
      directors: (details.created_by ?? []).map(creator => creator.name).slice(0, LIMITS.DETAILS_DIRECTORS),
      cast: credits.cast.slice(0, LIMITS.DETAILS_CAST).map(toCastCredit),
      imdbId: externalIds.imdb_id ?? null,
    };
  }

  private requireClient(): TMDBClient {
    if (!this.tmdb) {
      throw new ConfigurationError('TMDB_API_KEY', 'TMDB API key is not configured');
    }
    return this.tmdb;
  }
}
