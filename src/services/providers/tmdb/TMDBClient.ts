/**
 * TMDB API Client
 * Handles all interactions with The Movie Database API
 */

import axios, { AxiosInstance, isAxiosError } from 'axios';
import { logger } from '../../../middleware/logging.js';
import { RateLimiter } from './RateLimiter.js';
import { ResponseCache } from './ResponseCache.js';
import {
  AuthenticationError,
  ResourceNotFoundError,
  RateLimitError,
  ProviderServerError,
  NetworkError,
  ErrorCode,
} from '../../../errors/index.js';
import { getErrorMessage, toError } from '../../../utils/errorHandling.js';
import {
  TMDBCredits,
  TMDBExternalIds,
  TMDBImages,
  TMDBMediaKind,
  TMDBMovie,
  TMDBMovieSearchResponse,
  TMDBSearchOptions,
  TMDBTvSearchResponse,
  TMDBTvShow,
} from '../../../types/providers/tmdb.js';

type QueryParams = Record<string, string | number | boolean | undefined>;

export interface TMDBClientOptions {
  apiKey: string;
  baseUrl?: string;
  language?: string;
  includeAdult?: boolean;
  /** Request timeout in milliseconds */
  timeout?: number;
  /** Response cache TTL in seconds; 0 disables caching */
  cacheTtl?: number;
  rateLimit?: number;
  rateLimitWindow?: number;
  /** Preconfigured axios instance (tests pass one with a stub adapter) */
  httpClient?: AxiosInstance;
}

export interface TMDBClientStats {
  requestsInWindow: number;
  remainingRequests: number;
  cacheEntries: number;
}

export class TMDBClient {
  private readonly client: AxiosInstance;
  private readonly rateLimiter: RateLimiter;
  private readonly cache: ResponseCache;
  private readonly apiKey: string;
  private readonly language: string;
  private readonly includeAdult: boolean;
  private readonly cacheTtl: number;

  constructor(options: TMDBClientOptions) {
    this.apiKey = options.apiKey;
    this.language = options.language || 'en-US';
    this.includeAdult = options.includeAdult ?? false;
    this.cacheTtl = options.cacheTtl ?? 3600;

    this.rateLimiter = new RateLimiter(options.rateLimit ?? 40, options.rateLimitWindow ?? 10);
    this.cache = new ResponseCache(this.cacheTtl);

    this.client =
      options.httpClient ??
      axios.create({
        baseURL: options.baseUrl || 'https://api.themoviedb.org/3',
        headers: {
          'Content-Type': 'application/json;charset=utf-8',
        },
        timeout: options.timeout ?? 10000,
      });
  }

  // ============================================
  // Search
  // ============================================

  async searchMovies(options: TMDBSearchOptions): Promise<TMDBMovieSearchResponse> {
    return this.request<TMDBMovieSearchResponse>('/search/movie', this.searchParams(options));
  }

  async searchTvShows(options: TMDBSearchOptions): Promise<TMDBTvSearchResponse> {
    return this.request<TMDBTvSearchResponse>('/search/tv', this.searchParams(options));
  }

  // ============================================
  // Details
  // ============================================

  async getMovieDetails(movieId: number): Promise<TMDBMovie> {
    return this.request<TMDBMovie>(`/movie/${movieId}`, { language: this.language });
  }

  async getTvDetails(tvId: number): Promise<TMDBTvShow> {
    return this.request<TMDBTvShow>(`/tv/${tvId}`, { language: this.language });
  }

  async getMovieCredits(movieId: number): Promise<TMDBCredits> {
    return this.request<TMDBCredits>(`/movie/${movieId}/credits`, { language: this.language });
  }

  async getTvCredits(tvId: number): Promise<TMDBCredits> {
    return this.request<TMDBCredits>(`/tv/${tvId}/credits`, { language: this.language });
  }

  /**
   * All posters/backdrops regardless of language
   */
  async getMovieImages(movieId: number): Promise<TMDBImages> {
    return this.request<TMDBImages>(`/movie/${movieId}/images`);
  }

  async getTvImages(tvId: number): Promise<TMDBImages> {
    return this.request<TMDBImages>(`/tv/${tvId}/images`);
  }

  async getExternalIds(kind: TMDBMediaKind, tmdbId: number): Promise<TMDBExternalIds> {
    return this.request<TMDBExternalIds>(`/${kind}/${tmdbId}/external_ids`);
  }

  /**
   * Reported on /health
   */
  getStats(): TMDBClientStats {
    return {
      requestsInWindow: this.rateLimiter.getRequestCount(),
      remainingRequests: this.rateLimiter.getRemainingRequests(),
      cacheEntries: this.cache.size,
    };
  }

  // ============================================
  // Private Helper Methods
  // ============================================

  private searchParams(options: TMDBSearchOptions): QueryParams {
    return {
      query: options.query,
      language: options.language || this.language,
      include_adult: options.includeAdult ?? this.includeAdult,
      page: options.page || 1,
    };
  }

  /**
   * Cached, rate-limited GET. Failures are not retried.
   */
  private async request<T>(endpoint: string, params: QueryParams = {}): Promise<T> {
    const cacheKey = ResponseCache.buildKey(endpoint, params);
    const cached = this.cache.get(cacheKey);
    if (cached !== undefined) {
      logger.debug('TMDB cache hit', { endpoint });
      return cached as T;
    }

    return this.rateLimiter.execute(async () => {
      try {
        const response = await this.client.get<T>(endpoint, {
          params: { ...params, api_key: this.apiKey },
        });

        logger.debug('TMDB API request successful', {
          endpoint,
          status: response.status,
          stats: this.getStats(),
        });

        this.cache.set(cacheKey, response.data, this.cacheTtl);
        return response.data;
      } catch (error) {
        throw this.convertToApplicationError(error, endpoint);
      }
    });
  }

  /**
   * Convert Axios errors to ApplicationError types
   */
  private convertToApplicationError(error: unknown, endpoint: string): Error {
    const context = {
      service: 'TMDBClient',
      operation: 'request',
      metadata: { endpoint },
    };

    if (!isAxiosError(error)) {
      return new NetworkError(
        `TMDB request failed: ${getErrorMessage(error)}`,
        ErrorCode.NETWORK_CONNECTION_FAILED,
        endpoint,
        context,
        toError(error)
      );
    }

    if (error.response) {
      const status = error.response.status;
      const message = this.statusMessage(error.response.data) ?? error.message;
      const statusContext = { ...context, metadata: { ...context.metadata, status } };

      switch (status) {
        case 401:
          // Invalid API key
          return new AuthenticationError(`TMDB authentication failed: ${message}`, statusContext, error);

        case 404:
          return new ResourceNotFoundError(
            'TMDB resource',
            endpoint,
            `Resource not found: ${message}`,
            statusContext
          );

        case 429: {
          const retryAfter = Number(error.response.headers['retry-after']);
          return new RateLimitError(
            'TMDB',
            Number.isFinite(retryAfter) && retryAfter > 0 ? retryAfter : 60,
            `Rate limit exceeded: ${message}`,
            statusContext
          );
        }

        default:
          return new ProviderServerError(
            'TMDB',
            status,
            status >= 500 ? `Server error: ${message}` : `API error (${status}): ${message}`,
            statusContext,
            error
          );
      }
    }

    // Network errors (timeout, connection refused, etc.)
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new NetworkError(
        `TMDB request timeout: ${endpoint}`,
        ErrorCode.NETWORK_TIMEOUT,
        endpoint,
        { ...context, metadata: { ...context.metadata, code: error.code } },
        error
      );
    }

    return new NetworkError(
      `TMDB network error: ${error.message}`,
      ErrorCode.NETWORK_CONNECTION_FAILED,
      endpoint,
      { ...context, metadata: { ...context.metadata, code: error.code } },
      error
    );
  }

  private statusMessage(data: unknown): string | undefined {
    if (
      typeof data === 'object' &&
      data !== null &&
      'status_message' in data &&
      typeof data.status_message === 'string'
    ) {
      return data.status_message;
    }
    return undefined;
  }
}
