/**
 * TMDBClient Tests
 *
 * Requests go through a stub axios adapter; nothing leaves the process.
 */

import { describe, it, expect } from '@jest/globals';
import { AxiosError } from 'axios';
import {
  AuthenticationError,
  ErrorCode,
  NetworkError,
  ProviderServerError,
  RateLimitError,
  ResourceNotFoundError,
} from '../../src/errors/index.js';
import { createStubbedTmdbClient, movieFixture, routes } from './helpers.js';

describe('TMDBClient', () => {
  describe('requests', () => {
    it('should send the API key and language as query parameters', async () => {
      const { client, requests } = createStubbedTmdbClient(routes({ '/movie/603': movieFixture() }));

      const movie = await client.getMovieDetails(603);

      expect(movie.title).toBe('The Matrix');
      expect(requests).toHaveLength(1);
      expect(requests[0]?.params).toEqual({ language: 'en-US', api_key: 'test-key' });
    });

    it('should pass search options with configured defaults', async () => {
      const { client, requests } = createStubbedTmdbClient(
        routes({ '/search/tv': { page: 1, results: [], total_pages: 0, total_results: 0 } }),
        { language: 'de-DE', includeAdult: true }
      );

      await client.searchTvShows({ query: 'night', page: 2 });

      expect(requests[0]?.params).toEqual({
        query: 'night',
        language: 'de-DE',
        include_adult: true,
        page: 2,
        api_key: 'test-key',
      });
    });
  });

  describe('caching', () => {
    it('should serve a repeated request from the cache', async () => {
      const { client, requests } = createStubbedTmdbClient(routes({ '/movie/603': movieFixture() }));

      await client.getMovieDetails(603);
      const second = await client.getMovieDetails(603);

      expect(second.id).toBe(603);
      expect(requests).toHaveLength(1);
      expect(client.getStats()).toEqual({ requestsInWindow: 1, remainingRequests: 39, cacheEntries: 1 });
    });

    it('should not cache when the TTL is 0', async () => {
      const { client, requests } = createStubbedTmdbClient(routes({ '/movie/603': movieFixture() }), {
        cacheTtl: 0,
      });

      await client.getMovieDetails(603);
      await client.getMovieDetails(603);

      expect(requests).toHaveLength(2);
      expect(client.getStats().cacheEntries).toBe(0);
    });

    it('should not cache failures', async () => {
      const { client, requests } = createStubbedTmdbClient(routes({}));

      await expect(client.getMovieDetails(1)).rejects.toBeInstanceOf(ResourceNotFoundError);
      await expect(client.getMovieDetails(1)).rejects.toBeInstanceOf(ResourceNotFoundError);

      expect(requests).toHaveLength(2);
    });
  });

  describe('error mapping', () => {
    it('should map 401 to AuthenticationError', async () => {
      const { client } = createStubbedTmdbClient(() => ({
        status: 401,
        data: { status_code: 7, status_message: 'Invalid API key', success: false },
      }));

      const attempt = client.getMovieDetails(603);
      await expect(attempt).rejects.toBeInstanceOf(AuthenticationError);
      await expect(attempt).rejects.toMatchObject({
        message: 'TMDB authentication failed: Invalid API key',
        statusCode: 401,
      });
    });

    it('should map 404 to ResourceNotFoundError', async () => {
      const { client } = createStubbedTmdbClient(routes({}));

      await expect(client.getTvDetails(42)).rejects.toMatchObject({
        statusCode: 404,
        resourceId: '/tv/42',
      });
    });

    it('should map 429 to RateLimitError with Retry-After', async () => {
      const { client } = createStubbedTmdbClient(() => ({
        status: 429,
        data: { status_message: 'Slow down' },
        headers: { 'retry-after': '7' },
      }));

      const attempt = client.getMovieDetails(603);
      await expect(attempt).rejects.toBeInstanceOf(RateLimitError);
      await expect(attempt).rejects.toMatchObject({ retryAfter: 7, statusCode: 429 });
    });

    it('should default Retry-After to 60 seconds', async () => {
      const { client } = createStubbedTmdbClient(() => ({ status: 429, data: {} }));

      await expect(client.getMovieDetails(603)).rejects.toMatchObject({ retryAfter: 60 });
    });

    it('should map 5xx to a retryable ProviderServerError', async () => {
      const { client } = createStubbedTmdbClient(() => ({
        status: 503,
        data: { status_message: 'Maintenance' },
      }));

      const attempt = client.getMovieDetails(603);
      await expect(attempt).rejects.toBeInstanceOf(ProviderServerError);
      await expect(attempt).rejects.toMatchObject({
        message: 'Server error: Maintenance',
        httpStatusCode: 503,
        statusCode: 502,
        retryable: true,
      });
    });

    it('should map a timeout to NetworkError with the timeout code', async () => {
      const { client } = createStubbedTmdbClient((_path, config) => {
        throw new AxiosError('timeout of 10000ms exceeded', AxiosError.ECONNABORTED, config);
      });

      const attempt = client.getMovieDetails(603);
      await expect(attempt).rejects.toBeInstanceOf(NetworkError);
      await expect(attempt).rejects.toMatchObject({
        message: 'TMDB request timeout: /movie/603',
        code: ErrorCode.NETWORK_TIMEOUT,
      });
    });

    it('should map a refused connection to NetworkError', async () => {
      const { client } = createStubbedTmdbClient((_path, config) => {
        throw new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED', config);
      });

      await expect(client.getMovieDetails(603)).rejects.toMatchObject({
        message: 'TMDB network error: connect ECONNREFUSED',
        code: ErrorCode.NETWORK_CONNECTION_FAILED,
      });
    });
  });
});
