/**
 * Provider Test Helpers
 *
 * A TMDB client backed by an in-process axios adapter, plus fixtures.
 */

import axios, { AxiosError, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { TMDBClient, TMDBClientOptions } from '../../src/services/providers/tmdb/TMDBClient.js';
import type { TMDBCredits, TMDBImages, TMDBMovie, TMDBTvShow } from '../../src/types/providers/tmdb.js';

export interface StubReply {
  status: number;
  data: unknown;
  headers?: Record<string, string>;
}

/**
 * Maps a request path (e.g. `/movie/603`) to a reply. Returning undefined answers 404.
 * Throwing simulates a transport failure.
 */
export type StubHandler = (path: string, config: InternalAxiosRequestConfig) => StubReply | undefined;

export interface StubbedClient {
  client: TMDBClient;
  /** Every request that reached the adapter */
  requests: InternalAxiosRequestConfig[];
}

export function createStubbedTmdbClient(
  handler: StubHandler,
  options: Partial<TMDBClientOptions> = {}
): StubbedClient {
  const requests: InternalAxiosRequestConfig[] = [];

  const httpClient = axios.create({
    adapter: async config => {
      requests.push(config);
      const reply = handler(config.url ?? '', config) ?? {
        status: 404,
        data: { status_code: 34, status_message: 'The resource you requested could not be found.' },
      };
      const response: AxiosResponse = {
        data: reply.data,
        status: reply.status,
        statusText: String(reply.status),
        headers: reply.headers ?? {},
        config,
      };
      if (reply.status >= 400) {
        throw new AxiosError(
          `Request failed with status code ${reply.status}`,
          AxiosError.ERR_BAD_REQUEST,
          config,
          null,
          response
        );
      }
      return response;
    },
  });

  return {
    client: new TMDBClient({ apiKey: 'test-key', ...options, httpClient }),
    requests,
  };
}

/**
 * Replies from a fixed path table
 */
export function routes(table: Record<string, unknown>): StubHandler {
  return path => (path in table ? { status: 200, data: table[path] } : undefined);
}

export function movieFixture(overrides: Partial<TMDBMovie> = {}): TMDBMovie {
  return {
    id: 603,
    title: 'The Matrix',
    original_title: 'The Matrix',
    overview: 'A hacker learns the truth.',
    poster_path: '/matrix-poster.jpg',
    backdrop_path: '/matrix-backdrop.jpg',
    release_date: '1999-03-31',
    popularity: 80.5,
    vote_average: 8.2,
    vote_count: 25000,
    original_language: 'en',
    runtime: 136,
    budget: 63000000,
    revenue: 463517383,
    genres: [
      { id: 28, name: 'Action' },
      { id: 878, name: 'Science Fiction' },
    ],
    ...overrides,
  };
}

export function showFixture(overrides: Partial<TMDBTvShow> = {}): TMDBTvShow {
  return {
    id: 1396,
    name: 'Night Shift',
    original_name: 'Night Shift',
    overview: 'A hospital after dark.',
    poster_path: '/night-shift-poster.jpg',
    backdrop_path: null,
    first_air_date: '2008-01-20',
    last_air_date: '2013-09-29',
    popularity: 50,
    vote_average: 8.9,
    vote_count: 12000,
    original_language: 'en',
    number_of_seasons: 5,
    number_of_episodes: 62,
    episode_run_time: [47, 45],
    status: 'Ended',
    genres: [{ id: 18, name: 'Drama' }],
    created_by: [{ id: 1, name: 'Vera Lane' }],
    ...overrides,
  };
}

export function creditsFixture(): TMDBCredits {
  return {
    cast: [
      { id: 1, name: 'Ada Stone', character: 'Neo', profile_path: '/ada.jpg' },
      { id: 2, name: 'Ben Cole', character: 'Trinity', profile_path: null },
      { id: 3, name: 'Cy Moss', profile_path: null },
    ],
    crew: [
      { id: 10, name: 'Dana West', job: 'Director' },
      { id: 11, name: 'Eli North', job: 'Producer' },
      { id: 12, name: 'Fay South', job: 'Director' },
    ],
  };
}

export function imagesFixture(posters: string[], backdrops: string[] = []): TMDBImages {
  const image = (file_path: string) => ({
    aspect_ratio: 0.667,
    file_path,
    height: 1500,
    width: 1000,
    iso_639_1: null,
    vote_average: 5,
    vote_count: 1,
  });
  return { id: 603, posters: posters.map(image), backdrops: backdrops.map(image) };
}
