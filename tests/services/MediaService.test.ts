/**
 * MediaService Tests
 *
 * Catalog writes run against an in-memory database; TMDB answers come from
 * a stub adapter.
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import {
  MediaService,
  MediaSearchResult,
  SearchSort,
  sortSearchResults,
} from '../../src/services/media/MediaService.js';
import { MediaEnrichmentService } from '../../src/services/enrichment/MediaEnrichmentService.js';
import { ListService } from '../../src/services/list/ListService.js';
import { TMDBClient } from '../../src/services/providers/tmdb/TMDBClient.js';
import {
  ConfigurationError,
  DuplicateEntryError,
  DuplicateKeyError,
  ValidationError,
} from '../../src/errors/index.js';
import { TestDatabase, createTestDatabase } from '../utils/testDatabase.js';
import {
  StubHandler,
  createStubbedTmdbClient,
  creditsFixture,
  imagesFixture,
  movieFixture,
  routes,
  showFixture,
} from '../providers/helpers.js';

function searchResult(overrides: Partial<MediaSearchResult>): MediaSearchResult {
  return {
    tmdbId: 1,
    mediaType: 'movie',
    title: '',
    originalTitle: '',
    overview: '',
    posterPath: null,
    backdropPath: null,
    releaseDate: null,
    rating: 0,
    popularity: 0,
    ...overrides,
  };
}

describe('MediaService', () => {
  let testDb: TestDatabase;

  const createService = (tmdb: TMDBClient | null): MediaService =>
    new MediaService(testDb.db, tmdb, new MediaEnrichmentService(tmdb));

  const stubbed = (handler: StubHandler) => {
    const stub = createStubbedTmdbClient(handler);
    return { service: createService(stub.client), requests: stub.requests };
  };

  beforeEach(async () => {
    testDb = await createTestDatabase();
  });

  afterEach(async () => {
    await testDb.destroy();
  });

  describe('createMediaFromTmdb', () => {
    it('should import a movie once and return the stored record afterwards', async () => {
      const { service, requests } = stubbed(routes({ '/movie/603': movieFixture() }));

      const first = await service.createMediaFromTmdb(603, 'MOVIE');
      const second = await service.createMediaFromTmdb(603, 'MOVIE');

      expect(second.id).toBe(first.id);
      expect(first).toMatchObject({
        tmdbId: 603,
        mediaType: 'MOVIE',
        title: 'The Matrix',
        releaseDate: '1999-03-31',
        runtime: 136,
      });
      expect(requests).toHaveLength(1);
    });

    it('should refuse to import an id already stored as the other media type', async () => {
      const { service, requests } = stubbed(
        routes({
          '/movie/1396': movieFixture({ id: 1396, title: 'Same Number' }),
          '/tv/1396': showFixture(),
        })
      );

      const movie = await service.createMediaFromTmdb(1396, 'MOVIE');
      const attempt = service.createMediaFromTmdb(1396, 'TV_SHOW');

      await expect(attempt).rejects.toBeInstanceOf(DuplicateEntryError);
      await expect(attempt).rejects.toMatchObject({
        statusCode: 409,
        message: 'TMDB id 1396 is already stored as MOVIE',
      });
      expect(requests.map(r => r.url)).toEqual(['/movie/1396']);
      expect((await service.findByTmdbId(1396))?.id).toBe(movie.id);
    });

    it('should reject a second media row with the same TMDB id', async () => {
      await testDb.seedMovie('The Matrix', 603);

      const attempt = testDb.seedShow('Other', 1, 603);
      await expect(attempt).rejects.toBeInstanceOf(DuplicateKeyError);
      await expect(attempt).rejects.toMatchObject({ table: 'media', key: 'tmdb_id' });

      const rows = await testDb.db.query<{ media_type: string }>(
        'SELECT media_type FROM media WHERE tmdb_id = ?',
        [603]
      );
      expect(rows).toEqual([{ media_type: 'MOVIE' }]);
    });

    it('should allow any number of manual entries without a TMDB id', async () => {
      await testDb.seedMovie('Home Video');
      await testDb.seedShow('Home Series', 2);

      const rows = await testDb.db.query<{ id: number }>('SELECT id FROM media WHERE tmdb_id IS NULL');
      expect(rows).toHaveLength(2);
    });

    it('should store nothing when TMDB does not know the id', async () => {
      const { service } = stubbed(routes({}));

      await expect(service.createMediaFromTmdb(999, 'MOVIE')).rejects.toMatchObject({ statusCode: 404 });
      expect(await service.findByTmdbId(999)).toBeNull();
    });

    it('should require a TMDB client', async () => {
      await expect(createService(null).createMediaFromTmdb(603, 'MOVIE')).rejects.toBeInstanceOf(
        ConfigurationError
      );
    });
  });

  describe('createManualMedia', () => {
    it('should create a record without TMDB id', async () => {
      const media = await createService(null).createManualMedia({
        title: '  Home Video  ',
        mediaType: 'MOVIE',
        releaseDate: '2021-07-04',
      });

      expect(media).toMatchObject({
        tmdbId: null,
        mediaType: 'MOVIE',
        title: 'Home Video',
        releaseDate: '2021-07-04',
      });
    });

    it('should allow several manual records with the same title', async () => {
      const service = createService(null);

      const a = await service.createManualMedia({ title: 'Untitled', mediaType: 'MOVIE' });
      const b = await service.createManualMedia({ title: 'Untitled', mediaType: 'MOVIE' });

      expect(a.id).not.toBe(b.id);
    });

    it('should reject a blank title and an impossible date', async () => {
      const service = createService(null);

      await expect(service.createManualMedia({ title: '   ', mediaType: 'MOVIE' })).rejects.toMatchObject({
        message: 'Title is required',
      });
      await expect(
        service.createManualMedia({ title: 'Leap', mediaType: 'TV_SHOW', releaseDate: '2023-02-29' })
      ).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('updateMediaMetadata', () => {
    it('should overwrite stored values with current TMDB data', async () => {
      const stored = await testDb.seedMovie('Old Title', 603);
      const { service } = stubbed(routes({ '/movie/603': movieFixture({ vote_average: 9.1 }) }));

      const refreshed = await service.updateMediaMetadata(stored);

      expect(refreshed.id).toBe(stored.id);
      expect(refreshed.title).toBe('The Matrix');
      expect(refreshed.voteAverage).toBe(9.1);
      expect(refreshed.tmdbId).toBe(603);
    });

    it('should refuse to refresh manual media', async () => {
      const manual = await testDb.seedMovie('Home Video');
      const { service } = stubbed(routes({}));

      await expect(service.updateMediaMetadata(manual)).rejects.toMatchObject({
        message: 'Media has no TMDB id to refresh from',
      });
    });
  });

  describe('searchMedia', () => {
    const searchRoutes = {
      '/search/movie': {
        page: 1,
        total_pages: 1,
        total_results: 1,
        results: [
          {
            id: 603,
            title: 'The Matrix',
            poster_path: '/list-poster.jpg',
            backdrop_path: null,
            release_date: '1999-03-31',
            vote_average: 8.2,
          },
        ],
      },
      '/search/tv': {
        page: 1,
        total_pages: 1,
        total_results: 1,
        results: [
          {
            id: 1396,
            name: 'Matrix Stories',
            poster_path: null,
            backdrop_path: null,
            first_air_date: '',
            vote_average: 9.0,
          },
        ],
      },
    };

    it('should search movies then shows and normalize the hits', async () => {
      const { service } = stubbed(routes(searchRoutes));

      const results = await service.searchMedia('matrix');

      expect(results.map(r => [r.mediaType, r.tmdbId, r.title, r.releaseDate])).toEqual([
        ['movie', 603, 'The Matrix', '1999-03-31'],
        ['tv', 1396, 'Matrix Stories', null],
      ]);
    });

    it('should restrict by type and sort by rating', async () => {
      const { service, requests } = stubbed(routes(searchRoutes));

      const tvOnly = await service.searchMedia('matrix', { type: 'tv' });
      expect(tvOnly.map(r => r.tmdbId)).toEqual([1396]);
      expect(requests.map(r => r.url)).toEqual(['/search/tv']);

      const byRating = await service.searchMedia('matrix', { sort: 'rating' });
      expect(byRating.map(r => r.tmdbId)).toEqual([1396, 603]);
    });

    it('should attach credits and artwork when enrichment is requested', async () => {
      const { service } = stubbed(
        routes({
          ...searchRoutes,
          '/movie/603/credits': creditsFixture(),
          '/movie/603/images': imagesFixture(['/hd-poster.jpg']),
        })
      );

      const [movie, show] = await service.searchMedia('matrix', { enrich: true });

      expect(movie).toMatchObject({
        directors: ['Dana West', 'Fay South'],
        cast: ['Ada Stone', 'Ben Cole', 'Cy Moss'],
        posterPath: '/hd-poster.jpg',
      });
      // Show credits are missing from the stub: the hit is returned as is
      expect(show?.directors).toBeUndefined();
    });

    it('should require a TMDB client', async () => {
      await expect(createService(null).searchMedia('matrix')).rejects.toBeInstanceOf(ConfigurationError);
    });
  });

  describe('sortSearchResults', () => {
    const results = [
      searchResult({ tmdbId: 1, title: 'beta', rating: 5, releaseDate: '2001-01-01' }),
      searchResult({ tmdbId: 2, title: 'Alpha', rating: 9, releaseDate: null }),
      searchResult({ tmdbId: 3, title: 'gamma', rating: 7, releaseDate: '2010-06-15' }),
    ];

    const cases: Array<[SearchSort, number[]]> = [
      ['relevance', [1, 2, 3]],
      ['title', [2, 1, 3]],
      ['rating', [2, 3, 1]],
      ['date', [3, 1, 2]],
    ];

    it.each(cases)('should order by %s', (sort, expected) => {
      expect(sortSearchResults(results, sort).map(r => r.tmdbId)).toEqual(expected);
    });

    it('should not modify the input', () => {
      sortSearchResults(results, 'title');
      expect(results.map(r => r.tmdbId)).toEqual([1, 2, 3]);
    });
  });

  describe('browseUserMedia', () => {
    it("should return each media from the user's lists once, filtered and sorted", async () => {
      const user = await testDb.seedUser('alice');
      const other = await testDb.seedUser('bob');
      const lists = new ListService(testDb.db);
      const zulu = await testDb.seedMovie('Zulu');
      const alpha = await testDb.seedMovie('Alpha');
      const show = await testDb.seedShow('Mid Show', 10);
      const notMine = await testDb.seedMovie('Elsewhere');

      const first = await lists.createList(user, 'One');
      const second = await lists.createList(user, 'Two');
      await lists.addMediaToList(user, first, zulu);
      await lists.addMediaToList(user, first, show);
      await lists.addMediaToList(user, second, zulu);
      await lists.addMediaToList(user, second, alpha);
      await lists.addMediaToList(other, await lists.createList(other, 'Bob'), notMine);

      const service = createService(null);

      const byTitle = await service.browseUserMedia(user, { sort: 'title' });
      expect(byTitle.map(m => m.title)).toEqual(['Alpha', 'Mid Show', 'Zulu']);

      const movies = await service.browseUserMedia(user, { type: 'movie', sort: '-title' });
      expect(movies.map(m => m.title)).toEqual(['Zulu', 'Alpha']);

      const newest = await service.browseUserMedia(user);
      expect(newest.map(m => m.id)).toEqual([show.id, alpha.id, zulu.id]);
    });
  });
});
