/**
 * Episode, History and Profile API Endpoint Tests
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import request from 'supertest';
import type { Movie, TvShow } from '../../src/types/models.js';
import { Session, TestApp, bearer, createTestApp, registerAndLogin } from '../utils/testApp.js';

describe('Episode, History and Profile API Endpoints', () => {
  let ctx: TestApp;
  let alice: Session;
  let show: TvShow;
  let movie: Movie;

  const markEpisode = (session: Session, season: number, episode: number) =>
    request(ctx.app.express)
      .post(`/api/shows/${show.id}/episodes`)
      .set('Authorization', bearer(session))
      .send({ season, episode });

  beforeEach(async () => {
    ctx = await createTestApp();
    alice = await registerAndLogin(ctx.app, 'alice');
    show = await ctx.testDb.seedShow('Night Shift', 3);
    movie = await ctx.testDb.seedMovie('Dune');
  });

  afterEach(async () => {
    await ctx.close();
  });

  describe('/api/shows/:id/episodes', () => {
    it('should mark episodes idempotently and report progress', async () => {
      const first = await markEpisode(alice, 1, 1);
      expect(first.status).toBe(201);
      expect(first.body.episode).toMatchObject({ tvShowId: show.id, seasonNumber: 1, episodeNumber: 1 });
      expect(first.body.progress).toEqual({ watchedEpisodes: 1, totalEpisodes: 3, progressPercentage: 33 });

      const again = await markEpisode(alice, 1, 1);
      expect(again.body.episode.id).toBe(first.body.episode.id);
      expect(again.body.progress.watchedEpisodes).toBe(1);

      const listing = await request(ctx.app.express)
        .get(`/api/shows/${show.id}/episodes`)
        .set('Authorization', bearer(alice));
      expect(listing.body.episodes).toHaveLength(1);
    });

    it('should unmark an episode once', async () => {
      await markEpisode(alice, 2, 4).expect(201);

      await request(ctx.app.express)
        .delete(`/api/shows/${show.id}/episodes/2/4`)
        .set('Authorization', bearer(alice))
        .expect(204);

      const again = await request(ctx.app.express)
        .delete(`/api/shows/${show.id}/episodes/2/4`)
        .set('Authorization', bearer(alice));
      expect(again.status).toBe(404);
      expect(again.body.error.message).toBe('Episode is not marked as watched');
    });

    it('should reject episode numbers out of range', async () => {
      const response = await markEpisode(alice, 0, 1);

      expect(response.status).toBe(400);
      expect(response.body.error.details[0].field).toBe('season');
    });

    it('should refuse to track episodes of a movie', async () => {
      const response = await request(ctx.app.express)
        .post(`/api/shows/${movie.id}/episodes`)
        .set('Authorization', bearer(alice))
        .send({ season: 1, episode: 1 });

      expect(response.status).toBe(400);
      expect(response.body.error.message).toBe('Episodes can only be tracked for TV shows');
    });
  });

  describe('GET /api/history', () => {
    it('should merge watched movies and episodes, newest first', async () => {
      const list = await request(ctx.app.express)
        .post('/api/lists')
        .set('Authorization', bearer(alice))
        .send({ name: 'Seen' });
      const added = await request(ctx.app.express)
        .post(`/api/lists/${list.body.list.id}/items`)
        .set('Authorization', bearer(alice))
        .send({ mediaId: movie.id });
      await request(ctx.app.express)
        .patch(`/api/list-items/${added.body.item.id}/status`)
        .set('Authorization', bearer(alice))
        .send({ status: 'WATCHED' })
        .expect(200);
      const marked = await markEpisode(alice, 1, 2);

      await ctx.testDb.setTimestamp('list_items', 'added_at', added.body.item.id, '2026-03-01 20:00:00');
      await ctx.testDb.setTimestamp('watched_episodes', 'watched_at', marked.body.episode.id, '2026-03-02 20:00:00');

      const response = await request(ctx.app.express).get('/api/history').set('Authorization', bearer(alice));

      expect(response.status).toBe(200);
      expect(
        response.body.entries.map((entry: { type: string; title: string; timestamp: string }) => [
          entry.type,
          entry.title,
          entry.timestamp,
        ])
      ).toEqual([
        ['episode', 'Night Shift - S1E2', '2026-03-02T20:00:00.000Z'],
        ['movie', 'Dune', '2026-03-01T20:00:00.000Z'],
      ]);
    });
  });

  describe('profiles', () => {
    it('should create the profile with defaults on first access', async () => {
      const response = await request(ctx.app.express).get('/api/profile').set('Authorization', bearer(alice));

      expect(response.status).toBe(200);
      expect(response.body.profile).toMatchObject({
        userId: alice.userId,
        bio: '',
        avatarUrl: '',
        isVisible: true,
        showWatchedEpisodes: true,
        showLists: true,
      });
    });

    it('should update the profile and validate the bio length', async () => {
      const updated = await request(ctx.app.express)
        .patch('/api/profile')
        .set('Authorization', bearer(alice))
        .send({ bio: 'Mostly documentaries', showLists: false });
      expect(updated.status).toBe(200);
      expect(updated.body.profile).toMatchObject({ bio: 'Mostly documentaries', showLists: false });

      const tooLong = await request(ctx.app.express)
        .patch('/api/profile')
        .set('Authorization', bearer(alice))
        .send({ bio: 'x'.repeat(501) });
      expect(tooLong.status).toBe(400);
      expect(tooLong.body.error.message).toBe('bio: Bio must be at most 500 characters');
    });

    it('should serve a public profile without a token', async () => {
      await request(ctx.app.express)
        .post('/api/lists')
        .set('Authorization', bearer(alice))
        .send({ name: 'Shared', isPublic: true });
      await request(ctx.app.express)
        .post('/api/lists')
        .set('Authorization', bearer(alice))
        .send({ name: 'Private' });
      await markEpisode(alice, 1, 1).expect(201);
      await request(ctx.app.express).get('/api/profile').set('Authorization', bearer(alice)).expect(200);

      const response = await request(ctx.app.express).get('/api/profiles/alice');

      expect(response.status).toBe(200);
      expect(response.body.user.nickname).toBe('alice');
      expect(response.body.lists.map((list: { name: string }) => list.name)).toEqual(['Shared']);
      expect(response.body.recentEpisodes).toHaveLength(1);
      expect(response.body.recentEpisodes[0].showTitle).toBe('Night Shift');
      expect(response.body.totalWatched).toBe(1);
    });

    it('should answer 404 for a hidden or missing profile', async () => {
      const missing = await request(ctx.app.express).get('/api/profiles/alice');
      expect(missing.status).toBe(404);

      await request(ctx.app.express)
        .patch('/api/profile')
        .set('Authorization', bearer(alice))
        .send({ isVisible: false })
        .expect(200);

      const hidden = await request(ctx.app.express).get('/api/profiles/alice');
      expect(hidden.status).toBe(404);
      expect(hidden.body.error.message).toBe('Profile not found or not public');
    });
  });
});
