import { Request, Response, NextFunction } from 'express';
import { EpisodeTrackingService } from '../services/media/EpisodeTrackingService.js';
import { MediaService } from '../services/media/MediaService.js';
import { getAuthenticatedUser } from '../middleware/auth.js';
import { commonSchemas, parseInput } from '../middleware/validation.js';
import { episodeParams, markEpisodeSchema } from '../validation/mediaSchemas.js';
import { ResourceNotFoundError, ValidationError } from '../errors/index.js';
import type { TvShow } from '../types/models.js';

export class EpisodeController {
  constructor(
    private episodeService: EpisodeTrackingService,
    private mediaService: MediaService
  ) {}

  /**
   * GET /api/shows/:id/episodes
   */
  async getWatched(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const user = getAuthenticatedUser(req);
      const { id } = parseInput(commonSchemas.idParams, req.params);
      const show = await this.getShow(id);

      const [episodes, progress] = await Promise.all([
        this.episodeService.getWatchedEpisodes(user, show),
        this.episodeService.getWatchProgress(user, show),
      ]);
      res.json({ episodes, progress });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /api/shows/:id/episodes - marking twice is not an error
   */
  async mark(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const user = getAuthenticatedUser(req);
      const { id } = parseInput(commonSchemas.idParams, req.params);
      const { season, episode } = parseInput(markEpisodeSchema, req.body);
      const show = await this.getShow(id);

      const watched = await this.episodeService.markEpisodeWatched(user, show, season, episode);
      const progress = await this.episodeService.getWatchProgress(user, show);
      res.status(201).json({ episode: watched, progress });
    } catch (error) {
      next(error);
    }
  }

  /**
   * DELETE /api/shows/:id/episodes/:season/:episode
   */
  async unmark(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const user = getAuthenticatedUser(req);
      const { id, season, episode } = parseInput(episodeParams, req.params);
      const show = await this.getShow(id);

      const removed = await this.episodeService.unmarkEpisodeWatched(user, show, season, episode);
      if (!removed) {
        throw new ResourceNotFoundError('watchedEpisode', `${id}/S${season}E${episode}`, 'Episode is not marked as watched', {
          service: 'EpisodeController',
          operation: 'unmark',
        });
      }
      res.status(204).send();
    } catch (error) {
      next(error);
    }
  }

  private async getShow(id: number): Promise<TvShow> {
    const media = await this.mediaService.getMediaById(id);
    if (media.mediaType !== 'TV_SHOW') {
      throw new ValidationError('Episodes can only be tracked for TV shows', {
        service: 'EpisodeController',
        entityType: 'media',
        entityId: id,
      });
    }
    return media;
  }
}
