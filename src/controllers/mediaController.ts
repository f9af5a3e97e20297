import { Request, Response, NextFunction } from 'express';
import { MediaService } from '../services/media/MediaService.js';
import { MediaEnrichmentService } from '../services/enrichment/MediaEnrichmentService.js';
import { EpisodeTrackingService } from '../services/media/EpisodeTrackingService.js';
import { ListService } from '../services/list/ListService.js';
import { getAuthenticatedUser } from '../middleware/auth.js';
import { commonSchemas, parseInput } from '../middleware/validation.js';
import {
  browseMediaQuery,
  manualMediaSchema,
  remoteDetailsParams,
  searchMediaQuery,
} from '../validation/mediaSchemas.js';

export class MediaController {
  constructor(
    private mediaService: MediaService,
    private enrichmentService: MediaEnrichmentService,
    private episodeService: EpisodeTrackingService,
    private listService: ListService
  ) {}

  /**
   * GET /api/media/search?q=&type=movie|tv&enrich=true&sort=
   */
  async search(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { q, type, enrich, sort } = parseInput(searchMediaQuery, req.query);
      const results = await this.mediaService.searchMedia(q, { type, enrich, sort });
      res.json({ query: q, results });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /api/media/browse?type=&sort=
   */
  async browse(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { type, sort } = parseInput(browseMediaQuery, req.query);
      const media = await this.mediaService.browseUserMedia(getAuthenticatedUser(req), { type, sort });
      res.json({ media });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /api/media/manual - optional `listId` also adds the new record to that list
   */
  async createManual(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const user = getAuthenticatedUser(req);
      const { listId, ...fields } = parseInput(manualMediaSchema, req.body);

      // Resolve the list first so a bad listId creates nothing
      const list = listId !== undefined ? await this.listService.getOwnedList(user.id, listId) : null;
      const media = await this.mediaService.createManualMedia(fields);
      const item = list ? await this.listService.addMediaToList(user, list, media) : null;

      res.status(201).json({ media, item });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /api/media/:id - stored record, live enrichment and (for shows) the user's progress
   */
  async getById(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const user = getAuthenticatedUser(req);
      const { id } = parseInput(commonSchemas.idParams, req.params);

      const media = await this.mediaService.getMediaById(id);
      const [enrichment, progress] = await Promise.all([
        this.enrichmentService.enrich(media),
        media.mediaType === 'TV_SHOW'
          ? this.episodeService.getWatchProgress(user, media)
          : Promise.resolve(null),
      ]);

      res.json({ media, enrichment, progress });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /api/media/:id/refresh
   */
  async refresh(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { id } = parseInput(commonSchemas.idParams, req.params);
      const media = await this.mediaService.getMediaById(id);
      const refreshed = await this.mediaService.updateMediaMetadata(media);
      res.json({ media: refreshed });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /api/media/details/:mediaType/:tmdbId - straight from TMDB, nothing stored
   */
  async getRemoteDetails(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { mediaType, tmdbId } = parseInput(remoteDetailsParams, req.params);
      const details = await this.enrichmentService.getRemoteDetails(mediaType, tmdbId);
      res.json({ details });
    } catch (error) {
      next(error);
    }
  }
}
