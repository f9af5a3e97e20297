import { Request, Response, NextFunction } from 'express';
import { ListService } from '../services/list/ListService.js';
import { MediaService } from '../services/media/MediaService.js';
import { MediaEnrichmentService } from '../services/enrichment/MediaEnrichmentService.js';
import { getAuthenticatedUser } from '../middleware/auth.js';
import { commonSchemas, parseInput } from '../middleware/validation.js';
import {
  addListItemSchema,
  createListSchema,
  itemParams,
  itemStatusSchema,
  listMediaParams,
  moveItemSchema,
  reorderItemsSchema,
  updateListSchema,
} from '../validation/listSchemas.js';
import { ResourceNotFoundError } from '../errors/index.js';
import type { Media } from '../types/models.js';

/**
 * Lists of other users: private ones answer 404, public ones are readable
 * and any write to them is refused by ListService with 403.
 */
export class ListController {
  constructor(
    private listService: ListService,
    private mediaService: MediaService,
    private enrichmentService: MediaEnrichmentService
  ) {}

  async getAll(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const lists = await this.listService.getUserLists(getAuthenticatedUser(req));
      res.json({ lists });
    } catch (error) {
      next(error);
    }
  }

  async create(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { name, isPublic } = parseInput(createListSchema, req.body);
      const list = await this.listService.createList(getAuthenticatedUser(req), name, isPublic);
      res.status(201).json({ list });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /api/lists/:id - public lists are visible without a token
   */
  async getById(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { id } = parseInput(commonSchemas.idParams, req.params);
      const list = await this.listService.getViewableList(req.user?.id ?? null, id);
      const items = await this.listService.getListItems(list);
      const enrichments = await this.enrichmentService.enrichMany(items.map(item => item.media));

      res.json({
        list,
        items: items.map((item, index) => ({ ...item, enrichment: enrichments[index] ?? null })),
      });
    } catch (error) {
      next(error);
    }
  }

  async update(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const user = getAuthenticatedUser(req);
      const { id } = parseInput(commonSchemas.idParams, req.params);
      const changes = parseInput(updateListSchema, req.body);

      const list = await this.listService.getViewableList(user.id, id);
      const updated = await this.listService.updateList(user, list, changes);
      res.json({ list: updated });
    } catch (error) {
      next(error);
    }
  }

  async delete(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const user = getAuthenticatedUser(req);
      const { id } = parseInput(commonSchemas.idParams, req.params);

      const list = await this.listService.getViewableList(user.id, id);
      await this.listService.deleteList(user, list);
      res.status(204).send();
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /api/lists/:id/items - `{ mediaId }` or `{ tmdbId, mediaType }`
   */
  async addItem(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const user = getAuthenticatedUser(req);
      const { id } = parseInput(commonSchemas.idParams, req.params);
      const input = parseInput(addListItemSchema, req.body);

      const list = await this.listService.getViewableList(user.id, id);
      const media: Media =
        'mediaId' in input
          ? await this.mediaService.getMediaById(input.mediaId)
          : await this.mediaService.createMediaFromTmdb(input.tmdbId, input.mediaType);

      const item = await this.listService.addMediaToList(user, list, media);
      res.status(201).json({ item: { ...item, media } });
    } catch (error) {
      next(error);
    }
  }

  async removeItem(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const user = getAuthenticatedUser(req);
      const { id, mediaId } = parseInput(listMediaParams, req.params);

      const list = await this.listService.getViewableList(user.id, id);
      const media = await this.mediaService.getMediaById(mediaId);
      const removed = await this.listService.removeMediaFromList(user, list, media);
      if (!removed) {
        throw new ResourceNotFoundError('listItem', mediaId, 'Media is not in this list', {
          service: 'ListController',
          operation: 'removeItem',
        });
      }
      res.status(204).send();
    } catch (error) {
      next(error);
    }
  }

  /**
   * PUT /api/lists/:id/order
   */
  async reorder(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const user = getAuthenticatedUser(req);
      const { id } = parseInput(commonSchemas.idParams, req.params);
      const { itemIds } = parseInput(reorderItemsSchema, req.body);

      const list = await this.listService.getViewableList(user.id, id);
      await this.listService.reorderItems(user, list, itemIds);
      const items = await this.listService.getListItems(list);
      res.json({ items });
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /api/list-items/:itemId/move
   */
  async moveItem(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const user = getAuthenticatedUser(req);
      const { itemId } = parseInput(itemParams, req.params);
      const { targetListId } = parseInput(moveItemSchema, req.body);

      const item = await this.listService.getOwnedListItem(user.id, itemId);
      // Another user's private list stays a 404; a public one is refused as cross-owner
      const target = await this.listService.getViewableList(user.id, targetListId);
      const moved = await this.listService.moveItemToList(user, item, target);
      res.json({ item: moved });
    } catch (error) {
      next(error);
    }
  }

  /**
   * PATCH /api/list-items/:itemId/status
   */
  async updateItemStatus(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const user = getAuthenticatedUser(req);
      const { itemId } = parseInput(itemParams, req.params);
      const { status } = parseInput(itemStatusSchema, req.body);

      const item = await this.listService.getOwnedListItem(user.id, itemId);
      const updated = await this.listService.updateItemStatus(user, item, status);
      res.json({ item: updated });
    } catch (error) {
      next(error);
    }
  }
}
