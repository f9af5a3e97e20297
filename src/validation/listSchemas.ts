import { z } from 'zod';
import { commonSchemas } from '../middleware/validation.js';
import { MEDIA_TYPES, WATCH_STATUSES } from '../types/models.js';

/**
 * List Validation Schemas
 */

const listName = z.string().trim().min(1, 'List name is required').max(200);

export const createListSchema = z.object({
  name: listName,
  isPublic: z.boolean().default(false),
});

export const updateListSchema = z
  .object({
    name: listName.optional(),
    isPublic: z.boolean().optional(),
  })
  .refine(data => data.name !== undefined || data.isPublic !== undefined, {
    message: 'Nothing to update',
  });

/**
 * Add a stored media record, or import one from TMDB first
 */
export const addListItemSchema = z.union([
  z.object({ mediaId: commonSchemas.id }),
  z.object({
    tmdbId: commonSchemas.id,
    mediaType: z.enum(MEDIA_TYPES),
  }),
]);

export const reorderItemsSchema = z.object({
  itemIds: z.array(commonSchemas.id).max(10000),
});

export const moveItemSchema = z.object({
  targetListId: commonSchemas.id,
});

export const itemStatusSchema = z.object({
  status: z.enum(WATCH_STATUSES),
});

export const listMediaParams = z.object({
  id: commonSchemas.id,
  mediaId: commonSchemas.id,
});

export const itemParams = z.object({
  itemId: commonSchemas.id,
});
