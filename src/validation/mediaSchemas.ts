import { z } from 'zod';
import { commonSchemas } from '../middleware/validation.js';
import { LIMITS } from '../config/constants.js';
import { MEDIA_TYPES } from '../types/models.js';
import { BROWSE_SORTS, SEARCH_SORTS } from '../services/media/MediaService.js';

/**
 * Media Validation Schemas
 */

const tmdbKind = z.enum(['movie', 'tv']);

export const searchMediaQuery = z.object({
  q: z.string().trim().min(1, 'Search query is required').max(200),
  type: tmdbKind.optional(),
  enrich: commonSchemas.queryBoolean.optional(),
  sort: z.enum(SEARCH_SORTS).default('relevance'),
});

/**
 * `type=all` (or no type) browses movies and shows together
 */
export const browseMediaQuery = z.object({
  type: z
    .enum(['movie', 'tv', 'all'])
    .optional()
    .transform(value => (value === 'all' ? undefined : value)),
  sort: z.enum(BROWSE_SORTS).default('newest'),
});

export const manualMediaSchema = z.object({
  title: z.string().trim().min(1, 'Title is required').max(500),
  mediaType: z.enum(MEDIA_TYPES),
  originalTitle: z.string().trim().max(500).optional(),
  originalLanguage: z.string().trim().max(10).optional(),
  overview: z.string().max(10000).optional(),
  releaseDate: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, 'Release date must be YYYY-MM-DD')
    .nullable()
    .optional(),
  /** Also add the new record to this list */
  listId: commonSchemas.id.optional(),
});

export const remoteDetailsParams = z.object({
  mediaType: tmdbKind,
  tmdbId: commonSchemas.id,
});

const episodeNumber = z.coerce.number().int().min(1).max(LIMITS.MAX_EPISODE_NUMBER);

export const markEpisodeSchema = z.object({
  season: episodeNumber,
  episode: episodeNumber,
});

export const episodeParams = z.object({
  id: commonSchemas.id,
  season: episodeNumber,
  episode: episodeNumber,
});
