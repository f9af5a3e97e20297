import { z } from 'zod';
import { MAX_BIO_LENGTH } from '../services/profile/ProfileService.js';

export const updateProfileSchema = z.object({
  bio: z.string().max(MAX_BIO_LENGTH, `Bio must be at most ${MAX_BIO_LENGTH} characters`).optional(),
  avatarUrl: z.union([z.literal(''), z.string().url('Invalid avatar URL').max(500)]).optional(),
  isVisible: z.boolean().optional(),
  showWatchedEpisodes: z.boolean().optional(),
  showLists: z.boolean().optional(),
});

export const nicknameParams = z.object({
  nickname: z.string().min(1).max(50),
});
