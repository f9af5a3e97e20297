import { Router } from 'express';
import { DatabaseManager } from '../database/DatabaseManager.js';
import { TMDBClient } from '../services/providers/tmdb/TMDBClient.js';
import { ListService } from '../services/list/ListService.js';
import { EpisodeTrackingService } from '../services/media/EpisodeTrackingService.js';
import { MediaService } from '../services/media/MediaService.js';
import { MediaEnrichmentService } from '../services/enrichment/MediaEnrichmentService.js';
import { WatchHistoryService } from '../services/history/WatchHistoryService.js';
import { ProfileService } from '../services/profile/ProfileService.js';
import { UserService } from '../services/user/UserService.js';
import { AuthTokenService } from '../services/user/AuthTokenService.js';
import { AuthController } from '../controllers/authController.js';
import { ListController } from '../controllers/listController.js';
import { MediaController } from '../controllers/mediaController.js';
import { EpisodeController } from '../controllers/episodeController.js';
import { ProfileController } from '../controllers/profileController.js';
import { createAuthMiddleware } from '../middleware/auth.js';
import { rateLimitByIp } from '../middleware/security.js';
import { RATE_LIMITS } from '../config/constants.js';
import { AuthConfig } from '../config/types.js';

export interface ApiRouterOptions {
  auth: AuthConfig;
  /** null when no TMDB API key is configured */
  tmdbClient: TMDBClient | null;
}

// Initialize router factory function
export const createApiRouter = (dbManager: DatabaseManager, options: ApiRouterOptions): Router => {
  const router = Router();

  // Services
  const enrichmentService = new MediaEnrichmentService(options.tmdbClient);
  const listService = new ListService(dbManager);
  const episodeService = new EpisodeTrackingService(dbManager);
  const mediaService = new MediaService(dbManager, options.tmdbClient, enrichmentService);
  const historyService = new WatchHistoryService(dbManager, episodeService);
  const profileService = new ProfileService(dbManager, listService, episodeService);
  const userService = new UserService(dbManager);
  const tokenService = new AuthTokenService(dbManager, options.auth.tokenTtlHours);

  // Controllers
  const authController = new AuthController(userService, tokenService);
  const listController = new ListController(listService, mediaService, enrichmentService);
  const mediaController = new MediaController(mediaService, enrichmentService, episodeService, listService);
  const episodeController = new EpisodeController(episodeService, mediaService);
  const profileController = new ProfileController(profileService, historyService);

  const { requireAuth, optionalAuth } = createAuthMiddleware(tokenService);

  // ========================================
  // Auth
  // ========================================
  const authLimiter = rateLimitByIp(RATE_LIMITS.AUTH_WINDOW, RATE_LIMITS.AUTH_MAX_REQUESTS);

  router.post('/auth/register', authLimiter, (req, res, next) => authController.register(req, res, next));
  router.post('/auth/login', authLimiter, (req, res, next) => authController.login(req, res, next));
  router.post('/auth/logout', requireAuth, (req, res, next) => authController.logout(req, res, next));
  router.get('/auth/me', requireAuth, (req, res, next) => authController.getMe(req, res, next));
  router.patch('/auth/me', requireAuth, (req, res, next) => authController.updateMe(req, res, next));
  router.post('/auth/me/2fa/enable', requireAuth, (req, res, next) =>
    authController.enable2fa(req, res, next)
  );
  router.post('/auth/me/2fa/disable', requireAuth, (req, res, next) =>
    authController.disable2fa(req, res, next)
  );

  // ========================================
  // Lists
  // ========================================
  router.get('/lists', requireAuth, (req, res, next) => listController.getAll(req, res, next));
  router.post('/lists', requireAuth, (req, res, next) => listController.create(req, res, next));
  router.get('/lists/:id', optionalAuth, (req, res, next) => listController.getById(req, res, next));
  router.patch('/lists/:id', requireAuth, (req, res, next) => listController.update(req, res, next));
  router.delete('/lists/:id', requireAuth, (req, res, next) => listController.delete(req, res, next));
  router.post('/lists/:id/items', requireAuth, (req, res, next) => listController.addItem(req, res, next));
  router.delete('/lists/:id/items/:mediaId', requireAuth, (req, res, next) =>
    listController.removeItem(req, res, next)
  );
  router.put('/lists/:id/order', requireAuth, (req, res, next) => listController.reorder(req, res, next));

  router.post('/list-items/:itemId/move', requireAuth, (req, res, next) =>
    listController.moveItem(req, res, next)
  );
  router.patch('/list-items/:itemId/status', requireAuth, (req, res, next) =>
    listController.updateItemStatus(req, res, next)
  );

  // ========================================
  // Media
  // ========================================
  // Fixed paths before /media/:id
  router.get('/media/search', requireAuth, (req, res, next) => mediaController.search(req, res, next));
  router.get('/media/browse', requireAuth, (req, res, next) => mediaController.browse(req, res, next));
  router.post('/media/manual', requireAuth, (req, res, next) =>
    mediaController.createManual(req, res, next)
  );
  router.get('/media/details/:mediaType/:tmdbId', requireAuth, (req, res, next) =>
    mediaController.getRemoteDetails(req, res, next)
  );
  router.get('/media/:id', requireAuth, (req, res, next) => mediaController.getById(req, res, next));
  router.post('/media/:id/refresh', requireAuth, (req, res, next) =>
    mediaController.refresh(req, res, next)
  );

  // ========================================
  // Episodes
  // ========================================
  router.get('/shows/:id/episodes', requireAuth, (req, res, next) =>
    episodeController.getWatched(req, res, next)
  );
  router.post('/shows/:id/episodes', requireAuth, (req, res, next) =>
    episodeController.mark(req, res, next)
  );
  router.delete('/shows/:id/episodes/:season/:episode', requireAuth, (req, res, next) =>
    episodeController.unmark(req, res, next)
  );

  // ========================================
  // History & profiles
  // ========================================
  router.get('/history', requireAuth, (req, res, next) => profileController.getHistory(req, res, next));
  router.get('/profile', requireAuth, (req, res, next) => profileController.getOwn(req, res, next));
  router.patch('/profile', requireAuth, (req, res, next) => profileController.updateOwn(req, res, next));
  router.get('/profiles/:nickname', (req, res, next) => profileController.getPublic(req, res, next));

  return router;
};
