import { Request, Response, NextFunction } from 'express';
import { ProfileService } from '../services/profile/ProfileService.js';
import { WatchHistoryService } from '../services/history/WatchHistoryService.js';
import { getAuthenticatedUser } from '../middleware/auth.js';
import { parseInput } from '../middleware/validation.js';
import { nicknameParams, updateProfileSchema } from '../validation/profileSchemas.js';

export class ProfileController {
  constructor(
    private profileService: ProfileService,
    private historyService: WatchHistoryService
  ) {}

  /**
   * GET /api/profile - created with defaults on first access
   */
  async getOwn(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const profile = await this.profileService.getOrCreateProfile(getAuthenticatedUser(req));
      res.json({ profile });
    } catch (error) {
      next(error);
    }
  }

  async updateOwn(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const user = getAuthenticatedUser(req);
      const changes = parseInput(updateProfileSchema, req.body);

      const profile = await this.profileService.getOrCreateProfile(user);
      const updated = await this.profileService.updateProfile(user, profile, changes);
      res.json({ profile: updated });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /api/profiles/:nickname - no token needed; hidden profiles are 404
   */
  async getPublic(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { nickname } = parseInput(nicknameParams, req.params);
      const view = await this.profileService.getPublicProfileView(nickname);
      res.json(view);
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /api/history
   */
  async getHistory(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const entries = await this.historyService.getWatchHistory(getAuthenticatedUser(req));
      res.json({ entries });
    } catch (error) {
      next(error);
    }
  }
}
