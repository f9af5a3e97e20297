import { DatabaseManager } from '../../database/DatabaseManager.js';
import { mapRowToPublicProfile, parseTimestamp } from '../../database/mappers.js';
import { ListService } from '../list/ListService.js';
import { EpisodeTrackingService } from '../media/EpisodeTrackingService.js';
import { LIMITS } from '../../config/constants.js';
import { logger } from '../../middleware/logging.js';
import { buildUpdateQuery } from '../../utils/sqlBuilder.js';
import type { DatabaseConnection } from '../../types/database.js';
import type { PublicProfileRow } from '../../types/database-models.js';
import type { PublicProfile, PublicProfileView, UserRef } from '../../types/models.js';
import {
  AuthorizationError,
  DuplicateEntryError,
  ResourceNotFoundError,
  ValidationError,
} from '../../errors/index.js';

export const MAX_BIO_LENGTH = 500;

export interface ProfileChanges {
  bio?: string | undefined;
  avatarUrl?: string | undefined;
  isVisible?: boolean | undefined;
  showWatchedEpisodes?: boolean | undefined;
  showLists?: boolean | undefined;
}

type ProfileOwnerRow = PublicProfileRow & { nickname: string; user_created_at: string };

/**
 * ProfileService
 *
 * One public profile per user. Profiles start visible, with lists and
 * watched episodes shown.
 */
export class ProfileService {
  constructor(
    private readonly db: DatabaseManager,
    private readonly lists: ListService,
    private readonly episodes: EpisodeTrackingService
  ) {}

  async createProfile(user: UserRef): Promise<PublicProfile> {
    const profile = await this.db.transaction(async conn => {
      if (await this.findProfile(conn, user.id)) {
        throw new DuplicateEntryError('PublicProfile', 'User already has a public profile', {
          service: 'ProfileService',
          operation: 'createProfile',
          entityType: 'user',
          entityId: user.id,
        });
      }

      await conn.execute('INSERT INTO public_profiles (user_id) VALUES (?)', [user.id]);
      return this.requireProfile(conn, user.id, 'createProfile');
    });

    logger.info('Public profile created', { userId: user.id, profileId: profile.id });
    return profile;
  }

  async getOrCreateProfile(user: UserRef): Promise<PublicProfile> {
    return this.db.transaction(async conn => {
      await conn.execute('INSERT OR IGNORE INTO public_profiles (user_id) VALUES (?)', [user.id]);
      return this.requireProfile(conn, user.id, 'getOrCreateProfile');
    });
  }

  async updateProfile(actor: UserRef, profile: PublicProfile, changes: ProfileChanges): Promise<PublicProfile> {
    if (changes.bio !== undefined && changes.bio.length > MAX_BIO_LENGTH) {
      throw new ValidationError(`Bio must be at most ${MAX_BIO_LENGTH} characters`, {
        service: 'ProfileService',
        operation: 'updateProfile',
        entityType: 'profile',
        entityId: profile.id,
      });
    }

    return this.db.transaction(async conn => {
      const row = await conn.get<PublicProfileRow>('SELECT * FROM public_profiles WHERE id = ?', [
        profile.id,
      ]);
      if (!row) {
        throw new ResourceNotFoundError('profile', profile.id, undefined, {
          service: 'ProfileService',
          operation: 'updateProfile',
        });
      }
      if (row.user_id !== actor.id) {
        throw new AuthorizationError('updateProfile', 'You do not own this profile', {
          service: 'ProfileService',
          entityType: 'profile',
          entityId: profile.id,
        });
      }

      const updates = {
        bio: changes.bio,
        avatar_url: changes.avatarUrl,
        is_visible: changes.isVisible,
        show_watched_episodes: changes.showWatchedEpisodes,
        show_lists: changes.showLists,
      };
      if (Object.values(updates).some(value => value !== undefined)) {
        const { query, values } = buildUpdateQuery(
          'public_profiles',
          ['bio', 'avatar_url', 'is_visible', 'show_watched_episodes', 'show_lists'],
          updates,
          'id = ?',
          [profile.id],
          { touchColumn: 'updated_at' }
        );
        await conn.execute(query, values);
      }

      return this.requireProfile(conn, row.user_id, 'updateProfile');
    });
  }

  /**
   * Hidden profiles are reported the same as missing ones
   */
  async getProfileByNickname(nickname: string): Promise<PublicProfile | null> {
    const row = await this.findVisibleByNickname(nickname);
    return row ? mapRowToPublicProfile(row) : null;
  }

  async getPublicProfileView(nickname: string): Promise<PublicProfileView> {
    const row = await this.findVisibleByNickname(nickname);
    if (!row) {
      throw new ResourceNotFoundError('profile', nickname, 'Profile not found or not public', {
        service: 'ProfileService',
        operation: 'getPublicProfileView',
      });
    }

    const profile = mapRowToPublicProfile(row);
    const owner: UserRef = { id: profile.userId };

    const [lists, recentEpisodes, totalLists, totalWatched] = await Promise.all([
      profile.showLists ? this.lists.getUserLists(owner, false) : Promise.resolve([]),
      profile.showWatchedEpisodes
        ? this.episodes.getRecentWatchedEpisodes(owner, LIMITS.PROFILE_RECENT_EPISODES)
        : Promise.resolve([]),
      this.lists.countUserLists(owner),
      this.episodes.countWatchedEpisodes(owner),
    ]);

    return {
      profile,
      user: { nickname: row.nickname, createdAt: parseTimestamp(row.user_created_at) },
      lists,
      recentEpisodes,
      totalLists,
      totalWatched,
    };
  }

  private async findVisibleByNickname(nickname: string): Promise<ProfileOwnerRow | undefined> {
    return this.db.get<ProfileOwnerRow>(
      `SELECT p.*, u.nickname AS nickname, u.created_at AS user_created_at
       FROM public_profiles p
       INNER JOIN users u ON u.id = p.user_id
       WHERE u.nickname = ? AND p.is_visible = 1`,
      [nickname]
    );
  }

  private async findProfile(conn: DatabaseConnection, userId: number): Promise<PublicProfile | null> {
    const row = await conn.get<PublicProfileRow>('SELECT * FROM public_profiles WHERE user_id = ?', [
      userId,
    ]);
    return row ? mapRowToPublicProfile(row) : null;
  }

  private async requireProfile(conn: DatabaseConnection, userId: number, operation: string): Promise<PublicProfile> {
    const profile = await this.findProfile(conn, userId);
    if (!profile) {
      throw new ResourceNotFoundError('profile', userId, undefined, {
        service: 'ProfileService',
        operation,
      });
    }
    return profile;
  }
}
