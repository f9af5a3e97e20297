import { DatabaseManager } from '../../database/DatabaseManager.js';
import {
  mapRowToWatchedEpisode,
  mapRowToWatchedEpisodeWithShow,
} from '../../database/mappers.js';
import { LIMITS } from '../../config/constants.js';
import type { CountRow, WatchedEpisodeRow, WatchedEpisodeShowRow } from '../../types/database-models.js';
import type {
  Media,
  TvShow,
  UserRef,
  WatchProgress,
  WatchedEpisode,
  WatchedEpisodeWithShow,
} from '../../types/models.js';
import { DatabaseError, ErrorCode, ValidationError } from '../../errors/index.js';

/**
 * Tracks which (season, episode) pairs of a show a user has watched.
 * Marking is idempotent: the (user, show, season, episode) tuple is unique.
 */
export class EpisodeTrackingService {
  constructor(private readonly db: DatabaseManager) {}

  async markEpisodeWatched(
    user: UserRef,
    show: Media,
    season: number,
    episode: number
  ): Promise<WatchedEpisode> {
    const tvShow = this.requireTvShow(show, 'markEpisodeWatched');
    this.validateEpisodeNumbers(season, episode, 'markEpisodeWatched');

    return this.db.transaction(async conn => {
      await conn.execute(
        `INSERT OR IGNORE INTO watched_episodes (user_id, tv_show_id, season_number, episode_number)
         VALUES (?, ?, ?, ?)`,
        [user.id, tvShow.id, season, episode]
      );

      const row = await conn.get<WatchedEpisodeRow>(
        `SELECT * FROM watched_episodes
         WHERE user_id = ? AND tv_show_id = ? AND season_number = ? AND episode_number = ?`,
        [user.id, tvShow.id, season, episode]
      );
      if (!row) {
        throw new DatabaseError(
          'Watched episode missing after insert',
          ErrorCode.DATABASE_QUERY_FAILED,
          false,
          {
            service: 'EpisodeTrackingService',
            operation: 'markEpisodeWatched',
            entityType: 'media',
            entityId: tvShow.id,
          }
        );
      }
      return mapRowToWatchedEpisode(row);
    });
  }

  /**
   * @returns false when the episode was not marked
   */
  async unmarkEpisodeWatched(
    user: UserRef,
    show: Media,
    season: number,
    episode: number
  ): Promise<boolean> {
    const result = await this.db.transaction(conn =>
      conn.execute(
        `DELETE FROM watched_episodes
         WHERE user_id = ? AND tv_show_id = ? AND season_number = ? AND episode_number = ?`,
        [user.id, show.id, season, episode]
      )
    );
    return result.affectedRows > 0;
  }

  async getWatchedEpisodes(user: UserRef, show: Media): Promise<WatchedEpisode[]> {
    const rows = await this.db.query<WatchedEpisodeRow>(
      `SELECT * FROM watched_episodes
       WHERE user_id = ? AND tv_show_id = ?
       ORDER BY season_number ASC, episode_number ASC`,
      [user.id, show.id]
    );
    return rows.map(mapRowToWatchedEpisode);
  }

  /**
   * Percentage is floored and capped at 100: stale catalog data can report
   * fewer episodes than the user has already marked.
   */
  async getWatchProgress(user: UserRef, show: TvShow): Promise<WatchProgress> {
    const row = await this.db.get<CountRow>(
      'SELECT COUNT(*) AS count FROM watched_episodes WHERE user_id = ? AND tv_show_id = ?',
      [user.id, show.id]
    );
    const watchedEpisodes = row?.count ?? 0;
    const totalEpisodes = show.numberOfEpisodes ?? 0;

    const progressPercentage =
      totalEpisodes > 0 ? Math.min(100, Math.floor((watchedEpisodes * 100) / totalEpisodes)) : 0;

    return { watchedEpisodes, totalEpisodes, progressPercentage };
  }

  async isEpisodeWatched(
    user: UserRef,
    show: Media,
    season: number,
    episode: number
  ): Promise<boolean> {
    const row = await this.db.get<{ id: number }>(
      `SELECT id FROM watched_episodes
       WHERE user_id = ? AND tv_show_id = ? AND season_number = ? AND episode_number = ?`,
      [user.id, show.id, season, episode]
    );
    return row !== undefined;
  }

  /**
   * Newest first, with the show's title and poster
   */
  async getRecentWatchedEpisodes(user: UserRef, limit: number): Promise<WatchedEpisodeWithShow[]> {
    const rows = await this.db.query<WatchedEpisodeShowRow>(
      `SELECT we.*, m.title AS show_title, m.poster_path AS show_poster_path
       FROM watched_episodes we
       INNER JOIN media m ON m.id = we.tv_show_id
       WHERE we.user_id = ?
       ORDER BY we.watched_at DESC, we.id DESC
       LIMIT ?`,
      [user.id, limit]
    );
    return rows.map(mapRowToWatchedEpisodeWithShow);
  }

  async countWatchedEpisodes(user: UserRef): Promise<number> {
    const row = await this.db.get<CountRow>(
      'SELECT COUNT(*) AS count FROM watched_episodes WHERE user_id = ?',
      [user.id]
    );
    return row?.count ?? 0;
  }

  private requireTvShow(show: Media, operation: string): TvShow {
    if (show.mediaType !== 'TV_SHOW') {
      throw new ValidationError('Episodes can only be tracked for TV shows', {
        service: 'EpisodeTrackingService',
        operation,
        entityType: 'media',
        entityId: show.id,
      });
    }
    return show;
  }

  private validateEpisodeNumbers(season: number, episode: number, operation: string): void {
    const valid = (value: number) =>
      Number.isInteger(value) && value >= 1 && value <= LIMITS.MAX_EPISODE_NUMBER;

    if (!valid(season) || !valid(episode)) {
      throw new ValidationError(
        `Season and episode must be whole numbers between 1 and ${LIMITS.MAX_EPISODE_NUMBER}`,
        {
          service: 'EpisodeTrackingService',
          operation,
          metadata: { season, episode },
        }
      );
    }
  }
}
