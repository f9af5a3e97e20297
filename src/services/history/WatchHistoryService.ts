import { DatabaseManager } from '../../database/DatabaseManager.js';
import { PREFIXED_MEDIA_COLUMNS, mapRowToListItemWithMedia } from '../../database/mappers.js';
import { EpisodeTrackingService } from '../media/EpisodeTrackingService.js';
import { LIMITS } from '../../config/constants.js';
import type { ListItemMediaRow } from '../../types/database-models.js';
import type { UserRef, WatchHistoryEntry } from '../../types/models.js';

/**
 * Merged timeline of watched episodes and movies marked WATCHED in any list.
 * A movie's timestamp is when it was added to the list; the schema keeps no
 * separate "watched at" for list items.
 */
export class WatchHistoryService {
  constructor(
    private readonly db: DatabaseManager,
    private readonly episodes: EpisodeTrackingService
  ) {}

  async getWatchHistory(user: UserRef): Promise<WatchHistoryEntry[]> {
    const [recentEpisodes, movieRows] = await Promise.all([
      this.episodes.getRecentWatchedEpisodes(user, LIMITS.WATCH_HISTORY),
      this.db.query<ListItemMediaRow>(
        `SELECT li.*, ${PREFIXED_MEDIA_COLUMNS}
         FROM list_items li
         INNER JOIN lists l ON l.id = li.list_id
         INNER JOIN media m ON m.id = li.media_id
         WHERE l.user_id = ? AND li.status = 'WATCHED' AND m.media_type = 'MOVIE'
         ORDER BY li.added_at DESC, li.id DESC
         LIMIT ?`,
        [user.id, LIMITS.WATCH_HISTORY]
      ),
    ]);

    const entries: WatchHistoryEntry[] = recentEpisodes.map(episode => ({
      type: 'episode',
      title: `${episode.showTitle} - S${episode.seasonNumber}E${episode.episodeNumber}`,
      timestamp: episode.watchedAt,
      mediaId: episode.tvShowId,
      posterPath: episode.showPosterPath,
      seasonNumber: episode.seasonNumber,
      episodeNumber: episode.episodeNumber,
    }));

    for (const item of movieRows.map(mapRowToListItemWithMedia)) {
      entries.push({
        type: 'movie',
        title: item.media.title,
        timestamp: item.addedAt,
        mediaId: item.mediaId,
        posterPath: item.media.posterPath,
        listItemId: item.id,
      });
    }

    return entries.sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime());
  }
}
