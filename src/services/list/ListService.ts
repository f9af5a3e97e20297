import { DatabaseManager } from '../../database/DatabaseManager.js';
import {
  PREFIXED_MEDIA_COLUMNS,
  mapRowToList,
  mapRowToListItem,
  mapRowToListItemWithMedia,
} from '../../database/mappers.js';
import { logger } from '../../middleware/logging.js';
import { buildUpdateQuery } from '../../utils/sqlBuilder.js';
import type { DatabaseConnection } from '../../types/database.js';
import type {
  CountRow,
  ListItemMediaRow,
  ListItemRow,
  ListRow,
} from '../../types/database-models.js';
import type {
  List,
  ListItem,
  ListItemWithMedia,
  Media,
  UserRef,
  WatchStatus,
} from '../../types/models.js';
import {
  AuthorizationError,
  CrossOwnerViolationError,
  DuplicateEntryError,
  ResourceNotFoundError,
} from '../../errors/index.js';

export interface ListChanges {
  name?: string | undefined;
  isPublic?: boolean | undefined;
}

/**
 * ListService
 *
 * Owns every mutation of lists and list items. Each mutating operation takes
 * the acting user and re-reads the list inside its transaction, so a stale or
 * foreign List object can never be written through.
 *
 * Ordering rules:
 * - a new item goes to max(position) + 1 (1 for an empty list)
 * - removal leaves gaps; only reorderItems rewrites positions
 */
export class ListService {
  constructor(private readonly db: DatabaseManager) {}

  async createList(owner: UserRef, name: string, isPublic: boolean = false): Promise<List> {
    const list = await this.db.transaction(async conn => {
      const result = await conn.execute(
        'INSERT INTO lists (user_id, name, is_public) VALUES (?, ?, ?)',
        [owner.id, name, isPublic]
      );
      return this.requireList(conn, Number(result.insertId), 'createList');
    });

    logger.info('List created', { listId: list.id, userId: owner.id });
    return list;
  }

  async updateList(actor: UserRef, list: List, changes: ListChanges): Promise<List> {
    return this.db.transaction(async conn => {
      await this.requireOwnedList(conn, actor, list.id, 'updateList');

      const updates = { name: changes.name, is_public: changes.isPublic };
      if (updates.name !== undefined || updates.is_public !== undefined) {
        const { query, values } = buildUpdateQuery(
          'lists',
          ['name', 'is_public'],
          updates,
          'id = ?',
          [list.id],
          { touchColumn: 'updated_at' }
        );
        await conn.execute(query, values);
      }

      return this.requireList(conn, list.id, 'updateList');
    });
  }

  /**
   * Items go with the list (ON DELETE CASCADE)
   */
  async deleteList(actor: UserRef, list: List): Promise<void> {
    await this.db.transaction(async conn => {
      await this.requireOwnedList(conn, actor, list.id, 'deleteList');
      await conn.execute('DELETE FROM lists WHERE id = ?', [list.id]);
    });

    logger.info('List deleted', { listId: list.id, userId: actor.id });
  }

  async addMediaToList(actor: UserRef, list: List, media: Media): Promise<ListItem> {
    return this.db.transaction(async conn => {
      await this.requireOwnedList(conn, actor, list.id, 'addMediaToList');

      const mediaRow = await conn.get<{ id: number }>('SELECT id FROM media WHERE id = ?', [
        media.id,
      ]);
      if (!mediaRow) {
        throw new ResourceNotFoundError('media', media.id, undefined, {
          service: 'ListService',
          operation: 'addMediaToList',
        });
      }

      if (await this.containsMedia(conn, list.id, media.id)) {
        throw new DuplicateEntryError('ListItem', 'Media is already in this list', {
          service: 'ListService',
          operation: 'addMediaToList',
          entityType: 'list',
          entityId: list.id,
          metadata: { mediaId: media.id },
        });
      }

      const position = await this.nextPosition(conn, list.id);
      const result = await conn.execute(
        "INSERT INTO list_items (list_id, media_id, position, status) VALUES (?, ?, ?, 'PLANNED')",
        [list.id, media.id, position]
      );

      return this.requireItem(conn, Number(result.insertId), 'addMediaToList');
    });
  }

  /**
   * @returns false when the media was not in the list
   */
  async removeMediaFromList(actor: UserRef, list: List, media: Media): Promise<boolean> {
    return this.db.transaction(async conn => {
      await this.requireOwnedList(conn, actor, list.id, 'removeMediaFromList');
      const result = await conn.execute(
        'DELETE FROM list_items WHERE list_id = ? AND media_id = ?',
        [list.id, media.id]
      );
      return result.affectedRows > 0;
    });
  }

  /**
   * Re-parent an item to another list of the same owner, at the end of that list
   */
  async moveItemToList(actor: UserRef, item: ListItem, targetList: List): Promise<ListItem> {
    return this.db.transaction(async conn => {
      const current = await this.requireItem(conn, item.id, 'moveItemToList');
      const source = await this.requireList(conn, current.listId, 'moveItemToList');
      const target = await this.requireList(conn, targetList.id, 'moveItemToList');

      if (source.userId !== target.userId) {
        throw new CrossOwnerViolationError(undefined, {
          service: 'ListService',
          operation: 'moveItemToList',
          entityType: 'listItem',
          entityId: item.id,
          metadata: { sourceListId: source.id, targetListId: target.id },
        });
      }

      this.assertOwner(actor, source, 'moveItemToList');

      if (await this.containsMedia(conn, target.id, current.mediaId)) {
        throw new DuplicateEntryError('ListItem', 'Media is already in the target list', {
          service: 'ListService',
          operation: 'moveItemToList',
          entityType: 'list',
          entityId: target.id,
          metadata: { mediaId: current.mediaId },
        });
      }

      const position = await this.nextPosition(conn, target.id);
      await conn.execute('UPDATE list_items SET list_id = ?, position = ? WHERE id = ?', [
        target.id,
        position,
        current.id,
      ]);

      return this.requireItem(conn, current.id, 'moveItemToList');
    });
  }

  /**
   * Assign position = 1-based index in orderedItemIds.
   * Ids of items in other lists are ignored; items left out keep their position.
   */
  async reorderItems(actor: UserRef, list: List, orderedItemIds: number[]): Promise<void> {
    await this.db.transaction(async conn => {
      await this.requireOwnedList(conn, actor, list.id, 'reorderItems');

      for (const [index, itemId] of orderedItemIds.entries()) {
        await conn.execute('UPDATE list_items SET position = ? WHERE id = ? AND list_id = ?', [
          index + 1,
          itemId,
          list.id,
        ]);
      }
    });
  }

  async updateItemStatus(actor: UserRef, item: ListItem, status: WatchStatus): Promise<ListItem> {
    return this.db.transaction(async conn => {
      const current = await this.requireItem(conn, item.id, 'updateItemStatus');
      await this.requireOwnedList(conn, actor, current.listId, 'updateItemStatus');

      await conn.execute('UPDATE list_items SET status = ? WHERE id = ?', [status, item.id]);
      return this.requireItem(conn, item.id, 'updateItemStatus');
    });
  }

  /**
   * Newest first
   */
  async getUserLists(owner: UserRef, includePrivate: boolean = true): Promise<List[]> {
    const rows = await this.db.query<ListRow>(
      `SELECT * FROM lists
       WHERE user_id = ? ${includePrivate ? '' : 'AND is_public = 1'}
       ORDER BY created_at DESC, id DESC`,
      [owner.id]
    );
    return rows.map(mapRowToList);
  }

  async countUserLists(owner: UserRef): Promise<number> {
    const row = await this.db.get<CountRow>('SELECT COUNT(*) AS count FROM lists WHERE user_id = ?', [
      owner.id,
    ]);
    return row?.count ?? 0;
  }

  /**
   * Items by position, media included. Throws if the list has been deleted.
   */
  async getListItems(list: List): Promise<ListItemWithMedia[]> {
    await this.getListById(list.id);

    const rows = await this.db.query<ListItemMediaRow>(
      `SELECT li.*, ${PREFIXED_MEDIA_COLUMNS}
       FROM list_items li
       INNER JOIN media m ON m.id = li.media_id
       WHERE li.list_id = ?
       ORDER BY li.position ASC, li.added_at DESC, li.id DESC`,
      [list.id]
    );
    return rows.map(mapRowToListItemWithMedia);
  }

  // ============================================
  // Lookups
  // ============================================

  async getListById(listId: number): Promise<List> {
    const row = await this.db.get<ListRow>('SELECT * FROM lists WHERE id = ?', [listId]);
    if (!row) {
      throw new ResourceNotFoundError('list', listId, undefined, {
        service: 'ListService',
        operation: 'getListById',
      });
    }
    return mapRowToList(row);
  }

  /**
   * Lists of other users are reported as missing, not forbidden
   */
  async getOwnedList(ownerId: number, listId: number): Promise<List> {
    const row = await this.db.get<ListRow>('SELECT * FROM lists WHERE id = ? AND user_id = ?', [
      listId,
      ownerId,
    ]);
    if (!row) {
      throw new ResourceNotFoundError('list', listId, undefined, {
        service: 'ListService',
        operation: 'getOwnedList',
      });
    }
    return mapRowToList(row);
  }

  /**
   * The owner sees any of their lists; everyone else only public ones
   */
  async getViewableList(viewerId: number | null, listId: number): Promise<List> {
    const list = await this.getListById(listId);
    if (list.userId !== viewerId && !list.isPublic) {
      throw new ResourceNotFoundError('list', listId, undefined, {
        service: 'ListService',
        operation: 'getViewableList',
      });
    }
    return list;
  }

  async getOwnedListItem(ownerId: number, itemId: number): Promise<ListItem> {
    const row = await this.db.get<ListItemRow>(
      `SELECT li.* FROM list_items li
       INNER JOIN lists l ON l.id = li.list_id
       WHERE li.id = ? AND l.user_id = ?`,
      [itemId, ownerId]
    );
    if (!row) {
      throw new ResourceNotFoundError('listItem', itemId, undefined, {
        service: 'ListService',
        operation: 'getOwnedListItem',
      });
    }
    return mapRowToListItem(row);
  }

  // ============================================
  // Transaction helpers (use the transaction's connection)
  // ============================================

  private async requireList(conn: DatabaseConnection, listId: number, operation: string): Promise<List> {
    const row = await conn.get<ListRow>('SELECT * FROM lists WHERE id = ?', [listId]);
    if (!row) {
      throw new ResourceNotFoundError('list', listId, undefined, {
        service: 'ListService',
        operation,
      });
    }
    return mapRowToList(row);
  }

  private async requireOwnedList(
    conn: DatabaseConnection,
    actor: UserRef,
    listId: number,
    operation: string
  ): Promise<List> {
    const list = await this.requireList(conn, listId, operation);
    this.assertOwner(actor, list, operation);
    return list;
  }

  private assertOwner(actor: UserRef, list: List, operation: string): void {
    if (list.userId !== actor.id) {
      throw new AuthorizationError(operation, 'You do not own this list', {
        service: 'ListService',
        operation,
        entityType: 'list',
        entityId: list.id,
      });
    }
  }

  private async requireItem(conn: DatabaseConnection, itemId: number, operation: string): Promise<ListItem> {
    const row = await conn.get<ListItemRow>('SELECT * FROM list_items WHERE id = ?', [itemId]);
    if (!row) {
      throw new ResourceNotFoundError('listItem', itemId, undefined, {
        service: 'ListService',
        operation,
      });
    }
    return mapRowToListItem(row);
  }

  private async containsMedia(conn: DatabaseConnection, listId: number, mediaId: number): Promise<boolean> {
    const row = await conn.get<{ id: number }>(
      'SELECT id FROM list_items WHERE list_id = ? AND media_id = ?',
      [listId, mediaId]
    );
    return row !== undefined;
  }

  private async nextPosition(conn: DatabaseConnection, listId: number): Promise<number> {
    const row = await conn.get<{ max_position: number | null }>(
      'SELECT MAX(position) AS max_position FROM list_items WHERE list_id = ?',
      [listId]
    );
    return (row?.max_position ?? 0) + 1;
  }
}
