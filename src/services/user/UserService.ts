import { DatabaseManager } from '../../database/DatabaseManager.js';
import { mapRowToUser } from '../../database/mappers.js';
import { logger } from '../../middleware/logging.js';
import { buildUpdateQuery } from '../../utils/sqlBuilder.js';
import { hashPassword, verifyPassword } from '../../utils/passwordHash.js';
import type { DatabaseConnection } from '../../types/database.js';
import type { UserRow } from '../../types/database-models.js';
import type { User, UserRef } from '../../types/models.js';
import { DuplicateEntryError, ResourceNotFoundError } from '../../errors/index.js';

export interface RegistrationData {
  username: string;
  email: string;
  nickname: string;
  password: string;
}

export interface UserChanges {
  email?: string | undefined;
  nickname?: string | undefined;
}

type UniqueUserField = 'username' | 'email' | 'nickname';

const DUPLICATE_MESSAGES: Record<UniqueUserField, string> = {
  username: 'Username already exists',
  email: 'Email already exists',
  nickname: 'Nickname already exists',
};

/**
 * UserService
 *
 * Registration, credential checks and account settings. Username, email and
 * nickname are each unique; a clash is reported per field, checked in that
 * order.
 */
export class UserService {
  constructor(private readonly db: DatabaseManager) {}

  async registerUser(data: RegistrationData): Promise<User> {
    // Hashed outside the write lock
    const passwordHash = await hashPassword(data.password);

    const user = await this.db.transaction(async conn => {
      await this.assertAvailable(conn, 'username', data.username, null, 'registerUser');
      await this.assertAvailable(conn, 'email', data.email, null, 'registerUser');
      await this.assertAvailable(conn, 'nickname', data.nickname, null, 'registerUser');

      const result = await conn.execute(
        'INSERT INTO users (username, email, nickname, password_hash) VALUES (?, ?, ?, ?)',
        [data.username, data.email, data.nickname, passwordHash]
      );
      return this.requireUser(conn, Number(result.insertId), 'registerUser');
    });

    logger.info('User registered', { userId: user.id, username: user.username });
    return user;
  }

  /**
   * `login` may be the username or the email address.
   * @returns null when no account matches or the password is wrong
   */
  async authenticateUser(login: string, password: string): Promise<User | null> {
    const byUsername = await this.db.get<UserRow>('SELECT * FROM users WHERE username = ?', [login]);
    if (byUsername && (await verifyPassword(byUsername.password_hash, password))) {
      return mapRowToUser(byUsername);
    }

    const byEmail = await this.db.get<UserRow>('SELECT * FROM users WHERE email = ?', [login]);
    if (byEmail && (await verifyPassword(byEmail.password_hash, password))) {
      return mapRowToUser(byEmail);
    }

    logger.debug('Authentication failed', { login });
    return null;
  }

  async getUserById(id: number): Promise<User> {
    const row = await this.db.get<UserRow>('SELECT * FROM users WHERE id = ?', [id]);
    if (!row) {
      throw new ResourceNotFoundError('user', id, undefined, {
        service: 'UserService',
        operation: 'getUserById',
      });
    }
    return mapRowToUser(row);
  }

  /**
   * Values equal to the current ones are not re-checked for uniqueness
   */
  async updateUserProfile(user: UserRef, changes: UserChanges): Promise<User> {
    return this.db.transaction(async conn => {
      const current = await this.requireUser(conn, user.id, 'updateUserProfile');
      const updates: Partial<Record<'email' | 'nickname', string>> = {};

      if (changes.email !== undefined && changes.email !== current.email) {
        await this.assertAvailable(conn, 'email', changes.email, user.id, 'updateUserProfile');
        updates.email = changes.email;
      }
      if (changes.nickname !== undefined && changes.nickname !== current.nickname) {
        await this.assertAvailable(conn, 'nickname', changes.nickname, user.id, 'updateUserProfile');
        updates.nickname = changes.nickname;
      }

      if (updates.email === undefined && updates.nickname === undefined) {
        return current;
      }

      const { query, values } = buildUpdateQuery(
        'users',
        ['email', 'nickname'],
        updates,
        'id = ?',
        [user.id],
        { touchColumn: 'updated_at' }
      );
      await conn.execute(query, values);
      return this.requireUser(conn, user.id, 'updateUserProfile');
    });
  }

  async enable2fa(user: UserRef): Promise<User> {
    return this.set2fa(user, true);
  }

  async disable2fa(user: UserRef): Promise<User> {
    return this.set2fa(user, false);
  }

  private async set2fa(user: UserRef, enabled: boolean): Promise<User> {
    const operation = enabled ? 'enable2fa' : 'disable2fa';
    const updated = await this.db.transaction(async conn => {
      await this.requireUser(conn, user.id, operation);
      await conn.execute(
        'UPDATE users SET is_2fa_enabled = ?, updated_at = CURRENT_TIMESTAMP WHERE id = ?',
        [enabled, user.id]
      );
      return this.requireUser(conn, user.id, operation);
    });

    logger.info(enabled ? 'Two-factor authentication enabled' : 'Two-factor authentication disabled', {
      userId: user.id,
    });
    return updated;
  }

  private async assertAvailable(
    conn: DatabaseConnection,
    field: UniqueUserField,
    value: string,
    exceptUserId: number | null,
    operation: string
  ): Promise<void> {
    const row = await conn.get<{ id: number }>(`SELECT id FROM users WHERE ${field} = ?`, [value]);
    if (row && row.id !== exceptUserId) {
      throw new DuplicateEntryError('User', DUPLICATE_MESSAGES[field], {
        service: 'UserService',
        operation,
        metadata: { field },
      });
    }
  }

  private async requireUser(conn: DatabaseConnection, id: number, operation: string): Promise<User> {
    const row = await conn.get<UserRow>('SELECT * FROM users WHERE id = ?', [id]);
    if (!row) {
      throw new ResourceNotFoundError('user', id, undefined, {
        service: 'UserService',
        operation,
      });
    }
    return mapRowToUser(row);
  }
}
