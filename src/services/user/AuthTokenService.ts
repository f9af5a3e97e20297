import crypto from 'crypto';
import { DatabaseManager } from '../../database/DatabaseManager.js';
import { mapRowToUser, parseTimestamp, toSqliteTimestamp } from '../../database/mappers.js';
import { TIME } from '../../config/constants.js';
import { logger } from '../../middleware/logging.js';
import type { AuthTokenRow, UserRow } from '../../types/database-models.js';
import type { User, UserRef } from '../../types/models.js';

export interface IssuedToken {
  token: string;
  expiresAt: Date;
}

type TokenUserRow = UserRow & {
  token_id: AuthTokenRow['id'];
  token_expires_at: AuthTokenRow['expires_at'];
};

function sha256Hex(input: string): string {
  return crypto.createHash('sha256').update(input).digest('hex');
}

/**
 * Opaque bearer tokens. Only the SHA-256 of a token is stored.
 */
export class AuthTokenService {
  constructor(
    private readonly db: DatabaseManager,
    private readonly ttlHours: number
  ) {}

  async issueToken(user: UserRef): Promise<IssuedToken> {
    const token = crypto.randomBytes(32).toString('hex');
    const expiresAt = new Date(Date.now() + this.ttlHours * TIME.ONE_HOUR);

    await this.db.execute('INSERT INTO auth_tokens (user_id, token_hash, expires_at) VALUES (?, ?, ?)', [
      user.id,
      sha256Hex(token),
      toSqliteTimestamp(expiresAt),
    ]);

    logger.debug('Auth token issued', { userId: user.id });
    return { token, expiresAt };
  }

  /**
   * The token's user, or null if the token is unknown or expired.
   * Expired tokens are deleted on sight.
   */
  async resolveToken(token: string): Promise<User | null> {
    const row = await this.db.get<TokenUserRow>(
      `SELECT u.*, t.id AS token_id, t.expires_at AS token_expires_at
       FROM auth_tokens t
       INNER JOIN users u ON u.id = t.user_id
       WHERE t.token_hash = ?`,
      [sha256Hex(token)]
    );
    if (!row) {
      return null;
    }

    if (parseTimestamp(row.token_expires_at).getTime() <= Date.now()) {
      await this.db.execute('DELETE FROM auth_tokens WHERE id = ?', [row.token_id]);
      return null;
    }

    return mapRowToUser(row);
  }

  /**
   * @returns false when the token was not found
   */
  async revokeToken(token: string): Promise<boolean> {
    const result = await this.db.execute('DELETE FROM auth_tokens WHERE token_hash = ?', [
      sha256Hex(token),
    ]);
    return result.affectedRows > 0;
  }
}
