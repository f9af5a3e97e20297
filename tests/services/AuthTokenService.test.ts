/**
 * AuthTokenService Tests
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import crypto from 'crypto';
import { AuthTokenService } from '../../src/services/user/AuthTokenService.js';
import type { User } from '../../src/types/models.js';
import { TestDatabase, createTestDatabase } from '../utils/testDatabase.js';

describe('AuthTokenService', () => {
  let testDb: TestDatabase;
  let service: AuthTokenService;
  let user: User;

  beforeEach(async () => {
    testDb = await createTestDatabase();
    service = new AuthTokenService(testDb.db, 24);
    user = await testDb.seedUser('alice');
  });

  afterEach(async () => {
    await testDb.destroy();
  });

  it('should resolve an issued token to its user', async () => {
    const { token, expiresAt } = await service.issueToken(user);

    expect(token).toMatch(/^[0-9a-f]{64}$/);
    expect(expiresAt.getTime()).toBeGreaterThan(Date.now());
    expect((await service.resolveToken(token))?.id).toBe(user.id);
  });

  it('should store only the SHA-256 of the token', async () => {
    const { token } = await service.issueToken(user);

    const rows = await testDb.db.query<{ token_hash: string }>('SELECT token_hash FROM auth_tokens');
    expect(rows).toEqual([{ token_hash: crypto.createHash('sha256').update(token).digest('hex') }]);
  });

  it('should return null for an unknown token', async () => {
    expect(await service.resolveToken('0'.repeat(64))).toBeNull();
  });

  it('should reject and delete an expired token', async () => {
    const expired = new AuthTokenService(testDb.db, -1);
    const { token } = await expired.issueToken(user);

    expect(await service.resolveToken(token)).toBeNull();
    expect(await testDb.db.query('SELECT id FROM auth_tokens')).toEqual([]);
  });

  it('should revoke a single token', async () => {
    const { token } = await service.issueToken(user);

    expect(await service.revokeToken(token)).toBe(true);
    expect(await service.revokeToken(token)).toBe(false);
    expect(await service.resolveToken(token)).toBeNull();
  });
});
