/**
 * UserService Tests
 *
 * Registration and login go through real argon2 hashing.
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { UserService, RegistrationData } from '../../src/services/user/UserService.js';
import { DuplicateEntryError, ResourceNotFoundError } from '../../src/errors/index.js';
import { TestDatabase, createTestDatabase } from '../utils/testDatabase.js';

const ALICE: RegistrationData = {
  username: 'alice',
  email: 'alice@example.com',
  nickname: 'ali',
  password: 'test-password',
};

describe('UserService', () => {
  let testDb: TestDatabase;
  let service: UserService;

  beforeEach(async () => {
    testDb = await createTestDatabase();
    service = new UserService(testDb.db);
  });

  afterEach(async () => {
    await testDb.destroy();
  });

  describe('registerUser', () => {
    it('should store an argon2 hash, never the password', async () => {
      const user = await service.registerUser(ALICE);

      expect(user.username).toBe('alice');
      expect(user.is2faEnabled).toBe(false);
      const row = await testDb.db.get<{ password_hash: string }>(
        'SELECT password_hash FROM users WHERE id = ?',
        [user.id]
      );
      expect(row?.password_hash.startsWith('$argon2id$')).toBe(true);
      expect(user).not.toHaveProperty('passwordHash');
    });

    it.each([
      [{ ...ALICE, email: 'other@example.com', nickname: 'other' }, 'Username already exists'],
      [{ ...ALICE, username: 'other', nickname: 'other' }, 'Email already exists'],
      [{ ...ALICE, username: 'other', email: 'other@example.com' }, 'Nickname already exists'],
    ])('should reject a taken field (%#)', async (data, message) => {
      await service.registerUser(ALICE);

      const attempt = service.registerUser(data);
      await expect(attempt).rejects.toBeInstanceOf(DuplicateEntryError);
      await expect(attempt).rejects.toMatchObject({ message });
    });

    it('should report the username first when several fields clash', async () => {
      await service.registerUser(ALICE);

      await expect(service.registerUser(ALICE)).rejects.toMatchObject({
        message: 'Username already exists',
      });
    });
  });

  describe('authenticateUser', () => {
    beforeEach(async () => {
      await service.registerUser(ALICE);
    });

    it('should accept the username or the email as login', async () => {
      expect((await service.authenticateUser('alice', 'test-password'))?.username).toBe('alice');
      expect((await service.authenticateUser('alice@example.com', 'test-password'))?.username).toBe(
        'alice'
      );
    });

    it('should return null for a wrong password or unknown login', async () => {
      expect(await service.authenticateUser('alice', 'wrong-password')).toBeNull();
      expect(await service.authenticateUser('nobody', 'test-password')).toBeNull();
    });

    it('should return null for accounts without an argon2 hash', async () => {
      await testDb.seedUser('legacy');

      expect(await service.authenticateUser('legacy', 'not-a-real-hash')).toBeNull();
    });
  });

  describe('updateUserProfile', () => {
    it('should change email and nickname', async () => {
      const user = await service.registerUser(ALICE);

      const updated = await service.updateUserProfile(user, {
        email: 'new@example.com',
        nickname: 'alice2',
      });
      expect(updated.email).toBe('new@example.com');
      expect(updated.nickname).toBe('alice2');
      expect((await service.getUserById(user.id)).nickname).toBe('alice2');
    });

    it('should allow resubmitting the current values', async () => {
      const user = await service.registerUser(ALICE);

      const updated = await service.updateUserProfile(user, { email: ALICE.email, nickname: 'ali' });
      expect(updated.email).toBe(ALICE.email);
      expect(updated.nickname).toBe('ali');
    });

    it("should reject another user's nickname", async () => {
      const user = await service.registerUser(ALICE);
      await testDb.seedUser('bob', { nickname: 'bobby' });

      await expect(service.updateUserProfile(user, { nickname: 'bobby' })).rejects.toMatchObject({
        message: 'Nickname already exists',
        statusCode: 409,
      });
    });
  });

  it('should toggle two-factor authentication', async () => {
    const user = await service.registerUser(ALICE);

    expect((await service.enable2fa(user)).is2faEnabled).toBe(true);
    expect((await service.getUserById(user.id)).is2faEnabled).toBe(true);
    expect((await service.disable2fa(user)).is2faEnabled).toBe(false);
  });

  it('should throw for an unknown user id', async () => {
    await expect(service.getUserById(999)).rejects.toBeInstanceOf(ResourceNotFoundError);
  });
});
