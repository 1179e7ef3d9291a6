import bcrypt from 'bcryptjs';
import {
  createUser,
  getPasswordHashByUsername,
  getUserById,
  getUserByUsername
} from '../../src/services/user.service';
import { createFakeDatabase, makeUser, queryResult } from '../helpers';

describe('User service', () => {
  const newUser = { username: 'alice', email: 'alice@example.com', password: 'password123' };

  describe('createUser', () => {
    it('should insert the user with a hashed password', async () => {
      const { db, query } = createFakeDatabase();
      const user = makeUser();
      query
        .mockResolvedValueOnce(queryResult([]))
        .mockResolvedValueOnce(queryResult([]))
        .mockResolvedValueOnce(queryResult([user]));

      const result = await createUser(db, newUser, 4);

      expect(result).toEqual({ ok: true, value: user });
      expect(query).toHaveBeenCalledTimes(3);

      const [sql, params] = query.mock.calls[2];
      expect(sql).toContain('INSERT INTO users');
      expect(params[0]).toBe('alice');
      expect(params[1]).toBe('alice@example.com');
      expect(params[2]).not.toBe('password123');
      expect(await bcrypt.compare('password123', params[2])).toBe(true);
    });

    it('should reject a taken username without inserting', async () => {
      const { db, query } = createFakeDatabase();
      query.mockResolvedValueOnce(queryResult([{ id: 3 }]));

      const result = await createUser(db, newUser, 4);

      expect(result).toEqual({
        ok: false,
        error: { kind: 'Conflict', message: 'Username already exists' }
      });
      expect(query).toHaveBeenCalledTimes(1);
    });

    it('should reject a taken email without inserting', async () => {
      const { db, query } = createFakeDatabase();
      query
        .mockResolvedValueOnce(queryResult([]))
        .mockResolvedValueOnce(queryResult([{ id: 3 }]));

      const result = await createUser(db, newUser, 4);

      expect(result).toEqual({
        ok: false,
        error: { kind: 'Conflict', message: 'Email already registered' }
      });
      expect(query).toHaveBeenCalledTimes(2);
    });

    it('should report a unique violation from the insert as a conflict', async () => {
      const { db, query } = createFakeDatabase();
      query
        .mockResolvedValueOnce(queryResult([]))
        .mockResolvedValueOnce(queryResult([]))
        .mockRejectedValueOnce(Object.assign(new Error('duplicate key value'), { code: '23505' }));

      const result = await createUser(db, newUser, 4);

      expect(result).toEqual({
        ok: false,
        error: { kind: 'Conflict', message: 'Username or email already exists' }
      });
    });

    it('should rethrow other database errors', async () => {
      const { db, query } = createFakeDatabase();
      query
        .mockResolvedValueOnce(queryResult([]))
        .mockResolvedValueOnce(queryResult([]))
        .mockRejectedValueOnce(new Error('connection lost'));

      await expect(createUser(db, newUser, 4)).rejects.toThrow('connection lost');
    });
  });

  describe('lookups', () => {
    it('should return a user by username', async () => {
      const { db, query } = createFakeDatabase();
      const user = makeUser();
      query.mockResolvedValueOnce(queryResult([user]));

      await expect(getUserByUsername(db, 'alice')).resolves.toEqual(user);
      expect(query.mock.calls[0][1]).toEqual(['alice']);
    });

    it('should return null for an unknown username', async () => {
      const { db, query } = createFakeDatabase();
      query.mockResolvedValueOnce(queryResult([]));

      await expect(getUserByUsername(db, 'nobody')).resolves.toBeNull();
    });

    it('should return a user by id', async () => {
      const { db, query } = createFakeDatabase();
      const user = makeUser({ id: 42 });
      query.mockResolvedValueOnce(queryResult([user]));

      await expect(getUserById(db, 42)).resolves.toEqual(user);
      expect(query.mock.calls[0][1]).toEqual([42]);
    });

    it('should return the stored password hash', async () => {
      const { db, query } = createFakeDatabase();
      query.mockResolvedValueOnce(queryResult([{ password_hash: 'stored-hash' }]));

      await expect(getPasswordHashByUsername(db, 'alice')).resolves.toBe('stored-hash');
    });

    it('should return null when there is no password hash', async () => {
      const { db, query } = createFakeDatabase();
      query.mockResolvedValueOnce(queryResult([]));

      await expect(getPasswordHashByUsername(db, 'nobody')).resolves.toBeNull();
    });
  });
});
