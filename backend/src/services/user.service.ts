import { Queryable } from '../config/database';
import { PublicUser, ServiceResult } from '../types';
import { hashPassword } from '../utils/crypto.util';
import { fail, ok } from '../utils/result.util';

export const PUBLIC_USER_COLUMNS = 'id, username, email, onboarding_done, used_in_collaborative';

const UNIQUE_VIOLATION = '23505';

export interface NewUser {
  username: string;
  email: string;
  password: string;
}

const isUniqueViolation = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === UNIQUE_VIOLATION;

export const createUser = async (
  db: Queryable,
  { username, email, password }: NewUser,
  saltRounds: number
): Promise<ServiceResult<PublicUser>> => {
  const existingUsername = await db.query('SELECT id FROM users WHERE username = $1', [username]);
  if (existingUsername.rows.length > 0) {
    return fail('Conflict', 'Username already exists');
  }

  const existingEmail = await db.query('SELECT id FROM users WHERE email = $1', [email]);
  if (existingEmail.rows.length > 0) {
    return fail('Conflict', 'Email already registered');
  }

  const passwordHash = await hashPassword(password, saltRounds);

  try {
    const result = await db.query<PublicUser>(
      `INSERT INTO users (username, email, password_hash)
       VALUES ($1, $2, $3)
       RETURNING ${PUBLIC_USER_COLUMNS}`,
      [username, email, passwordHash]
    );

    return ok(result.rows[0]);
  } catch (error) {
    // Lost a race with a concurrent registration
    if (isUniqueViolation(error)) {
      return fail('Conflict', 'Username or email already exists');
    }
    throw error;
  }
};

export const getUserById = async (db: Queryable, id: number): Promise<PublicUser | null> => {
  const result = await db.query<PublicUser>(
    `SELECT ${PUBLIC_USER_COLUMNS} FROM users WHERE id = $1`,
    [id]
  );

  return result.rows[0] ?? null;
};

export const getUserByUsername = async (
  db: Queryable,
  username: string
): Promise<PublicUser | null> => {
  const result = await db.query<PublicUser>(
    `SELECT ${PUBLIC_USER_COLUMNS} FROM users WHERE username = $1`,
    [username]
  );

  return result.rows[0] ?? null;
};

export const getPasswordHashByUsername = async (
  db: Queryable,
  username: string
): Promise<string | null> => {
  const result = await db.query<{ password_hash: string }>(
    'SELECT password_hash FROM users WHERE username = $1',
    [username]
  );

  return result.rows[0]?.password_hash ?? null;
};
