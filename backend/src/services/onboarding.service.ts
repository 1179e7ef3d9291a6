import { Database, Queryable } from '../config/database';
import { PreferenceType, PublicUser, ServiceResult, UserPreferences } from '../types';
import { fail, ok } from '../utils/result.util';
import { PUBLIC_USER_COLUMNS } from './user.service';

export interface OnboardingState {
  user: PublicUser;
  preferences: UserPreferences;
}

interface PreferenceRow {
  preference_type: string;
  value: string;
}

const emptyPreferences = (): UserPreferences => ({ subject: [], level: [] });

const unique = (values: string[]): string[] => Array.from(new Set(values));

const lockOnboardingFlag = async (client: Queryable, userId: number): Promise<boolean | null> => {
  const result = await client.query<{ onboarding_done: boolean }>(
    'SELECT onboarding_done FROM users WHERE id = $1 FOR UPDATE',
    [userId]
  );

  return result.rows.length > 0 ? result.rows[0].onboarding_done : null;
};

const setOnboardingFlag = async (
  client: Queryable,
  userId: number,
  done: boolean
): Promise<PublicUser> => {
  const result = await client.query<PublicUser>(
    `UPDATE users SET onboarding_done = $2 WHERE id = $1 RETURNING ${PUBLIC_USER_COLUMNS}`,
    [userId, done]
  );

  return result.rows[0];
};

export const getUserPreferences = async (
  db: Queryable,
  userId: number
): Promise<UserPreferences> => {
  const result = await db.query<PreferenceRow>(
    'SELECT preference_type, value FROM user_preferences WHERE user_id = $1 ORDER BY id',
    [userId]
  );

  const preferences = emptyPreferences();
  for (const row of result.rows) {
    if (row.preference_type === PreferenceType.SUBJECT) {
      preferences.subject.push(row.value);
    } else if (row.preference_type === PreferenceType.LEVEL) {
      preferences.level.push(row.value);
    }
  }

  return preferences;
};

export const completeOnboarding = (
  db: Database,
  userId: number,
  preferences: UserPreferences
): Promise<ServiceResult<OnboardingState>> => {
  return db.transaction(async (client): Promise<ServiceResult<OnboardingState>> => {
    const onboardingDone = await lockOnboardingFlag(client, userId);

    if (onboardingDone === null) {
      return fail('NotFound', 'User not found');
    }
    if (onboardingDone) {
      return fail('StateViolation', 'Onboarding already completed');
    }

    const saved: UserPreferences = {
      subject: unique(preferences.subject),
      level: unique(preferences.level)
    };

    const types = [
      ...saved.subject.map(() => PreferenceType.SUBJECT),
      ...saved.level.map(() => PreferenceType.LEVEL)
    ];
    const values = [...saved.subject, ...saved.level];

    await client.query(
      `INSERT INTO user_preferences (user_id, preference_type, value)
       SELECT $1, t.preference_type, t.value
       FROM UNNEST($2::text[], $3::text[]) AS t(preference_type, value)`,
      [userId, types, values]
    );

    const user = await setOnboardingFlag(client, userId, true);

    return ok({ user, preferences: saved });
  });
};

export const resetOnboarding = (
  db: Database,
  userId: number
): Promise<ServiceResult<OnboardingState>> => {
  return db.transaction(async (client): Promise<ServiceResult<OnboardingState>> => {
    const onboardingDone = await lockOnboardingFlag(client, userId);

    if (onboardingDone === null) {
      return fail('NotFound', 'User not found');
    }
    if (!onboardingDone) {
      return fail('StateViolation', 'Onboarding has not been completed');
    }

    await client.query('DELETE FROM user_preferences WHERE user_id = $1', [userId]);
    const user = await setOnboardingFlag(client, userId, false);

    return ok({ user, preferences: emptyPreferences() });
  });
};
