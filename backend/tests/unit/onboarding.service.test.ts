import {
  completeOnboarding,
  getUserPreferences,
  resetOnboarding
} from '../../src/services/onboarding.service';
import { createFakeDatabase, makeUser, queryResult } from '../helpers';

describe('Onboarding service', () => {
  describe('completeOnboarding', () => {
    it('should save de-duplicated preferences and set the flag', async () => {
      const { db, query, transaction } = createFakeDatabase();
      const onboarded = makeUser({ onboarding_done: true });
      query
        .mockResolvedValueOnce(queryResult([{ onboarding_done: false }]))
        .mockResolvedValueOnce(queryResult([], 2))
        .mockResolvedValueOnce(queryResult([onboarded]));

      const result = await completeOnboarding(db, 1, {
        subject: ['Web Development', 'Web Development'],
        level: ['Beginner Level']
      });

      expect(transaction).toHaveBeenCalledTimes(1);
      expect(result).toEqual({
        ok: true,
        value: {
          user: onboarded,
          preferences: { subject: ['Web Development'], level: ['Beginner Level'] }
        }
      });

      expect(query.mock.calls[0][0]).toContain('FOR UPDATE');
      expect(query.mock.calls[1][1]).toEqual([
        1,
        ['subject', 'level'],
        ['Web Development', 'Beginner Level']
      ]);
      expect(query.mock.calls[2][1]).toEqual([1, true]);
    });

    it('should refuse a second completion', async () => {
      const { db, query } = createFakeDatabase();
      query.mockResolvedValueOnce(queryResult([{ onboarding_done: true }]));

      const result = await completeOnboarding(db, 1, {
        subject: ['Graphics Design'],
        level: ['All Levels']
      });

      expect(result).toEqual({
        ok: false,
        error: { kind: 'StateViolation', message: 'Onboarding already completed' }
      });
      expect(query).toHaveBeenCalledTimes(1);
    });

    it('should report a missing user', async () => {
      const { db, query } = createFakeDatabase();
      query.mockResolvedValueOnce(queryResult([]));

      const result = await completeOnboarding(db, 404, {
        subject: ['Graphics Design'],
        level: ['All Levels']
      });

      expect(result).toEqual({ ok: false, error: { kind: 'NotFound', message: 'User not found' } });
    });
  });

  describe('resetOnboarding', () => {
    it('should delete preferences and clear the flag', async () => {
      const { db, query } = createFakeDatabase();
      const reset = makeUser({ onboarding_done: false });
      query
        .mockResolvedValueOnce(queryResult([{ onboarding_done: true }]))
        .mockResolvedValueOnce(queryResult([], 3))
        .mockResolvedValueOnce(queryResult([reset]));

      const result = await resetOnboarding(db, 1);

      expect(result).toEqual({
        ok: true,
        value: { user: reset, preferences: { subject: [], level: [] } }
      });
      expect(query.mock.calls[1]).toEqual(['DELETE FROM user_preferences WHERE user_id = $1', [1]]);
      expect(query.mock.calls[2][1]).toEqual([1, false]);
    });

    it('should refuse to reset before onboarding is done', async () => {
      const { db, query } = createFakeDatabase();
      query.mockResolvedValueOnce(queryResult([{ onboarding_done: false }]));

      const result = await resetOnboarding(db, 1);

      expect(result).toEqual({
        ok: false,
        error: { kind: 'StateViolation', message: 'Onboarding has not been completed' }
      });
      expect(query).toHaveBeenCalledTimes(1);
    });
  });

  describe('getUserPreferences', () => {
    it('should group rows by preference type', async () => {
      const { db, query } = createFakeDatabase();
      query.mockResolvedValueOnce(
        queryResult([
          { preference_type: 'subject', value: 'Business Finance' },
          { preference_type: 'level', value: 'Expert Level' },
          { preference_type: 'subject', value: 'Musical Instruments' },
          { preference_type: 'language', value: 'English' }
        ])
      );

      await expect(getUserPreferences(db, 1)).resolves.toEqual({
        subject: ['Business Finance', 'Musical Instruments'],
        level: ['Expert Level']
      });
    });
  });
});
