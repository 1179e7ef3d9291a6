import { Response } from 'express';
import { AuthRequest, resolveCurrentUser } from '../middleware/auth.middleware';
import { completeOnboarding, resetOnboarding } from '../services/onboarding.service';
import { AppContext } from '../types/context';
import { errorText, sendError, sendServiceError, sendSuccess } from '../utils/response.util';
import { onboardingSchema, validatePayload } from '../utils/validators.util';

export const createOnboardingController = ({ db }: AppContext) => {
  const complete = async (req: AuthRequest, res: Response): Promise<void> => {
    try {
      const user = await resolveCurrentUser(db, req, res);
      if (!user) {
        return;
      }

      const payload = validatePayload(onboardingSchema, req.body);
      if (!payload.ok) {
        sendServiceError(res, payload.error);
        return;
      }

      const result = await completeOnboarding(db, user.id, payload.value.preferences);
      if (!result.ok) {
        sendServiceError(res, result.error);
        return;
      }

      sendSuccess(res, 200, 'Onboarding completed successfully', result.value);
    } catch (error) {
      console.error('Complete onboarding error:', error);
      sendError(res, 500, `Error completing onboarding: ${errorText(error)}`);
    }
  };

  const reset = async (req: AuthRequest, res: Response): Promise<void> => {
    try {
      const user = await resolveCurrentUser(db, req, res);
      if (!user) {
        return;
      }

      const result = await resetOnboarding(db, user.id);
      if (!result.ok) {
        sendServiceError(res, result.error);
        return;
      }

      sendSuccess(res, 200, 'Onboarding reset successfully', result.value);
    } catch (error) {
      console.error('Reset onboarding error:', error);
      sendError(res, 500, `Error resetting onboarding: ${errorText(error)}`);
    }
  };

  return { complete, reset };
};
