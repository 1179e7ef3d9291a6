import { Router } from 'express';
import { createOnboardingController } from '../controllers/onboarding.controller';
import { authenticate } from '../middleware/auth.middleware';
import { AppContext } from '../types/context';

export const createOnboardingRoutes = (ctx: AppContext): Router => {
  const router = Router();
  const { complete, reset } = createOnboardingController(ctx);

  router.post('/', authenticate(ctx.config.jwt.secret), complete);
  router.delete('/', authenticate(ctx.config.jwt.secret), reset);

  return router;
};
