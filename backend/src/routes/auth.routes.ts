import { Router } from 'express';
import { createAuthController } from '../controllers/auth.controller';
import { authenticate } from '../middleware/auth.middleware';
import { createRegisterLimiter } from '../middleware/rateLimit.middleware';
import { AppContext } from '../types/context';

export const createAuthRoutes = (ctx: AppContext): Router => {
  const router = Router();
  const { register, login, getProfile } = createAuthController(ctx);

  // Public routes
  router.post('/register', createRegisterLimiter(ctx.config), register);
  router.post('/login', login);

  // Authenticated routes
  router.get('/me', authenticate(ctx.config.jwt.secret), getProfile);

  return router;
};
