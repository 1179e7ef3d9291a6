import { Router } from 'express';
import { createInteractionController } from '../controllers/interaction.controller';
import { authenticate } from '../middleware/auth.middleware';
import { AppContext } from '../types/context';

export const createInteractionRoutes = (ctx: AppContext): Router => {
  const router = Router();
  const { logInteraction, listInteractions, deleteInteraction } = createInteractionController(ctx);

  router.use(authenticate(ctx.config.jwt.secret));

  router.post('/', logInteraction);
  router.get('/', listInteractions);
  router.delete('/:id', deleteInteraction);

  return router;
};
