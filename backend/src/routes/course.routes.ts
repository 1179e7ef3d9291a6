import { Router } from 'express';
import { createCourseController } from '../controllers/course.controller';
import { AppContext } from '../types/context';

export const createCourseRoutes = (ctx: AppContext): Router => {
  const router = Router();
  const { getCourses, getRandom, getCourse, getRecommendations } = createCourseController(ctx);

  // Catalogue routes are public
  router.get('/', getCourses);
  router.get('/random', getRandom);
  router.get('/:id', getCourse);
  router.get('/:id/recommendations', getRecommendations);

  return router;
};
