import cors from 'cors';
import express, { Application, ErrorRequestHandler } from 'express';
import helmet from 'helmet';
import morgan from 'morgan';
import { createAuthRoutes } from './routes/auth.routes';
import { createCourseRoutes } from './routes/course.routes';
import { createInteractionRoutes } from './routes/interaction.routes';
import { createOnboardingRoutes } from './routes/onboarding.routes';
import { AppContext } from './types/context';
import { errorText, sendError, sendSuccess } from './utils/response.util';

const isBodyParseError = (error: unknown): boolean =>
  typeof error === 'object' &&
  error !== null &&
  'type' in error &&
  error.type === 'entity.parse.failed';

const handleError: ErrorRequestHandler = (error, _req, res, _next) => {
  // Unparseable JSON is treated like a missing body
  if (isBodyParseError(error)) {
    sendError(res, 400, 'No data provided');
    return;
  }

  console.error('Unhandled error:', error);
  sendError(res, 500, `Internal server error: ${errorText(error)}`);
};

export const createApp = (ctx: AppContext): Application => {
  const app = express();

  app.use(helmet());
  app.use(cors({ origin: ctx.config.corsOrigin }));
  if (ctx.config.nodeEnv !== 'test') {
    app.use(morgan(ctx.config.nodeEnv === 'production' ? 'combined' : 'dev'));
  }
  app.use(express.json());

  app.get('/health', (_req, res) => {
    sendSuccess(res, 200, 'Service is healthy', { uptime: process.uptime() });
  });

  app.use(createAuthRoutes(ctx));
  app.use('/onboarding', createOnboardingRoutes(ctx));
  app.use('/interactions', createInteractionRoutes(ctx));
  app.use('/courses', createCourseRoutes(ctx));

  app.use((req, res) => {
    sendError(res, 404, `Route ${req.method} ${req.path} not found`);
  });
  app.use(handleError);

  return app;
};
