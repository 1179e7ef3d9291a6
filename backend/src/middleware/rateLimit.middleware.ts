import rateLimit from 'express-rate-limit';
import { AppConfig } from '../config/environment';

export const createRegisterLimiter = (config: AppConfig) =>
  rateLimit({
    windowMs: config.registerRateLimit.windowMs,
    limit: config.registerRateLimit.max,
    standardHeaders: true,
    legacyHeaders: false,
    statusCode: 429,
    message: {
      status: 'error',
      message: 'Too many registration attempts, please try again later',
      data: {}
    }
  });
