import dotenv from 'dotenv';

dotenv.config();

const DEFAULT_JWT_SECRET = 'dev-jwt-secret-change-in-production';

export interface AppConfig {
  port: number;
  nodeEnv: string;
  database: {
    connectionString?: string;
    host: string;
    port: number;
    name: string;
    user: string;
    password: string;
    poolMax: number;
  };
  jwt: {
    secret: string;
    expiresInSeconds: number;
  };
  bcryptSaltRounds: number;
  corsOrigin: string;
  registerRateLimit: {
    windowMs: number;
    max: number;
  };
  recommender: {
    url?: string;
    timeoutMs: number;
  };
}

const toInt = (value: string | undefined, fallback: number): number => {
  const parsed = parseInt(value ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => ({
  port: toInt(env.PORT, 5000),
  nodeEnv: env.NODE_ENV || 'development',

  database: {
    connectionString: env.DATABASE_URL || undefined,
    host: env.DB_HOST || 'localhost',
    port: toInt(env.DB_PORT, 5432),
    name: env.DB_NAME || 'course_platform',
    user: env.DB_USER || 'postgres',
    password: env.DB_PASSWORD || '',
    poolMax: toInt(env.DB_POOL_MAX, 10)
  },

  // Tokens are valid for 3 days unless overridden
  jwt: {
    secret: env.JWT_SECRET || DEFAULT_JWT_SECRET,
    expiresInSeconds: toInt(env.JWT_EXPIRES_IN_SECONDS, 3 * 24 * 60 * 60)
  },
  bcryptSaltRounds: toInt(env.BCRYPT_SALT_ROUNDS, 10),

  corsOrigin: env.CORS_ORIGIN || '*',

  registerRateLimit: {
    windowMs: toInt(env.REGISTER_RATE_LIMIT_WINDOW_MS, 60_000),
    max: toInt(env.REGISTER_RATE_LIMIT_MAX, 5)
  },

  recommender: {
    url: env.RECOMMENDER_URL || undefined,
    timeoutMs: toInt(env.RECOMMENDER_TIMEOUT_MS, 5000)
  }
});

export function validateConfig(config: AppConfig): void {
  if (config.nodeEnv === 'production' && config.jwt.secret === DEFAULT_JWT_SECRET) {
    throw new Error('JWT_SECRET must be set in production');
  }
}

export const config = loadConfig();
