import { createApp } from './app';
import { createDatabase, createPool } from './config/database';
import { config, validateConfig } from './config/environment';
import { createRecommendationLookup } from './services/recommendation.service';

validateConfig(config);

const pool = createPool(config);
const db = createDatabase(pool);
const app = createApp({ config, db, recommender: createRecommendationLookup(config, db) });

const server = app.listen(config.port, () => {
  console.log(`
    ╔════════════════════════════════════════════╗
    ║   Course Platform API Server Started       ║
    ╠════════════════════════════════════════════╣
    ║   Port: ${config.port}
    ║   Environment: ${config.nodeEnv}
    ║   Recommender: ${config.recommender.url ?? 'same-subject (database)'}
    ╚════════════════════════════════════════════╝
  `);
});

// Graceful shutdown
const shutdown = (signal: string): void => {
  console.log(`${signal} signal received: closing HTTP server`);
  server.close(() => {
    console.log('HTTP server closed');
    pool
      .end()
      .then(() => {
        console.log('Database pool closed');
        process.exit(0);
      })
      .catch((error: unknown) => {
        console.error('Error closing database pool:', error);
        process.exit(1);
      });
  });
};

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

export default server;
