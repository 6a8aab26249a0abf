/**
 * Express server: signal intake, order status and admin controls
 */

import 'dotenv/config';
import express from 'express';
import { getConfig, loadEnv } from '../config/index.js';
import { getDb, closeDb } from '../db/client.js';
import { createTradingCore } from '../trading/core.js';
import { createLogger } from '../utils/logger.js';
import { RateLimiter } from './rate-limit.js';
import { createRoutes } from './routes.js';

const log = createLogger('server');

async function main() {
  const env = loadEnv();
  const config = getConfig();
  const core = createTradingCore({ config, db: getDb(env.dbPath), forcePaper: env.forcePaper });

  if (env.adminIds.size === 0) {
    log.warn('ADMIN_IDS is empty - admin endpoints will refuse every request');
  }

  const app = express();
  app.use(express.json());
  const limiter = new RateLimiter(config.admin.rateLimit, config.admin.rateWindowSeconds * 1000);
  app.use('/api', createRoutes(core, env.adminIds, limiter));

  const server = app.listen(env.port, () => {
    log.info({ port: env.port }, 'server listening');
  });

  // Graceful shutdown
  const shutdown = () => {
    log.info('shutting down');
    server.close(() => {
      closeDb();
      log.info('server closed');
      process.exit(0);
    });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch(error => {
  log.fatal({ err: error }, 'failed to start server');
  process.exit(1);
});
