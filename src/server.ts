// Loads .env before any other module reads process.env
import { loadServerEnv } from './config/env';
import { buildApp } from './app';
import { getDbPool } from './config/database';
import { loadSchedulingConfig } from './config/scheduling';
import { logger } from './lib/logger';
import { SchedulingFacade } from './services/scheduling.facade';
import { PgSchedulingStore } from './store/pg.store';

const start = async () => {
  try {
    // Validate configuration
    const env = loadServerEnv();
    const config = loadSchedulingConfig();

    const store = PgSchedulingStore.fromPool(getDbPool(env.DATABASE_URL), logger);
    const facade = new SchedulingFacade(store, { config, logger });

    const server = await buildApp({
      facade,
      jwtSecret: env.JWT_SECRET,
      corsOrigins: env.CORS_ORIGINS,
      logger,
    });

    await server.listen({ port: env.PORT, host: '0.0.0.0' });
  } catch (err) {
    logger.error({ err }, 'Failed to start server');
    process.exit(1);
  }
};

void start();
