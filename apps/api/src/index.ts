// src/index.ts
import { createServer } from 'http';
import type { Pool } from 'pg';
import { buildApp } from './app.js';
import { logger } from './libs/logger.js';
import { MemoryIntakeStore } from './repositories/memory.store.js';
import { PostgresIntakeStore } from './repositories/postgres.store.js';
import type { IntakeStore } from './repositories/types.js';
import { createIntakeDesk } from './services/index.js';
import { closePool, createDb, createPool } from './utils/db.js';
import { loadEnv, phoneConventionOf } from './utils/env.js';

const env = loadEnv();

let pool: Pool | null = null;
let store: IntakeStore;
if (env.INTAKE_STORE === 'postgres') {
  pool = createPool(env, logger);
  store = new PostgresIntakeStore(createDb(pool));
} else {
  logger.warn('Using the in-memory store; nothing survives a restart');
  store = new MemoryIntakeStore();
}

const desk = createIntakeDesk({
  store,
  logger,
  phoneConvention: phoneConventionOf(env),
  maxAttempts: env.RESOLVE_MAX_ATTEMPTS,
});

const app = buildApp({ desk, logger, corsOrigin: env.CORS_ORIGIN });
const httpServer = createServer(app);

// Graceful shutdown
function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down gracefully`);

  httpServer.close(async () => {
    try {
      if (pool) {
        await closePool(pool);
        logger.info('Database disconnected');
      }
      process.exit(0);
    } catch (error) {
      logger.error('Error during shutdown', {
        error: error instanceof Error ? error.message : String(error),
      });
      process.exit(1);
    }
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

// Unhandled promise rejection handler
process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled Promise Rejection', {
    reason: reason instanceof Error ? reason.message : String(reason),
    stack: reason instanceof Error ? reason.stack : undefined,
  });
});

// Uncaught exception handler
process.on('uncaughtException', (error) => {
  logger.error('Uncaught Exception', {
    error: error.message,
    stack: error.stack,
  });
  process.exit(1);
});

httpServer.listen(env.PORT, () => {
  logger.info('Intake API server started', {
    port: env.PORT,
    store: env.INTAKE_STORE,
    environment: env.NODE_ENV,
    nodeVersion: process.version,
  });
});
