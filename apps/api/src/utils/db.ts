// src/utils/db.ts
import { Pool } from 'pg';
import { drizzle } from 'drizzle-orm/node-postgres';
import type { NodePgDatabase } from 'drizzle-orm/node-postgres';
import type { Env } from './env.js';
import type { AppLogger } from '../libs/logger.js';

type GlobalWithPool = typeof globalThis & { __intakePool?: Pool };

const g = globalThis as GlobalWithPool;

export function createPool(env: Env, log: AppLogger): Pool {
  if (!env.DATABASE_URL) {
    throw new Error('DATABASE_URL is not set');
  }

  // In dev (watch reloads) the pool is cached on globalThis so connections don't pile up
  if (g.__intakePool) return g.__intakePool;

  const pool = new Pool({
    connectionString: env.DATABASE_URL,
    max: env.DB_POOL_MAX,
    connectionTimeoutMillis: env.DB_CONNECTION_TIMEOUT_MS,
    idleTimeoutMillis: 30_000,
    statement_timeout: env.DB_STATEMENT_TIMEOUT_MS,
  });

  pool.on('error', (err) => {
    log.error('Database pool error', { error: err.message });
  });

  if (env.NODE_ENV !== 'production') g.__intakePool = pool;
  return pool;
}

export function createDb(pool: Pool): NodePgDatabase {
  return drizzle(pool);
}

export async function closePool(pool: Pool): Promise<void> {
  if (g.__intakePool === pool) g.__intakePool = undefined;
  await pool.end();
}
