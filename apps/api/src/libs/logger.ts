// src/libs/logger.ts
import pino from 'pino';
import type { Logger as PinoLogger } from 'pino';

const isProd = process.env.NODE_ENV === 'production';
const isTest = process.env.NODE_ENV === 'test';
const level = process.env.LOG_LEVEL || (isProd ? 'info' : isTest ? 'silent' : 'debug');

type AnyRecord = Record<string, unknown>;

export interface AppLogger {
  info(msg: string, meta?: AnyRecord): void;
  warn(msg: string, meta?: AnyRecord): void;
  error(msg: string, meta?: AnyRecord): void;
  debug(msg: string, meta?: AnyRecord): void;
  child(bindings: AnyRecord): AppLogger;
}

const base = pino({
  level,
  base: {
    service: process.env.SERVICE_NAME || 'intake-api',
    env: process.env.NODE_ENV || 'development',
  },
  ...(isProd || isTest
    ? {}
    : {
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            singleLine: false,
          },
        },
      }),
});

// pino takes the object first; callers here pass the message first
function wrap(target: PinoLogger): AppLogger {
  return {
    info: (msg, meta) => target.info({ ...(meta || {}) }, msg),
    warn: (msg, meta) => target.warn({ ...(meta || {}) }, msg),
    error: (msg, meta) => target.error({ ...(meta || {}) }, msg),
    debug: (msg, meta) => target.debug({ ...(meta || {}) }, msg),
    child: (bindings) => wrap(target.child(bindings)),
  };
}

export const logger: AppLogger = wrap(base);

/** Logger that drops everything; handy for scripts and tests. */
export const silentLogger: AppLogger = wrap(pino({ level: 'silent' }));

export default logger;
