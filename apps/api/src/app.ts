import express from 'express';
import type { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { ZodError } from 'zod';
import { logger as rootLogger } from './libs/logger.js';
import type { AppLogger } from './libs/logger.js';
import { customersRoutes } from './routes/customers.routes.js';
import { intakeRoutes } from './routes/intake.routes.js';
import type { IntakeDesk } from './services/index.js';
import { isHttpError } from './utils/httpError.js';
import { ValidationFailure } from './utils/intakeErrors.js';
import { metricsMiddleware, metricsRegistry } from './utils/metrics.js';

export interface AppOptions {
  desk: IntakeDesk;
  logger?: AppLogger;
  /** Comma-separated whitelist; empty allows every origin. */
  corsOrigin?: string;
  rateLimitMax?: number;
}

export function buildApp(options: AppOptions): Express {
  const { desk } = options;
  const log = options.logger ?? rootLogger;
  const app = express();

  // behind a reverse proxy the client IP comes from X-Forwarded-For
  app.set('trust proxy', 1);

  app.use(helmet());

  const ALLOWED_ORIGINS = (options.corsOrigin || '')
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);

  app.use(
    cors({
      origin(origin, cb) {
        if (!origin) return cb(null, true); // curl/postman
        if (ALLOWED_ORIGINS.length === 0) return cb(null, true);
        return ALLOWED_ORIGINS.includes(origin) ? cb(null, true) : cb(new Error('CORS_NOT_ALLOWED'));
      },
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With'],
    })
  );

  app.use(
    '/api',
    rateLimit({
      windowMs: 15 * 60 * 1000,
      max: options.rateLimitMax ?? 1000,
      standardHeaders: true,
      legacyHeaders: false,
      message: { error: 'TOO_MANY_REQUESTS', message: 'Too many requests, try later.' },
    })
  );

  app.use(express.json({ limit: '1mb' }));

  // Request logging middleware
  app.use((req, res, next) => {
    const start = Date.now();
    res.on('finish', () => {
      log.info('HTTP Request', {
        method: req.method,
        url: req.originalUrl,
        status: res.statusCode,
        duration: `${Date.now() - start}ms`,
      });
    });
    next();
  });

  app.use(metricsMiddleware());

  app.get('/healthz', (_req, res) => {
    res.json({
      ok: true,
      time: new Date().toISOString(),
      uptimeSec: Math.round(process.uptime()),
    });
  });

  app.get('/metrics', async (_req, res, next) => {
    try {
      res.set('Content-Type', metricsRegistry.contentType);
      res.send(await metricsRegistry.metrics());
    } catch (err) {
      next(err);
    }
  });

  app.use('/api/intake', intakeRoutes(desk));
  app.use('/api/customers', customersRoutes(desk));

  // 404 handler
  app.use('*', (req, res) => {
    res.status(404).json({
      error: 'NOT_FOUND',
      message: 'The requested resource was not found',
      path: req.originalUrl,
    });
  });

  // Centralized error handler - normalize to { error: { code, message, details } }
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof ZodError) {
      const failure = new ValidationFailure('Request validation failed', err.flatten().fieldErrors);
      res.status(failure.status).json(failure.toJSON());
      return;
    }

    if (isHttpError(err)) {
      const meta = { code: err.code, message: err.message, url: req.originalUrl, method: req.method };
      if (err.status >= 500) log.error('Request failed', { ...meta, stack: err.stack });
      else log.warn('Request rejected', meta);
      res.status(err.status).json(err.toJSON());
      return;
    }

    // body-parser and cors report client faults as plain errors
    if (err instanceof Error && err.message === 'CORS_NOT_ALLOWED') {
      res.status(403).json({ error: { code: 'FORBIDDEN', message: 'Origin not allowed', details: null } });
      return;
    }
    if (err instanceof Error && 'status' in err && typeof err.status === 'number' && err.status < 500) {
      res.status(err.status).json({ error: { code: 'BAD_REQUEST', message: err.message, details: null } });
      return;
    }

    log.error('Unhandled application error', {
      message: err instanceof Error ? err.message : String(err),
      stack: err instanceof Error ? err.stack : undefined,
      url: req.originalUrl,
      method: req.method,
    });
    res.status(500).json({ error: { code: 'INTERNAL', message: 'Internal server error', details: null } });
  });

  return app;
}
