import { collectDefaultMetrics, Counter, Histogram, Registry } from 'prom-client';
import type { NextFunction, Request, Response } from 'express';

// Create a Registry to register the metrics
export const metricsRegistry = new Registry();

// Default metrics (process, event loop, memory, etc.)
collectDefaultMetrics({ register: metricsRegistry, prefix: 'intake_' });

export const httpRequestDuration = new Histogram({
  name: 'intake_http_request_duration_ms',
  help: 'Duration of HTTP requests in ms',
  labelNames: ['method', 'route', 'status'] as const,
  buckets: [50, 100, 200, 500, 1000, 2000, 5000],
  registers: [metricsRegistry],
});

export const customerResolutions = new Counter({
  name: 'intake_customer_resolutions_total',
  help: 'Committed customer resolutions by outcome (created, reused, race_reused)',
  labelNames: ['outcome'] as const,
  registers: [metricsRegistry],
});

export const intakeFlows = new Counter({
  name: 'intake_flows_total',
  help: 'Coordinated intake flows by outcome (committed, rolled_back)',
  labelNames: ['outcome'] as const,
  registers: [metricsRegistry],
});

export function metricsMiddleware() {
  return function (req: Request, res: Response, next: NextFunction) {
    const start = process.hrtime.bigint();
    res.on('finish', () => {
      const diffMs = Number(process.hrtime.bigint() - start) / 1_000_000;
      const route: unknown = req.route?.path;
      httpRequestDuration
        .labels(req.method, typeof route === 'string' ? route : 'unmatched', String(res.statusCode))
        .observe(diffMs);
    });
    next();
  };
}
