/**
 * Prometheus metrics
 */

import { Request, Response, NextFunction } from 'express';
import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';
import { logger } from '../utils/logger';

export const register = new Registry();

export const messagesCounter = new Counter({
  name: 'sms_messages_total',
  help: 'Per-recipient dispatch outcomes',
  labelNames: ['outcome'],
  registers: [register],
});

export const batchesCounter = new Counter({
  name: 'sms_batches_total',
  help: 'Dispatch calls by mode and result',
  labelNames: ['mode', 'result'],
  registers: [register],
});

export const dispatchDuration = new Histogram({
  name: 'sms_dispatch_duration_ms',
  help: 'Duration of a dispatch call in milliseconds',
  labelNames: ['mode'],
  buckets: [5, 25, 100, 250, 500, 1000, 2500, 5000, 10000, 30000],
  registers: [register],
});

export const httpCounter = new Counter({
  name: 'sms_http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'route', 'status'],
  registers: [register],
});

let defaultMetricsEnabled = false;

/** Process metrics (CPU, memory, event loop). Called once by the server entrypoint. */
export function enableDefaultMetrics(): void {
  if (defaultMetricsEnabled) return;
  collectDefaultMetrics({ register, prefix: 'sms_' });
  defaultMetricsEnabled = true;
}

export function metricsMiddleware(req: Request, res: Response, next: NextFunction) {
  res.on('finish', () => {
    const route = req.route?.path || req.path || 'unknown';
    httpCounter.inc({ method: req.method, route, status: res.statusCode.toString() });
  });
  next();
}

export async function metricsHandler(req: Request, res: Response) {
  try {
    res.set('Content-Type', register.contentType);
    res.end(await register.metrics());
  } catch (error) {
    logger.error({ error }, 'Error collecting metrics');
    res.status(500).end('Error collecting metrics');
  }
}
