import express, { Express } from 'express';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { createSmsRouter } from './routes/sms';
import { metricsHandler, metricsMiddleware } from './observability/metrics';
import { errorHandler } from './utils/errors';
import { logger } from './utils/logger';
import type { SmsService } from './services/smsService';

export interface AppDependencies {
  smsService: SmsService;
  rateLimitPerMinute?: number;
}

export function createApp(deps: AppDependencies): Express {
  const app = express();

  app.use(helmet());
  app.use(express.json({ limit: '1mb' }));
  app.use(metricsMiddleware);

  const limiter = rateLimit({
    windowMs: 60 * 1000,
    limit: deps.rateLimitPerMinute ?? 300,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (req, res) => {
      logger.warn({ ip: req.ip, path: req.path }, 'Rate limit exceeded');
      res.status(429).json({ error: 'Too many requests' });
    },
  });
  app.use('/api/', limiter);

  app.get('/health', (req, res) => {
    res.json({ status: 'ok', service: 'sms-dispatch' });
  });
  app.get('/metrics', metricsHandler);

  app.use('/api/sms', createSmsRouter(deps.smsService));

  app.use((req, res) => {
    res.status(404).json({ error: 'Not found' });
  });
  app.use(errorHandler);

  return app;
}
