import { loadConfig } from './config';
import { createApp } from './server';
import { DispatchEngine } from './services/dispatchEngine';
import { SmsService } from './services/smsService';
import { LogOnlyTransport } from './providers/logOnlyTransport';
import { enableDefaultMetrics } from './observability/metrics';
import { logger } from './utils/logger';

const config = loadConfig();
logger.level = config.logLevel;
enableDefaultMetrics();

const engine = new DispatchEngine({
  transport: new LogOnlyTransport(50),
  maxConcurrency: config.sms.maxConcurrency,
  defaultRegion: config.sms.defaultRegion,
});
const app = createApp({ smsService: new SmsService(engine, config.sms.defaultRegion) });

const server = app.listen(config.port, () => {
  logger.info({ port: config.port, region: config.sms.defaultRegion }, 'SMS dispatch service listening');
});

process.on('SIGTERM', () => {
  logger.info('SIGTERM received, closing server');
  server.close(() => process.exit(0));
});
