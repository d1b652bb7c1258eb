import { type Logger, pino } from 'pino';
import type { Config } from './config.js';

export type { Logger };

export type LogComponent = 'driver' | 'fetcher' | 'extractor' | 'forwarder' | 'notifier';

export const createLogger = (level: Config['logLevel']): Logger =>
  pino({
    name: 'aare-scraper',
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
  });

export const componentLogger = (logger: Logger, component: LogComponent): Logger =>
  logger.child({ component });
