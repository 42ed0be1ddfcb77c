/**
 * Structured logger (Pino)
 *
 * Pretty-prints in development, JSON everywhere else.
 */

import pino from 'pino';

export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  transport:
    process.env.NODE_ENV === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
  formatters: {
    level: (label) => {
      return { level: label };
    },
  },
  base: {
    service: 'sms-dispatch',
    env: process.env.NODE_ENV || 'development',
  },
});

export type { Logger } from 'pino';

/**
 * Keep the country prefix and the last two digits, e.g. "+155****67".
 */
export function maskPhone(phone: string): string {
  if (phone.length <= 4) return '****';
  return phone.substring(0, 4) + '****' + phone.substring(phone.length - 2);
}
