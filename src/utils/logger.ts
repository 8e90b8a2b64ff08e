// ===========================================
// LOGGER: SOL SMART MONEY ALERTS
// ===========================================

import pino from 'pino';
import { appConfig } from '../config/index.js';

export const logger = pino({
  level: appConfig.logLevel,
  transport: appConfig.nodeEnv === 'development' ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
    },
  } : undefined,
  base: {
    service: 'sol-smart-money-alerts',
    env: appConfig.nodeEnv,
  },
});

/**
 * Shorten an address for log lines: first 8 characters
 */
export function short(address: string): string {
  return address.slice(0, 8);
}

export default logger;
