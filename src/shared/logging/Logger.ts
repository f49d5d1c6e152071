/**
 * Application logger based on pino.
 * This provides structured, JSON logs suitable for production.
 */
import pino, { Logger as PinoLogger } from 'pino';
import { config } from '../config/Config';

export type AppLogger = PinoLogger;

function defaultLevel(): string {
  if (config.env === 'production') return 'info';
  if (config.env === 'test') return 'silent';
  return 'debug';
}

const level = process.env.LOG_LEVEL || defaultLevel();

export const logger: AppLogger = pino({
  level,
  base: {
    service: config.serviceName,
    version: config.serviceVersion,
    buildVersion: config.buildVersion,
    env: config.env,
  },
  transport:
    config.env === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
});
