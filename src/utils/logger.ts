import pino from 'pino';
import { config } from '../config/index.js';

export const logger = pino({
  name: 'papertrail',
  level: config.server.logLevel,
  redact: {
    paths: ['apiKey', '*.apiKey', 'password', '*.password'],
    censor: '[redacted]',
  },
  transport:
    config.server.nodeEnv === 'development'
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
