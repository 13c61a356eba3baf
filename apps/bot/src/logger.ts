import pino, { type Logger } from 'pino';
import type { QuoterConfig } from '@strike-quoter/config';

export function createLogger(config: Pick<QuoterConfig, 'logLevel' | 'nodeEnv'>): Logger {
  return pino({
    level: config.logLevel,
    transport:
      config.nodeEnv === 'development'
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
            },
          }
        : undefined,
  });
}
