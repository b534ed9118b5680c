import pino from 'pino';

const env = process.env['NODE_ENV'];

export const logger = pino({
  name: 'feedsmith',
  level: process.env['LOG_LEVEL'] ?? (env === 'test' ? 'silent' : 'info'),
  transport:
    env !== 'production' && env !== 'test'
      ? { target: 'pino-pretty', options: { colorize: true, ignore: 'pid,hostname' } }
      : undefined,
  redact: {
    paths: ['authorization', 'cookie', '*.authorization', '*.cookie', 'headers.authorization'],
    censor: '***REDACTED***',
  },
});

/** Logger tagged with the subsystem that emits it. */
export function childLogger(component: string) {
  return logger.child({ component });
}
