import pino from 'pino';

const nodeEnv = process.env.NODE_ENV ?? 'development';

/** `LOG_LEVEL` wins; otherwise silent under test and info elsewhere. */
export function resolveLogLevel(env: NodeJS.ProcessEnv): string {
  return env.LOG_LEVEL || (env.NODE_ENV === 'test' ? 'silent' : 'info');
}

export const logger = pino({
  level: resolveLogLevel(process.env),
  transport:
    nodeEnv === 'development'
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
