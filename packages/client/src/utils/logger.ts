import pino from 'pino';

const env = process.env.NODE_ENV;

// Tests stay quiet unless LOG_LEVEL asks otherwise
const logLevel = process.env.LOG_LEVEL || (env === 'test' ? 'silent' : 'info');

export const logger = pino({
  level: logLevel,
  transport: env !== 'production' && env !== 'test' ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname'
    }
  } : undefined,
});

export type Logger = typeof logger;
