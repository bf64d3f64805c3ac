import { pino, type Logger, type LoggerOptions } from 'pino';

const isDev = process.env['NODE_ENV'] !== 'production';
const isTest = process.env['VITEST'] !== undefined;

// Build options conditionally to satisfy exactOptionalPropertyTypes
const options: LoggerOptions = {
  level: process.env['SEO_PIPELINE_LOG_LEVEL'] ?? (isDev ? 'debug' : 'info'),
  base: {
    pid: undefined,
    hostname: undefined,
  },
};

// Pretty output only for interactive development; tests keep the plain JSON stream
if (isDev && !isTest) {
  options.transport = {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
    },
  };
}

export const logger = pino(options);

export function createLogger(module: string): Logger {
  return logger.child({ module });
}
