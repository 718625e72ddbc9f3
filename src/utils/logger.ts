import { pino, stdSerializers, type Logger } from 'pino';
import { getLoggerEnv } from '../config/env.js';

const env = getLoggerEnv();

const logger = pino({
  name: 'graphql-bearer-client',
  level: env.LOG_LEVEL,
  ...(env.NODE_ENV === 'development' && {
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'yyyy-mm-dd HH:MM:ss',
        ignore: 'pid,hostname',
      },
    },
  }),
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
  serializers: {
    error: stdSerializers.err,
  },
});

export { logger };

export function createRequestLogger(requestId: string, parent: Logger = logger): Logger {
  return parent.child({ requestId });
}
