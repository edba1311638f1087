import type { LoggerOptions } from 'pino';
import { stdTimeFunctions } from 'pino';

import type { LogLevel } from './config';

export const createLogger = (level: LogLevel): LoggerOptions => ({
  level,
  base: undefined,
  timestamp: stdTimeFunctions.isoTime,
  redact: {
    paths: ['req.headers.authorization', 'req.headers["x-gateway-user"]'],
    censor: '[redacted]'
  }
});
