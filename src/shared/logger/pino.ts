import pino, { type Logger } from 'pino';

import { env } from '../config/environment.js';

export const logger: Logger = pino({
  name: 'short-video-assembler',
  level: env.LOG_LEVEL,
  base: undefined,
  timestamp: pino.stdTimeFunctions.isoTime,
});

export function createChildLogger(bindings: Record<string, unknown>): Logger {
  return logger.child(bindings);
}
