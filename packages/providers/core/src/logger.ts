import pino, { type Logger } from 'pino';

import { resolveLogLevel, type LogLevel } from './config.ts';

export type { Logger };

export function createLogger(name: string, level: LogLevel = resolveLogLevel()): Logger {
  return pino({ name, level });
}
