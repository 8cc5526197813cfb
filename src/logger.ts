import pino from 'pino';
import type { Logger } from 'pino';

export function defaultLogger(): Logger {
  return pino({ level: process.env.LOG_LEVEL ?? 'info' });
}
