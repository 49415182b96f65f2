import pino from 'pino';
import type { LevelWithSilent, Logger } from 'pino';

export type { Logger } from 'pino';

export type LoggerOptions = {
  level?: LevelWithSilent;
};

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({ name: 'share-vault', level: options.level ?? 'silent' });
}
