import { destination, pino } from 'pino';
import type { LevelWithSilent, Logger } from 'pino';

export type { Logger };

export const LOG_LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export function isLogLevel(x: unknown): x is LevelWithSilent {
  return LOG_LEVELS.some((level) => level === x);
}

// JSON lines on stderr, stdout stays free for front ends.
export function createLogger(opts: { level?: LevelWithSilent; name?: string } = {}): Logger {
  return pino({ name: opts.name ?? 'taskcards', level: opts.level ?? 'info' }, destination(2));
}

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
