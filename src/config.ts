import path from 'node:path';
import type { LevelWithSilent } from 'pino';
import { isLogLevel } from './logger.js';

export interface CardsConfig {
  root: string;
  logLevel: LevelWithSilent;
}

export const DEFAULT_CARDS_DIR = './tasks';

export function resolveCardsRoot(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): string {
  const raw = env.TASKCARDS_DIR || env.TASKMASTER_TASKS_DIR || DEFAULT_CARDS_DIR;
  return path.resolve(cwd, raw);
}

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LevelWithSilent {
  const raw = env.TASKCARDS_LOG_LEVEL?.trim().toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): CardsConfig {
  return {
    root: resolveCardsRoot(env, cwd),
    logLevel: resolveLogLevel(env)
  };
}
