// src/services/logger.ts — structured logging for backend
import { Logger } from 'tslog';

const LEVELS: Record<string, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

function resolveMinLevel(): number {
  const configured = (process.env.LOG_LEVEL ?? '').toLowerCase();
  if (configured in LEVELS) return LEVELS[configured];
  return process.env.NODE_ENV === 'test' ? LEVELS.error : LEVELS.info;
}

export const logger = new Logger({
  name: 'product-answer-api',
  minLevel: resolveMinLevel(),
  prettyLogTemplate: '{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} ',
  type: process.env.NODE_ENV === 'production' ? 'json' : 'pretty',
});
