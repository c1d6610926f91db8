// src/services/logger.ts: structured logging for the engine
import { Logger } from 'tslog';

export const LOG_LEVELS = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
} as const;

export type LogLevelName = keyof typeof LOG_LEVELS;

function isLogLevel(raw: string): raw is LogLevelName {
  return Object.hasOwn(LOG_LEVELS, raw);
}

function resolveMinLevel(raw: string | undefined): number {
  if (process.env.VITEST) return LOG_LEVELS.fatal;
  const name = (raw ?? 'info').toLowerCase();
  return isLogLevel(name) ? LOG_LEVELS[name] : LOG_LEVELS.info;
}

export const logger = new Logger({
  name: 'context-engine',
  minLevel: resolveMinLevel(process.env.LOG_LEVEL),
  prettyLogTemplate: '{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} ',
  type: 'pretty',
});

/** Applies the validated config level once it is loaded. */
export function setLogLevel(level: LogLevelName): void {
  logger.settings.minLevel = LOG_LEVELS[level];
}
