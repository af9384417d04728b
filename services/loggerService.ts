import type { LogLevel } from '../types.ts';
import { settingsService } from './settingsService.ts';

export type LogMeta = { [key: string]: unknown };

const LEVEL_ORDER: { [level in LogLevel]: number } = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

// Errors stringify to {} otherwise
const normalizeMeta = (meta: LogMeta): LogMeta =>
  Object.fromEntries(
    Object.entries(meta).map(([key, value]) => [
      key,
      value instanceof Error ? { name: value.name, message: value.message } : value
    ])
  );

const write = (level: LogLevel, message: string, meta?: LogMeta) => {
  const { level: threshold } = settingsService.getLogSettings();
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;

  const entry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...(meta ? { meta: normalizeMeta(meta) } : {}),
  };
  console.log(JSON.stringify(entry));
};

export const loggerService = {
  debug: (message: string, meta?: LogMeta) => write('debug', message, meta),
  info: (message: string, meta?: LogMeta) => write('info', message, meta),
  warn: (message: string, meta?: LogMeta) => write('warn', message, meta),
  error: (message: string, meta?: LogMeta) => write('error', message, meta),
};
