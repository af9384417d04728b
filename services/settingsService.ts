import dotenv from 'dotenv';
import type { LogLevel, LogSettings, SerializationSettings } from '../types.ts';

dotenv.config();

// Environment Keys
const KEYS = {
  LOG_LEVEL: 'MNODA_LOG_LEVEL',
  JSON_INDENT: 'MNODA_JSON_INDENT',
};

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const DEFAULT_LOG_LEVEL: LogLevel = 'info';
const DEFAULT_JSON_INDENT = 0;

const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value);

export const settingsService = {
  // --- Logging ---
  getLogSettings: (): LogSettings => {
    const raw = (process.env[KEYS.LOG_LEVEL] || '').trim().toLowerCase();
    return { level: isLogLevel(raw) ? raw : DEFAULT_LOG_LEVEL };
  },

  setLogSettings: (settings: LogSettings) => {
    process.env[KEYS.LOG_LEVEL] = settings.level;
  },

  // --- Serialization ---
  getSerializationSettings: (): SerializationSettings => {
    const parsed = Number.parseInt(process.env[KEYS.JSON_INDENT] || '', 10);
    return { indent: Number.isInteger(parsed) && parsed >= 0 ? parsed : DEFAULT_JSON_INDENT };
  },

  setSerializationSettings: (settings: SerializationSettings) => {
    process.env[KEYS.JSON_INDENT] = String(settings.indent);
  },
};
