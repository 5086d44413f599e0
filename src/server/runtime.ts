import dotenv from 'dotenv';

dotenv.config();

export const parsePositiveInt = (rawValue: string | undefined, fallback: number): number => {
  const parsed = Number(rawValue);
  return Number.isFinite(parsed) && parsed > 0 ? Math.round(parsed) : fallback;
};

const readString = (rawValue: string | undefined, fallback: string): string => {
  const trimmed = rawValue?.trim();
  return trimmed ? trimmed : fallback;
};

export const PORT = process.env.PORT || 3001;
export const IS_PRODUCTION = process.env.NODE_ENV === 'production';
export const DEBUG_COLLECT = process.env.DEBUG_COLLECT === 'true';

export const REQUEST_TIMEOUT_MS = parsePositiveInt(process.env.REQUEST_TIMEOUT_MS, 20000);
export const RATE_LIMIT_WINDOW_MS = parsePositiveInt(process.env.RATE_LIMIT_WINDOW_MS, 15 * 60 * 1000);
export const RATE_LIMIT_MAX_REQUESTS = parsePositiveInt(process.env.RATE_LIMIT_MAX_REQUESTS, 60);

export const DB_PATH = readString(process.env.DB_PATH, './data/weather.db');
export const PLOTS_DIR = readString(process.env.PLOTS_DIR, './plots');
export const HOURS_WINDOW = parsePositiveInt(process.env.HOURS_WINDOW, 168);

export const DEFAULT_CITY = readString(process.env.DEFAULT_CITY, 'Rio de Janeiro');
export const DEFAULT_COUNTRY = readString(process.env.DEFAULT_COUNTRY, 'BR');
export const DEFAULT_LANG = readString(process.env.DEFAULT_LANG, 'pt');
export const DEFAULT_UNITS = readString(process.env.DEFAULT_UNITS, 'M');

export const CORS_ALLOWLIST = (process.env.CORS_ORIGIN || '')
  .split(',')
  .map((origin) => origin.trim())
  .filter(Boolean);
