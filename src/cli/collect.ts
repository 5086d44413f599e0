import {
  DB_PATH,
  DEBUG_COLLECT,
  DEFAULT_CITY,
  DEFAULT_COUNTRY,
  DEFAULT_LANG,
  DEFAULT_UNITS,
  REQUEST_TIMEOUT_MS,
} from '../server/runtime.js';
import { runCollect } from './commands.js';

await runCollect({
  env: process.env,
  dbPath: DB_PATH,
  city: DEFAULT_CITY,
  country: DEFAULT_COUNTRY,
  lang: DEFAULT_LANG,
  units: DEFAULT_UNITS,
  timeoutMs: REQUEST_TIMEOUT_MS,
  debug: DEBUG_COLLECT,
});
