import { DEFAULT_CITY, DEFAULT_COUNTRY, DEFAULT_LANG, DEFAULT_UNITS, REQUEST_TIMEOUT_MS } from '../server/runtime.js';
import { runCurrent } from './commands.js';

// usage: current [city] [country]
const [city = DEFAULT_CITY, country = DEFAULT_COUNTRY] = process.argv.slice(2);

await runCurrent({
  env: process.env,
  city,
  country,
  lang: DEFAULT_LANG,
  units: DEFAULT_UNITS,
  timeoutMs: REQUEST_TIMEOUT_MS,
});
