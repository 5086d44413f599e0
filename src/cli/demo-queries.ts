import { DB_PATH, DEFAULT_CITY, DEFAULT_COUNTRY } from '../server/runtime.js';
import { parseDemoMode, runDemoQueries } from './commands.js';

// usage: demo-queries [latest|range]
await runDemoQueries({
  dbPath: DB_PATH,
  city: DEFAULT_CITY,
  country: DEFAULT_COUNTRY,
  mode: parseDemoMode(process.argv[2]),
});
