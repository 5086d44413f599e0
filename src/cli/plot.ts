import { DB_PATH, DEFAULT_CITY, DEFAULT_COUNTRY, HOURS_WINDOW, PLOTS_DIR } from '../server/runtime.js';
import { runPlot } from './commands.js';

await runPlot({
  dbPath: DB_PATH,
  city: DEFAULT_CITY,
  country: DEFAULT_COUNTRY,
  hoursWindow: HOURS_WINDOW,
  outputDir: PLOTS_DIR,
});
