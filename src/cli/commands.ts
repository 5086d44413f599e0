import { renderDailyCharts } from '../utils/charts.js';
import { collectObservation, type Logger } from '../utils/collector.js';
import { ConfigurationError, errorMessage } from '../utils/errors.js';
import { createFetchWithTimeout, type FetchWithTimeout } from '../utils/http-client.js';
import { createObservationQueries, type ObservationRecord } from '../utils/observation-queries.js';
import { createObservationStore } from '../utils/observation-store.js';
import { formatObservationLines, summarizePayload } from '../utils/summary.js';
import { nowEpochSeconds, windowStartEpoch } from '../utils/time.js';
import { createWeatherbitClient, loadWeatherbitConfig, type WeatherbitClient } from '../utils/weatherbit.js';

export interface CommandContext {
  env: Record<string, string | undefined>;
  dbPath: string;
  city: string;
  country: string;
  lang: string;
  units: string;
  timeoutMs: number;
  logger?: Logger;
  debug?: boolean;
  /** Overrides the provider transport; defaults to a timed global fetch. */
  fetchWithTimeout?: FetchWithTimeout;
}

export const NO_DATA_TO_PLOT = 'No data to plot. Run a collection first (npm run collect).';

const buildClient = ({
  env,
  timeoutMs,
  fetchWithTimeout,
}: Pick<CommandContext, 'env' | 'timeoutMs' | 'fetchWithTimeout'>): WeatherbitClient => {
  const config = loadWeatherbitConfig(env, { timeoutMs });
  return createWeatherbitClient({
    config,
    fetchWithTimeout: fetchWithTimeout ?? createFetchWithTimeout(config.timeoutMs),
  });
};

const fail = (logger: Logger, fallbackPrefix: string, error: unknown) => {
  const prefix = error instanceof ConfigurationError ? 'Configuration error' : fallbackPrefix;
  logger.error(`${prefix}: ${errorMessage(error)}`);
  process.exitCode = 1;
};

/** One collection for the configured city; meant for cron or manual runs. */
export const runCollect = async (context: CommandContext): Promise<void> => {
  const { dbPath, city, country, lang, units, logger = console, debug = false } = context;
  try {
    await collectObservation({
      client: buildClient(context),
      store: createObservationStore(dbPath),
      city,
      country,
      lang,
      units,
      logger,
      debug,
    });
  } catch (error) {
    fail(logger, 'Collection failed', error);
  }
};

/** Prints the provider's current conditions without storing them. */
export const runCurrent = async (context: Omit<CommandContext, 'dbPath' | 'debug'>): Promise<void> => {
  const { city, country, lang, units, logger = console } = context;
  try {
    const payload = await buildClient(context).fetchByCity({ city, country, lang, units });
    logger.log(summarizePayload(payload));
  } catch (error) {
    fail(logger, 'Request failed', error);
  }
};

export interface PlotContext extends Pick<CommandContext, 'dbPath' | 'city' | 'country' | 'logger'> {
  hoursWindow: number;
  outputDir: string;
  now?: number;
}

export const runPlot = async ({
  dbPath,
  city,
  country,
  hoursWindow,
  outputDir,
  now = nowEpochSeconds(),
  logger = console,
}: PlotContext): Promise<void> => {
  try {
    const queries = createObservationQueries({ store: createObservationStore(dbPath), defaultCountry: country });
    const records = await queries.range({ city, country, start: windowStartEpoch(hoursWindow, now), end: now });

    if (records.length === 0) {
      logger.log(NO_DATA_TO_PLOT);
      return;
    }

    const paths = await renderDailyCharts({ records, cityTag: `${city}-${country}`, outputDir });
    logger.log(`Charts written:\n - ${paths.temp}\n - ${paths.tempFeels}\n - ${paths.humidity}`);
  } catch (error) {
    fail(logger, 'Plot failed', error);
  }
};

export type DemoMode = 'latest' | 'range';

export interface DemoQueriesContext extends Pick<CommandContext, 'dbPath' | 'city' | 'country' | 'logger'> {
  mode: DemoMode;
  now?: number;
}

export const parseDemoMode = (value: string | undefined): DemoMode => (value === 'range' ? 'range' : 'latest');

export const runDemoQueries = async ({
  dbPath,
  city,
  country,
  mode,
  now = nowEpochSeconds(),
  logger = console,
}: DemoQueriesContext): Promise<void> => {
  try {
    const queries = createObservationQueries({ store: createObservationStore(dbPath), defaultCountry: country });
    const records: ObservationRecord[] =
      mode === 'range'
        ? await queries.range({ city, country, start: windowStartEpoch(24, now), end: now })
        : await queries.latestMany({ city, country, limit: 5 });
    for (const line of formatObservationLines(records)) {
      logger.log(line);
    }
  } catch (error) {
    fail(logger, 'Query failed', error);
  }
};
