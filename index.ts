import { createObservationsApi } from './src/server/observations-api.js';
import { startServer } from './src/server/start-server.js';
import {
  PORT,
  IS_PRODUCTION,
  DEBUG_COLLECT,
  REQUEST_TIMEOUT_MS,
  RATE_LIMIT_WINDOW_MS,
  RATE_LIMIT_MAX_REQUESTS,
  CORS_ALLOWLIST,
  DB_PATH,
  DEFAULT_COUNTRY,
  DEFAULT_LANG,
  DEFAULT_UNITS,
} from './src/server/runtime.js';
import { ConfigurationError } from './src/utils/errors.js';
import { createFetchWithTimeout } from './src/utils/http-client.js';
import { createObservationStore } from './src/utils/observation-store.js';
import { createWeatherbitClient, loadWeatherbitConfig, type WeatherbitClient } from './src/utils/weatherbit.js';

const buildClient = (): WeatherbitClient | ConfigurationError => {
  try {
    const config = loadWeatherbitConfig(process.env, { timeoutMs: REQUEST_TIMEOUT_MS });
    return createWeatherbitClient({ config, fetchWithTimeout: createFetchWithTimeout(config.timeoutMs) });
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.warn(`[config] ${error.message}. POST /collect will answer 503 until it is set.`);
      return error;
    }
    throw error;
  }
};

export const app = await createObservationsApi({
  store: createObservationStore(DB_PATH),
  client: buildClient(),
  defaultCountry: DEFAULT_COUNTRY,
  lang: DEFAULT_LANG,
  units: DEFAULT_UNITS,
  isProduction: IS_PRODUCTION,
  corsAllowlist: CORS_ALLOWLIST,
  rateLimitWindowMs: RATE_LIMIT_WINDOW_MS,
  rateLimitMaxRequests: RATE_LIMIT_MAX_REQUESTS,
  debug: DEBUG_COLLECT,
});

if (process.env.NODE_ENV !== 'test') {
  startServer({ app, port: PORT });
}
