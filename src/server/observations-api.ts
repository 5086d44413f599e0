import type { Express } from 'express';
import { createApp } from './create-app.js';
import { registerHealthRoutes } from '../routes/health.js';
import { createErrorHandler, registerObservationRoutes } from '../routes/observations.js';
import type { Logger } from '../utils/collector.js';
import { ConfigurationError } from '../utils/errors.js';
import { createObservationQueries } from '../utils/observation-queries.js';
import type { ObservationStore } from '../utils/observation-store.js';
import type { WeatherbitClient } from '../utils/weatherbit.js';

export interface ObservationsApiOptions {
  store: ObservationStore;
  /** Either a ready client or the configuration error that prevented building one. */
  client: WeatherbitClient | ConfigurationError;
  defaultCountry: string;
  lang: string;
  units: string;
  isProduction: boolean;
  corsAllowlist: string[];
  rateLimitWindowMs: number;
  rateLimitMaxRequests: number;
  logger?: Logger;
  debug?: boolean;
}

export const createObservationsApi = async ({
  store,
  client,
  defaultCountry,
  lang,
  units,
  logger = console,
  debug = false,
  ...appOptions
}: ObservationsApiOptions): Promise<Express> => {
  const app = createApp({ ...appOptions, logger });

  await store.ensureSchema();

  registerHealthRoutes(app);
  registerObservationRoutes({
    app,
    store,
    queries: createObservationQueries({ store, defaultCountry }),
    resolveClient: () => {
      if (client instanceof ConfigurationError) {
        throw client;
      }
      return client;
    },
    defaultCountry,
    lang,
    units,
    logger,
    debug,
  });
  app.use(createErrorHandler(logger));

  return app;
};
