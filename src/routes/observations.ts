import type { ErrorRequestHandler, Express, NextFunction, Request, RequestHandler, Response } from 'express';
import { collectObservation, type Logger } from '../utils/collector.js';
import {
  ConfigurationError,
  IncompleteObservationError,
  InvalidQueryError,
  ProviderError,
  StoreUnavailableError,
} from '../utils/errors.js';
import { parseRequiredText, type ObservationQueries } from '../utils/observation-queries.js';
import type { ObservationStore } from '../utils/observation-store.js';
import type { WeatherbitClient } from '../utils/weatherbit.js';

const queryValue = (value: Request['query'][string]): string | undefined => {
  if (typeof value === 'string') return value;
  if (Array.isArray(value) && typeof value[0] === 'string') return value[0];
  return undefined;
};

const asyncHandler =
  (handler: (req: Request, res: Response) => Promise<void>): RequestHandler =>
  (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };

interface RegisterObservationRoutesOptions {
  app: Express;
  store: ObservationStore;
  queries: ObservationQueries;
  /** Throws ConfigurationError when no provider credential was configured at startup. */
  resolveClient: () => WeatherbitClient;
  defaultCountry: string;
  lang: string;
  units: string;
  logger?: Logger;
  debug?: boolean;
}

export const registerObservationRoutes = ({
  app,
  store,
  queries,
  resolveClient,
  defaultCountry,
  lang,
  units,
  logger = console,
  debug = false,
}: RegisterObservationRoutesOptions) => {
  const collect = asyncHandler(async (req, res) => {
    const city = parseRequiredText('city', queryValue(req.query.city));
    const country = queryValue(req.query.country)?.trim() || defaultCountry;
    const result = await collectObservation({
      client: resolveClient(),
      store,
      city,
      country,
      lang,
      units,
      logger,
      debug,
    });
    const { observation } = result;
    res.json({
      city: `${observation.cityName}-${observation.countryCode}`,
      tsUtc: observation.tsUtc,
      tsIsoUtc: result.tsIsoUtc,
      inserted: result.inserted,
    });
  });

  app.post('/collect', collect);

  app.get('/latest', asyncHandler(async (req, res) => {
    const record = await queries.latest({
      city: queryValue(req.query.city),
      country: queryValue(req.query.country),
    });
    if (!record) {
      res.status(404).json({ error: 'No data for this city.' });
      return;
    }
    res.json(record);
  }));

  app.get('/weather', asyncHandler(async (req, res) => {
    const data = await queries.range({
      city: queryValue(req.query.city),
      country: queryValue(req.query.country),
      start: queryValue(req.query.start),
      end: queryValue(req.query.end),
    });
    res.json({ count: data.length, data });
  }));
};

export const statusForError = (error: unknown): number => {
  if (error instanceof InvalidQueryError) return 400;
  if (error instanceof IncompleteObservationError) return 422;
  if (error instanceof ProviderError) return 502;
  if (error instanceof ConfigurationError || error instanceof StoreUnavailableError) return 503;
  return 500;
};

export const createErrorHandler = (logger: Logger = console): ErrorRequestHandler => (error, req, res, next) => {
  if (res.headersSent) {
    next(error);
    return;
  }
  const status = statusForError(error);
  const message = error instanceof Error ? error.message : 'Unexpected error';
  if (status >= 500) {
    logger.error(`[${req.method} ${req.originalUrl}] ${status}:`, error);
  }
  res.status(status).json({ error: status === 500 ? 'Internal server error' : message });
};
