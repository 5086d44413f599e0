import { normalizeCurrent, type Observation } from './observation.js';
import type { ObservationStore } from './observation-store.js';
import { epochToIsoUtc, formatLocalDateTime } from './time.js';
import type { WeatherbitClient } from './weatherbit.js';

export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;

export interface CollectOptions {
  client: WeatherbitClient;
  store: ObservationStore;
  city: string;
  country?: string | null;
  lang?: string;
  units?: string;
  logger?: Logger;
  debug?: boolean;
}

export interface CollectResult {
  observation: Observation;
  inserted: boolean;
  tsIsoUtc: string | null;
}

export const describeObservation = (observation: Observation): string => {
  const tag = `${observation.cityName ?? '?'}-${observation.countryCode ?? '?'}`;
  if (observation.tsUtc === null) {
    return `${tag} @ unknown time`;
  }
  return `${tag} @ ${formatLocalDateTime(observation.tsUtc, observation.tz)} (${observation.tz})`;
};

/**
 * Fetches the current conditions for one city and stores them.
 * Provider and store errors are not caught here; a duplicate is reported through `inserted: false`.
 */
export const collectObservation = async ({
  client,
  store,
  city,
  country = null,
  lang = 'pt',
  units = 'M',
  logger = console,
  debug = false,
}: CollectOptions): Promise<CollectResult> => {
  const payload = await client.fetchByCity({ city, country, lang, units });
  if (debug) {
    logger.log(`[collect] ${city}${country ? `-${country}` : ''}: ${payload.data?.length ?? 0} result(s)`);
  }

  const observation = normalizeCurrent(payload);
  await store.ensureSchema();
  const inserted = await store.insert(observation);

  logger.log(`[collect] ${inserted ? 'inserted' : 'duplicate ignored'} ${describeObservation(observation)}`);

  return {
    observation,
    inserted,
    tsIsoUtc: observation.tsUtc === null ? null : epochToIsoUtc(observation.tsUtc),
  };
};
