import { InvalidQueryError } from './errors.js';
import type { StoredObservation } from './observation.js';
import type { ObservationStore } from './observation-store.js';
import { epochToIsoUtc } from './time.js';

export interface ObservationRecord {
  city: string;
  country: string;
  tsUtc: number;
  tsIsoUtc: string;
  tz: string;
  tempC: number | null;
  feelsLikeC: number | null;
  humidity: number | null;
  weatherDescription: string | null;
}

export type QueryParam = string | string[] | number | null | undefined;

export interface LatestQuery {
  city: QueryParam;
  country?: QueryParam;
  limit?: QueryParam;
}

export interface RangeQuery {
  city: QueryParam;
  country?: QueryParam;
  start?: QueryParam;
  end?: QueryParam;
}

export interface ObservationQueries {
  latest(query: LatestQuery): Promise<ObservationRecord | null>;
  latestMany(query: LatestQuery): Promise<ObservationRecord[]>;
  range(query: RangeQuery): Promise<ObservationRecord[]>;
}

export const toObservationRecord = (row: StoredObservation): ObservationRecord => ({
  city: row.cityName,
  country: row.countryCode,
  tsUtc: row.tsUtc,
  tsIsoUtc: epochToIsoUtc(row.tsUtc),
  tz: row.tz,
  tempC: row.tempC,
  feelsLikeC: row.feelsLikeC,
  humidity: row.humidity,
  weatherDescription: row.weatherDescription,
});

const firstValue = (value: QueryParam): string | number | null => {
  const single = Array.isArray(value) ? value[0] : value;
  if (single === undefined || single === null) return null;
  if (typeof single === 'number') return single;
  const trimmed = single.trim();
  return trimmed ? trimmed : null;
};

export const parseRequiredText = (name: string, value: QueryParam): string => {
  const parsed = firstValue(value);
  if (parsed === null) {
    throw new InvalidQueryError(name, `Query parameter "${name}" is required.`);
  }
  return String(parsed);
};

const INTEGER_PATTERN = /^-?\d+$/;

export const parseOptionalInt = (name: string, value: QueryParam): number | null => {
  const parsed = firstValue(value);
  if (parsed === null) return null;
  const numeric = typeof parsed === 'number' ? parsed : INTEGER_PATTERN.test(parsed) ? Number(parsed) : Number.NaN;
  if (!Number.isInteger(numeric)) {
    throw new InvalidQueryError(name, `Query parameter "${name}" must be an integer, got "${parsed}".`);
  }
  return numeric;
};

interface CreateObservationQueriesOptions {
  store: ObservationStore;
  defaultCountry: string;
  defaultLimit?: number;
}

export const createObservationQueries = ({
  store,
  defaultCountry,
  defaultLimit = 10,
}: CreateObservationQueriesOptions): ObservationQueries => {
  const resolveIdentity = (query: { city: QueryParam; country?: QueryParam }) => ({
    city: parseRequiredText('city', query.city),
    country: firstValue(query.country ?? null)?.toString() ?? defaultCountry,
  });

  const latestMany = async (query: LatestQuery): Promise<ObservationRecord[]> => {
    const { city, country } = resolveIdentity(query);
    const limit = parseOptionalInt('limit', query.limit) ?? defaultLimit;
    if (limit < 1) {
      throw new InvalidQueryError('limit', 'Query parameter "limit" must be at least 1.');
    }
    const rows = await store.fetchLatest(city, country, limit);
    return rows.map(toObservationRecord);
  };

  return {
    latestMany,
    latest: async (query) => (await latestMany({ ...query, limit: 1 }))[0] ?? null,
    range: async (query) => {
      const { city, country } = resolveIdentity(query);
      const startUtc = parseOptionalInt('start', query.start);
      const endUtc = parseOptionalInt('end', query.end);
      const rows = await store.fetchRange(city, country, { startUtc, endUtc });
      return rows.map(toObservationRecord);
    },
  };
};
