import type { WeatherbitCurrent, WeatherbitPayload } from './weatherbit.js';

export const DEFAULT_TIMEZONE = 'UTC';

/**
 * One weather reading for a city at a UTC instant.
 * Identity is (cityName, countryCode, tsUtc); the other fields are passed through from the provider as-is.
 */
export interface Observation {
  cityName: string | null;
  countryCode: string | null;
  lat: number | null;
  lon: number | null;
  /** Epoch seconds, always UTC. */
  tsUtc: number | null;
  /** IANA zone name, "UTC" when the provider omits it. */
  tz: string;
  tempC: number | null;
  feelsLikeC: number | null;
  humidity: number | null;
  pressure: number | null;
  windSpeed: number | null;
  windDir: number | null;
  clouds: number | null;
  visibilityKm: number | null;
  weatherDescription: string | null;
}

export interface StoredObservation extends Omit<Observation, 'cityName' | 'countryCode' | 'tsUtc' | 'tz'> {
  id: number;
  cityName: string;
  countryCode: string;
  tsUtc: number;
  tz: string;
  createdAt: string;
}

const DECIMAL_EPOCH = /^-?\d+(\.\d+)?$/;

export const toEpochSeconds = (value: number | string | null | undefined): number | null => {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.trunc(value) : null;
  }
  const trimmed = value.trim();
  return DECIMAL_EPOCH.test(trimmed) ? Math.trunc(Number(trimmed)) : null;
};

export const firstResult = (payload: WeatherbitPayload): WeatherbitCurrent | null => payload.data?.[0] ?? null;

/**
 * Maps the first result of a Weatherbit "current" payload to an Observation.
 * A payload without results yields an observation whose fields are all null.
 */
export const normalizeCurrent = (payload: WeatherbitPayload): Observation => {
  const current = firstResult(payload);

  return {
    cityName: current?.city_name ?? null,
    countryCode: current?.country_code ?? null,
    lat: current?.lat ?? null,
    lon: current?.lon ?? null,
    // `ts` is UTC even though the docs only say so for ob_time
    tsUtc: toEpochSeconds(current?.ts),
    tz: current?.timezone || DEFAULT_TIMEZONE,
    tempC: current?.temp ?? null,
    feelsLikeC: current?.app_temp ?? null,
    humidity: current?.rh ?? null,
    pressure: current?.pres ?? null,
    windSpeed: current?.wind_spd ?? null,
    windDir: current?.wind_dir ?? null,
    clouds: current?.clouds ?? null,
    visibilityKm: current?.vis ?? null,
    weatherDescription: current?.weather?.description ?? null,
  };
};

export const missingIdentityFields = (observation: Observation): string[] => {
  const missing: string[] = [];
  if (!observation.cityName) missing.push('cityName');
  if (!observation.countryCode) missing.push('countryCode');
  if (observation.tsUtc === null) missing.push('tsUtc');
  return missing;
};
