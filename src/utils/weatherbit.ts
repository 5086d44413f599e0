import { z } from 'zod';
import { ConfigurationError, ProviderError, errorMessage } from './errors.js';
import { DEFAULT_FETCH_HEADERS, type FetchResponseLike, type FetchWithTimeout } from './http-client.js';

export const WEATHERBIT_CURRENT_URL = 'https://api.weatherbit.io/v2.0/current';

const nullableNumber = z.number().nullish();
const nullableString = z.string().nullish();

// Weatherbit sends ts as a number; some proxies re-serialize it as a string.
const epochField = z.union([z.number(), z.string()]).nullish();

export const weatherbitCurrentSchema = z
  .object({
    city_name: nullableString,
    country_code: nullableString,
    lat: nullableNumber,
    lon: nullableNumber,
    ts: epochField,
    ob_time: nullableString,
    timezone: nullableString,
    temp: nullableNumber,
    app_temp: nullableNumber,
    rh: nullableNumber,
    pres: nullableNumber,
    wind_spd: nullableNumber,
    wind_dir: nullableNumber,
    clouds: nullableNumber,
    vis: nullableNumber,
    sunrise: nullableString,
    sunset: nullableString,
    weather: z
      .object({
        description: nullableString,
        icon: nullableString,
        code: z.union([z.number(), z.string()]).nullish(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

export const weatherbitPayloadSchema = z
  .object({
    count: z.number().nullish(),
    data: z.array(weatherbitCurrentSchema).nullish(),
  })
  .passthrough();

export type WeatherbitCurrent = z.infer<typeof weatherbitCurrentSchema>;
export type WeatherbitPayload = z.infer<typeof weatherbitPayloadSchema>;

export interface WeatherbitConfig {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
}

/**
 * Resolves the provider configuration from the environment once, at startup.
 * A missing credential is reported to the caller instead of ending the process.
 */
export const loadWeatherbitConfig = (
  env: Record<string, string | undefined>,
  defaults: { timeoutMs: number },
): WeatherbitConfig => {
  const apiKey = env.WEATHERBIT_API_KEY?.trim();
  if (!apiKey) {
    throw new ConfigurationError('WEATHERBIT_API_KEY is not set; add it to the environment or .env');
  }
  return {
    apiKey,
    baseUrl: env.WEATHERBIT_BASE_URL?.trim() || WEATHERBIT_CURRENT_URL,
    timeoutMs: defaults.timeoutMs,
  };
};

export interface FetchByCityOptions {
  city: string;
  country?: string | null;
  lang?: string;
  units?: string;
}

export interface FetchByCoordsOptions {
  lat: number;
  lon: number;
  lang?: string;
  units?: string;
}

export interface WeatherbitClient {
  fetchByCity(options: FetchByCityOptions): Promise<WeatherbitPayload>;
  fetchByCoords(options: FetchByCoordsOptions): Promise<WeatherbitPayload>;
}

interface CreateWeatherbitClientOptions {
  config: WeatherbitConfig;
  fetchWithTimeout: FetchWithTimeout;
}

export const createWeatherbitClient = ({ config, fetchWithTimeout }: CreateWeatherbitClientOptions): WeatherbitClient => {
  const requestCurrent = async (params: URLSearchParams): Promise<WeatherbitPayload> => {
    const url = `${config.baseUrl}?${params.toString()}`;

    let response: FetchResponseLike;
    try {
      response = await fetchWithTimeout(url, { headers: DEFAULT_FETCH_HEADERS }, config.timeoutMs);
    } catch (error) {
      throw new ProviderError(`Weatherbit request failed: ${errorMessage(error)}`);
    }

    if (!response.ok) {
      // Drain the body so the connection is released; Weatherbit puts the reason in it.
      const detail = (await response.text().catch(() => '')).trim().slice(0, 200);
      throw new ProviderError(
        `Weatherbit request failed with status ${response.status}${detail ? `: ${detail}` : ''}`,
        response.status,
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new ProviderError(`Weatherbit returned a non-JSON body: ${errorMessage(error)}`, response.status);
    }

    const parsed = weatherbitPayloadSchema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ProviderError(
        `Weatherbit response has an unexpected shape at ${issue?.path.join('.') || '<root>'}: ${issue?.message ?? 'invalid'}`,
        response.status,
      );
    }
    return parsed.data;
  };

  return {
    fetchByCity: ({ city, country, lang = 'pt', units = 'M' }) => {
      const params = new URLSearchParams({ city, key: config.apiKey, lang, units });
      if (country) {
        params.set('country', country);
      }
      return requestCurrent(params);
    },
    fetchByCoords: ({ lat, lon, lang = 'pt', units = 'M' }) => {
      const params = new URLSearchParams({
        lat: String(lat),
        lon: String(lon),
        key: config.apiKey,
        lang,
        units,
      });
      return requestCurrent(params);
    },
  };
};
