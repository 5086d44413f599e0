import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { Logger } from '../src/utils/collector.js';
import type { FetchResponseLike } from '../src/utils/http-client.js';
import type { Observation } from '../src/utils/observation.js';
import type { WeatherbitCurrent, WeatherbitPayload } from '../src/utils/weatherbit.js';

// 2023-11-14T22:13:20Z, 19:13 in America/Sao_Paulo
export const RIO_TS = 1700000000;

export const buildCurrent = (overrides: Partial<WeatherbitCurrent> = {}): WeatherbitCurrent => ({
  city_name: 'Rio de Janeiro',
  country_code: 'BR',
  lat: -22.91,
  lon: -43.18,
  ts: RIO_TS,
  ob_time: '2023-11-14 22:13',
  timezone: 'America/Sao_Paulo',
  temp: 25,
  app_temp: 27.3,
  rh: 70,
  pres: 1012.5,
  wind_spd: 3.1,
  wind_dir: 120,
  clouds: 20,
  vis: 10,
  sunrise: '08:01',
  sunset: '21:30',
  weather: { description: 'Few clouds', icon: 'c02d', code: 801 },
  ...overrides,
});

export const buildPayload = (overrides: Partial<WeatherbitCurrent> = {}): WeatherbitPayload => ({
  count: 1,
  data: [buildCurrent(overrides)],
});

export const buildObservation = (overrides: Partial<Observation> = {}): Observation => ({
  cityName: 'Rio de Janeiro',
  countryCode: 'BR',
  lat: -22.91,
  lon: -43.18,
  tsUtc: RIO_TS,
  tz: 'America/Sao_Paulo',
  tempC: 25,
  feelsLikeC: 27.3,
  humidity: 70,
  pressure: 1012.5,
  windSpeed: 3.1,
  windDir: 120,
  clouds: 20,
  visibilityKm: 10,
  weatherDescription: 'Few clouds',
  ...overrides,
});

export const jsonResponse = (status: number, body: unknown): FetchResponseLike => ({
  ok: status >= 200 && status < 300,
  status,
  json: async () => body,
  text: async () => JSON.stringify(body),
});

export interface TempDir {
  dir: string;
  dbPath: string;
  cleanup(): void;
}

export const createTempDir = (): TempDir => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'weather-obs-'));
  return {
    dir,
    dbPath: path.join(dir, 'data', 'weather.db'),
    cleanup: () => fs.rmSync(dir, { recursive: true, force: true }),
  };
};

export interface CapturingLogger extends Logger {
  lines: string[];
}

export const createCapturingLogger = (): CapturingLogger => {
  const lines: string[] = [];
  const push = (...args: unknown[]) => {
    lines.push(args.map(String).join(' '));
  };
  return { lines, log: push, warn: push, error: push };
};
