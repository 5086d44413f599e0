import fs from 'node:fs';
import path from 'node:path';
import { createClient, type Client } from '@libsql/client';
import { z } from 'zod';
import { IncompleteObservationError, StoreUnavailableError, errorMessage } from './errors.js';
import { missingIdentityFields, type Observation, type StoredObservation } from './observation.js';

export const OBSERVATIONS_TABLE = 'weather_observations';

// UNIQUE(city_name, country_code, ts_utc) is what makes collection idempotent:
// re-running a collection for the same instant leaves exactly one row.
export const OBSERVATIONS_DDL = `
CREATE TABLE IF NOT EXISTS ${OBSERVATIONS_TABLE} (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  city_name TEXT NOT NULL,
  country_code TEXT NOT NULL,
  lat REAL,
  lon REAL,
  ts_utc INTEGER NOT NULL,
  tz TEXT,
  temp_c REAL,
  feels_like_c REAL,
  humidity INTEGER,
  pressure REAL,
  wind_speed REAL,
  wind_dir INTEGER,
  clouds INTEGER,
  visibility_km REAL,
  weather_description TEXT,
  created_at TEXT DEFAULT (CURRENT_TIMESTAMP),
  UNIQUE(city_name, country_code, ts_utc)
);`;

const INSERT_SQL = `
INSERT OR IGNORE INTO ${OBSERVATIONS_TABLE} (
  city_name, country_code, lat, lon, ts_utc, tz,
  temp_c, feels_like_c, humidity, pressure, wind_speed, wind_dir,
  clouds, visibility_km, weather_description
) VALUES (
  :city_name, :country_code, :lat, :lon, :ts_utc, :tz,
  :temp_c, :feels_like_c, :humidity, :pressure, :wind_speed, :wind_dir,
  :clouds, :visibility_km, :weather_description
)`;

const SELECT_COLUMNS = `id, city_name, country_code, lat, lon, ts_utc, tz, temp_c, feels_like_c, humidity,
  pressure, wind_speed, wind_dir, clouds, visibility_km, weather_description, created_at`;

type ObservationParams = {
  city_name: string | null;
  country_code: string | null;
  lat: number | null;
  lon: number | null;
  ts_utc: number | null;
  tz: string;
  temp_c: number | null;
  feels_like_c: number | null;
  humidity: number | null;
  pressure: number | null;
  wind_speed: number | null;
  wind_dir: number | null;
  clouds: number | null;
  visibility_km: number | null;
  weather_description: string | null;
};

const nullableNumber = z.number().nullable();

const observationRowSchema = z.object({
  id: z.number(),
  city_name: z.string(),
  country_code: z.string(),
  lat: nullableNumber,
  lon: nullableNumber,
  ts_utc: z.number(),
  tz: z.string().nullable(),
  temp_c: nullableNumber,
  feels_like_c: nullableNumber,
  humidity: nullableNumber,
  pressure: nullableNumber,
  wind_speed: nullableNumber,
  wind_dir: nullableNumber,
  clouds: nullableNumber,
  visibility_km: nullableNumber,
  weather_description: z.string().nullable(),
  created_at: z.string(),
});

type ObservationRow = z.infer<typeof observationRowSchema>;

const toParams = (observation: Observation): ObservationParams => ({
  city_name: observation.cityName,
  country_code: observation.countryCode,
  lat: observation.lat,
  lon: observation.lon,
  ts_utc: observation.tsUtc,
  tz: observation.tz,
  temp_c: observation.tempC,
  feels_like_c: observation.feelsLikeC,
  humidity: observation.humidity,
  pressure: observation.pressure,
  wind_speed: observation.windSpeed,
  wind_dir: observation.windDir,
  clouds: observation.clouds,
  visibility_km: observation.visibilityKm,
  weather_description: observation.weatherDescription,
});

const fromRow = (row: unknown): StoredObservation => {
  const parsed: ObservationRow = observationRowSchema.parse(row);
  return {
    id: parsed.id,
    cityName: parsed.city_name,
    countryCode: parsed.country_code,
    lat: parsed.lat,
    lon: parsed.lon,
    tsUtc: parsed.ts_utc,
    tz: parsed.tz || 'UTC',
    tempC: parsed.temp_c,
    feelsLikeC: parsed.feels_like_c,
    humidity: parsed.humidity,
    pressure: parsed.pressure,
    windSpeed: parsed.wind_speed,
    windDir: parsed.wind_dir,
    clouds: parsed.clouds,
    visibilityKm: parsed.visibility_km,
    weatherDescription: parsed.weather_description,
    createdAt: parsed.created_at,
  };
};

export interface FetchRangeOptions {
  startUtc?: number | null;
  endUtc?: number | null;
}

export interface ObservationStore {
  readonly dbPath: string;
  ensureSchema(): Promise<void>;
  insert(observation: Observation): Promise<boolean>;
  fetchLatest(city: string, country: string, limit: number): Promise<StoredObservation[]>;
  fetchRange(city: string, country: string, range?: FetchRangeOptions): Promise<StoredObservation[]>;
}

type ConnectionMode = 'read' | 'write';

export const databaseUrl = (dbPath: string): string => `file:${path.resolve(dbPath)}`;

/**
 * SQLite-backed store. Every operation opens its own connection and closes it before returning,
 * on error paths too; nothing is cached between calls.
 */
export const createObservationStore = (dbPath: string): ObservationStore => {
  // libsql creates a missing file on open, so reads check for it first.
  const open = (mode: ConnectionMode): Client => {
    if (mode === 'read' && !fs.existsSync(dbPath)) {
      throw new StoreUnavailableError(`Cannot open database at ${dbPath}: the file does not exist`, dbPath);
    }
    try {
      if (mode === 'write') {
        fs.mkdirSync(path.dirname(dbPath), { recursive: true });
      }
      return createClient({ url: databaseUrl(dbPath) });
    } catch (error) {
      throw new StoreUnavailableError(`Cannot open database at ${dbPath}: ${errorMessage(error)}`, dbPath);
    }
  };

  const withConnection = async <T>(mode: ConnectionMode, work: (db: Client) => Promise<T>): Promise<T> => {
    const db = open(mode);
    try {
      return await work(db);
    } catch (error) {
      throw new StoreUnavailableError(`Database operation failed at ${dbPath}: ${errorMessage(error)}`, dbPath);
    } finally {
      db.close();
    }
  };

  return {
    dbPath,

    ensureSchema: async () => {
      await withConnection('write', (db) => db.execute(OBSERVATIONS_DDL));
    },

    insert: async (observation) => {
      // OR IGNORE would also swallow NOT NULL violations and report them as duplicates.
      const missing = missingIdentityFields(observation);
      if (missing.length > 0) {
        throw new IncompleteObservationError(missing);
      }
      const result = await withConnection('write', (db) => db.execute({ sql: INSERT_SQL, args: toParams(observation) }));
      return result.rowsAffected > 0;
    },

    fetchLatest: (city, country, limit) =>
      withConnection('read', async (db) => {
        const result = await db.execute({
          sql: `SELECT ${SELECT_COLUMNS} FROM ${OBSERVATIONS_TABLE}
                WHERE city_name = ? AND country_code = ?
                ORDER BY ts_utc DESC
                LIMIT ?`,
          args: [city, country, limit],
        });
        return result.rows.map(fromRow);
      }),

    fetchRange: (city, country, { startUtc = null, endUtc = null } = {}) =>
      withConnection('read', async (db) => {
        let sql = `SELECT ${SELECT_COLUMNS} FROM ${OBSERVATIONS_TABLE} WHERE city_name = ? AND country_code = ?`;
        const args: Array<string | number> = [city, country];
        if (startUtc !== null) {
          sql += ' AND ts_utc >= ?';
          args.push(Math.trunc(startUtc));
        }
        if (endUtc !== null) {
          sql += ' AND ts_utc <= ?';
          args.push(Math.trunc(endUtc));
        }
        sql += ' ORDER BY ts_utc ASC';
        const result = await db.execute({ sql, args });
        return result.rows.map(fromRow);
      }),
  };
};
