import { DEFAULT_TIMEZONE, firstResult, toEpochSeconds } from './observation.js';
import type { ObservationRecord } from './observation-queries.js';
import { formatLocalDateTime, resolveTimeZone } from './time.js';
import type { WeatherbitPayload } from './weatherbit.js';
import { formatWind } from './wind.js';

const show = (value: string | number | null | undefined): string =>
  value === null || value === undefined || value === '' ? 'n/a' : String(value);

/** Multi-line, human-readable view of a raw provider payload, for debugging a collection. */
export const summarizePayload = (payload: WeatherbitPayload): string => {
  const current = firstResult(payload);
  const tsUtc = toEpochSeconds(current?.ts);
  if (!current || tsUtc === null) {
    return `Unexpected API response:\n${JSON.stringify(payload)}`;
  }

  const tzName = current.timezone || DEFAULT_TIMEZONE;
  const localZone = resolveTimeZone(tzName);

  return [
    `City: ${show(current.city_name)}, ${show(current.country_code)}`,
    `Conditions: ${show(current.weather?.description)}`,
    `Temp: ${show(current.temp)} °C (feels like ${show(current.app_temp)} °C)`,
    `Humidity: ${show(current.rh)}%`,
    `Wind: ${formatWind(current.wind_spd, current.wind_dir)}`,
    `Clouds: ${show(current.clouds)}%`,
    `Visibility: ${show(current.vis)} km`,
    `Local time: ${formatLocalDateTime(tsUtc, localZone)} (${tzName})`,
    `UTC time: ${formatLocalDateTime(tsUtc, 'UTC')} (UTC)`,
    `Sunrise (UTC): ${show(current.sunrise)}`,
    `Sunset (UTC): ${show(current.sunset)}`,
  ].join('\n');
};

export const formatObservationLine = (record: ObservationRecord): string =>
  `${record.city}-${record.country} | ${formatLocalDateTime(record.tsUtc, record.tz)} (${record.tz}) | ` +
  `${show(record.tempC)}°C (feels ${show(record.feelsLikeC)}°C) | ${show(record.humidity)}% rh | ${show(record.weatherDescription)}`;

export const formatObservationLines = (records: ObservationRecord[]): string[] =>
  records.length === 0 ? ['No records found.'] : records.map(formatObservationLine);
