import {
  epochToIsoUtc,
  formatLocalDateTime,
  isValidTimeZone,
  localDateKey,
  nowEpochSeconds,
  resolveTimeZone,
  windowStartEpoch,
} from '../src/utils/time.js';
import { RIO_TS } from './helpers.js';

test('formatLocalDateTime renders the instant in the requested zone', () => {
  expect(formatLocalDateTime(RIO_TS, 'UTC')).toBe('2023-11-14 22:13');
  expect(formatLocalDateTime(RIO_TS, 'America/Sao_Paulo')).toBe('2023-11-14 19:13');
  expect(formatLocalDateTime(RIO_TS, 'Asia/Tokyo')).toBe('2023-11-15 07:13');
});

test('formatLocalDateTime uses 00 for midnight', () => {
  expect(formatLocalDateTime(1700006400, 'UTC')).toBe('2023-11-15 00:00');
});

test('unknown or missing zones resolve to UTC', () => {
  expect(isValidTimeZone('Nowhere/Special')).toBe(false);
  expect(isValidTimeZone('Europe/Lisbon')).toBe(true);
  expect(resolveTimeZone(null)).toBe('UTC');
  expect(resolveTimeZone('Nowhere/Special')).toBe('UTC');
  expect(formatLocalDateTime(RIO_TS, 'Nowhere/Special')).toBe('2023-11-14 22:13');
});

test('localDateKey gives the calendar day in the zone', () => {
  expect(localDateKey(RIO_TS, 'America/Sao_Paulo')).toBe('2023-11-14');
  expect(localDateKey(RIO_TS, 'Asia/Tokyo')).toBe('2023-11-15');
});

test('epoch helpers', () => {
  expect(epochToIsoUtc(RIO_TS)).toBe('2023-11-14T22:13:20.000Z');
  expect(nowEpochSeconds(1700000000999)).toBe(RIO_TS);
  expect(windowStartEpoch(168, RIO_TS)).toBe(1699395200);
});
