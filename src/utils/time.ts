export const SECONDS_PER_HOUR = 3600;

export const nowEpochSeconds = (now: number = Date.now()): number => Math.floor(now / 1000);

export const epochToIsoUtc = (tsUtc: number): string => new Date(tsUtc * 1000).toISOString();

export const isValidTimeZone = (timeZone: string | null | undefined): timeZone is string => {
  if (typeof timeZone !== 'string' || !timeZone.trim()) {
    return false;
  }
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
};

export const resolveTimeZone = (timeZone: string | null | undefined): string =>
  isValidTimeZone(timeZone) ? timeZone : 'UTC';

interface LocalParts {
  year: string;
  month: string;
  day: string;
  hour: string;
  minute: string;
}

const localParts = (tsUtc: number, timeZone: string | null | undefined): LocalParts => {
  const formatter = new Intl.DateTimeFormat('en-CA', {
    timeZone: resolveTimeZone(timeZone),
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23',
  });
  const parts: LocalParts = { year: '', month: '', day: '', hour: '', minute: '' };
  for (const part of formatter.formatToParts(new Date(tsUtc * 1000))) {
    if (part.type === 'year' || part.type === 'month' || part.type === 'day' || part.type === 'hour' || part.type === 'minute') {
      parts[part.type] = part.value;
    }
  }
  return parts;
};

/** `YYYY-MM-DD HH:mm` in the given zone; unknown zones render as UTC. */
export const formatLocalDateTime = (tsUtc: number, timeZone: string | null | undefined): string => {
  const { year, month, day, hour, minute } = localParts(tsUtc, timeZone);
  return `${year}-${month}-${day} ${hour}:${minute}`;
};

export const localDateKey = (tsUtc: number, timeZone: string | null | undefined): string => {
  const { year, month, day } = localParts(tsUtc, timeZone);
  return `${year}-${month}-${day}`;
};

export const windowStartEpoch = (hoursWindow: number, nowUtc: number): number =>
  nowUtc - Math.round(hoursWindow) * SECONDS_PER_HOUR;
