export const CARDINAL_DIRECTIONS = [
  'N',
  'NNE',
  'NE',
  'ENE',
  'E',
  'ESE',
  'SE',
  'SSE',
  'S',
  'SSW',
  'SW',
  'WSW',
  'W',
  'WNW',
  'NW',
  'NNW',
] as const;

export type CardinalDirection = (typeof CARDINAL_DIRECTIONS)[number];

export const degreesToCardinal = (degrees: number | null | undefined): CardinalDirection | null => {
  if (typeof degrees !== 'number' || !Number.isFinite(degrees)) {
    return null;
  }
  const normalized = ((degrees % 360) + 360) % 360;
  const index = Math.round(normalized / 22.5) % CARDINAL_DIRECTIONS.length;
  return CARDINAL_DIRECTIONS[index] ?? null;
};

export const formatWind = (speed: number | null | undefined, degrees: number | null | undefined): string => {
  const speedText = typeof speed === 'number' && Number.isFinite(speed) ? `${speed} m/s` : 'n/a';
  const cardinal = degreesToCardinal(degrees);
  if (cardinal === null) {
    return speedText;
  }
  return `${speedText} from ${degrees}° (${cardinal})`;
};
