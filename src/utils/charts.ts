import fs from 'node:fs/promises';
import path from 'node:path';
import type { ObservationRecord } from './observation-queries.js';
import { localDateKey, resolveTimeZone } from './time.js';

// --- Aggregation ---

export interface DailyMean {
  /** Local calendar day, YYYY-MM-DD, in the series' zone. */
  date: string;
  samples: number;
  tempC: number | null;
  feelsLikeC: number | null;
  humidity: number | null;
}

const mean = (values: Array<number | null>): number | null => {
  const finite = values.filter((value): value is number => typeof value === 'number' && Number.isFinite(value));
  if (finite.length === 0) return null;
  return finite.reduce((sum, value) => sum + value, 0) / finite.length;
};

/**
 * Groups records by local day and averages the numeric fields, ignoring nulls.
 * Records of one city share a zone, so the first record's zone is used for the whole series.
 */
export const dailyMeans = (records: ObservationRecord[]): DailyMean[] => {
  if (records.length === 0) return [];
  const timeZone = resolveTimeZone(records[0]?.tz);

  const byDay = new Map<string, ObservationRecord[]>();
  for (const record of records) {
    const key = localDateKey(record.tsUtc, timeZone);
    const bucket = byDay.get(key);
    if (bucket) {
      bucket.push(record);
    } else {
      byDay.set(key, [record]);
    }
  }

  return [...byDay.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([date, bucket]) => ({
      date,
      samples: bucket.length,
      tempC: mean(bucket.map((r) => r.tempC)),
      feelsLikeC: mean(bucket.map((r) => r.feelsLikeC)),
      humidity: mean(bucket.map((r) => r.humidity)),
    }));
};

// --- Geometry ---

const WIDTH = 640;
const HEIGHT = 360;
const MARGIN = { top: 40, right: 16, bottom: 48, left: 56 };
const PLOT_W = WIDTH - MARGIN.left - MARGIN.right;
const PLOT_H = HEIGHT - MARGIN.top - MARGIN.bottom;
const Y_TICKS = 5;
const SERIES_COLORS = ['#1f77b4', '#ff7f0e', '#2ca02c'];

export interface ChartSeries {
  label: string;
  values: Array<number | null>;
}

export interface LineChartSpec {
  title: string;
  yLabel: string;
  xLabels: string[];
  series: ChartSeries[];
}

export const escapeXml = (value: string): string =>
  value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');

// "2024-03-05" -> "05/03"
export const dayMonthLabel = (isoDate: string): string => {
  const match = isoDate.match(/^\d{4}-(\d{2})-(\d{2})$/);
  return match ? `${match[2]}/${match[1]}` : isoDate;
};

const yDomain = (series: ChartSeries[]): [number, number] => {
  const finite = series
    .flatMap((s) => s.values)
    .filter((value): value is number => typeof value === 'number' && Number.isFinite(value));
  if (finite.length === 0) return [0, 1];
  const min = Math.min(...finite);
  const max = Math.max(...finite);
  return min === max ? [min - 1, max + 1] : [min, max];
};

export const pointX = (index: number, count: number): number =>
  count <= 1 ? MARGIN.left + PLOT_W / 2 : MARGIN.left + (index * PLOT_W) / (count - 1);

export const pointY = (value: number, [min, max]: [number, number]): number =>
  MARGIN.top + ((max - value) / (max - min)) * PLOT_H;

/** Line chart with a marker per point and x ticks only at the points that exist. */
export const buildLineChartSvg = ({ title, yLabel, xLabels, series }: LineChartSpec): string => {
  const domain = yDomain(series);
  const count = xLabels.length;
  const parts: string[] = [];

  parts.push(
    `<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 ${WIDTH} ${HEIGHT}" width="${WIDTH}" height="${HEIGHT}" font-family="sans-serif" font-size="11">`,
    `<rect width="${WIDTH}" height="${HEIGHT}" fill="#ffffff"/>`,
    `<text x="${WIDTH / 2}" y="22" text-anchor="middle" font-size="14">${escapeXml(title)}</text>`,
  );

  // Axes
  const axisBottom = MARGIN.top + PLOT_H;
  parts.push(
    `<line x1="${MARGIN.left}" y1="${axisBottom}" x2="${MARGIN.left + PLOT_W}" y2="${axisBottom}" stroke="#333"/>`,
    `<line x1="${MARGIN.left}" y1="${MARGIN.top}" x2="${MARGIN.left}" y2="${axisBottom}" stroke="#333"/>`,
    `<text x="14" y="${MARGIN.top + PLOT_H / 2}" text-anchor="middle" transform="rotate(-90 14 ${MARGIN.top + PLOT_H / 2})">${escapeXml(yLabel)}</text>`,
  );

  for (let i = 0; i <= Y_TICKS; i += 1) {
    const value = domain[0] + ((domain[1] - domain[0]) * i) / Y_TICKS;
    const y = pointY(value, domain).toFixed(2);
    parts.push(
      `<line x1="${MARGIN.left - 4}" y1="${y}" x2="${MARGIN.left}" y2="${y}" stroke="#333"/>`,
      `<text x="${MARGIN.left - 6}" y="${y}" text-anchor="end" dominant-baseline="middle">${value.toFixed(1)}</text>`,
    );
  }

  xLabels.forEach((label, index) => {
    const x = pointX(index, count).toFixed(2);
    parts.push(
      `<line x1="${x}" y1="${axisBottom}" x2="${x}" y2="${axisBottom + 4}" stroke="#333"/>`,
      `<text x="${x}" y="${axisBottom + 18}" text-anchor="middle" class="x-tick">${escapeXml(label)}</text>`,
    );
  });

  series.forEach((s, seriesIndex) => {
    const color = SERIES_COLORS[seriesIndex % SERIES_COLORS.length];
    const points = s.values.flatMap((value, index) =>
      typeof value === 'number' && Number.isFinite(value)
        ? [`${pointX(index, count).toFixed(2)},${pointY(value, domain).toFixed(2)}`]
        : [],
    );
    if (points.length > 1) {
      parts.push(`<polyline fill="none" stroke="${color}" stroke-width="2" points="${points.join(' ')}"/>`);
    }
    for (const point of points) {
      const [cx, cy] = point.split(',');
      parts.push(`<circle cx="${cx}" cy="${cy}" r="3" fill="${color}" class="marker"/>`);
    }
    const legendY = MARGIN.top + 12 + seriesIndex * 14;
    parts.push(
      `<rect x="${WIDTH - MARGIN.right - 120}" y="${legendY - 8}" width="10" height="10" fill="${color}"/>`,
      `<text x="${WIDTH - MARGIN.right - 106}" y="${legendY}">${escapeXml(s.label)}</text>`,
    );
  });

  parts.push('</svg>');
  return parts.join('\n');
};

// --- Rendering ---

export const chartFileTag = (cityTag: string): string => cityTag.replace(/ /g, '_');

export interface DailyChartPaths {
  temp: string;
  tempFeels: string;
  humidity: string;
}

interface RenderDailyChartsOptions {
  records: ObservationRecord[];
  cityTag: string;
  outputDir: string;
}

export const renderDailyCharts = async ({ records, cityTag, outputDir }: RenderDailyChartsOptions): Promise<DailyChartPaths> => {
  const days = dailyMeans(records);
  if (days.length === 0) {
    throw new Error(`No observations to plot for ${cityTag}.`);
  }

  const xLabels = days.map((day) => dayMonthLabel(day.date));
  const tag = chartFileTag(cityTag);
  await fs.mkdir(outputDir, { recursive: true });

  const charts: Array<[keyof DailyChartPaths, string, LineChartSpec]> = [
    ['temp', `temp_${tag}.svg`, {
      title: `Temperature — ${cityTag} (daily mean)`,
      yLabel: '°C',
      xLabels,
      series: [{ label: 'Temperature (°C)', values: days.map((d) => d.tempC) }],
    }],
    ['tempFeels', `temp_feels_${tag}.svg`, {
      title: `Temp vs feels like — ${cityTag} (daily mean)`,
      yLabel: '°C',
      xLabels,
      series: [
        { label: 'Temp (°C)', values: days.map((d) => d.tempC) },
        { label: 'Feels like (°C)', values: days.map((d) => d.feelsLikeC) },
      ],
    }],
    ['humidity', `humidity_${tag}.svg`, {
      title: `Humidity — ${cityTag} (daily mean)`,
      yLabel: '%',
      xLabels,
      series: [{ label: 'Humidity (%)', values: days.map((d) => d.humidity) }],
    }],
  ];

  const written: DailyChartPaths = { temp: '', tempFeels: '', humidity: '' };
  for (const [key, fileName, chart] of charts) {
    const filePath = path.join(outputDir, fileName);
    await fs.writeFile(filePath, buildLineChartSvg(chart), 'utf8');
    written[key] = filePath;
  }
  return written;
};
