/**
 * Chart data processor
 *
 * Cleans a historical series for display: IQR outlier clipping, optional weighted
 * moving-average smoothing, then time bucketing (day -> hours, month -> days,
 * year -> months). Running totals are summed per bucket, instantaneous readings are
 * averaged. Sleep segments are first summed per night (noon to noon), and the nightly
 * totals are what get clipped, smoothed and averaged.
 */

import { CUMULATIVE_METRICS, MetricType, Period } from '../metrics/metricModel';
import { BucketUnit, bucketStart, getNightKey } from '../lib/dayKeys';

export interface SeriesPoint {
  date: string; // ISO
  value: number;
}

export type SmoothingLevel = 'none' | 'light' | 'moderate' | 'heavy';

export const SMOOTHING_WINDOWS: Record<SmoothingLevel, number> = {
  none: 1,
  light: 3,
  moderate: 5,
  heavy: 7,
};

export const BUCKET_UNITS: Record<Period, BucketUnit> = {
  day: 'hour',
  month: 'day',
  year: 'month',
};

export interface ChartOptions {
  smoothing?: SmoothingLevel;
  timeZone?: string;
}

const MIN_POINTS_TO_PROCESS = 3;
const MIN_POINTS_TO_CLIP = 5;
const IQR_FENCE = 1.5;
const DISTANCE_DECAY = 0.5;

interface TimedValue {
  time: number;
  date: string;
  value: number;
}

export function defaultSmoothing(metricType: MetricType): SmoothingLevel {
  return CUMULATIVE_METRICS.has(metricType) ? 'none' : 'light';
}

/**
 * Clamps values to the Tukey fences around the quartiles. Needs at least five points.
 */
export function clipOutliers(values: number[]): number[] {
  if (values.length < MIN_POINTS_TO_CLIP) {
    return [...values];
  }

  const sorted = [...values].sort((a, b) => a - b);
  const q1 = sorted[Math.floor(sorted.length / 4)];
  const q3 = sorted[Math.floor((sorted.length * 3) / 4)];
  const iqr = q3 - q1;
  const lower = q1 - IQR_FENCE * iqr;
  const upper = q3 + IQR_FENCE * iqr;

  return values.map((value) => Math.max(lower, Math.min(upper, value)));
}

/**
 * Weighted moving average; neighbours count 1 / (1 + 0.5 * distance).
 * Applied only when there are more points than the window.
 */
export function smoothValues(values: number[], level: SmoothingLevel): number[] {
  const window = SMOOTHING_WINDOWS[level];
  if (window <= 1 || values.length <= window) {
    return [...values];
  }

  const half = Math.floor(window / 2);
  return values.map((_, index) => {
    let weightedSum = 0;
    let weightTotal = 0;
    for (let j = Math.max(0, index - half); j <= Math.min(values.length - 1, index + half); j++) {
      const weight = 1 / (1 + Math.abs(index - j) * DISTANCE_DECAY);
      weightedSum += values[j] * weight;
      weightTotal += weight;
    }
    return weightedSum / weightTotal;
  });
}

function groupBy<K>(points: TimedValue[], keyOf: (point: TimedValue) => K | null): Map<K, number[]> {
  const groups = new Map<K, number[]>();
  for (const point of points) {
    const key = keyOf(point);
    if (key === null) continue;
    const bucket = groups.get(key);
    if (bucket) {
      bucket.push(point.value);
    } else {
      groups.set(key, [point.value]);
    }
  }
  return groups;
}

const sum = (values: number[]) => values.reduce((total, value) => total + value, 0);
const mean = (values: number[]) => (values.length > 0 ? sum(values) / values.length : 0);

// stage segments -> one total per night, dated by the evening it started
function nightlyTotals(points: TimedValue[], timeZone: string): TimedValue[] {
  const nights = new Map<string, number>();
  for (const point of points) {
    const night = getNightKey(point.date, timeZone);
    if (night === null) continue;
    nights.set(night, (nights.get(night) ?? 0) + point.value);
  }
  return [...nights.entries()]
    .map(([night, total]) => ({ time: Date.parse(night), date: night, value: total }))
    .sort((a, b) => a.time - b.time);
}

function cleanValues(points: TimedValue[], smoothing: SmoothingLevel): TimedValue[] {
  if (points.length < MIN_POINTS_TO_PROCESS) {
    return points;
  }
  const values = smoothValues(clipOutliers(points.map((point) => point.value)), smoothing);
  return points.map((point, index) => ({ ...point, value: values[index] }));
}

function aggregateSeries(
  points: TimedValue[],
  metricType: MetricType,
  period: Period,
  timeZone: string
): SeriesPoint[] {
  const unit = BUCKET_UNITS[period];
  // nightly sleep totals are averaged; raw sleep segments in an hourly view are summed
  const reduce = CUMULATIVE_METRICS.has(metricType) || (metricType === 'sleepHours' && unit === 'hour') ? sum : mean;
  const groups = groupBy(points, (point) => bucketStart(point.date, unit, timeZone));

  return [...groups.entries()]
    .map(([date, values]) => ({ date, value: reduce(values) }))
    .sort((a, b) => Date.parse(a.date) - Date.parse(b.date));
}

export function processSeries(
  series: readonly SeriesPoint[],
  metricType: MetricType,
  period: Period,
  options: ChartOptions = {}
): SeriesPoint[] {
  const timeZone = options.timeZone || 'UTC';
  let points: TimedValue[] = series
    .map((point) => ({ time: Date.parse(point.date), date: point.date, value: point.value }))
    .filter((point) => Number.isFinite(point.value) && !Number.isNaN(point.time))
    .sort((a, b) => a.time - b.time);

  if (metricType === 'sleepHours' && BUCKET_UNITS[period] !== 'hour') {
    points = nightlyTotals(points, timeZone);
  }

  const cleaned = cleanValues(points, options.smoothing ?? defaultSmoothing(metricType));
  return aggregateSeries(cleaned, metricType, period, timeZone);
}
