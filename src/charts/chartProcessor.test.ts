import { describe, it, expect } from 'vitest';
import { clipOutliers, processSeries, smoothValues } from './chartProcessor';

function daily(values: number[]) {
  return values.map((value, index) => ({
    date: `2025-06-${String(index + 1).padStart(2, '0')}T08:00:00.000Z`,
    value,
  }));
}

describe('clipOutliers', () => {
  it('clamps values beyond the IQR fences', () => {
    // q1 = sorted[1] = 11, q3 = sorted[4] = 14, upper fence 18.5
    expect(clipOutliers([10, 11, 12, 13, 14, 100])).toEqual([10, 11, 12, 13, 14, 18.5]);
  });

  it('leaves short series alone', () => {
    expect(clipOutliers([1, 2, 3, 500])).toEqual([1, 2, 3, 500]);
  });
});

describe('smoothValues', () => {
  it('weights neighbours by distance', () => {
    const smoothed = smoothValues([10, 20, 30, 40], 'light');

    expect(smoothed[0]).toBeCloseTo(14, 10);
    expect(smoothed[1]).toBeCloseTo(20, 10);
    expect(smoothed[2]).toBeCloseTo(30, 10);
    expect(smoothed[3]).toBeCloseTo(36, 10);
  });

  it('skips series no longer than the window', () => {
    expect(smoothValues([10, 20, 30], 'light')).toEqual([10, 20, 30]);
    expect(smoothValues([10, 20, 30, 40], 'none')).toEqual([10, 20, 30, 40]);
  });
});

describe('processSeries', () => {
  it('clips and buckets instantaneous readings by day for a month view', () => {
    const result = processSeries(daily([60, 61, 62, 63, 64, 140]), 'restingHeartRate', 'month', { smoothing: 'none' });

    // q1 = 61, q3 = 64, upper fence 68.5
    expect(result.map((point) => point.value)).toEqual([60, 61, 62, 63, 64, 68.5]);
    expect(result[0].date).toBe('2025-06-01T00:00:00.000Z');
  });

  it('sums running totals within a bucket', () => {
    const result = processSeries(
      [
        { date: '2025-06-01T08:00:00.000Z', value: 1000 },
        { date: '2025-06-01T12:00:00.000Z', value: 2000 },
        { date: '2025-06-02T09:00:00.000Z', value: 500 },
      ],
      'steps',
      'month'
    );

    expect(result).toEqual([
      { date: '2025-06-01T00:00:00.000Z', value: 3000 },
      { date: '2025-06-02T00:00:00.000Z', value: 500 },
    ]);
  });

  it('averages instantaneous readings per month for a year view', () => {
    const result = processSeries(
      [
        { date: '2025-05-10T08:00:00.000Z', value: 58 },
        { date: '2025-05-20T08:00:00.000Z', value: 62 },
        { date: '2025-06-03T08:00:00.000Z', value: 70 },
      ],
      'restingHeartRate',
      'year',
      { smoothing: 'none' }
    );

    expect(result).toEqual([
      { date: '2025-05-01T00:00:00.000Z', value: 60 },
      { date: '2025-06-01T00:00:00.000Z', value: 70 },
    ]);
  });

  it('averages nightly sleep totals per month for a year view', () => {
    const result = processSeries(
      [
        { date: '2025-05-31T23:00:00.000Z', value: 3 },
        { date: '2025-06-01T03:00:00.000Z', value: 4.5 },
        { date: '2025-06-01T23:30:00.000Z', value: 6.5 },
      ],
      'sleepHours',
      'year'
    );

    // the 31 May night (7.5) lands in May, the 1 June night (6.5) in June
    expect(result).toEqual([
      { date: '2025-05-01T00:00:00.000Z', value: 7.5 },
      { date: '2025-06-01T00:00:00.000Z', value: 6.5 },
    ]);
  });

  it('keeps a night that crosses midnight together', () => {
    const result = processSeries(
      [
        { date: '2025-06-01T22:00:00.000Z', value: 2 },
        { date: '2025-06-02T01:00:00.000Z', value: 6 },
        { date: '2025-06-02T22:00:00.000Z', value: 2 },
        { date: '2025-06-03T01:00:00.000Z', value: 6 },
      ],
      'sleepHours',
      'month'
    );

    expect(result).toEqual([
      { date: '2025-06-01T00:00:00.000Z', value: 8 },
      { date: '2025-06-02T00:00:00.000Z', value: 8 },
    ]);
  });

  it('sums stage segments before smoothing', () => {
    const result = processSeries(
      [
        { date: '2025-06-01T23:00:00.000Z', value: 0.5 },
        { date: '2025-06-01T23:30:00.000Z', value: 4 },
        { date: '2025-06-02T03:30:00.000Z', value: 0.5 },
        { date: '2025-06-02T04:00:00.000Z', value: 1 },
        { date: '2025-06-02T05:00:00.000Z', value: 2 },
      ],
      'sleepHours',
      'month'
    );

    expect(result).toEqual([{ date: '2025-06-01T00:00:00.000Z', value: 8 }]);
  });

  it('clips outliers among nightly totals', () => {
    const nights = [7, 7.5, 8, 7, 7.5, 20].map((value, index) => ({
      date: `2025-06-0${index + 1}T23:00:00.000Z`,
      value,
    }));

    const result = processSeries(nights, 'sleepHours', 'month', { smoothing: 'none' });

    // q1 = 7, q3 = 8, upper fence 9.5
    expect(result.map((point) => point.value)).toEqual([7, 7.5, 8, 7, 7.5, 9.5]);
    expect(result[5].date).toBe('2025-06-06T00:00:00.000Z');
  });

  it('buckets by hour in the requested time zone', () => {
    const result = processSeries([{ date: '2025-06-01T08:15:00.000Z', value: 400 }], 'steps', 'day', {
      timeZone: 'Europe/Istanbul',
    });

    expect(result).toEqual([{ date: '2025-06-01T11:00:00.000+03:00', value: 400 }]);
  });

  it('drops points with invalid values or dates', () => {
    const result = processSeries(
      [
        { date: '2025-06-01T08:00:00.000Z', value: Number.NaN },
        { date: 'yesterday', value: 5 },
        { date: '2025-06-01T09:00:00.000Z', value: 7 },
      ],
      'stressLevel',
      'month'
    );

    expect(result).toEqual([{ date: '2025-06-01T00:00:00.000Z', value: 7 }]);
  });

  it('returns an empty series for no input', () => {
    expect(processSeries([], 'steps', 'year')).toEqual([]);
  });
});
