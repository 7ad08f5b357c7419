/**
 * Unit tests for the metric risk model
 */

import { describe, it, expect } from 'vitest';
import {
  BASELINE_LIFE_MINUTES,
  clampToDomain,
  computeDailyImpactMinutes,
  evaluateMetric,
  remainingReferenceYears,
} from './riskModel';
import { parseTable } from '../config/tableLoader';
import { riskCurveTableSchema } from './riskCurveSchema';
import riskCurveData from './riskCurves.json';
import { ResolvedProfile } from './metricModel';

const AGE_40: ResolvedProfile = { age: 40, gender: 'male' };

// Minutes per unit of (1 - RR) at age 40: 78-year lifespan spread over 38 remaining years.
const MINUTES_PER_RR_AT_40 = BASELINE_LIFE_MINUTES / (38 * 365.25);

describe('relative-risk curves', () => {
  it('credits 8,500 steps with a gain on the logarithmic branch', () => {
    const progress = Math.log(1 + 0.75 * (Math.E - 1));
    const expectedRr = 1.3 - 0.4 * progress;

    const evaluation = evaluateMetric('steps', 8500, AGE_40);

    expect(evaluation.relativeRisk).toBeCloseTo(expectedRr, 10);
    expect(evaluation.minutes).toBeCloseTo(MINUTES_PER_RR_AT_40 * (1 - expectedRr) * 0.082, 8);
    expect(evaluation.minutes).toBeGreaterThan(0);
  });

  it('treats 7.5 hours of sleep as neutral', () => {
    expect(computeDailyImpactMinutes('sleepHours', 7.5, AGE_40)).toBeCloseTo(0, 6);
  });

  it('penalises a resting heart rate of 70 by 16% relative risk', () => {
    const evaluation = evaluateMetric('restingHeartRate', 70, AGE_40);

    expect(evaluation.relativeRisk).toBeCloseTo(1.16, 10);
    expect(evaluation.minutes).toBeCloseTo(MINUTES_PER_RR_AT_40 * -0.16 * 0.04, 8);
    expect(evaluation.minutes).toBeLessThan(0);
  });

  it('evaluates exercise against weekly minutes', () => {
    // 150 weekly minutes sits exactly on the end of the logarithmic segment
    const evaluation = evaluateMetric('exerciseMinutes', 150 / 7, AGE_40);

    expect(evaluation.relativeRisk).toBeCloseTo(0.77, 10);
    expect(evaluation.minutes).toBeCloseTo(MINUTES_PER_RR_AT_40 * 0.23 * 0.126, 8);
  });

  it('keeps at least one remaining year for very old profiles', () => {
    expect(remainingReferenceYears(90)).toBe(1);
    expect(remainingReferenceYears(40)).toBe(38);
  });
});

describe('direct-minutes curves', () => {
  it('maps smoking status codes to fixed penalties', () => {
    expect(computeDailyImpactMinutes('smokingStatus', 0, AGE_40)).toBeCloseTo(0, 10);
    expect(computeDailyImpactMinutes('smokingStatus', 1, AGE_40)).toBeCloseTo(-116.1, 8);
    expect(computeDailyImpactMinutes('smokingStatus', 2, AGE_40)).toBeCloseTo(-232.2, 8);
    expect(computeDailyImpactMinutes('smokingStatus', 3, AGE_40)).toBeCloseTo(-348.3, 8);
  });

  it('penalises body mass above the healthy band', () => {
    expect(computeDailyImpactMinutes('bodyMass', 150, AGE_40)).toBe(0);
    // 60 lb over 160 at 17.4 minutes per 20 lb
    expect(computeDailyImpactMinutes('bodyMass', 220, AGE_40)).toBeCloseTo(-52.2, 8);
  });

  it('gives 17.4 minutes per 10 ms of HRV around 40 ms', () => {
    expect(computeDailyImpactMinutes('heartRateVariability', 40, AGE_40)).toBeCloseTo(0, 8);
    expect(computeDailyImpactMinutes('heartRateVariability', 50, AGE_40)).toBeCloseTo(17.4, 8);
  });

  it('caps VO2max outside 20–60', () => {
    expect(computeDailyImpactMinutes('vo2Max', 70, AGE_40)).toBeCloseTo(87.2, 8);
    expect(computeDailyImpactMinutes('vo2Max', 18, AGE_40)).toBeCloseTo(-87.2, 8);
  });
});

describe('domain clamping', () => {
  it('clamps out-of-range readings and reports it', () => {
    const evaluation = evaluateMetric('steps', -50, AGE_40);

    expect(evaluation.clampedValue).toBe(0);
    expect(evaluation.wasClamped).toBe(true);
    expect(evaluation.rawValue).toBe(-50);
  });

  it('replaces non-finite readings with the domain minimum', () => {
    expect(clampToDomain('sleepHours', Number.NaN)).toEqual({ value: 3, wasClamped: true });
    expect(clampToDomain('sleepHours', Number.POSITIVE_INFINITY)).toEqual({ value: 3, wasClamped: true });
  });

  it('leaves in-range readings untouched', () => {
    expect(clampToDomain('restingHeartRate', 65)).toEqual({ value: 65, wasClamped: false });
  });
});

describe('monotonicity', () => {
  it('increases steps impact across the logarithmic segment', () => {
    let previous = Number.NEGATIVE_INFINITY;
    for (let steps = 4000; steps <= 10000; steps += 500) {
      const minutes = computeDailyImpactMinutes('steps', steps, AGE_40);
      expect(minutes).toBeGreaterThan(previous);
      previous = minutes;
    }
  });

  it('decreases resting heart rate impact as bpm rises', () => {
    let previous = Number.POSITIVE_INFINITY;
    for (let bpm = 40; bpm <= 120; bpm += 5) {
      const minutes = computeDailyImpactMinutes('restingHeartRate', bpm, AGE_40);
      expect(minutes).toBeLessThan(previous);
      previous = minutes;
    }
  });
});

describe('curve table validation', () => {
  it('accepts the bundled table', () => {
    expect(() => parseTable(riskCurveTableSchema, riskCurveData, 'risk curve table')).not.toThrow();
  });

  it('rejects a table with a gap between segments', () => {
    const broken = structuredClone(riskCurveData);
    broken.metrics.steps.model.segments[1].start = 2800;

    expect(() => parseTable(riskCurveTableSchema, broken, 'risk curve table')).toThrow(
      /Invalid risk curve table: metrics\.steps\.model\.segments\.1: segments must be contiguous/
    );
  });

  it('rejects a table missing a metric', () => {
    const { stressLevel: _dropped, ...metrics } = riskCurveData.metrics;
    const broken = { ...riskCurveData, metrics };

    expect(() => parseTable(riskCurveTableSchema, broken, 'risk curve table')).toThrow(/metrics\.stressLevel/);
  });
});
