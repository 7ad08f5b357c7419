/**
 * Metric risk model
 *
 * Maps one raw metric reading to a daily lifespan impact in minutes. Every metric is a
 * curve in riskCurves.json: either a relative-risk curve converted to minutes against a
 * 78-year reference lifespan, or a direct minutes-per-unit curve. Inputs outside the
 * physiological domain are clamped, never rejected.
 */

import riskCurveData from './riskCurves.json';
import { parseTable } from '../config/tableLoader';
import { getEngineConfig } from '../config/engineConfig';
import { MetricType, ResolvedProfile } from './metricModel';
import { CurveSegment, MetricCurve, RiskCurveTable, riskCurveTableSchema } from './riskCurveSchema';

export const RISK_CURVES: RiskCurveTable = parseTable(riskCurveTableSchema, riskCurveData, 'risk curve table');

export const DAYS_PER_YEAR = 365.25;
export const MINUTES_PER_DAY = 24 * 60;
export const MINUTES_PER_YEAR = DAYS_PER_YEAR * MINUTES_PER_DAY;
export const REFERENCE_LIFE_EXPECTANCY_YEARS = RISK_CURVES.referenceLifeExpectancyYears;
export const BASELINE_LIFE_MINUTES = REFERENCE_LIFE_EXPECTANCY_YEARS * MINUTES_PER_YEAR;

export interface MetricEvaluation {
  metricType: MetricType;
  rawValue: number;
  clampedValue: number;
  wasClamped: boolean;
  relativeRisk: number | null; // null for direct-minutes curves
  minutes: number;
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function getMetricCurve(metricType: MetricType): MetricCurve {
  return RISK_CURVES.metrics[metricType];
}

/**
 * Clamps a raw reading to the metric's domain. Non-finite readings become the domain minimum.
 */
export function clampToDomain(metricType: MetricType, rawValue: number): { value: number; wasClamped: boolean } {
  const { domain } = getMetricCurve(metricType);
  if (!Number.isFinite(rawValue)) {
    return { value: domain.min, wasClamped: true };
  }
  const value = clamp(rawValue, domain.min, domain.max);
  return { value, wasClamped: value !== rawValue };
}

function evaluateSegment(segment: CurveSegment, x: number): number {
  const t = clamp((x - segment.start) / (segment.end - segment.start), 0, 1);
  // log shape: steep early gains flattening out; passes through both endpoints
  const progress = segment.shape === 'log' ? Math.log(1 + t * (Math.E - 1)) : t;
  return segment.from + (segment.to - segment.from) * progress;
}

export function evaluateSegments(segments: CurveSegment[], x: number): number {
  for (const segment of segments) {
    if (x <= segment.end) {
      return evaluateSegment(segment, x);
    }
  }
  return evaluateSegment(segments[segments.length - 1], x);
}

export function remainingReferenceYears(age: number): number {
  return Math.max(1, REFERENCE_LIFE_EXPECTANCY_YEARS - age);
}

/**
 * Converts a relative risk into minutes of lifespan gained (RR < 1) or lost (RR > 1) per day.
 */
export function relativeRiskToDailyMinutes(relativeRisk: number, scaling: number, age: number): number {
  const lifetimeMinutes = BASELINE_LIFE_MINUTES * (1 - relativeRisk) * scaling;
  return lifetimeMinutes / (remainingReferenceYears(age) * DAYS_PER_YEAR);
}

export function evaluateMetric(metricType: MetricType, rawValue: number, profile: ResolvedProfile): MetricEvaluation {
  const curve = getMetricCurve(metricType);
  const { value, wasClamped } = clampToDomain(metricType, rawValue);

  if (wasClamped && getEngineConfig().logDomainClamps) {
    console.log(`[RiskModel] ${metricType} clamped from ${rawValue} to ${value}`);
  }

  const { model } = curve;
  const x = value * model.inputScale;

  switch (model.kind) {
    case 'relativeRisk': {
      const relativeRisk = evaluateSegments(model.segments, x);
      return {
        metricType,
        rawValue,
        clampedValue: value,
        wasClamped,
        relativeRisk,
        minutes: relativeRiskToDailyMinutes(relativeRisk, model.scaling, profile.age),
      };
    }
    case 'directMinutes':
      return {
        metricType,
        rawValue,
        clampedValue: value,
        wasClamped,
        relativeRisk: null,
        minutes: evaluateSegments(model.segments, x),
      };
  }
}

export function computeDailyImpactMinutes(metricType: MetricType, rawValue: number, profile: ResolvedProfile): number {
  return evaluateMetric(metricType, rawValue, profile).minutes;
}
