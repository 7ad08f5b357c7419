/**
 * Projection engine
 *
 * Converts a steady-state weighted daily impact into an adjusted life expectancy:
 * baseline expectancy + decayed lifetime impact (in years, discounted by evidence
 * quality), bounded to [age + 1, 120]. Per-metric contributions decay at the rate of
 * their behavior category.
 */

import { ScalingPolicy } from '../config/engineConfig';
import { HealthMetric, METRIC_TYPES, MetricType, UserProfile, resolveProfile } from '../metrics/metricModel';
import { MINUTES_PER_YEAR } from '../metrics/riskModel';
import {
  aggregateDecayRate,
  decayRateFor,
  getBaselineLifeExpectancy,
  integrateDecayedImpact,
} from '../mortality/mortalityAdjuster';
import { computeImpact } from '../impact/impactEngine';

export const MAX_LIFE_EXPECTANCY_YEARS = 120;
export const CONFIDENCE_INTERVAL_YEARS = 2;

export interface LifeProjection {
  currentAge: number;
  baselineExpectancyYears: number;
  adjustedExpectancyYears: number;
  confidencePercentage: number; // 0–1
  confidenceIntervalYears: number;
}

export interface ProjectionOptions {
  asOf?: Date;
  decayRate?: number;
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

interface ProjectionBase {
  age: number;
  baselineExpectancyYears: number;
  remainingYears: number;
}

function projectionBase(profile: UserProfile, asOf?: Date): ProjectionBase {
  const resolved = resolveProfile(profile, asOf);
  const baselineExpectancyYears = getBaselineLifeExpectancy(resolved);
  return {
    age: resolved.age,
    baselineExpectancyYears,
    remainingYears: Math.max(1, baselineExpectancyYears - resolved.age),
  };
}

function toProjection(base: ProjectionBase, lifetimeMinutes: number, evidenceQuality: number): LifeProjection {
  const quality = Number.isFinite(evidenceQuality) ? clamp(evidenceQuality, 0, 1) : 0;
  const impactYears = ((Number.isFinite(lifetimeMinutes) ? lifetimeMinutes : 0) / MINUTES_PER_YEAR) * quality;

  return {
    currentAge: base.age,
    baselineExpectancyYears: base.baselineExpectancyYears,
    adjustedExpectancyYears: clamp(base.baselineExpectancyYears + impactYears, base.age + 1, MAX_LIFE_EXPECTANCY_YEARS),
    confidencePercentage: quality,
    confidenceIntervalYears: CONFIDENCE_INTERVAL_YEARS,
  };
}

/**
 * Projects a single daily total, decayed at the aggregate rate unless one is given.
 */
export function project(
  profile: UserProfile,
  weightedDailyImpact: number,
  evidenceQuality: number,
  options: ProjectionOptions = {}
): LifeProjection {
  const base = projectionBase(profile, options.asOf);
  const dailyImpact = Number.isFinite(weightedDailyImpact) ? weightedDailyImpact : 0;
  const lifetimeMinutes = integrateDecayedImpact(
    dailyImpact,
    base.remainingYears,
    options.decayRate ?? aggregateDecayRate()
  );
  return toProjection(base, lifetimeMinutes, evidenceQuality);
}

/**
 * Projects per-metric daily contributions, each decayed at its behavior category's rate
 * (or at options.decayRate for all of them).
 */
export function projectContributions(
  profile: UserProfile,
  contributions: Readonly<Partial<Record<MetricType, number>>>,
  evidenceQuality: number,
  options: ProjectionOptions = {}
): LifeProjection {
  const base = projectionBase(profile, options.asOf);
  let lifetimeMinutes = 0;

  for (const metricType of METRIC_TYPES) {
    const daily = contributions[metricType];
    if (daily === undefined || !Number.isFinite(daily)) continue;
    lifetimeMinutes += integrateDecayedImpact(daily, base.remainingYears, options.decayRate ?? decayRateFor(metricType));
  }

  return toProjection(base, lifetimeMinutes, evidenceQuality);
}

/**
 * Snapshot of today's metrics projected over the remaining lifetime.
 */
export function projectFromMetrics(
  metrics: readonly HealthMetric[],
  profile: UserProfile,
  scalingPolicy: ScalingPolicy,
  options: ProjectionOptions = {}
): LifeProjection {
  const snapshot = computeImpact(metrics, 'day', profile, { scalingPolicy, asOf: options.asOf });
  return projectContributions(profile, snapshot.contributions, snapshot.evidenceQualityScore, options);
}
