/**
 * Aggregation engine
 *
 * metrics -> risk curves -> interactions -> mortality adjustment -> evidence weighting
 * -> period scaling. Produces an immutable ImpactSnapshot whose total is always derived
 * from its per-metric contributions.
 */

import { ScalingPolicy } from '../config/engineConfig';
import {
  HealthMetric,
  METRIC_TYPES,
  MetricType,
  Period,
  ResolvedProfile,
  UserProfile,
  resolveProfile,
} from '../metrics/metricModel';
import { MetricEvaluation, clampToDomain, evaluateMetric } from '../metrics/riskModel';
import { getEvidenceStrength, getEvidenceWeight } from '../metrics/studyReferences';
import { ActiveInteraction, adjustImpacts, getActiveInteractions } from '../interactions/interactionRules';
import { adjustDailyImpact } from '../mortality/mortalityAdjuster';
import { totalFromContributions } from './periodScaling';
import { ComparisonResult, ImpactSnapshot, MetricImpactDetail } from './impactModel';

export interface ImpactOptions {
  scalingPolicy: ScalingPolicy;
  asOf?: Date;
}

// Daily impacts within half a minute of zero count as no change
export const NEUTRAL_BAND_MINUTES = 0.5;

export function compareToBaseline(dailyImpactMinutes: number): ComparisonResult {
  if (dailyImpactMinutes > NEUTRAL_BAND_MINUTES) return 'better';
  if (dailyImpactMinutes < -NEUTRAL_BAND_MINUTES) return 'worse';
  return 'same';
}

/**
 * Keeps one reading per metric type: the most recent by timestamp. Readings with an
 * unparseable timestamp lose to any dated reading.
 */
export function latestByType(metrics: readonly HealthMetric[]): Map<MetricType, HealthMetric> {
  const latest = new Map<MetricType, HealthMetric>();
  const timeOf = (metric: HealthMetric) => {
    const time = Date.parse(metric.timestamp);
    return Number.isNaN(time) ? Number.NEGATIVE_INFINITY : time;
  };

  for (const metric of metrics) {
    const existing = latest.get(metric.type);
    if (!existing || timeOf(metric) >= timeOf(existing)) {
      latest.set(metric.type, metric);
    }
  }
  return latest;
}

/**
 * Impact of one metric value with the other metrics held fixed: risk curve, then
 * interactions, then mortality adjustment. No evidence weighting.
 */
export function adjustedMetricImpact(
  metricType: MetricType,
  rawValue: number,
  profile: ResolvedProfile,
  otherValues: ReadonlyMap<MetricType, number> = new Map()
): number {
  const evaluation = evaluateMetric(metricType, rawValue, profile);

  const values = new Map<MetricType, number>();
  for (const [type, value] of otherValues) {
    values.set(type, clampToDomain(type, value).value);
  }
  values.set(metricType, evaluation.clampedValue);

  const impacts = new Map<MetricType, number>([[metricType, evaluation.minutes]]);
  const interacted = adjustImpacts(impacts, values).get(metricType) ?? evaluation.minutes;
  return adjustDailyImpact(interacted, profile);
}

export function createImpactSnapshot(
  period: Period,
  scalingPolicy: ScalingPolicy,
  details: readonly MetricImpactDetail[],
  activeInteractions: readonly ActiveInteraction[],
  calculatedAt: Date = new Date()
): ImpactSnapshot {
  const contributions: Partial<Record<MetricType, number>> = {};
  let dailyTotalMinutes = 0;
  let weightSum = 0;

  for (const detail of details) {
    contributions[detail.metricType] = detail.dailyImpactMinutes;
    dailyTotalMinutes += detail.dailyImpactMinutes;
    weightSum += detail.evidenceWeight;
  }

  return Object.freeze({
    period,
    scalingPolicy,
    calculatedAt: calculatedAt.toISOString(),
    dailyTotalMinutes,
    totalImpactMinutes: totalFromContributions(contributions, period, scalingPolicy),
    contributions: Object.freeze(contributions),
    details: Object.freeze([...details]),
    evidenceQualityScore: details.length > 0 ? weightSum / details.length : 0,
    activeInteractions: Object.freeze([...activeInteractions]),
  });
}

export function computeImpact(
  metrics: readonly HealthMetric[],
  period: Period,
  profile: UserProfile,
  options: ImpactOptions
): ImpactSnapshot {
  const asOf = options.asOf ?? new Date();
  const resolved = resolveProfile(profile, asOf);

  const evaluations = new Map<MetricType, MetricEvaluation>();
  for (const [metricType, metric] of latestByType(metrics)) {
    evaluations.set(metricType, evaluateMetric(metricType, metric.value, resolved));
  }

  const baseImpacts = new Map<MetricType, number>();
  const values = new Map<MetricType, number>();
  for (const [metricType, evaluation] of evaluations) {
    baseImpacts.set(metricType, evaluation.minutes);
    values.set(metricType, evaluation.clampedValue);
  }

  const interacted = adjustImpacts(baseImpacts, values);
  const activeInteractions = getActiveInteractions(values, baseImpacts);

  const details: MetricImpactDetail[] = [];
  for (const metricType of METRIC_TYPES) {
    const evaluation = evaluations.get(metricType);
    if (!evaluation) continue;

    const adjustedImpactMinutes = adjustDailyImpact(interacted.get(metricType) ?? evaluation.minutes, resolved);
    const evidenceWeight = getEvidenceWeight(metricType);
    const dailyImpactMinutes = adjustedImpactMinutes * evidenceWeight;

    details.push(
      Object.freeze({
        metricType,
        rawValue: evaluation.rawValue,
        clampedValue: evaluation.clampedValue,
        wasClamped: evaluation.wasClamped,
        baseImpactMinutes: evaluation.minutes,
        adjustedImpactMinutes,
        dailyImpactMinutes,
        comparisonToBaseline: compareToBaseline(dailyImpactMinutes),
        evidenceStrength: getEvidenceStrength(metricType),
        evidenceWeight,
      })
    );
  }

  return createImpactSnapshot(period, options.scalingPolicy, details, activeInteractions, asOf);
}
