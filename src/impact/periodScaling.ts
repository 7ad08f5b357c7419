/**
 * Period scaling
 *
 * Turns a daily impact into a day/month/year total. Under the `linear` policy every
 * metric scales by the number of days. Under `effectAware` the multiplier depends on
 * how the behavior's effect accumulates over time.
 */

import { ScalingPolicy } from '../config/engineConfig';
import { METRIC_TYPES, MetricType, PERIOD_DAYS, Period } from '../metrics/metricModel';
import { EffectType } from '../metrics/riskCurveSchema';
import { getMetricCurve } from '../metrics/riskModel';

// Lower bounds for diminishing and threshold effects, in days-equivalent
export const MIN_PERIOD_MULTIPLIER: Record<Period, number> = {
  day: 0,
  month: 20,
  year: 180,
};

export const DIMINISHING_LOG_COEFFICIENT = 0.1;
export const THRESHOLD_MATURATION_DAYS = 14;
export const THRESHOLD_EARLY_FRACTION = 0.3;
export const PLATEAU_DAYS = 60;
export const EXPONENTIAL_GROWTH_PER_YEAR = 0.5;
export const EXPONENTIAL_CAP_RATIO = 1.5;

/**
 * Days-equivalent multiplier for one metric's daily impact over the period.
 */
export function periodMultiplier(effectType: EffectType, period: Period, policy: ScalingPolicy): number {
  const days = PERIOD_DAYS[period];
  if (policy === 'linear') {
    return days;
  }

  const floor = MIN_PERIOD_MULTIPLIER[period];
  switch (effectType) {
    case 'linearCumulative':
      return days;
    case 'diminishingReturns':
      return Math.max(floor, days / (1 + DIMINISHING_LOG_COEFFICIENT * Math.log(days)));
    case 'thresholdBased': {
      const earlyDays = Math.min(days, THRESHOLD_MATURATION_DAYS);
      const matureDays = Math.max(0, days - THRESHOLD_MATURATION_DAYS);
      return Math.max(floor, earlyDays * THRESHOLD_EARLY_FRACTION + matureDays);
    }
    case 'plateau':
      return Math.min(days, PLATEAU_DAYS);
    case 'exponential':
      return Math.min(days * EXPONENTIAL_CAP_RATIO, days * Math.exp((EXPONENTIAL_GROWTH_PER_YEAR * days) / 365));
  }
}

export function scaleImpact(dailyMinutes: number, metricType: MetricType, period: Period, policy: ScalingPolicy): number {
  return dailyMinutes * periodMultiplier(getMetricCurve(metricType).effectType, period, policy);
}

/**
 * Period total of per-metric daily contributions.
 */
export function totalFromContributions(
  contributions: Partial<Record<MetricType, number>>,
  period: Period,
  policy: ScalingPolicy
): number {
  let total = 0;
  for (const metricType of METRIC_TYPES) {
    const minutes = contributions[metricType];
    if (minutes === undefined) continue;
    total += scaleImpact(minutes, metricType, period, policy);
  }
  return total;
}
