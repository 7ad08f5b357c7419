import { z } from 'zod';
import { METRIC_TYPES, MetricType, PERIODS, Period } from '../metrics/metricModel';
import { isSameDay } from '../lib/dayKeys';
import { clampToDomain } from '../metrics/riskModel';

/**
 * Cached daily target for one (metric, period) pair.
 */
export interface DailyTarget {
  metricType: MetricType;
  period: Period;
  targetValue: number;
  originalCurrentValue: number;
  originalBenefitMinutes: number;
  calculationDate: string; // ISO
  algorithmVersion: number;
  approximate: boolean; // search hit its iteration cap
}

/**
 * What callers see: the stored target plus values derived from the live reading.
 */
export interface TargetView {
  target: DailyTarget;
  currentValue: number;
  remainingAmount: number;
  benefitMinutes: number;
  currentImpactMinutes: number;
  targetImpactMinutes: number;
}

export const dailyTargetSchema = z.object({
  metricType: z.enum(METRIC_TYPES),
  period: z.enum(PERIODS),
  targetValue: z.number(),
  originalCurrentValue: z.number(),
  originalBenefitMinutes: z.number(),
  calculationDate: z.string().datetime({ offset: true }),
  algorithmVersion: z.number().int(),
  approximate: z.boolean(),
});

/**
 * A target stays valid for the rest of the calendar day it was calculated on, and only
 * for the algorithm version that produced it.
 */
export function isTargetValid(target: DailyTarget, now: Date, timeZone: string, algorithmVersion: number): boolean {
  return target.algorithmVersion === algorithmVersion && isSameDay(target.calculationDate, now, timeZone);
}

/**
 * How far the live reading still is from the target, in the metric's units. Zero once
 * the target is reached or passed in the improving direction. The reading is clamped to
 * the metric's domain first.
 */
export function remainingAmount(target: DailyTarget, currentValue: number): number {
  const current = clampToDomain(target.metricType, currentValue).value;
  const increasing = target.targetValue >= target.originalCurrentValue;
  return increasing ? Math.max(0, target.targetValue - current) : Math.max(0, current - target.targetValue);
}
