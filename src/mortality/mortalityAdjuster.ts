/**
 * Mortality adjuster
 *
 * Baseline life expectancy and annual mortality by age and gender, the age-risk
 * adjustment of daily impacts, and long-horizon integration with behavior decay.
 */

import { z } from 'zod';
import mortalityData from './mortalityTables.json';
import { parseTable } from '../config/tableLoader';
import { Gender, MetricType, ResolvedProfile } from '../metrics/metricModel';
import { DAYS_PER_YEAR, getMetricCurve } from '../metrics/riskModel';
import { DECAY_CATEGORIES } from '../metrics/riskCurveSchema';

const genderSeriesSchema = z.object({
  male: z.array(z.number().nonnegative()),
  female: z.array(z.number().nonnegative()),
});

const mortalityTableSchema = z
  .object({
    anchorAges: z.array(z.number().nonnegative()).min(2),
    remainingLifeYears: genderSeriesSchema,
    annualDeathsPerThousand: genderSeriesSchema,
    baselineAnnualMortality: z.number().positive(),
    decayRates: z.record(z.enum(DECAY_CATEGORIES), z.number().nonnegative()),
    aggregateDecayRate: z.number().nonnegative(),
    segmentYears: z.number().positive(),
  })
  .superRefine((table, ctx) => {
    const count = table.anchorAges.length;
    for (let i = 1; i < count; i++) {
      if (table.anchorAges[i] <= table.anchorAges[i - 1]) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'anchor ages must ascend', path: ['anchorAges', i] });
      }
    }
    const series = [
      ['remainingLifeYears', table.remainingLifeYears],
      ['annualDeathsPerThousand', table.annualDeathsPerThousand],
    ] as const;
    for (const [name, values] of series) {
      if (values.male.length !== count || values.female.length !== count) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'one value per anchor age required', path: [name] });
      }
    }
    for (const category of DECAY_CATEGORIES) {
      if (table.decayRates[category] === undefined) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'missing decay rate', path: ['decayRates', category] });
      }
    }
  });

export type MortalityTables = z.infer<typeof mortalityTableSchema>;

export const MORTALITY_TABLES: MortalityTables = parseTable(mortalityTableSchema, mortalityData, 'mortality table');

const DEFAULT_DECAY_RATE = 0.12;

function interpolate(anchors: number[], values: number[], age: number): number {
  if (age <= anchors[0]) {
    return values[0];
  }
  for (let i = 1; i < anchors.length; i++) {
    if (age <= anchors[i]) {
      const t = (age - anchors[i - 1]) / (anchors[i] - anchors[i - 1]);
      return values[i - 1] + t * (values[i] - values[i - 1]);
    }
  }
  return values[values.length - 1];
}

function lookup(series: { male: number[]; female: number[] }, age: number, gender: Gender): number {
  const anchors = MORTALITY_TABLES.anchorAges;
  switch (gender) {
    case 'male':
      return interpolate(anchors, series.male, age);
    case 'female':
      return interpolate(anchors, series.female, age);
    case 'preferNotToSay':
      return (interpolate(anchors, series.male, age) + interpolate(anchors, series.female, age)) / 2;
  }
}

export function getRemainingLifeYears(age: number, gender: Gender): number {
  return lookup(MORTALITY_TABLES.remainingLifeYears, age, gender);
}

export function getBaselineLifeExpectancy(profile: ResolvedProfile): number {
  return profile.age + getRemainingLifeYears(profile.age, profile.gender);
}

/**
 * Probability of dying within a year at the given age. The table is per 1,000, not
 * per 100,000, so the damping in mortalityAdjustmentFactor starts in middle age.
 */
export function getAnnualMortalityRate(age: number, gender: Gender): number {
  return lookup(MORTALITY_TABLES.annualDeathsPerThousand, age, gender) / 1000;
}

/**
 * Shrinks impacts for ages whose baseline mortality exceeds the reference rate.
 * Always in (0, 1].
 */
export function mortalityAdjustmentFactor(age: number, gender: Gender): number {
  const base = MORTALITY_TABLES.baselineAnnualMortality;
  const rate = getAnnualMortalityRate(age, gender);
  return Math.sqrt(base / Math.max(rate, base));
}

export function adjustDailyImpact(dailyImpactMinutes: number, profile: ResolvedProfile): number {
  return dailyImpactMinutes * mortalityAdjustmentFactor(profile.age, profile.gender);
}

export function decayRateFor(metricType: MetricType): number {
  const category = getMetricCurve(metricType).decayCategory;
  return MORTALITY_TABLES.decayRates[category] ?? DEFAULT_DECAY_RATE;
}

export function aggregateDecayRate(): number {
  return MORTALITY_TABLES.aggregateDecayRate;
}

/**
 * Total minutes gained or lost over the remaining years when adherence decays
 * exponentially. Integrated over fixed segments with the decay taken at each
 * segment midpoint; the final segment may be partial.
 */
export function integrateDecayedImpact(dailyImpactMinutes: number, remainingYears: number, decayRate: number): number {
  const segmentYears = MORTALITY_TABLES.segmentYears;
  let total = 0;

  for (let start = 0; start < remainingYears; start += segmentYears) {
    const length = Math.min(segmentYears, remainingYears - start);
    const midpoint = start + length / 2;
    total += dailyImpactMinutes * Math.exp(-decayRate * midpoint) * length * DAYS_PER_YEAR;
  }

  return total;
}
