/**
 * Interaction effects between metrics
 *
 * Each rule watches one or two metric values and scales a single target metric's
 * impact by a positive factor. Rules run once each, in the order listed.
 */

import { MetricType } from '../metrics/metricModel';

export type MetricValues = ReadonlyMap<MetricType, number>;
export type MetricImpacts = ReadonlyMap<MetricType, number>;

export interface InteractionRule {
  id: string;
  title: string;
  target: MetricType;
  /** Returns the factor to apply, or null when the rule does not fire. */
  factor: (values: MetricValues) => number | null;
}

export interface ActiveInteraction {
  id: string;
  title: string;
  target: MetricType;
  factor: number;
}

export const SLEEP_EXERCISE_SYNERGY = 1.15;
export const ALCOHOL_HRV_FACTOR = 0.75;
export const ALCOHOL_SLEEP_FACTOR = 0.8;
export const STRESS_SLEEP_FACTOR = 0.85;
export const BODY_MASS_ACTIVITY_FACTOR = 0.9;

export const ALCOHOL_HRV_THRESHOLD_DRINKS = 0.5;
export const ALCOHOL_SLEEP_THRESHOLD_DRINKS = 1;
export const HIGH_STRESS_THRESHOLD = 6;
export const BODY_MASS_THRESHOLD_LB = 200;
const BODY_MASS_INCREMENT_LB = 20;

export const INTERACTION_RULES: readonly InteractionRule[] = [
  {
    id: 'sleepExerciseSynergy',
    title: 'Good sleep amplifies exercise benefits',
    target: 'exerciseMinutes',
    factor: (values) => {
      const sleep = values.get('sleepHours');
      const exercise = values.get('exerciseMinutes');
      if (sleep === undefined || exercise === undefined) return null;
      return sleep >= 7 && sleep <= 8.5 && exercise >= 20 ? SLEEP_EXERCISE_SYNERGY : null;
    },
  },
  {
    id: 'alcoholHrvAntagonism',
    title: 'Alcohol blunts heart rate variability',
    target: 'heartRateVariability',
    factor: (values) => {
      const drinks = values.get('alcoholConsumption');
      if (drinks === undefined) return null;
      return drinks >= ALCOHOL_HRV_THRESHOLD_DRINKS ? ALCOHOL_HRV_FACTOR : null;
    },
  },
  {
    id: 'alcoholSleepAntagonism',
    title: 'Alcohol reduces sleep quality',
    target: 'sleepHours',
    factor: (values) => {
      const drinks = values.get('alcoholConsumption');
      if (drinks === undefined) return null;
      return drinks >= ALCOHOL_SLEEP_THRESHOLD_DRINKS ? ALCOHOL_SLEEP_FACTOR : null;
    },
  },
  {
    id: 'stressSleepAntagonism',
    title: 'High stress undermines sleep',
    target: 'sleepHours',
    factor: (values) => {
      const stress = values.get('stressLevel');
      if (stress === undefined) return null;
      return stress > HIGH_STRESS_THRESHOLD ? STRESS_SLEEP_FACTOR : null;
    },
  },
  {
    id: 'bodyMassActivityAntagonism',
    title: 'Excess body mass dampens activity benefits',
    target: 'steps',
    factor: (values) => {
      const mass = values.get('bodyMass');
      if (mass === undefined || mass <= BODY_MASS_THRESHOLD_LB) return null;
      return Math.pow(BODY_MASS_ACTIVITY_FACTOR, (mass - BODY_MASS_THRESHOLD_LB) / BODY_MASS_INCREMENT_LB);
    },
  },
];

/**
 * Rules that fire for the given values and whose target has an impact to adjust.
 */
export function getActiveInteractions(
  values: MetricValues,
  impacts?: MetricImpacts,
  rules: readonly InteractionRule[] = INTERACTION_RULES
): ActiveInteraction[] {
  const active: ActiveInteraction[] = [];
  for (const rule of rules) {
    if (impacts && !impacts.has(rule.target)) continue;
    const factor = rule.factor(values);
    if (factor === null) continue;
    active.push({ id: rule.id, title: rule.title, target: rule.target, factor });
  }
  return active;
}

/**
 * Applies every firing rule to its target impact. Metrics without a firing rule pass
 * through unchanged; the input map is not modified.
 */
export function adjustImpacts(
  impacts: MetricImpacts,
  values: MetricValues,
  rules: readonly InteractionRule[] = INTERACTION_RULES
): Map<MetricType, number> {
  const adjusted = new Map(impacts);
  for (const interaction of getActiveInteractions(values, impacts, rules)) {
    const current = adjusted.get(interaction.target);
    if (current === undefined) continue;
    adjusted.set(interaction.target, current * interaction.factor);
  }
  return adjusted;
}
