/**
 * Shared domain types for health metrics, user profiles and reporting periods.
 */

export const METRIC_TYPES = [
  'steps',
  'exerciseMinutes',
  'sleepHours',
  'restingHeartRate',
  'heartRateVariability',
  'bodyMass',
  'activeEnergyBurned',
  'vo2Max',
  'oxygenSaturation',
  'nutritionQuality',
  'smokingStatus',
  'alcoholConsumption',
  'socialConnectionsQuality',
  'stressLevel',
] as const;

export type MetricType = (typeof METRIC_TYPES)[number];

export const PERIODS = ['day', 'month', 'year'] as const;
export type Period = (typeof PERIODS)[number];

export const PERIOD_DAYS: Record<Period, number> = {
  day: 1,
  month: 30,
  year: 365,
};

export type MetricSource = 'sensor' | 'manual' | 'derived';

export interface HealthMetric {
  readonly type: MetricType;
  readonly value: number;
  readonly timestamp: string; // ISO
  readonly source: MetricSource;
}

export type Gender = 'male' | 'female' | 'preferNotToSay';

export interface UserProfile {
  birthYear?: number;
  gender?: Gender;
  height?: number; // cm
  weight?: number; // lb
  hasCompletedOnboarding?: boolean;
  hasCompletedQuestionnaire?: boolean;
}

/**
 * Profile after defaults have been applied. Every engine computation runs on this.
 */
export interface ResolvedProfile {
  age: number;
  gender: Gender;
}

export const DEFAULT_AGE_YEARS = 40;
export const DEFAULT_GENDER: Gender = 'male';
// One below the projection ceiling so a projection can always exceed the current age
export const MAX_AGE_YEARS = 119;

// Metrics whose daily value is a running total rather than an instantaneous reading.
export const CUMULATIVE_METRICS: ReadonlySet<MetricType> = new Set<MetricType>([
  'steps',
  'exerciseMinutes',
  'activeEnergyBurned',
]);

export function isMetricType(value: string): value is MetricType {
  return METRIC_TYPES.some((type) => type === value);
}

/**
 * Derives age and gender from a profile as of a given date.
 * Age is the calendar-year difference, clamped to 0–119; missing birth year falls back to 40.
 */
export function resolveProfile(profile: UserProfile, asOf: Date = new Date()): ResolvedProfile {
  const gender = profile.gender ?? DEFAULT_GENDER;

  if (profile.birthYear === undefined || !Number.isFinite(profile.birthYear)) {
    return { age: DEFAULT_AGE_YEARS, gender };
  }

  const age = asOf.getUTCFullYear() - profile.birthYear;
  return { age: Math.max(0, Math.min(MAX_AGE_YEARS, age)), gender };
}
