import { HealthMetric, MetricType, UserProfile, resolveProfile } from '../metrics/metricModel';

/**
 * Research-backed optimal readings for a profile, used to show what the projection
 * would be with every behavior at its best sustainable level.
 */
export function createOptimalMetrics(profile: UserProfile, asOf: Date = new Date()): HealthMetric[] {
  const { age, gender } = resolveProfile(profile, asOf);
  const timestamp = asOf.toISOString();

  const isFemale = gender === 'female';
  const vo2Multiplier = isFemale ? 0.88 : 1.0;
  const optimalVo2Max = Math.max(50 * vo2Multiplier - Math.max(0, age - 30) * 0.3, 35 * vo2Multiplier);

  const values: Array<[MetricType, number]> = [
    ['steps', 12000],
    ['exerciseMinutes', 45],
    ['sleepHours', 7.5],
    ['restingHeartRate', 55],
    ['heartRateVariability', Math.max(50, 60 - (age - 30) * 0.5)],
    ['smokingStatus', 0],
    ['alcoholConsumption', 0],
    ['stressLevel', 2],
    ['nutritionQuality', 9],
    ['socialConnectionsQuality', 8],
    ['bodyMass', isFemale ? 135 : 155],
    ['vo2Max', optimalVo2Max],
    ['activeEnergyBurned', 600],
    ['oxygenSaturation', 98],
  ];

  return values.map(([type, value]): HealthMetric => ({ type, value, timestamp, source: 'derived' }));
}
