/**
 * Converts 1–10 questionnaire answers into raw metric units. Alcohol and smoking
 * answers run from 1 (heaviest use) to 10 (never); the quality and stress scales are
 * already in raw units.
 */

import { HealthMetric, MetricType } from './metricModel';

export type QuestionnaireMetric = Extract<
  MetricType,
  'alcoholConsumption' | 'smokingStatus' | 'nutritionQuality' | 'socialConnectionsQuality' | 'stressLevel'
>;

export const QUESTIONNAIRE_METRICS: readonly QuestionnaireMetric[] = [
  'alcoholConsumption',
  'smokingStatus',
  'nutritionQuality',
  'socialConnectionsQuality',
  'stressLevel',
];

function clampAnswer(answer: number): number {
  return Math.max(1, Math.min(10, answer));
}

// 10 never, 7–9 occasionally, 3–7 about one a day, below 3 heavy
export function drinksPerDayFromAnswer(answer: number): number {
  const scale = clampAnswer(answer);
  if (scale >= 9) return 0;
  if (scale >= 7) return 0.5;
  if (scale >= 3) return 1;
  return 2;
}

// 0 never, 1 former, 2 light, 3 heavy
export function smokingStatusFromAnswer(answer: number): number {
  const scale = clampAnswer(answer);
  if (scale >= 9) return 0;
  if (scale >= 6) return 1;
  if (scale >= 2) return 2;
  return 3;
}

export function rawValueFromAnswer(metricType: QuestionnaireMetric, answer: number): number {
  switch (metricType) {
    case 'alcoholConsumption':
      return drinksPerDayFromAnswer(answer);
    case 'smokingStatus':
      return smokingStatusFromAnswer(answer);
    case 'nutritionQuality':
    case 'socialConnectionsQuality':
    case 'stressLevel':
      return clampAnswer(answer);
  }
}

export function metricFromQuestionnaire(
  metricType: QuestionnaireMetric,
  answer: number,
  timestamp: string = new Date().toISOString()
): HealthMetric {
  return {
    type: metricType,
    value: rawValueFromAnswer(metricType, answer),
    timestamp,
    source: 'manual',
  };
}
