import { ScalingPolicy } from '../config/engineConfig';
import { MetricType, Period } from '../metrics/metricModel';
import { EvidenceStrength } from '../metrics/studyReferences';
import { ActiveInteraction } from '../interactions/interactionRules';

export type ComparisonResult = 'better' | 'same' | 'worse';

export interface MetricImpactDetail {
  readonly metricType: MetricType;
  readonly rawValue: number;
  readonly clampedValue: number;
  readonly wasClamped: boolean;
  readonly baseImpactMinutes: number; // straight from the risk curve
  readonly adjustedImpactMinutes: number; // after interactions and mortality adjustment
  readonly dailyImpactMinutes: number; // after evidence weighting
  readonly comparisonToBaseline: ComparisonResult;
  readonly evidenceStrength: EvidenceStrength;
  readonly evidenceWeight: number;
}

export interface ImpactSnapshot {
  readonly period: Period;
  readonly scalingPolicy: ScalingPolicy;
  readonly calculatedAt: string;
  readonly dailyTotalMinutes: number;
  readonly totalImpactMinutes: number;
  readonly contributions: Readonly<Partial<Record<MetricType, number>>>;
  readonly details: readonly MetricImpactDetail[];
  readonly evidenceQualityScore: number;
  readonly activeInteractions: readonly ActiveInteraction[];
}
