/**
 * Published studies behind each metric's curve. The first reference for a metric is
 * its primary source and sets the metric's evidence strength.
 */

import { z } from 'zod';
import studyData from './studyReferences.json';
import { parseTable } from '../config/tableLoader';
import { METRIC_TYPES, MetricType } from './metricModel';

export const EVIDENCE_STRENGTHS = ['high', 'moderate', 'low'] as const;
export type EvidenceStrength = (typeof EVIDENCE_STRENGTHS)[number];

export const EVIDENCE_WEIGHTS: Record<EvidenceStrength, number> = {
  high: 1.0,
  moderate: 0.8,
  low: 0.6,
};

const studyReferenceSchema = z.object({
  citation: z.string().min(1),
  sampleSize: z.number().int().positive(),
  followUpYears: z.number().positive(),
  studyType: z.enum(['metaAnalysis', 'prospectiveCohort', 'randomizedTrial', 'expertConsensus']),
  reliability: z.enum(EVIDENCE_STRENGTHS),
});

export type StudyReference = Readonly<z.infer<typeof studyReferenceSchema>>;

const studyTableSchema = z.record(z.string(), z.array(studyReferenceSchema).min(1)).superRefine((table, ctx) => {
  for (const metricType of METRIC_TYPES) {
    if (!table[metricType]) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'no study for metric', path: [metricType] });
    }
  }
});

const STUDY_TABLE = parseTable(studyTableSchema, studyData, 'study reference table');

export function getStudyReferences(metricType: MetricType): readonly StudyReference[] {
  return STUDY_TABLE[metricType] ?? [];
}

export function getEvidenceStrength(metricType: MetricType): EvidenceStrength {
  const [primary] = getStudyReferences(metricType);
  return primary ? primary.reliability : 'low';
}

export function getEvidenceWeight(metricType: MetricType): number {
  return EVIDENCE_WEIGHTS[getEvidenceStrength(metricType)];
}
