import { z } from 'zod';
import { METRIC_TYPES, PERIODS } from '../metrics/metricModel';

const metricTypeSchema = z.enum(METRIC_TYPES);
const periodSchema = z.enum(PERIODS);

export const profileSchema = z
  .object({
    birthYear: z.number().int().min(1850).max(2200).optional(),
    gender: z.enum(['male', 'female', 'preferNotToSay']).optional(),
    height: z.number().positive().optional(),
    weight: z.number().positive().optional(),
  })
  .default({});

export const metricSchema = z.object({
  type: metricTypeSchema,
  value: z.number(),
  timestamp: z.string().default(() => new Date().toISOString()),
  source: z.enum(['sensor', 'manual', 'derived']).default('sensor'),
});

export const questionnaireSchema = z
  .object({
    alcoholConsumption: z.number().optional(),
    smokingStatus: z.number().optional(),
    nutritionQuality: z.number().optional(),
    socialConnectionsQuality: z.number().optional(),
    stressLevel: z.number().optional(),
  })
  .strict();

export const impactRequestSchema = z.object({
  metrics: z.array(metricSchema).default([]),
  questionnaire: questionnaireSchema.optional(),
  profile: profileSchema,
  period: periodSchema.default('day'),
});

export const projectionRequestSchema = z.object({
  metrics: z.array(metricSchema).default([]),
  questionnaire: questionnaireSchema.optional(),
  profile: profileSchema,
});

export const targetRequestSchema = z.object({
  userId: z.string().min(1),
  metricType: metricTypeSchema,
  currentValue: z.number(),
  period: periodSchema.default('day'),
  profile: profileSchema,
  otherMetrics: z.record(metricTypeSchema, z.number()).optional(),
});

export const chartRequestSchema = z.object({
  metricType: metricTypeSchema,
  period: periodSchema,
  series: z.array(z.object({ date: z.string(), value: z.number() })),
  smoothing: z.enum(['none', 'light', 'moderate', 'heavy']).optional(),
  timeZone: z.string().optional(),
});

export type QuestionnaireAnswers = z.infer<typeof questionnaireSchema>;
