import { z } from 'zod';

export const EFFECT_TYPES = [
  'linearCumulative',
  'diminishingReturns',
  'thresholdBased',
  'plateau',
  'exponential',
] as const;
export type EffectType = (typeof EFFECT_TYPES)[number];

export const DECAY_CATEGORIES = ['effortDependent', 'addiction', 'habitual', 'default'] as const;
export type DecayCategory = (typeof DECAY_CATEGORIES)[number];

const EPSILON = 1e-9;

const segmentSchema = z
  .object({
    start: z.number(),
    end: z.number(),
    shape: z.enum(['linear', 'log']),
    from: z.number(),
    to: z.number(),
  })
  .refine((segment) => segment.end > segment.start, { message: 'segment end must be after start' });

export type CurveSegment = z.infer<typeof segmentSchema>;

const relativeRiskModelSchema = z.object({
  kind: z.literal('relativeRisk'),
  scaling: z.number().positive(),
  inputScale: z.number().positive().default(1),
  segments: z.array(segmentSchema).min(1),
});

const directMinutesModelSchema = z.object({
  kind: z.literal('directMinutes'),
  inputScale: z.number().positive().default(1),
  segments: z.array(segmentSchema).min(1),
});

const curveModelSchema = z.discriminatedUnion('kind', [relativeRiskModelSchema, directMinutesModelSchema]);
export type CurveModel = z.infer<typeof curveModelSchema>;

const metricCurveSchema = z
  .object({
    domain: z.object({ min: z.number(), max: z.number() }),
    optimum: z.number(),
    effectType: z.enum(EFFECT_TYPES),
    decayCategory: z.enum(DECAY_CATEGORIES),
    model: curveModelSchema,
  })
  .superRefine((curve, ctx) => {
    const { domain, optimum, model } = curve;
    if (domain.max <= domain.min) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'domain max must exceed min', path: ['domain'] });
      return;
    }
    if (optimum < domain.min || optimum > domain.max) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'optimum lies outside the domain', path: ['optimum'] });
    }

    // Segments must tile the (scaled) domain without gaps.
    const segments = model.segments;
    const expectedStart = domain.min * model.inputScale;
    const expectedEnd = domain.max * model.inputScale;
    if (Math.abs(segments[0].start - expectedStart) > EPSILON) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'first segment must start at the domain min', path: ['model', 'segments', 0] });
    }
    for (let i = 1; i < segments.length; i++) {
      if (Math.abs(segments[i].start - segments[i - 1].end) > EPSILON) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'segments must be contiguous', path: ['model', 'segments', i] });
      }
    }
    if (Math.abs(segments[segments.length - 1].end - expectedEnd) > EPSILON) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'last segment must end at the domain max',
        path: ['model', 'segments', segments.length - 1],
      });
    }

    if (model.kind === 'relativeRisk' && segments.some((segment) => segment.from <= 0 || segment.to <= 0)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'relative risk must be positive', path: ['model', 'segments'] });
    }
  });

export type MetricCurve = z.infer<typeof metricCurveSchema>;

export const riskCurveTableSchema = z.object({
  referenceLifeExpectancyYears: z.number().positive(),
  metrics: z.object({
    steps: metricCurveSchema,
    exerciseMinutes: metricCurveSchema,
    sleepHours: metricCurveSchema,
    restingHeartRate: metricCurveSchema,
    heartRateVariability: metricCurveSchema,
    bodyMass: metricCurveSchema,
    activeEnergyBurned: metricCurveSchema,
    vo2Max: metricCurveSchema,
    oxygenSaturation: metricCurveSchema,
    nutritionQuality: metricCurveSchema,
    smokingStatus: metricCurveSchema,
    alcoholConsumption: metricCurveSchema,
    socialConnectionsQuality: metricCurveSchema,
    stressLevel: metricCurveSchema,
  }),
});

export type RiskCurveTable = z.infer<typeof riskCurveTableSchema>;
