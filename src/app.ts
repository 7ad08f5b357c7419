import express, { Express, Response } from 'express';
import cors from 'cors';
import { ZodError } from 'zod';
import {
  QuestionnaireAnswers,
  chartRequestSchema,
  impactRequestSchema,
  projectionRequestSchema,
  targetRequestSchema,
} from './api/requestSchemas';
import { EngineConfig } from './config/engineConfig';
import { HealthMetric, MetricType, isMetricType } from './metrics/metricModel';
import { QUESTIONNAIRE_METRICS, metricFromQuestionnaire } from './metrics/questionnaireScales';
import { computeImpact } from './impact/impactEngine';
import { projectFromMetrics } from './projection/projectionEngine';
import { createOptimalMetrics } from './projection/optimalMetrics';
import { RecommendationEngine } from './recommendation/recommendationEngine';
import { processSeries } from './charts/chartProcessor';

export interface AppDependencies {
  config: Pick<EngineConfig, 'scalingPolicy' | 'timeZone' | 'algorithmVersion'>;
  recommendations: RecommendationEngine;
  now?: () => Date;
}

function withQuestionnaire(
  metrics: readonly HealthMetric[],
  answers: QuestionnaireAnswers | undefined,
  timestamp: string
): HealthMetric[] {
  const merged = [...metrics];
  if (!answers) return merged;

  for (const metricType of QUESTIONNAIRE_METRICS) {
    const answer = answers[metricType];
    if (answer !== undefined) {
      merged.push(metricFromQuestionnaire(metricType, answer, timestamp));
    }
  }
  return merged;
}

function toValueMap(values: Partial<Record<string, number>> | undefined): Map<MetricType, number> {
  const map = new Map<MetricType, number>();
  for (const [key, value] of Object.entries(values ?? {})) {
    if (isMetricType(key) && value !== undefined) {
      map.set(key, value);
    }
  }
  return map;
}

function sendError(res: Response, tag: string, error: unknown) {
  if (error instanceof ZodError) {
    return res.status(400).json({
      error: 'Invalid request',
      issues: error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    });
  }
  console.error(`[${tag}] error:`, error);
  return res.status(500).json({
    error: 'Internal server error',
    debug:
      process.env.NODE_ENV === 'development'
        ? String(error instanceof Error ? error.message : error)
        : undefined,
  });
}

export function createApp(deps: AppDependencies): Express {
  const now = deps.now ?? (() => new Date());
  const { scalingPolicy } = deps.config;
  const app: Express = express();

  app.use(cors());
  app.use(express.json());

  app.get('/api/health', (_req, res) => {
    return res.json({ ok: true, algorithmVersion: deps.config.algorithmVersion, scalingPolicy });
  });

  app.post('/api/impact', (req, res) => {
    try {
      const body = impactRequestSchema.parse(req.body);
      const asOf = now();
      const metrics = withQuestionnaire(body.metrics, body.questionnaire, asOf.toISOString());
      const snapshot = computeImpact(metrics, body.period, body.profile, { scalingPolicy, asOf });

      console.log('[impact]', body.period, {
        metrics: snapshot.details.length,
        dailyTotalMinutes: Number(snapshot.dailyTotalMinutes.toFixed(2)),
      });
      return res.json(snapshot);
    } catch (error) {
      return sendError(res, 'impact', error);
    }
  });

  app.post('/api/projection', (req, res) => {
    try {
      const body = projectionRequestSchema.parse(req.body);
      const asOf = now();
      const metrics = withQuestionnaire(body.metrics, body.questionnaire, asOf.toISOString());

      return res.json({
        current: projectFromMetrics(metrics, body.profile, scalingPolicy, { asOf }),
        optimal: projectFromMetrics(createOptimalMetrics(body.profile, asOf), body.profile, scalingPolicy, { asOf }),
      });
    } catch (error) {
      return sendError(res, 'projection', error);
    }
  });

  app.post('/api/targets', async (req, res) => {
    try {
      const body = targetRequestSchema.parse(req.body);
      const view = await deps.recommendations.findTarget(body.metricType, body.currentValue, body.period, body.profile, {
        namespace: body.userId,
        otherMetrics: toValueMap(body.otherMetrics),
      });
      return res.json(view);
    } catch (error) {
      return sendError(res, 'targets', error);
    }
  });

  app.post('/api/charts', (req, res) => {
    try {
      const body = chartRequestSchema.parse(req.body);
      const series = processSeries(body.series, body.metricType, body.period, {
        smoothing: body.smoothing,
        timeZone: body.timeZone || deps.config.timeZone,
      });
      return res.json({ metricType: body.metricType, period: body.period, series });
    } catch (error) {
      return sendError(res, 'charts', error);
    }
  });

  return app;
}
