import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest';
import { Server } from 'http';
import { createApp } from './app';
import { RecommendationEngine } from './recommendation/recommendationEngine';
import { InMemoryKeyValueCache, KeyValueCache } from './recommendation/targetCache';

const NOW = new Date('2025-06-01T09:00:00.000Z');
const PROFILE = { birthYear: 1985, gender: 'male' };

function listen(cache: KeyValueCache): Promise<{ server: Server; baseUrl: string }> {
  const recommendations = new RecommendationEngine({ cache, scalingPolicy: 'effectAware', now: () => NOW });
  const app = createApp({
    config: { scalingPolicy: 'effectAware', timeZone: 'UTC', algorithmVersion: 3 },
    recommendations,
    now: () => NOW,
  });
  return new Promise((resolve) => {
    const server = app.listen(0, () => {
      const address = server.address();
      const port = address && typeof address === 'object' ? address.port : 0;
      resolve({ server, baseUrl: `http://127.0.0.1:${port}` });
    });
  });
}

function close(server: Server): Promise<void> {
  return new Promise((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
}

describe('HTTP app', () => {
  const cache = new InMemoryKeyValueCache();
  let server: Server;
  let baseUrl: string;

  const post = (path: string, body: unknown) =>
    fetch(`${baseUrl}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });

  beforeAll(async () => {
    ({ server, baseUrl } = await listen(cache));
  });

  afterAll(async () => {
    await close(server);
  });

  it('reports health', async () => {
    const response = await fetch(`${baseUrl}/api/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ ok: true, algorithmVersion: 3, scalingPolicy: 'effectAware' });
  });

  it('computes an impact snapshot with questionnaire answers merged in', async () => {
    const response = await post('/api/impact', {
      metrics: [{ type: 'steps', value: 3000, timestamp: '2025-06-01T08:00:00.000Z' }],
      questionnaire: { smokingStatus: 10 },
      profile: PROFILE,
      period: 'month',
    });
    const snapshot = await response.json();

    expect(response.status).toBe(200);
    expect(snapshot.period).toBe('month');
    expect(snapshot.calculatedAt).toBe('2025-06-01T09:00:00.000Z');
    expect(snapshot.details.map((detail: { metricType: string }) => detail.metricType)).toEqual([
      'steps',
      'smokingStatus',
    ]);
    expect(snapshot.contributions.smokingStatus).toBe(0);
    expect(snapshot.contributions.steps).toBeLessThan(0);
  });

  it('rejects malformed requests with the failing fields', async () => {
    const response = await post('/api/impact', { metrics: [{ type: 'heightInches', value: 70 }] });
    const body = await response.json();

    expect(response.status).toBe(400);
    expect(body.error).toBe('Invalid request');
    expect(body.issues[0].path).toBe('metrics.0.type');
  });

  it('projects current metrics against the optimal set', async () => {
    const response = await post('/api/projection', {
      metrics: [
        { type: 'steps', value: 3000, timestamp: '2025-06-01T08:00:00.000Z' },
        { type: 'smokingStatus', value: 3, timestamp: '2025-06-01T08:00:00.000Z' },
      ],
      profile: PROFILE,
    });
    const { current, optimal } = await response.json();

    expect(response.status).toBe(200);
    expect(current.currentAge).toBe(40);
    expect(current.adjustedExpectancyYears).toBeLessThan(current.baselineExpectancyYears);
    expect(optimal.adjustedExpectancyYears).toBeGreaterThan(optimal.baselineExpectancyYears);
  });

  it('returns a target cached under the user id', async () => {
    const response = await post('/api/targets', {
      userId: 'user-1',
      metricType: 'restingHeartRate',
      currentValue: 70,
      period: 'day',
      profile: PROFILE,
      otherMetrics: { sleepHours: 7.5 },
    });
    const view = await response.json();

    expect(response.status).toBe(200);
    expect(view.target.targetValue).toBeGreaterThanOrEqual(59.5);
    expect(view.target.targetValue).toBeLessThanOrEqual(60.5);
    expect(await cache.get('dailyTarget:user-1:restingHeartRate:day')).not.toBeNull();
  });

  it('processes chart series', async () => {
    const response = await post('/api/charts', {
      metricType: 'steps',
      period: 'month',
      series: [
        { date: '2025-06-01T08:00:00.000Z', value: 1000 },
        { date: '2025-06-01T12:00:00.000Z', value: 2000 },
        { date: '2025-06-02T09:00:00.000Z', value: 500 },
      ],
    });

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      metricType: 'steps',
      period: 'month',
      series: [
        { date: '2025-06-01T00:00:00.000Z', value: 3000 },
        { date: '2025-06-02T00:00:00.000Z', value: 500 },
      ],
    });
  });
});

describe('HTTP app failures', () => {
  it('hides internal errors behind a 500', async () => {
    const failing: KeyValueCache = {
      get: async () => {
        throw new Error('cache offline');
      },
      set: async () => undefined,
      delete: async () => undefined,
    };
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const { server, baseUrl } = await listen(failing);

    try {
      const response = await fetch(`${baseUrl}/api/targets`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ userId: 'user-2', metricType: 'steps', currentValue: 3000 }),
      });

      expect(response.status).toBe(500);
      expect(await response.json()).toEqual({ error: 'Internal server error' });
      expect(error).toHaveBeenCalledWith('[targets] error:', expect.any(Error));
    } finally {
      error.mockRestore();
      await close(server);
    }
  });
});
