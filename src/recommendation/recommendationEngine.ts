/**
 * Recommendation engine
 *
 * Finds the metric value that neutralizes a negative daily impact (or a modest
 * improvement when the impact is already non-negative) and caches the result per
 * (metric, period) for the rest of the calendar day.
 *
 * Reads go straight to the cache. A missing, stale or unreadable entry is recomputed
 * under a per-key lock so concurrent callers for the same key compute it once.
 */

import { ScalingPolicy, TARGET_ALGORITHM_VERSION } from '../config/engineConfig';
import { MetricType, Period, ResolvedProfile, UserProfile, resolveProfile } from '../metrics/metricModel';
import { clampToDomain, getMetricCurve } from '../metrics/riskModel';
import { adjustedMetricImpact } from '../impact/impactEngine';
import { scaleImpact } from '../impact/periodScaling';
import { KeyValueCache, KeyedLock } from './targetCache';
import { DailyTarget, TargetView, dailyTargetSchema, isTargetValid, remainingAmount } from './targetModel';
import { SearchOptions, findNeutralValue } from './targetSearch';

export const IMPROVEMENT_RATIO = 0.2;

export interface RecommendationEngineOptions extends SearchOptions {
  cache: KeyValueCache;
  scalingPolicy: ScalingPolicy;
  timeZone?: string;
  algorithmVersion?: number;
  now?: () => Date;
}

export interface TargetRequest {
  /** Other current readings, held fixed while searching (they drive interactions). */
  otherMetrics?: ReadonlyMap<MetricType, number>;
  /** Cache namespace, typically the user id. */
  namespace?: string;
}

export class RecommendationEngine {
  private readonly cache: KeyValueCache;
  private readonly lock = new KeyedLock();
  private readonly scalingPolicy: ScalingPolicy;
  private readonly timeZone: string;
  private readonly algorithmVersion: number;
  private readonly now: () => Date;
  private readonly searchOptions: SearchOptions;

  constructor(options: RecommendationEngineOptions) {
    this.cache = options.cache;
    this.scalingPolicy = options.scalingPolicy;
    this.timeZone = options.timeZone || 'UTC';
    this.algorithmVersion = options.algorithmVersion ?? TARGET_ALGORITHM_VERSION;
    this.now = options.now ?? (() => new Date());
    this.searchOptions = { toleranceMinutes: options.toleranceMinutes, maxIterations: options.maxIterations };
  }

  static cacheKey(metricType: MetricType, period: Period, namespace?: string): string {
    return ['dailyTarget', namespace, metricType, period].filter(Boolean).join(':');
  }

  async findTarget(
    metricType: MetricType,
    currentValue: number,
    period: Period,
    profile: UserProfile,
    request: TargetRequest = {}
  ): Promise<TargetView> {
    const now = this.now();
    const resolved = resolveProfile(profile, now);
    const others = request.otherMetrics ?? new Map<MetricType, number>();
    const key = RecommendationEngine.cacheKey(metricType, period, request.namespace);

    const cached = await this.readValidTarget(key, now);
    const target =
      cached ??
      (await this.lock.run(key, async () => {
        // another caller may have written it while we waited
        const fresh = await this.readValidTarget(key, now);
        if (fresh) {
          return fresh;
        }
        const computed = this.calculateTarget(metricType, currentValue, period, resolved, others, now);
        await this.cache.set(key, JSON.stringify(computed));
        console.log(
          `[RecommendationEngine] ${key} -> ${computed.targetValue.toFixed(2)}${computed.approximate ? ' (approximate)' : ''}`
        );
        return computed;
      }));

    return this.buildView(target, currentValue, resolved, others);
  }

  async clearTarget(metricType: MetricType, period: Period, namespace?: string): Promise<void> {
    const key = RecommendationEngine.cacheKey(metricType, period, namespace);
    await this.lock.run(key, () => this.cache.delete(key));
  }

  /**
   * Pure target calculation; no cache access.
   */
  calculateTarget(
    metricType: MetricType,
    currentValue: number,
    period: Period,
    profile: ResolvedProfile,
    otherMetrics: ReadonlyMap<MetricType, number>,
    now: Date
  ): DailyTarget {
    const curve = getMetricCurve(metricType);
    const current = clampToDomain(metricType, currentValue).value;
    const impactAt = (value: number) => adjustedMetricImpact(metricType, value, profile, otherMetrics);

    const currentImpact = impactAt(current);
    let targetValue: number;
    let approximate = false;

    if (currentImpact < 0) {
      const result = findNeutralValue(impactAt, current, curve.optimum, this.searchOptions);
      targetValue = result.value;
      approximate = result.approximate;
    } else {
      // past the optimum on a plateau a step back gains nothing; hold the current value
      const stepped = improvedValue(current, curve.optimum, curve.domain);
      targetValue = impactAt(stepped) > currentImpact ? stepped : current;
    }

    return {
      metricType,
      period,
      targetValue,
      originalCurrentValue: current,
      originalBenefitMinutes: scaleImpact(impactAt(targetValue) - currentImpact, metricType, period, this.scalingPolicy),
      calculationDate: now.toISOString(),
      algorithmVersion: this.algorithmVersion,
      approximate,
    };
  }

  private buildView(
    target: DailyTarget,
    currentValue: number,
    profile: ResolvedProfile,
    otherMetrics: ReadonlyMap<MetricType, number>
  ): TargetView {
    const currentImpactMinutes = adjustedMetricImpact(target.metricType, currentValue, profile, otherMetrics);
    const targetImpactMinutes = adjustedMetricImpact(target.metricType, target.targetValue, profile, otherMetrics);

    return {
      target,
      currentValue,
      remainingAmount: remainingAmount(target, currentValue),
      benefitMinutes: scaleImpact(
        targetImpactMinutes - currentImpactMinutes,
        target.metricType,
        target.period,
        this.scalingPolicy
      ),
      currentImpactMinutes,
      targetImpactMinutes,
    };
  }

  private async readValidTarget(key: string, now: Date): Promise<DailyTarget | null> {
    const raw = await this.cache.get(key);
    if (raw === null) {
      return null;
    }

    const parsed = dailyTargetSchema.safeParse(parseJson(raw));
    if (!parsed.success) {
      console.warn(`[RecommendationEngine] discarding unreadable cache entry ${key}`);
      return null;
    }

    return isTargetValid(parsed.data, now, this.timeZone, this.algorithmVersion) ? parsed.data : null;
  }
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

/**
 * Moves the value 20% toward the optimum without passing it.
 */
export function improvedValue(current: number, optimum: number, domain: { min: number; max: number }): number {
  const step = Math.abs(current) * IMPROVEMENT_RATIO;
  const moved = optimum >= current ? Math.min(current + step, optimum) : Math.max(current - step, optimum);
  return Math.max(domain.min, Math.min(domain.max, moved));
}
