/**
 * Bisection search for the value at which a metric's daily impact reaches zero.
 *
 * The bracket runs from the current value (negative impact) to the metric's optimum
 * (non-negative impact). Every curve is unimodal around its optimum, so the impact is
 * monotonic on that bracket even where the whole curve is not (steps' J-shape, sleep's
 * U-shape). The full domain is never searched.
 */

export const DEFAULT_TOLERANCE_MINUTES = 0.5;
export const DEFAULT_MAX_ITERATIONS = 40;

export interface SearchOptions {
  toleranceMinutes?: number;
  maxIterations?: number;
}

export interface SearchResult {
  value: number;
  impactMinutes: number;
  iterations: number;
  approximate: boolean;
}

export function findNeutralValue(
  impactAt: (value: number) => number,
  from: number,
  toward: number,
  options: SearchOptions = {}
): SearchResult {
  const tolerance = options.toleranceMinutes ?? DEFAULT_TOLERANCE_MINUTES;
  const maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;

  const fromImpact = impactAt(from);
  if (fromImpact >= -tolerance) {
    return { value: from, impactMinutes: fromImpact, iterations: 0, approximate: false };
  }

  const towardImpact = impactAt(toward);
  if (towardImpact < -tolerance) {
    // even the best value on this branch stays negative
    return { value: toward, impactMinutes: towardImpact, iterations: 0, approximate: true };
  }

  let negative = from;
  let nonNegative = toward;
  let nonNegativeImpact = towardImpact;

  for (let iteration = 1; iteration <= maxIterations; iteration++) {
    const mid = (negative + nonNegative) / 2;
    const impact = impactAt(mid);

    if (Math.abs(impact) <= tolerance) {
      return { value: mid, impactMinutes: impact, iterations: iteration, approximate: false };
    }
    if (impact < 0) {
      negative = mid;
    } else {
      nonNegative = mid;
      nonNegativeImpact = impact;
    }
  }

  console.warn(`[TargetSearch] no convergence after ${maxIterations} iterations, using ${nonNegative}`);
  return { value: nonNegative, impactMinutes: nonNegativeImpact, iterations: maxIterations, approximate: true };
}
