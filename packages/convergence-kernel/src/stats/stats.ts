// packages/convergence-kernel/src/stats/stats.ts
//
// Small numeric helpers shared by the fitter, validator and scorer.
// Pure functions, no allocation beyond what the caller sees.

export function clamp01(x: number): number {
  if (!Number.isFinite(x)) return 0;
  if (x < 0) return 0;
  if (x > 1) return 1;
  return x;
}

/**
 * Percentile of an ascending-sorted array, linear interpolation between closest ranks
 * (same convention as the usual "linear" method).
 */
export function percentileSorted(sortedAsc: readonly number[], p: number): number {
  const n = sortedAsc.length;
  if (n === 0) return NaN;
  if (n === 1) return sortedAsc[0];
  const rank = (Math.min(100, Math.max(0, p)) / 100) * (n - 1);
  const lo = Math.floor(rank);
  const hi = Math.ceil(rank);
  if (lo === hi) return sortedAsc[lo];
  return sortedAsc[lo] + (sortedAsc[hi] - sortedAsc[lo]) * (rank - lo);
}

export function percentile(values: readonly number[], p: number): number {
  return percentileSorted([...values].sort((a, b) => a - b), p);
}

/** IQR divided by the median; null when the median is not positive. */
export function relativeIqr(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const median = percentileSorted(sorted, 50);
  if (!(median > 0)) return null;
  return (percentileSorted(sorted, 75) - percentileSorted(sorted, 25)) / median;
}

export type LinearFit = {
  slope: number;
  intercept: number;
  n: number;
  x_mean: number;
  sxx: number;
  // sqrt(SSE / (n - 2)); null when n <= 2
  residual_se: number | null;
};

export function ordinaryLeastSquares(xs: readonly number[], ys: readonly number[]): LinearFit | null {
  const n = Math.min(xs.length, ys.length);
  if (n < 2) return null;

  let sx = 0;
  let sy = 0;
  for (let i = 0; i < n; i++) {
    sx += xs[i];
    sy += ys[i];
  }
  const xMean = sx / n;
  const yMean = sy / n;

  let sxx = 0;
  let sxy = 0;
  for (let i = 0; i < n; i++) {
    const dx = xs[i] - xMean;
    sxx += dx * dx;
    sxy += dx * (ys[i] - yMean);
  }
  if (!(sxx > 0)) return null;

  const slope = sxy / sxx;
  const intercept = yMean - slope * xMean;

  let sse = 0;
  for (let i = 0; i < n; i++) {
    const r = ys[i] - (intercept + slope * xs[i]);
    sse += r * r;
  }
  const residual_se = n > 2 ? Math.sqrt(sse / (n - 2)) : null;

  return { slope, intercept, n, x_mean: xMean, sxx, residual_se };
}

// Abramowitz & Stegun 7.1.26, |error| < 1.5e-7
function erf(x: number): number {
  const sign = x < 0 ? -1 : 1;
  const ax = Math.abs(x);
  const t = 1 / (1 + 0.3275911 * ax);
  const poly = t * (0.254829592 + t * (-0.284496736 + t * (1.421413741 + t * (-1.453152027 + t * 1.061405429))));
  return sign * (1 - poly * Math.exp(-ax * ax));
}

export function normalCdf(z: number): number {
  return 0.5 * (1 + erf(z / Math.SQRT2));
}

export type MannKendallResult = {
  s: number;
  tau: number;
  z: number;
  // one-sided p-value for a decreasing trend
  p_decreasing: number;
};

/**
 * Mann-Kendall monotonic trend test (Kendall's tau of the series against its index),
 * normal approximation with tie correction and continuity correction.
 */
export function mannKendall(ys: readonly number[]): MannKendallResult | null {
  const n = ys.length;
  if (n < 3) return null;

  let s = 0;
  for (let i = 0; i < n - 1; i++) {
    for (let j = i + 1; j < n; j++) {
      s += Math.sign(ys[j] - ys[i]);
    }
  }

  const ties = new Map<number, number>();
  for (const y of ys) ties.set(y, (ties.get(y) ?? 0) + 1);
  let tieTerm = 0;
  for (const t of ties.values()) {
    if (t > 1) tieTerm += t * (t - 1) * (2 * t + 5);
  }

  const variance = (n * (n - 1) * (2 * n + 5) - tieTerm) / 18;
  if (!(variance > 0)) return null;

  const sd = Math.sqrt(variance);
  const z = s > 0 ? (s - 1) / sd : s < 0 ? (s + 1) / sd : 0;
  const tau = s / ((n * (n - 1)) / 2);

  return { s, tau, z, p_decreasing: normalCdf(z) };
}
