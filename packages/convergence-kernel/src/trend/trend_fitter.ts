// packages/convergence-kernel/src/trend/trend_fitter.ts
//
// Robust Trend Fitter.
//
// Window: samples in [t_end - max_days, t_end]; if that holds fewer than min_samples, the last
// fallback_samples samples instead. A gap longer than max_gap_days between consecutive samples
// invalidates everything before it (no guessing of cycle counts across a gap).
// Fit: OLS on (days since window start, unwrapped phase rad), then trim_iterations rounds of
// percentile trimming of residuals and refit; a round that would leave fewer than
// min_trim_samples points is skipped and the previous fit is kept.

import type { FitConfigV1 } from "@gapwatch/contracts";
import type { PhaseSampleV1 } from "@gapwatch/contracts";
import type { HistorySnapshot } from "../history/phase_history";
import { ordinaryLeastSquares, percentileSorted, type LinearFit } from "../stats/stats";
import { unwrapDegreesToRadians } from "../unwrap/angular_unwrap";

export const DAY_MS = 86_400_000;

export type TrendEstimate = {
  slope_per_day: number; // rad/day
  intercept: number; // rad at window_start
  phi_now: number; // fitted rad at window_end
  window_start: number; // unix ms
  window_end: number; // unix ms
  n_used: number; // points in the final fit
  n_window: number; // points in the window before trimming
  residual_se: number | null;
  x_mean: number;
  sxx: number;
  x_end: number; // days from window_start to window_end
};

export type InsufficientReason = "TOO_FEW_SAMPLES" | "GAP_TRUNCATED" | "DEGENERATE_WINDOW";

export type TrendFitResult =
  | { ok: true; estimate: TrendEstimate }
  | { ok: false; code: "INSUFFICIENT_DATA"; reason: InsufficientReason; n_available: number; message: string };

export type FitWindow = {
  samples: readonly PhaseSampleV1[];
  gap_truncated: boolean;
};

/** Index of the first sample after the last gap longer than maxGapMs (0 when there is none). */
export function segmentStartAfterGaps(samples: readonly PhaseSampleV1[], maxGapMs: number): number {
  let start = 0;
  for (let i = 1; i < samples.length; i++) {
    if (samples[i].ts - samples[i - 1].ts > maxGapMs) start = i;
  }
  return start;
}

export function selectFitWindow(snapshot: HistorySnapshot, cfg: FitConfigV1): FitWindow {
  const latest = snapshot.latest();
  if (!latest) return { samples: [], gap_truncated: false };

  let selected = snapshot.since(latest.ts - cfg.max_days * DAY_MS);
  if (selected.length < cfg.min_samples) {
    selected = snapshot.tail(cfg.fallback_samples);
  }

  const start = segmentStartAfterGaps(selected, cfg.max_gap_days * DAY_MS);
  if (start > 0) return { samples: selected.slice(start), gap_truncated: true };
  return { samples: selected, gap_truncated: false };
}

function insufficient(reason: InsufficientReason, n: number, message: string): TrendFitResult {
  return { ok: false, code: "INSUFFICIENT_DATA", reason, n_available: n, message };
}

export function fitTrend(snapshot: HistorySnapshot, cfg: FitConfigV1): TrendFitResult {
  if (snapshot.size < cfg.min_samples) {
    return insufficient(
      "TOO_FEW_SAMPLES",
      snapshot.size,
      `need at least ${cfg.min_samples} samples, have ${snapshot.size}`
    );
  }

  const window = selectFitWindow(snapshot, cfg);
  const samples = window.samples;
  if (samples.length < cfg.min_samples) {
    return insufficient(
      window.gap_truncated ? "GAP_TRUNCATED" : "TOO_FEW_SAMPLES",
      samples.length,
      window.gap_truncated
        ? `only ${samples.length} samples since the last gap longer than ${cfg.max_gap_days} days`
        : `need at least ${cfg.min_samples} samples in the fit window, have ${samples.length}`
    );
  }

  const t0 = samples[0].ts;
  const xs = samples.map((s) => (s.ts - t0) / DAY_MS);
  const ys = unwrapDegreesToRadians(samples.map((s) => s.phase_deg));

  const initial = ordinaryLeastSquares(xs, ys);
  if (!initial) {
    return insufficient("DEGENERATE_WINDOW", samples.length, "fit window has no spread in time");
  }

  let fit: LinearFit = initial;
  let px = xs;
  let py = ys;
  for (let iter = 0; iter < cfg.trim_iterations; iter++) {
    const current = fit;
    const resid = py.map((y, i) => y - (current.intercept + current.slope * px[i]));
    const sorted = [...resid].sort((a, b) => a - b);
    const lo = percentileSorted(sorted, cfg.trim_lower_pct);
    const hi = percentileSorted(sorted, cfg.trim_upper_pct);

    const kx: number[] = [];
    const ky: number[] = [];
    for (let i = 0; i < resid.length; i++) {
      if (resid[i] >= lo && resid[i] <= hi) {
        kx.push(px[i]);
        ky.push(py[i]);
      }
    }
    if (kx.length < cfg.min_trim_samples) break;

    const refit = ordinaryLeastSquares(kx, ky);
    if (!refit) break;
    fit = refit;
    px = kx;
    py = ky;
  }

  const xEnd = xs[xs.length - 1];
  return {
    ok: true,
    estimate: {
      slope_per_day: fit.slope,
      intercept: fit.intercept,
      phi_now: fit.intercept + fit.slope * xEnd,
      window_start: t0,
      window_end: samples[samples.length - 1].ts,
      n_used: fit.n,
      n_window: samples.length,
      residual_se: fit.residual_se,
      x_mean: fit.x_mean,
      sxx: fit.sxx,
      x_end: xEnd,
    },
  };
}
