// packages/convergence-kernel/src/stability/eta_stability.ts
//
// Stability of the ETA over the logged trend estimates.
//
// - Band: IQR and median of the ETA values within lookback_days of the newest estimate.
// - Monotonicity: Kendall tau (two-sided p) of the slope series; only qualifies a STABLE band.
// - Placebo: medians of shuffled ETA tails, a baseline with the temporal order destroyed.
// - Bootstrap: IQR of resampled bands.
// Both resampling passes use a seeded generator, so the same log always yields the same record.

import type { EtaStabilityV1, StabilityConfigV1 } from "@gapwatch/contracts";
import { toIsoUtc } from "@gapwatch/contracts";
import { mannKendall, normalCdf, percentileSorted } from "../stats/stats";
import { DAY_MS } from "../trend/trend_fitter";

export type EtaEstimatePoint = {
  ts: number;
  slope_per_day: number;
  eta_days: number | null;
};

export type EtaStabilityResult =
  | { ok: true; stability: EtaStabilityV1 }
  | { ok: false; code: "INSUFFICIENT_DATA"; n_points: number; message: string };

/** Mulberry32: small deterministic PRNG, uniform in [0, 1). */
export function mulberry32(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function sortedAsc(values: readonly number[]): number[] {
  return [...values].sort((a, b) => a - b);
}

function iqrOf(sorted: readonly number[]): number {
  return percentileSorted(sorted, 75) - percentileSorted(sorted, 25);
}

function placeboBand(etas: readonly number[], cfg: StabilityConfigV1): EtaStabilityV1["placebo"] {
  if (etas.length < cfg.placebo_sample) return null;
  const rng = mulberry32(cfg.placebo_seed);
  const work = [...etas];
  const medians: number[] = [];
  for (let trial = 0; trial < cfg.placebo_trials; trial++) {
    for (let i = work.length - 1; i > 0; i--) {
      const j = Math.floor(rng() * (i + 1));
      const tmp = work[i];
      work[i] = work[j];
      work[j] = tmp;
    }
    medians.push(percentileSorted(sortedAsc(work.slice(work.length - cfg.placebo_sample)), 50));
  }
  const sorted = sortedAsc(medians);
  return { median_days: percentileSorted(sorted, 50), iqr_days: iqrOf(sorted), n_trials: cfg.placebo_trials };
}

function bootstrapBand(etas: readonly number[], cfg: StabilityConfigV1): EtaStabilityV1["bootstrap"] {
  const rng = mulberry32(cfg.bootstrap_seed);
  const iqrs: number[] = [];
  const sample = new Array<number>(etas.length);
  for (let b = 0; b < cfg.bootstrap_samples; b++) {
    for (let i = 0; i < etas.length; i++) sample[i] = etas[Math.floor(rng() * etas.length)];
    iqrs.push(iqrOf(sortedAsc(sample)));
  }
  const sorted = sortedAsc(iqrs);
  return {
    iqr_median_days: percentileSorted(sorted, 50),
    iqr_95pct_days: percentileSorted(sorted, 95),
    n_boot: cfg.bootstrap_samples,
  };
}

function stabilityMessage(
  assessment: EtaStabilityV1["assessment"],
  qualifier: EtaStabilityV1["qualifier"],
  cfg: StabilityConfigV1
): string {
  if (assessment === "UNSTABLE") return `UNSTABLE - Prediction varies widely (>${cfg.unstable_iqr_days} days IQR)`;
  if (assessment === "MODERATE") return "MODERATE - Some variability in prediction";
  if (qualifier === "ACCELERATING") return "STABLE - Consistent prediction band with accelerating convergence";
  if (qualifier === "DIVERGING") return "STABLE - Consistent prediction band but slope increasing (diverging trend)";
  return "STABLE - Consistent prediction band";
}

/**
 * Assesses the logged ETA estimates. Estimates without a positive ETA below `maxEtaDays`
 * are ignored; fewer than `min_points` usable estimates in the lookback is INSUFFICIENT_DATA.
 */
export function assessEtaStability(
  points: readonly EtaEstimatePoint[],
  cfg: StabilityConfigV1,
  opts: { now: number; maxEtaDays: number }
): EtaStabilityResult {
  const usable = points
    .filter(
      (p): p is EtaEstimatePoint & { eta_days: number } =>
        p.eta_days !== null &&
        Number.isFinite(p.eta_days) &&
        p.eta_days > 0 &&
        p.eta_days < opts.maxEtaDays &&
        Number.isFinite(p.slope_per_day)
    )
    .sort((a, b) => a.ts - b.ts);

  const newest = usable[usable.length - 1];
  const cutoff = newest ? newest.ts - cfg.lookback_days * DAY_MS : 0;
  const windowed = usable.filter((p) => p.ts >= cutoff);

  if (!newest || windowed.length < cfg.min_points) {
    return {
      ok: false,
      code: "INSUFFICIENT_DATA",
      n_points: windowed.length,
      message: `need ${cfg.min_points} closing ETA estimates within ${cfg.lookback_days} days, have ${windowed.length}`,
    };
  }

  const etas = windowed.map((p) => p.eta_days);
  const sorted = sortedAsc(etas);
  const band_iqr_days = iqrOf(sorted);

  const mk = windowed.length >= cfg.min_kendall_points ? mannKendall(windowed.map((p) => p.slope_per_day)) : null;
  const kendall_tau = mk ? mk.tau : null;
  const kendall_p_value = mk ? Math.min(1, 2 * (1 - normalCdf(Math.abs(mk.z)))) : null;

  const assessment: EtaStabilityV1["assessment"] =
    band_iqr_days > cfg.unstable_iqr_days ? "UNSTABLE" : band_iqr_days > cfg.moderate_iqr_days ? "MODERATE" : "STABLE";
  let qualifier: EtaStabilityV1["qualifier"] = null;
  if (assessment === "STABLE" && kendall_tau !== null) {
    if (kendall_tau < -cfg.tau_qualifier) qualifier = "ACCELERATING";
    else if (kendall_tau > cfg.tau_qualifier) qualifier = "DIVERGING";
  }

  return {
    ok: true,
    stability: {
      as_of_utc: toIsoUtc(opts.now),
      n_points: windowed.length,
      eta_days_latest: newest.eta_days,
      eta_days_median: percentileSorted(sorted, 50),
      band_iqr_days,
      slope_rad_per_day_latest: newest.slope_per_day,
      kendall_tau,
      kendall_p_value,
      assessment,
      qualifier,
      message: stabilityMessage(assessment, qualifier, cfg),
      placebo: placeboBand(etas, cfg),
      bootstrap: bootstrapBand(etas, cfg),
    },
  };
}
