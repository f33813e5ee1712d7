// packages/convergence-kernel/src/confidence/confidence_scorer.ts
//
// Confidence Scorer.
//
//   d    = 1 / (1 + dispersion / dispersion_scale)        (unknown dispersion scores as dispersion_scale)
//   q    = clarity * d                                    (unknown clarity scores as 0)
//   m    = max(0, samples_confirmed - k)
//   b    = persistence_bonus_max * m / (m + k)
//   conf = clamp01(q + (1 - q) * b)
//
// Monotone non-decreasing in clarity and samples_confirmed, non-increasing in dispersion.

import type { ConfidenceConfigV1 } from "@gapwatch/contracts";
import { clamp01, relativeIqr } from "../stats/stats";

export type ConfidenceInputs = {
  clarity: number | null;
  dispersion: number | null;
  samples_confirmed: number;
  k: number;
};

export function scoreConfidence(cfg: ConfidenceConfigV1, inputs: ConfidenceInputs): number {
  const disp = inputs.dispersion === null || !Number.isFinite(inputs.dispersion)
    ? cfg.dispersion_scale
    : Math.max(0, inputs.dispersion);
  const d = 1 / (1 + disp / cfg.dispersion_scale);
  const q = clamp01(inputs.clarity ?? 0) * d;

  const k = Math.max(1, inputs.k);
  const m = Math.max(0, inputs.samples_confirmed - k);
  const b = (cfg.persistence_bonus_max * m) / (m + k);

  return clamp01(q + (1 - q) * b);
}

/**
 * Relative IQR over the most recent ETA estimates (oldest first), capped at dispersion_window.
 * Null until min_dispersion_estimates finite estimates exist.
 */
export function etaDispersion(cfg: ConfidenceConfigV1, recentEtaDays: readonly number[]): number | null {
  const finite = recentEtaDays.filter((v) => Number.isFinite(v) && v >= 0);
  const windowed = finite.slice(Math.max(0, finite.length - cfg.dispersion_window));
  if (windowed.length < cfg.min_dispersion_estimates) return null;
  return relativeIqr(windowed);
}
