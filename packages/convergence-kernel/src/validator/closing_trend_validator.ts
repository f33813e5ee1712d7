// packages/convergence-kernel/src/validator/closing_trend_validator.ts
//
// Closing-Trend Validator: a closing trend must persist, a single sample is not enough.
//
// - sign: consecutive negative unwrapped differences counted back from the latest sample;
//   a non-negative difference or a gap longer than max_gap_days ends the streak.
// - rank: Mann-Kendall over the last rank_window samples (after the last long gap);
//   significant when tau < 0 and the one-sided p-value < rank_alpha.

import type { PhaseSampleV1, ValidatorConfigV1 } from "@gapwatch/contracts";
import { mannKendall } from "../stats/stats";
import { degToRad, unwrapDegreesToRadians, wrapDeltaRad } from "../unwrap/angular_unwrap";
import { DAY_MS, segmentStartAfterGaps } from "../trend/trend_fitter";

export type RankCheck = {
  tau: number;
  z: number;
  p_value: number;
  n: number;
  significant: boolean;
};

export type ClosingValidation = {
  mode: ValidatorConfigV1["mode"];
  k: number;
  samples_confirmed: number;
  sign_confirmed: boolean;
  rank: RankCheck | null;
  confirmed: boolean;
};

export function closingStreak(samples: readonly PhaseSampleV1[], maxGapDays: number): number {
  const maxGapMs = maxGapDays * DAY_MS;
  let streak = 0;
  for (let i = samples.length - 1; i >= 1; i--) {
    const cur = samples[i];
    const prev = samples[i - 1];
    if (cur.ts - prev.ts > maxGapMs) break;
    const d = wrapDeltaRad(degToRad(cur.phase_deg) - degToRad(prev.phase_deg));
    if (d < 0) streak++;
    else break;
  }
  return streak;
}

export function rankTrend(
  samples: readonly PhaseSampleV1[],
  cfg: ValidatorConfigV1,
  maxGapDays: number
): RankCheck | null {
  const tail = samples.slice(Math.max(0, samples.length - cfg.rank_window));
  const segment = tail.slice(segmentStartAfterGaps(tail, maxGapDays * DAY_MS));
  const mk = mannKendall(unwrapDegreesToRadians(segment.map((s) => s.phase_deg)));
  if (!mk) return null;
  return {
    tau: mk.tau,
    z: mk.z,
    p_value: mk.p_decreasing,
    n: segment.length,
    significant: mk.tau < 0 && mk.p_decreasing < cfg.rank_alpha,
  };
}

export function validateClosingTrend(
  samples: readonly PhaseSampleV1[],
  cfg: ValidatorConfigV1,
  maxGapDays: number
): ClosingValidation {
  const samples_confirmed = closingStreak(samples, maxGapDays);
  const sign_confirmed = samples_confirmed >= cfg.k;
  const rank = cfg.mode === "sign" ? null : rankTrend(samples, cfg, maxGapDays);
  const rankOk = rank?.significant ?? false;

  let confirmed: boolean;
  switch (cfg.mode) {
    case "sign":
      confirmed = sign_confirmed;
      break;
    case "rank":
      confirmed = rankOk;
      break;
    case "both":
      confirmed = sign_confirmed && rankOk;
      break;
  }

  return { mode: cfg.mode, k: cfg.k, samples_confirmed, sign_confirmed, rank, confirmed };
}
