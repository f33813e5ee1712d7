// packages/convergence-kernel/src/eta/eta_projector.ts
//
// ETA Projector: time until the fitted phase reaches zero under the current linear trend.
// Non-closing slopes produce an explicit DIVERGING result, never a negative or infinite ETA.

import type { EtaConfigV1, BandV1 } from "@gapwatch/contracts";
import { DAY_MS, type TrendEstimate } from "../trend/trend_fitter";

// Largest instant representable by Date.
const MAX_DATE_MS = 8.64e15;

export type EtaUncertainty = {
  var_phi: number;
  var_slope: number;
  cov_phi_slope: number;
};

export type EtaResult =
  | {
      closing: true;
      status: "CONVERGING" | "STABLE";
      eta_days: number;
      eta_date: string | null;
      ci68: BandV1 | null;
      ci95: BandV1 | null;
      notes: string[];
    }
  | {
      closing: false;
      status: "DIVERGING";
      code: "NON_CLOSING_SLOPE";
      message: string;
    };

/**
 * Covariance of (phi_now, slope) implied by the fit's residual standard error.
 * phi_now = b + m * x_end, so Var(phi) = s²(1/n + (x_end - x̄)²/Sxx) and
 * Cov(phi, m) = s²(x_end - x̄)/Sxx.
 */
export function etaUncertaintyFromTrend(est: TrendEstimate): EtaUncertainty | null {
  const s = est.residual_se;
  if (s === null || !Number.isFinite(s) || !(est.sxx > 0) || est.n_used < 3) return null;
  const s2 = s * s;
  const dx = est.x_end - est.x_mean;
  return {
    var_phi: s2 * (1 / est.n_used + (dx * dx) / est.sxx),
    var_slope: s2 / est.sxx,
    cov_phi_slope: (s2 * dx) / est.sxx,
  };
}

/** "100 years" for whole multiples of 365 days, otherwise the day count. */
export function horizonLabel(days: number): string {
  const years = days / 365;
  return Number.isInteger(years) ? `${years} years` : `${days} days`;
}

function band(center: number, halfWidth: number): BandV1 {
  return [Math.max(0, center - halfWidth), center + halfWidth];
}

export function etaDateUtc(nowMs: number, etaDays: number): string | null {
  const t = Math.round(nowMs + etaDays * DAY_MS);
  if (!Number.isFinite(t) || Math.abs(t) > MAX_DATE_MS) return null;
  return new Date(t).toISOString().slice(0, 10);
}

export function projectEta(
  args: { phi_now: number; slope_per_day: number; now: number; uncertainty?: EtaUncertainty | null },
  cfg: EtaConfigV1
): EtaResult {
  const { phi_now, slope_per_day: m, now } = args;

  if (!(m < 0)) {
    return {
      closing: false,
      status: "DIVERGING",
      code: "NON_CLOSING_SLOPE",
      message: "Phase gap not closing (slope >= 0)",
    };
  }

  const etaDays = Math.abs(phi_now) / -m;
  const notes: string[] = [];
  let status: "CONVERGING" | "STABLE" = "CONVERGING";
  if (etaDays > cfg.max_eta_days) {
    status = "STABLE";
    notes.push(`ETA exceeds ${horizonLabel(cfg.max_eta_days)} - likely not converging`);
  } else if (etaDays < 1) {
    notes.push("Convergence imminent (<1 day)");
  }

  let ci68: BandV1 | null = null;
  let ci95: BandV1 | null = null;
  const u = args.uncertainty ?? null;
  if (u) {
    const sign = phi_now < 0 ? -1 : 1;
    const dPhi = sign / -m;
    const dSlope = Math.abs(phi_now) / (m * m);
    const variance = dPhi * dPhi * u.var_phi + dSlope * dSlope * u.var_slope + 2 * dPhi * dSlope * u.cov_phi_slope;
    const se = Math.sqrt(Math.max(0, variance));
    if (Number.isFinite(se)) {
      ci68 = band(etaDays, cfg.z68 * se);
      ci95 = band(etaDays, cfg.z95 * se);
    }
  }

  return {
    closing: true,
    status,
    eta_days: etaDays,
    eta_date: etaDateUtc(now, etaDays),
    ci68,
    ci95,
    notes,
  };
}
