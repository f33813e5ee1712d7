// packages/convergence-kernel/src/evaluate.ts
//
// One evaluation cycle over an immutable history snapshot:
//   fit -> ETA -> closing-trend validation -> trigger step -> confidence -> status records.
//
// Pure: the prior EventState comes in, the proposed next state comes out inside `outcome`.
// "No data" conditions are result states, never exceptions.

import type {
  DataStatusV1,
  EngineConfigV1,
  EtaProjectionV1,
  EventStateV1,
  EventStatusV1,
} from "@gapwatch/contracts";
import { toIsoUtc } from "@gapwatch/contracts";
import type { HistorySnapshot } from "./history/phase_history";
import { fitTrend, selectFitWindow, type TrendFitResult } from "./trend/trend_fitter";
import { etaUncertaintyFromTrend, projectEta, type EtaResult } from "./eta/eta_projector";
import { validateClosingTrend, type ClosingValidation } from "./validator/closing_trend_validator";
import { ageHours, stepTrigger, type TriggerOutcome } from "./trigger/convergence_trigger";
import { etaDispersion, scoreConfidence } from "./confidence/confidence_scorer";
import { radToDeg, wrapDegrees } from "./unwrap/angular_unwrap";

const HOUR_MS = 3_600_000;

export type ClarityObservation = { value: number; ts: number };

export type EvaluationInputs = {
  snapshot: HistorySnapshot;
  now: number;
  clarity: ClarityObservation | null;
  // ETA estimates from earlier cycles, oldest first.
  recent_eta_days: readonly number[];
};

export type EvaluationResult = {
  now: number;
  trend: TrendFitResult;
  eta: EtaResult | null;
  validation: ClosingValidation;
  phase_gap_deg: number | null;
  clarity: number | null;
  data_fresh_hours: number | null;
  data_status: DataStatusV1;
  window_size: number;
  dispersion: number | null;
  confidence: number;
  outcome: TriggerOutcome;
  status: EventStatusV1;
  projection: EtaProjectionV1;
};

function toProjection(now: number, trend: TrendFitResult, eta: EtaResult | null): EtaProjectionV1 {
  const as_of_utc = toIsoUtc(now);
  if (!trend.ok) {
    return {
      as_of_utc,
      closing: false,
      status: "INSUFFICIENT_DATA",
      eta_days: null,
      eta_date: null,
      slope_rad_per_day: null,
      phi_now_rad: null,
      ci68: null,
      ci95: null,
      message: trend.message,
    };
  }
  const est = trend.estimate;
  if (!eta || !eta.closing) {
    return {
      as_of_utc,
      closing: false,
      status: "DIVERGING",
      eta_days: null,
      eta_date: null,
      slope_rad_per_day: est.slope_per_day,
      phi_now_rad: est.phi_now,
      ci68: null,
      ci95: null,
      message: eta ? eta.message : null,
    };
  }
  return {
    as_of_utc,
    closing: true,
    status: eta.status,
    eta_days: eta.eta_days,
    eta_date: eta.eta_date,
    slope_rad_per_day: est.slope_per_day,
    phi_now_rad: est.phi_now,
    ci68: eta.ci68,
    ci95: eta.ci95,
    message: eta.notes.length ? eta.notes.join("; ") : null,
  };
}

export function evaluateConvergence(
  cfg: EngineConfigV1,
  prior: EventStateV1,
  inputs: EvaluationInputs
): EvaluationResult {
  const { snapshot, now } = inputs;
  const latest = snapshot.latest();

  const trend = fitTrend(snapshot, cfg.fit);
  const eta = trend.ok
    ? projectEta(
        {
          phi_now: trend.estimate.phi_now,
          slope_per_day: trend.estimate.slope_per_day,
          now,
          uncertainty: etaUncertaintyFromTrend(trend.estimate),
        },
        cfg.eta
      )
    : null;

  const validation = validateClosingTrend(snapshot.samples, cfg.validator, cfg.fit.max_gap_days);

  const phase_gap_deg = latest ? wrapDegrees(latest.phase_deg) : null;
  // Negative while the latest sample sits inside the allowed clock skew.
  const data_fresh_hours = latest ? (now - latest.ts) / HOUR_MS : null;

  // A clarity reading older than the freshness horizon, or stamped beyond the skew, counts as unavailable.
  const clarityAgeHours = inputs.clarity ? ageHours(cfg.trigger, now, inputs.clarity.ts) : null;
  const clarity =
    inputs.clarity && clarityAgeHours !== null && clarityAgeHours <= cfg.trigger.freshness_hours
      ? inputs.clarity.value
      : null;

  const outcome = stepTrigger(cfg.trigger, prior, {
    now,
    phase_gap_deg,
    clarity,
    validation,
    data_fresh_hours,
  });

  const etaHistory = eta && eta.closing ? [...inputs.recent_eta_days, eta.eta_days] : [...inputs.recent_eta_days];
  const dispersion = etaDispersion(cfg.confidence, etaHistory);
  const confidence = scoreConfidence(cfg.confidence, {
    clarity,
    dispersion,
    samples_confirmed: validation.samples_confirmed,
    k: cfg.validator.k,
  });

  const data_status: DataStatusV1 = !outcome.fresh ? "STALE_DATA" : trend.ok ? "OK" : "INSUFFICIENT_DATA";
  const window_size = trend.ok ? trend.estimate.n_window : selectFitWindow(snapshot, cfg.fit).samples.length;

  const status: EventStatusV1 = {
    as_of_utc: toIsoUtc(now),
    is_triggered: outcome.state.is_triggered,
    phase_gap_deg,
    gti: clarity,
    confidence,
    evidence: {
      closing_rate_deg_per_day: trend.ok ? radToDeg(trend.estimate.slope_per_day) : null,
      samples_confirmed: validation.samples_confirmed,
      data_fresh_hours,
    },
    data_status,
    cycle: "EVALUATED",
    skip_reason: null,
  };

  return {
    now,
    trend,
    eta,
    validation,
    phase_gap_deg,
    clarity,
    data_fresh_hours,
    data_status,
    window_size,
    dispersion,
    confidence,
    outcome,
    status,
    projection: toProjection(now, trend, eta),
  };
}
