// packages/contracts/src/schema/event_status_v1.ts
//
// Read-side records exposed to reporting collaborators. The reporting layer consumes these;
// it never mutates engine state.

import { z } from "zod";

const IsoZ = z.string().datetime({ offset: true });

export const EventStateV1Z = z
  .object({
    is_triggered: z.boolean(),
    since: z.number().int().nonnegative(), // unix ms of the last transition (or startup)
    samples_confirmed: z.number().int().nonnegative(),
    alert_emitted: z.boolean(), // one-shot latch, cleared on return to OPEN
    clarity_low_streak: z.number().int().nonnegative(), // consecutive CLOSING evaluations with clarity < tau
  })
  .strict();

export type EventStateV1 = z.infer<typeof EventStateV1Z>;

export const DataStatusV1Z = z.enum(["OK", "STALE_DATA", "INSUFFICIENT_DATA"]);
export type DataStatusV1 = z.infer<typeof DataStatusV1Z>;

export const EventStatusV1Z = z
  .object({
    as_of_utc: IsoZ,
    is_triggered: z.boolean(),
    phase_gap_deg: z.number().finite().nullable(),
    gti: z.number().finite().nullable(),
    confidence: z.number().min(0).max(1),
    evidence: z
      .object({
        closing_rate_deg_per_day: z.number().finite().nullable(),
        samples_confirmed: z.number().int().nonnegative(),
        data_fresh_hours: z.number().finite().nullable(),
      })
      .strict(),
    data_status: DataStatusV1Z,
    cycle: z.enum(["EVALUATED", "SKIPPED"]),
    skip_reason: z.string().nullable(),
  })
  .strict();

export type EventStatusV1 = z.infer<typeof EventStatusV1Z>;

export const BandV1Z = z.tuple([z.number().finite(), z.number().finite()]);
export type BandV1 = z.infer<typeof BandV1Z>;

export const EtaProjectionV1Z = z
  .object({
    as_of_utc: IsoZ,
    closing: z.boolean(),
    status: z.enum(["CONVERGING", "STABLE", "DIVERGING", "INSUFFICIENT_DATA"]),
    eta_days: z.number().finite().nullable(),
    eta_date: z.string().nullable(),
    slope_rad_per_day: z.number().finite().nullable(),
    phi_now_rad: z.number().finite().nullable(),
    ci68: BandV1Z.nullable(),
    ci95: BandV1Z.nullable(),
    message: z.string().nullable(),
  })
  .strict();

export type EtaProjectionV1 = z.infer<typeof EtaProjectionV1Z>;

export const EtaStabilityV1Z = z
  .object({
    as_of_utc: IsoZ,
    n_points: z.number().int().nonnegative(),
    eta_days_latest: z.number().finite(),
    eta_days_median: z.number().finite(),
    band_iqr_days: z.number().finite().nonnegative(),
    slope_rad_per_day_latest: z.number().finite(),
    kendall_tau: z.number().finite().nullable(),
    kendall_p_value: z.number().finite().nullable(),
    assessment: z.enum(["STABLE", "MODERATE", "UNSTABLE"]),
    // STABLE only: slopes steepening (ACCELERATING) or flattening (DIVERGING) by Kendall tau
    qualifier: z.enum(["ACCELERATING", "DIVERGING"]).nullable(),
    message: z.string(),
    placebo: z
      .object({ median_days: z.number().finite(), iqr_days: z.number().finite(), n_trials: z.number().int() })
      .strict()
      .nullable(),
    bootstrap: z
      .object({ iqr_median_days: z.number().finite(), iqr_95pct_days: z.number().finite(), n_boot: z.number().int() })
      .strict()
      .nullable(),
  })
  .strict();

export type EtaStabilityV1 = z.infer<typeof EtaStabilityV1Z>;

export const EventAuditV1Z = z
  .object({
    audit_id: z.string().min(1),
    evaluated_at_ts: z.number().int().nonnegative(),
    transition: z.enum(["ENTER", "EXIT"]),
    alert_emitted: z.boolean(),
    state_before: EventStateV1Z,
    state_after: EventStateV1Z,
    inputs: z
      .object({
        phase_gap_deg: z.number().finite().nullable(),
        slope_rad_per_day: z.number().finite().nullable(),
        clarity: z.number().finite().nullable(),
        data_fresh_hours: z.number().finite().nullable(),
        window_size: z.number().int().nonnegative(),
        samples_confirmed: z.number().int().nonnegative(),
      })
      .strict(),
    reasons: z.array(z.string()),
    config_hash: z.string().min(1),
  })
  .strict();

export type EventAuditV1 = z.infer<typeof EventAuditV1Z>;

/** Legacy reporting shape kept for existing dashboard consumers. */
export type ZeroResetV1 = {
  is_0000: boolean;
  phase_gap_deg: number | null;
  gti: number | null;
  confidence: number;
};
