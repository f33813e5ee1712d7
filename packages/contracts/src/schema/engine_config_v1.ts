// packages/contracts/src/schema/engine_config_v1.ts
//
// Engine configuration (SSOT: config/engine/default.json).
// Every threshold has a named field and a default; cross-field constraints are refined here
// so a bad file fails at load time, not mid-evaluation.

import { z } from "zod";

const SemVerZ = z.string().regex(/^\d+\.\d+\.\d+$/);

export const HistoryConfigV1Z = z
  .object({
    max_samples: z.number().int().min(20).max(1_000_000).default(5000),
  })
  .strict();

export const FitConfigV1Z = z
  .object({
    max_days: z.number().positive().default(300),
    fallback_samples: z.number().int().min(2).default(200),
    min_samples: z.number().int().min(3).default(20),
    min_trim_samples: z.number().int().min(3).default(10),
    trim_iterations: z.number().int().min(0).max(10).default(2),
    trim_lower_pct: z.number().min(0).max(50).default(5),
    trim_upper_pct: z.number().min(50).max(100).default(95),
    max_gap_days: z.number().positive().default(3),
  })
  .strict();

export const EtaConfigV1Z = z
  .object({
    max_eta_days: z.number().positive().default(36500),
    z68: z.number().positive().default(1),
    z95: z.number().positive().default(1.96),
  })
  .strict();

export const ValidatorModeV1Z = z.enum(["sign", "rank", "both"]);

export const ValidatorConfigV1Z = z
  .object({
    mode: ValidatorModeV1Z.default("sign"),
    k: z.number().int().min(1).default(3),
    rank_window: z.number().int().min(4).default(30),
    rank_alpha: z.number().gt(0).lt(1).default(0.05),
  })
  .strict();

export const TriggerConfigV1Z = z
  .object({
    theta_enter_deg: z.number().positive().default(1.0),
    theta_exit_deg: z.number().positive().default(1.5),
    clarity_tau: z.number().min(0).max(1).default(0.65),
    freshness_hours: z.number().positive().default(24),
    clarity_exit_persistence: z.number().int().min(1).default(3),
    // samples and clarity readings stamped further ahead of the engine clock are rejected
    max_future_skew_ms: z.number().int().min(0).default(300_000),
  })
  .strict();

export const ConfidenceConfigV1Z = z
  .object({
    dispersion_scale: z.number().positive().default(0.25),
    persistence_bonus_max: z.number().min(0).max(1).default(0.6),
    dispersion_window: z.number().int().min(2).default(12),
    min_dispersion_estimates: z.number().int().min(2).default(4),
  })
  .strict();

// Stability of the logged ETA estimates (IQR band, Kendall tau on slopes, placebo and bootstrap bands).
export const StabilityConfigV1Z = z
  .object({
    lookback_days: z.number().positive().default(365),
    max_estimates: z.number().int().min(10).default(5000),
    min_points: z.number().int().min(2).default(10),
    min_kendall_points: z.number().int().min(3).default(8),
    moderate_iqr_days: z.number().positive().default(45),
    unstable_iqr_days: z.number().positive().default(90),
    tau_qualifier: z.number().gt(0).lt(1).default(0.3),
    placebo_trials: z.number().int().min(1).max(10_000).default(200),
    placebo_sample: z.number().int().min(2).default(12),
    placebo_seed: z.number().int().default(123),
    bootstrap_samples: z.number().int().min(1).max(10_000).default(300),
    bootstrap_seed: z.number().int().default(321),
  })
  .strict();

export const RuntimeConfigV1Z = z
  .object({
    interval_ms: z.number().int().min(1000).default(300_000),
    clarity_timeout_ms: z.number().int().min(1).default(2000),
    evaluate_on_append: z.boolean().default(true),
    estimate_log: z.boolean().default(true),
    upstream_poll_ms: z.number().int().min(1000).default(60_000),
  })
  .strict();

export const EngineConfigV1Z = z
  .object({
    schema_version: SemVerZ,
    history: HistoryConfigV1Z.default({}),
    fit: FitConfigV1Z.default({}),
    eta: EtaConfigV1Z.default({}),
    validator: ValidatorConfigV1Z.default({}),
    trigger: TriggerConfigV1Z.default({}),
    confidence: ConfidenceConfigV1Z.default({}),
    stability: StabilityConfigV1Z.default({}),
    runtime: RuntimeConfigV1Z.default({}),
  })
  .strict()
  .superRefine((cfg, ctx) => {
    if (cfg.trigger.theta_exit_deg <= cfg.trigger.theta_enter_deg) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "trigger.theta_exit_deg must be strictly greater than trigger.theta_enter_deg",
        path: ["trigger", "theta_exit_deg"],
      });
    }
    if (cfg.fit.min_trim_samples > cfg.fit.min_samples) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "fit.min_trim_samples must not exceed fit.min_samples",
        path: ["fit", "min_trim_samples"],
      });
    }
    if (cfg.stability.moderate_iqr_days >= cfg.stability.unstable_iqr_days) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "stability.moderate_iqr_days must be below stability.unstable_iqr_days",
        path: ["stability", "moderate_iqr_days"],
      });
    }
    if (cfg.fit.trim_lower_pct >= cfg.fit.trim_upper_pct) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "fit.trim_lower_pct must be below fit.trim_upper_pct",
        path: ["fit", "trim_lower_pct"],
      });
    }
  });

export type EngineConfigV1 = z.infer<typeof EngineConfigV1Z>;
export type FitConfigV1 = EngineConfigV1["fit"];
export type EtaConfigV1 = EngineConfigV1["eta"];
export type ValidatorConfigV1 = EngineConfigV1["validator"];
export type TriggerConfigV1 = EngineConfigV1["trigger"];
export type ConfidenceConfigV1 = EngineConfigV1["confidence"];
export type StabilityConfigV1 = EngineConfigV1["stability"];
export type RuntimeConfigV1 = EngineConfigV1["runtime"];

export function parseEngineConfigV1(input: unknown): EngineConfigV1 {
  return EngineConfigV1Z.parse(input);
}
