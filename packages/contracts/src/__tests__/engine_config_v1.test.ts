import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { EngineConfigV1Z, parseEngineConfigV1 } from "../schema/engine_config_v1";

describe("EngineConfigV1Z", () => {
  it("fills every section with defaults", () => {
    const cfg = parseEngineConfigV1({ schema_version: "1.0.0" });
    assert.equal(cfg.history.max_samples, 5000);
    assert.equal(cfg.fit.max_days, 300);
    assert.equal(cfg.fit.fallback_samples, 200);
    assert.equal(cfg.fit.min_samples, 20);
    assert.equal(cfg.fit.min_trim_samples, 10);
    assert.equal(cfg.fit.max_gap_days, 3);
    assert.equal(cfg.eta.max_eta_days, 36500);
    assert.equal(cfg.validator.mode, "sign");
    assert.equal(cfg.validator.k, 3);
    assert.equal(cfg.trigger.theta_enter_deg, 1.0);
    assert.equal(cfg.trigger.theta_exit_deg, 1.5);
    assert.equal(cfg.trigger.clarity_tau, 0.65);
    assert.equal(cfg.trigger.freshness_hours, 24);
    assert.equal(cfg.trigger.clarity_exit_persistence, 3);
    assert.equal(cfg.confidence.dispersion_scale, 0.25);
    assert.equal(cfg.trigger.max_future_skew_ms, 300_000);
    assert.equal(cfg.runtime.clarity_timeout_ms, 2000);
    assert.equal(cfg.stability.moderate_iqr_days, 45);
    assert.equal(cfg.stability.unstable_iqr_days, 90);
    assert.equal(cfg.stability.placebo_seed, 123);
    assert.equal(cfg.stability.bootstrap_seed, 321);
  });

  it("rejects a moderate stability bound at or above the unstable bound", () => {
    const r = EngineConfigV1Z.safeParse({
      schema_version: "1.0.0",
      stability: { moderate_iqr_days: 90, unstable_iqr_days: 90 },
    });
    assert.equal(r.success, false);
    if (!r.success) {
      assert.deepEqual(r.error.issues.map((i) => i.path.join(".")), ["stability.moderate_iqr_days"]);
    }
  });

  it("rejects an exit threshold that does not exceed the entry threshold", () => {
    const r = EngineConfigV1Z.safeParse({
      schema_version: "1.0.0",
      trigger: { theta_enter_deg: 1.5, theta_exit_deg: 1.5 },
    });
    assert.equal(r.success, false);
    if (!r.success) {
      assert.deepEqual(r.error.issues.map((i) => i.path.join(".")), ["trigger.theta_exit_deg"]);
    }
  });

  it("rejects trimming below the fit minimum and inverted percentiles", () => {
    const r = EngineConfigV1Z.safeParse({
      schema_version: "1.0.0",
      fit: { min_samples: 10, min_trim_samples: 12, trim_lower_pct: 50, trim_upper_pct: 50 },
    });
    assert.equal(r.success, false);
    if (!r.success) {
      assert.deepEqual(r.error.issues.map((i) => i.path.join(".")), ["fit.min_trim_samples", "fit.trim_lower_pct"]);
    }
  });

  it("rejects unknown keys and a malformed schema_version", () => {
    assert.equal(EngineConfigV1Z.safeParse({ schema_version: "1.0.0", extra: 1 }).success, false);
    assert.equal(EngineConfigV1Z.safeParse({ schema_version: "v1" }).success, false);
    assert.equal(EngineConfigV1Z.safeParse({ schema_version: "1.0.0", validator: { mode: "fuzzy" } }).success, false);
  });
});
