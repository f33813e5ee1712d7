import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { etaDateUtc, etaUncertaintyFromTrend, horizonLabel, projectEta } from "../eta/eta_projector";
import type { TrendEstimate } from "../trend/trend_fitter";
import { assertClose, defaultConfig } from "./fixtures";

const cfg = defaultConfig().eta;
const NOW = Date.UTC(2024, 6, 1);

describe("projectEta", () => {
  it("projects 0.18 rad at -0.02 rad/day to 9 days", () => {
    const r = projectEta({ phi_now: 0.18, slope_per_day: -0.02, now: NOW }, cfg);
    assert.equal(r.closing, true);
    if (!r.closing) return;
    assertClose(r.eta_days, 9.0, 1e-9);
    assert.equal(r.eta_date, "2024-07-10");
    assert.equal(r.status, "CONVERGING");
    assert.deepEqual(r.notes, []);
    assert.equal(r.ci68, null);
    assert.equal(r.ci95, null);
  });

  it("treats a negative phase the same as its magnitude", () => {
    const r = projectEta({ phi_now: -0.18, slope_per_day: -0.02, now: NOW }, cfg);
    assert.equal(r.closing, true);
    if (r.closing) assertClose(r.eta_days, 9.0, 1e-9);
  });

  it("reports a non-closing slope instead of an ETA", () => {
    for (const slope of [0, 0.01]) {
      const r = projectEta({ phi_now: 0.18, slope_per_day: slope, now: NOW }, cfg);
      assert.equal(r.closing, false);
      if (!r.closing) {
        assert.equal(r.status, "DIVERGING");
        assert.equal(r.code, "NON_CLOSING_SLOPE");
        assert.equal(r.message, "Phase gap not closing (slope >= 0)");
      }
    }
  });

  it("grows with |phi| and shrinks with steeper slopes", () => {
    const eta = (phi: number, slope: number): number => {
      const r = projectEta({ phi_now: phi, slope_per_day: slope, now: NOW }, cfg);
      if (!r.closing) throw new Error("expected closing");
      return r.eta_days;
    };
    assert.ok(eta(0.1, -0.02) < eta(0.2, -0.02));
    assert.ok(eta(0.1, -0.04) < eta(0.1, -0.02));
  });

  it("marks very distant convergence as STABLE", () => {
    const r = projectEta({ phi_now: 1, slope_per_day: -1e-5, now: NOW }, cfg);
    assert.equal(r.closing, true);
    if (!r.closing) return;
    assert.equal(r.status, "STABLE");
    assert.deepEqual(r.notes, ["ETA exceeds 100 years - likely not converging"]);
  });

  it("names the configured horizon in the STABLE note", () => {
    const r = projectEta({ phi_now: 1, slope_per_day: -0.0005, now: NOW }, { ...cfg, max_eta_days: 1000 });
    assert.equal(r.closing, true);
    if (!r.closing) return;
    assert.equal(r.status, "STABLE");
    assert.deepEqual(r.notes, ["ETA exceeds 1000 days - likely not converging"]);

    assert.equal(horizonLabel(3650), "10 years");
    assert.equal(horizonLabel(36500), "100 years");
  });

  it("notes imminent convergence", () => {
    const r = projectEta({ phi_now: 0.001, slope_per_day: -0.01, now: NOW }, cfg);
    assert.equal(r.closing, true);
    if (r.closing) assert.deepEqual(r.notes, ["Convergence imminent (<1 day)"]);
  });

  it("propagates phase uncertainty into symmetric bands", () => {
    const r = projectEta(
      {
        phi_now: 0.18,
        slope_per_day: -0.02,
        now: NOW,
        uncertainty: { var_phi: 0.0004, var_slope: 0, cov_phi_slope: 0 },
      },
      cfg
    );
    assert.equal(r.closing, true);
    if (!r.closing || !r.ci68 || !r.ci95) throw new Error("expected bands");
    assertClose(r.ci68[0], 8, 1e-6);
    assertClose(r.ci68[1], 10, 1e-6);
    assertClose(r.ci95[0], 9 - 1.96, 1e-6);
    assertClose(r.ci95[1], 9 + 1.96, 1e-6);
  });

  it("clamps the lower band at zero", () => {
    const r = projectEta(
      {
        phi_now: 0.18,
        slope_per_day: -0.02,
        now: NOW,
        uncertainty: { var_phi: 0.04, var_slope: 0, cov_phi_slope: 0 },
      },
      cfg
    );
    if (!r.closing || !r.ci68) throw new Error("expected bands");
    assert.equal(r.ci68[0], 0);
    assertClose(r.ci68[1], 19, 1e-6);
  });
});

describe("etaUncertaintyFromTrend", () => {
  const base: TrendEstimate = {
    slope_per_day: -0.02,
    intercept: 0.5,
    phi_now: 0.18,
    window_start: 0,
    window_end: 0,
    n_used: 10,
    n_window: 10,
    residual_se: 0.1,
    x_mean: 4.5,
    sxx: 82.5,
    x_end: 9,
  };

  it("derives the covariance of phase and slope", () => {
    const u = etaUncertaintyFromTrend(base);
    assert.ok(u);
    assertClose(u.var_slope, 0.01 / 82.5);
    assertClose(u.var_phi, 0.01 * (0.1 + 20.25 / 82.5));
    assertClose(u.cov_phi_slope, (0.01 * 4.5) / 82.5);
  });

  it("is null without a residual standard error", () => {
    assert.equal(etaUncertaintyFromTrend({ ...base, residual_se: null }), null);
  });
});

describe("etaDateUtc", () => {
  it("is null beyond the representable date range", () => {
    assert.equal(etaDateUtc(NOW, 1e12), null);
    assert.equal(etaDateUtc(NOW, 0), "2024-07-01");
  });
});
