import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { closingStreak, validateClosingTrend } from "../validator/closing_trend_validator";
import { DAY_MS } from "../trend/trend_fitter";
import { dailySamples, defaultConfig, range, T0 } from "./fixtures";

const base = defaultConfig().validator;
const MAX_GAP_DAYS = 3;

describe("closingStreak", () => {
  it("counts consecutive decreases back from the latest sample", () => {
    const samples = dailySamples(T0, [5, 5, 5, 5, 5, 5, 4, 3, 2, 1]);
    assert.equal(closingStreak(samples, MAX_GAP_DAYS), 4);
  });

  it("stops at a non-negative difference", () => {
    const samples = dailySamples(T0, [5, 4, 3, 3.5, 3, 2]);
    assert.equal(closingStreak(samples, MAX_GAP_DAYS), 2);
  });

  it("stops at a long gap", () => {
    const samples = [
      ...dailySamples(T0, [9, 8, 7, 6]),
      ...dailySamples(T0 + 8 * DAY_MS, [5, 4, 3]),
    ];
    assert.equal(closingStreak(samples, MAX_GAP_DAYS), 2);
  });

  it("follows the unwrapped direction across ±180°", () => {
    const samples = dailySamples(T0, [-178, 179, 177]);
    assert.equal(closingStreak(samples, MAX_GAP_DAYS), 2);
  });

  it("is zero for fewer than two samples", () => {
    assert.equal(closingStreak([], MAX_GAP_DAYS), 0);
    assert.equal(closingStreak(dailySamples(T0, [1]), MAX_GAP_DAYS), 0);
  });
});

describe("validateClosingTrend", () => {
  it("needs k consecutive decreases in sign mode", () => {
    const two = validateClosingTrend(dailySamples(T0, [5, 5, 4, 3]), base, MAX_GAP_DAYS);
    assert.equal(two.samples_confirmed, 2);
    assert.equal(two.confirmed, false);
    assert.equal(two.rank, null);

    const three = validateClosingTrend(dailySamples(T0, [5, 4, 3, 2]), base, MAX_GAP_DAYS);
    assert.equal(three.samples_confirmed, 3);
    assert.equal(three.confirmed, true);
  });

  it("accepts a significant monotone decrease in rank mode", () => {
    const samples = dailySamples(T0, range(15).map((i) => 20 - i));
    const r = validateClosingTrend(samples, { ...base, mode: "rank" }, MAX_GAP_DAYS);
    assert.ok(r.rank);
    assert.equal(r.rank.tau, -1);
    assert.equal(r.rank.n, 15);
    assert.equal(r.rank.significant, true);
    assert.equal(r.confirmed, true);
  });

  it("rejects a rising series in rank mode", () => {
    const samples = dailySamples(T0, range(15).map((i) => i));
    const r = validateClosingTrend(samples, { ...base, mode: "rank" }, MAX_GAP_DAYS);
    assert.equal(r.rank?.significant, false);
    assert.equal(r.confirmed, false);
  });

  it("requires both checks in both mode", () => {
    const phases = range(15).map((i) => 20 - i);
    phases.push(6);
    const r = validateClosingTrend(dailySamples(T0, phases), { ...base, mode: "both" }, MAX_GAP_DAYS);
    assert.equal(r.samples_confirmed, 0);
    assert.equal(r.rank?.significant, true);
    assert.equal(r.confirmed, false);
  });
});
