import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { PgClaritySource, PgPhaseSource } from "../sources/pg_upstream";
import { FakeQueryable } from "./helpers";

describe("PgPhaseSource", () => {
  it("reads everything on the first fetch and converts radians to degrees", async () => {
    const db = new FakeQueryable(() => [
      { as_of_utc: new Date("2024-07-01T00:00:00Z"), phase_gap_rad: Math.PI / 2 },
      { as_of_utc: "2024-07-02T00:00:00Z", phase_gap_rad: "-0.5" },
    ]);
    const out = await new PgPhaseSource(db, 50).fetchSince(null);

    assert.equal(db.calls.length, 1);
    assert.equal(
      db.calls[0].text,
      "select as_of_utc, phase_gap_rad from phase_gap_history order by as_of_utc asc limit $1"
    );
    assert.deepEqual(db.calls[0].values, [50]);
    assert.equal(out.skipped, 0);
    assert.equal(out.samples.length, 2);
    assert.equal(out.samples[0].ts, Date.UTC(2024, 6, 1));
    assert.ok(Math.abs(out.samples[0].phase_deg - 90) < 1e-12);
    assert.equal(out.samples[1].ts, Date.UTC(2024, 6, 2));
    assert.ok(Math.abs(out.samples[1].phase_deg - (-0.5 * 180) / Math.PI) < 1e-12);
  });

  it("fetches strictly after the cursor", async () => {
    const db = new FakeQueryable(() => []);
    await new PgPhaseSource(db).fetchSince(Date.UTC(2024, 6, 1));
    assert.match(db.calls[0].text, /where as_of_utc > \$1::timestamptz order by as_of_utc asc limit \$2$/);
    assert.deepEqual(db.calls[0].values, ["2024-07-01T00:00:00.000Z", 1000]);
  });

  it("skips rows with unusable timestamps or phases", async () => {
    const db = new FakeQueryable(() => [
      { as_of_utc: null, phase_gap_rad: 0.1 },
      { as_of_utc: "2024-07-01T00:00:00Z", phase_gap_rad: null },
      { as_of_utc: "2024-07-01T01:00:00Z", phase_gap_rad: 0 },
    ]);
    const out = await new PgPhaseSource(db).fetchSince(null);
    assert.equal(out.skipped, 2);
    assert.deepEqual(out.samples, [{ ts: Date.UTC(2024, 6, 1, 1), phase_deg: 0 }]);
  });

  it("fails the ping when nothing comes back", async () => {
    await assert.rejects(new PgPhaseSource(new FakeQueryable(() => [])).ping(), /pg ping failed/);
    await new PgPhaseSource(new FakeQueryable(() => [{ ok: 1 }])).ping();
  });
});

describe("PgClaritySource", () => {
  it("returns the newest gti reading", async () => {
    const db = new FakeQueryable(() => [{ timestamp: new Date("2024-07-01T06:00:00Z"), gti_value: 0.81 }]);
    assert.deepEqual(await new PgClaritySource(db).latest(), { ts: Date.UTC(2024, 6, 1, 6), value: 0.81 });
    assert.match(db.calls[0].text, /from gti_calculation .* order by "timestamp" desc limit 1$/);
  });

  it("returns null for an empty table", async () => {
    assert.equal(await new PgClaritySource(new FakeQueryable(() => [])).latest(), null);
  });
});
