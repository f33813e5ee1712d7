import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { PhaseSampleInputV1Schema, toIsoUtc, toPhaseSample } from "../schema/phase_sample_v1";

describe("PhaseSampleInputV1Schema", () => {
  it("accepts an offset timestamp and converts it to epoch ms", () => {
    const input = PhaseSampleInputV1Schema.parse({ as_of_utc: "2024-03-01T02:00:00+02:00", phase_deg: -12.5 });
    assert.deepEqual(toPhaseSample(input), { ts: Date.UTC(2024, 2, 1), phase_deg: -12.5 });
  });

  it("rejects missing or non-numeric phase", () => {
    assert.equal(PhaseSampleInputV1Schema.safeParse({ as_of_utc: "2024-03-01T00:00:00Z" }).success, false);
    assert.equal(
      PhaseSampleInputV1Schema.safeParse({ as_of_utc: "2024-03-01T00:00:00Z", phase_deg: "3" }).success,
      false
    );
    assert.equal(PhaseSampleInputV1Schema.safeParse({ as_of_utc: "yesterday", phase_deg: 3 }).success, false);
  });

  it("formats epoch ms as ISO UTC", () => {
    assert.equal(toIsoUtc(Date.UTC(2024, 2, 1)), "2024-03-01T00:00:00.000Z");
  });
});
