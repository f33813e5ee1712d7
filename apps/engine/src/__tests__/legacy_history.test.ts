import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { parseLegacyHistory } from "../legacy_history";

describe("parseLegacyHistory", () => {
  it("returns valid entries oldest first and counts the rest", () => {
    const out = parseLegacyHistory({
      history: [
        { as_of_utc: "2024-07-02T00:00:00Z", phase_deg: 4.5, source: "nightly" },
        { as_of_utc: "2024-07-01T00:00:00Z", phase_deg: 5 },
        { as_of_utc: "2024-07-03T00:00:00Z" },
        "garbage",
        null,
      ],
    });
    assert.deepEqual(out.samples, [
      { ts: Date.UTC(2024, 6, 1), phase_deg: 5 },
      { ts: Date.UTC(2024, 6, 2), phase_deg: 4.5 },
    ]);
    assert.equal(out.skipped, 3);
  });

  it("throws when the file has no history array", () => {
    assert.throws(() => parseLegacyHistory({ samples: [] }));
  });
});
