// apps/engine/src/legacy_history.ts
//
// Reader for the legacy history file kept by the previous calculator:
//   { "history": [ { "as_of_utc": "...", "phase_deg": 12.3 }, ... ] }
// Entries that do not parse are counted and skipped; the rest are returned oldest first.

import { z } from "zod";

import { PhaseSampleInputV1Schema, toPhaseSample, type PhaseSampleV1 } from "@gapwatch/contracts";

const LegacyHistoryFileZ = z.object({
  history: z.array(z.unknown()),
});

export type LegacyHistory = {
  samples: PhaseSampleV1[];
  skipped: number;
};

export function parseLegacyHistory(json: unknown): LegacyHistory {
  const file = LegacyHistoryFileZ.parse(json);
  const samples: PhaseSampleV1[] = [];
  let skipped = 0;
  for (const entry of file.history) {
    // extra keys in old files (notes, source tags) are ignored
    const picked =
      entry && typeof entry === "object"
        ? PhaseSampleInputV1Schema.safeParse(
            Object.fromEntries(Object.entries(entry).filter(([k]) => k === "as_of_utc" || k === "phase_deg"))
          )
        : null;
    if (!picked || !picked.success) {
      skipped++;
      continue;
    }
    samples.push(toPhaseSample(picked.data));
  }
  samples.sort((a, b) => a.ts - b.ts);
  return { samples, skipped };
}
