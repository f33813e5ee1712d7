/**
 * File: packages/convergence-kernel/src/history/phase_history.ts
 *
 * Phase History Store (bounded, time-sorted, copy-on-write).
 *
 * Contract:
 * - Duplicate timestamps are REJECTED (never overwritten).
 * - Late samples are accepted and inserted at their sorted position.
 * - When the cap is exceeded the oldest samples are dropped (FIFO by timestamp).
 * - Every append publishes a new frozen array; snapshots keep the array they were taken from,
 *   so an in-flight evaluation never observes an eviction or a half-applied append.
 */

import type { PhaseSampleV1 } from "@gapwatch/contracts";

export type HistoryErrorCode = "DUPLICATE_TIMESTAMP" | "MALFORMED_SAMPLE";

export type AppendResult =
  | { ok: true; sample: PhaseSampleV1; evicted: number }
  | { ok: false; code: HistoryErrorCode; message: string };

export type TimeWindow = { startTs: number; endTs: number };

// First index whose ts >= target.
function lowerBound(samples: readonly PhaseSampleV1[], target: number): number {
  let lo = 0;
  let hi = samples.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (samples[mid].ts < target) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

export class HistorySnapshot {
  constructor(readonly samples: readonly PhaseSampleV1[]) {}

  get size(): number {
    return this.samples.length;
  }

  latest(): PhaseSampleV1 | null {
    return this.samples.length ? this.samples[this.samples.length - 1] : null;
  }

  tail(n: number): readonly PhaseSampleV1[] {
    if (n <= 0) return [];
    return this.samples.slice(Math.max(0, this.samples.length - n));
  }

  /** Samples with ts >= startTs (inclusive lower bound, open upper end). */
  since(startTs: number): readonly PhaseSampleV1[] {
    return this.samples.slice(lowerBound(this.samples, startTs));
  }

  /**
   * Lazy view over [startTs, endTs). Each iteration re-walks the same frozen array,
   * so the returned iterable can be consumed more than once.
   */
  query(window: TimeWindow): Iterable<PhaseSampleV1> {
    const samples = this.samples;
    return {
      *[Symbol.iterator]() {
        for (let i = lowerBound(samples, window.startTs); i < samples.length; i++) {
          const s = samples[i];
          if (s.ts >= window.endTs) return;
          yield s;
        }
      },
    };
  }
}

export class PhaseHistory {
  private samples: readonly PhaseSampleV1[] = Object.freeze([]);

  constructor(private readonly maxSamples: number) {
    if (!Number.isInteger(maxSamples) || maxSamples < 1) {
      throw new Error(`invalid maxSamples: ${maxSamples}`);
    }
  }

  static fromSamples(maxSamples: number, samples: Iterable<PhaseSampleV1>): PhaseHistory {
    const h = new PhaseHistory(maxSamples);
    for (const s of samples) h.append(s);
    return h;
  }

  get size(): number {
    return this.samples.length;
  }

  append(sample: PhaseSampleV1): AppendResult {
    if (!Number.isFinite(sample.ts) || !Number.isInteger(sample.ts)) {
      return { ok: false, code: "MALFORMED_SAMPLE", message: `timestamp must be an integer epoch ms (got ${sample.ts})` };
    }
    if (!Number.isFinite(sample.phase_deg)) {
      return { ok: false, code: "MALFORMED_SAMPLE", message: `phase_deg must be finite (got ${sample.phase_deg})` };
    }

    const current = this.samples;
    const idx = lowerBound(current, sample.ts);
    if (idx < current.length && current[idx].ts === sample.ts) {
      return {
        ok: false,
        code: "DUPLICATE_TIMESTAMP",
        message: `a sample already exists at ${new Date(sample.ts).toISOString()}`,
      };
    }

    const stored: PhaseSampleV1 = Object.freeze({ ts: sample.ts, phase_deg: sample.phase_deg });
    const next = current.slice();
    next.splice(idx, 0, stored);

    const evicted = Math.max(0, next.length - this.maxSamples);
    if (evicted > 0) next.splice(0, evicted);

    this.samples = Object.freeze(next);
    return { ok: true, sample: stored, evicted };
  }

  snapshot(): HistorySnapshot {
    return new HistorySnapshot(this.samples);
  }
}
