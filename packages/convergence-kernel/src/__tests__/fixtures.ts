// Shared builders for kernel tests.

import { parseEngineConfigV1, type EngineConfigV1, type PhaseSampleV1 } from "@gapwatch/contracts";
import { DAY_MS } from "../trend/trend_fitter";

export const T0 = Date.UTC(2024, 0, 1);

export function defaultConfig(): EngineConfigV1 {
  return parseEngineConfigV1({ schema_version: "1.0.0" });
}

/** One sample per day starting at `start`, phase taken from `phasesDeg` in order. */
export function dailySamples(start: number, phasesDeg: readonly number[]): PhaseSampleV1[] {
  return phasesDeg.map((phase_deg, i) => ({ ts: start + i * DAY_MS, phase_deg }));
}

export function range(n: number): number[] {
  return Array.from({ length: n }, (_, i) => i);
}

export function assertClose(actual: number | null | undefined, expected: number, tol = 1e-9): void {
  if (actual === null || actual === undefined || !(Math.abs(actual - expected) <= tol)) {
    throw new Error(`expected ${expected} (±${tol}), got ${actual}`);
  }
}
