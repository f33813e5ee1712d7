// Shared test wiring: in-memory SQLite, silent Fastify logger, recording alert sink.

import Fastify, { type FastifyBaseLogger } from "fastify";

import type { PhaseSampleV1 } from "@gapwatch/contracts";
import type { ClarityObservation } from "@gapwatch/convergence-kernel";

import { parseEngineConfig, type LoadedEngineConfig } from "../config";
import { EngineSqliteStore } from "../store/sqlite_store";
import { ManualClaritySource, type ClaritySource } from "../sources/clarity";
import type { AlertSink, ConvergenceAlert } from "../alerts";
import { EngineRuntime } from "../runtime";
import type { Queryable, QueryRows } from "../sources/pg_upstream";

export const H = 3_600_000;
export const DAY = 24 * H;
export const NOW = Date.UTC(2024, 6, 1, 12);

export function quietLog(): FastifyBaseLogger {
  return Fastify({ logger: false }).log;
}

export function testConfig(overrides: Record<string, unknown> = {}): LoadedEngineConfig {
  return parseEngineConfig({ schema_version: "1.0.0", ...overrides }, "test");
}

export class RecordingAlertSink implements AlertSink {
  readonly alerts: ConvergenceAlert[] = [];

  async emit(alert: ConvergenceAlert): Promise<void> {
    this.alerts.push(alert);
  }
}

/** 30 daily samples, the newest `ageHours` before NOW at `lastDeg`, closing by `ratePerDay`. */
export function closingSeries(lastDeg = 0.6, ratePerDay = 0.5, ageHours = 2): PhaseSampleV1[] {
  const last = NOW - ageHours * H;
  return Array.from({ length: 30 }, (_, i) => ({
    ts: last - (29 - i) * DAY,
    phase_deg: lastDeg + ratePerDay * (29 - i),
  }));
}

export function freshClarity(value = 0.72): ClarityObservation {
  return { value, ts: NOW - H };
}

export type Harness = {
  runtime: EngineRuntime;
  store: EngineSqliteStore;
  clarity: ManualClaritySource;
  alerts: RecordingAlertSink;
  clock: { now: number };
};

export function makeHarness(
  opts: {
    config?: LoadedEngineConfig;
    store?: EngineSqliteStore;
    claritySource?: ClaritySource;
    alerts?: AlertSink;
  } = {}
): Harness {
  const store = opts.store ?? new EngineSqliteStore({ filePath: ":memory:" });
  const clarity = new ManualClaritySource();
  const alerts = new RecordingAlertSink();
  const clock = { now: NOW };
  const runtime = new EngineRuntime({
    config: opts.config ?? testConfig(),
    store,
    clarity: opts.claritySource ?? clarity,
    alerts: opts.alerts ?? alerts,
    log: quietLog(),
    clock: () => clock.now,
  });
  return { runtime, store, clarity, alerts, clock };
}

/** In-process stand-in for a pg Pool: records every query and answers from a handler. */
export class FakeQueryable implements Queryable {
  readonly calls: { text: string; values: unknown[] | undefined }[] = [];

  constructor(private readonly handler: (text: string, values: unknown[] | undefined) => Record<string, unknown>[]) {}

  async query(text: string, values?: unknown[]): Promise<QueryRows> {
    this.calls.push({ text, values });
    return { rows: this.handler(text, values) };
  }
}
