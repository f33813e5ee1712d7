// apps/engine/src/runtime.ts
//
// Engine runtime: the single owner of the EventState.
//
// - Appends: SQLite archive first (authoritative for duplicates), then the bounded in-memory history.
// - Evaluations: serialised by a promise-chain lock; each works on an immutable history snapshot.
//   State, audit and estimate rows commit in one SQLite transaction; the in-memory state is
//   replaced only after that commit. A structural fault skips the cycle and keeps the last state.
// - Alerts are emitted after the commit; a failing sink is logged and never rolls the state back.

import type { FastifyBaseLogger } from "fastify";

import {
  PhaseSampleInputV1Schema,
  toIsoUtc,
  toPhaseSample,
  type EngineConfigV1,
  type EtaProjectionV1,
  type EventAuditV1,
  type EventStateV1,
  type EventStatusV1,
  type PhaseSampleV1,
  type ZeroResetV1,
} from "@gapwatch/contracts";
import {
  ConvergenceTrigger,
  PhaseHistory,
  assessEtaStability,
  evaluateConvergence,
  initialEventState,
  type EtaStabilityResult,
  type EvaluationResult,
} from "@gapwatch/convergence-kernel";

import type { LoadedEngineConfig } from "./config";
import type { EngineSqliteStore } from "./store/sqlite_store";
import type { ClaritySource } from "./sources/clarity";
import { readClarityWithTimeout } from "./sources/clarity";
import type { PgPhaseSource } from "./sources/pg_upstream";
import type { AlertSink } from "./alerts";
import { SerialLock } from "./lock";
import { EngineInputRejected, issuesToErrors } from "./errors";
import { newId, nowMs } from "./util";

export type EngineRuntimeDeps = {
  config: LoadedEngineConfig;
  store: EngineSqliteStore;
  clarity: ClaritySource;
  alerts: AlertSink;
  log: FastifyBaseLogger;
  clock?: () => number;
};

export type AppendSampleOutput = {
  sample: PhaseSampleV1;
  evicted: number;
  status: EventStatusV1 | null;
};

export type BulkAppendOutput = {
  accepted: number;
  duplicates: number;
  malformed: number;
  status: EventStatusV1 | null;
};

type StoreResult =
  | { ok: true; sample: PhaseSampleV1; evicted: number }
  | { ok: false; code: "DUPLICATE_TIMESTAMP" | "MALFORMED_SAMPLE"; message: string };

export class EngineRuntime {
  private readonly cfg: EngineConfigV1;
  private readonly config_hash: string;
  private readonly store: EngineSqliteStore;
  private readonly clarity: ClaritySource;
  private readonly alerts: AlertSink;
  private readonly log: FastifyBaseLogger;
  private readonly clock: () => number;
  private readonly lock = new SerialLock();
  private readonly history: PhaseHistory;

  private readonly trigger: ConvergenceTrigger;
  private lastStatus: EventStatusV1 | null = null;
  private lastProjection: EtaProjectionV1 | null = null;
  private upstreamCursor: number | null | undefined = undefined;

  constructor(deps: EngineRuntimeDeps) {
    this.cfg = deps.config.cfg;
    this.config_hash = deps.config.config_hash;
    this.store = deps.store;
    this.clarity = deps.clarity;
    this.alerts = deps.alerts;
    this.log = deps.log;
    this.clock = deps.clock ?? nowMs;

    const restored = this.store.loadRecentSamples(this.cfg.history.max_samples);
    this.history = PhaseHistory.fromSamples(this.cfg.history.max_samples, restored);
    this.trigger = new ConvergenceTrigger(
      this.cfg.trigger,
      this.store.loadEventState() ?? initialEventState(this.clock())
    );

    this.log.info(
      { samples: this.history.size, is_triggered: this.trigger.current().is_triggered, config_hash: this.config_hash },
      "engine runtime restored"
    );
  }

  read(): EventStateV1 {
    return this.trigger.read();
  }

  latestStatus(): EventStatusV1 | null {
    return this.lastStatus;
  }

  latestProjection(): EtaProjectionV1 | null {
    return this.lastProjection;
  }

  zeroReset(): ZeroResetV1 {
    const s = this.lastStatus;
    return {
      is_0000: s ? s.is_triggered : this.trigger.current().is_triggered,
      phase_gap_deg: s ? s.phase_gap_deg : null,
      gti: s ? s.gti : null,
      confidence: s ? s.confidence : 0,
    };
  }

  /** Stability of the logged ETA estimates; reads the estimate log, never the live state. */
  etaStability(): EtaStabilityResult {
    return assessEtaStability(this.store.recentEstimates(this.cfg.stability.max_estimates), this.cfg.stability, {
      now: this.clock(),
      maxEtaDays: this.cfg.eta.max_eta_days,
    });
  }

  effectiveConfig(): { config_hash: string; config: EngineConfigV1 } {
    return { config_hash: this.config_hash, config: this.cfg };
  }

  listAudit(limit: number): EventAuditV1[] {
    return this.store.listAudit(limit);
  }

  historyWindow(startTs: number, endTs: number): PhaseSampleV1[] {
    return [...this.history.snapshot().query({ startTs, endTs })];
  }

  historySize(): number {
    return this.history.size;
  }

  /** True when `ts` lies beyond the engine clock plus the allowed skew. */
  isAheadOfClock(ts: number): boolean {
    return ts > this.clock() + this.cfg.trigger.max_future_skew_ms;
  }

  private storeSample(sample: PhaseSampleV1): StoreResult {
    // a future-dated sample would stay latest() and pin freshness and the phase gap
    if (this.isAheadOfClock(sample.ts)) {
      return {
        ok: false,
        code: "MALFORMED_SAMPLE",
        message: `sample at ${toIsoUtc(sample.ts)} is ahead of the engine clock`,
      };
    }
    if (!this.store.insertSample(sample, this.clock())) {
      return {
        ok: false,
        code: "DUPLICATE_TIMESTAMP",
        message: `a sample already exists at ${toIsoUtc(sample.ts)}`,
      };
    }
    const r = this.history.append(sample);
    // archived but not retained in memory; the next restart reloads it from SQLite
    if (!r.ok) this.log.warn({ code: r.code, ts: sample.ts }, r.message);
    return r;
  }

  /** Ingestion boundary: validates, stores and (by default) evaluates. Rejections throw EngineInputRejected. */
  async appendSample(input: unknown): Promise<AppendSampleOutput> {
    const parsed = PhaseSampleInputV1Schema.safeParse(input);
    if (!parsed.success) {
      throw new EngineInputRejected(400, issuesToErrors("MALFORMED_SAMPLE", parsed.error.issues));
    }
    const sample = toPhaseSample(parsed.data);
    const r = this.storeSample(sample);
    if (!r.ok) {
      throw new EngineInputRejected(r.code === "DUPLICATE_TIMESTAMP" ? 409 : 400, [
        { code: r.code, path: "as_of_utc", message: r.message },
      ]);
    }

    const status = this.cfg.runtime.evaluate_on_append ? await this.evaluate() : null;
    return { sample: r.sample, evicted: r.evicted, status };
  }

  /** Bulk path for backfills and upstream polling: counts rejections instead of throwing, evaluates once. */
  async appendMany(samples: Iterable<PhaseSampleV1>): Promise<BulkAppendOutput> {
    let accepted = 0;
    let duplicates = 0;
    let malformed = 0;
    for (const s of samples) {
      if (!Number.isInteger(s.ts) || !Number.isFinite(s.phase_deg)) {
        malformed++;
        continue;
      }
      const r = this.storeSample(s);
      if (r.ok) accepted++;
      else if (r.code === "DUPLICATE_TIMESTAMP") duplicates++;
      else malformed++;
    }

    const status = accepted > 0 && this.cfg.runtime.evaluate_on_append ? await this.evaluate() : null;
    return { accepted, duplicates, malformed, status };
  }

  async pollUpstream(source: PgPhaseSource): Promise<BulkAppendOutput> {
    if (this.upstreamCursor === undefined) this.upstreamCursor = this.store.latestSampleTs();
    const batch = await source.fetchSince(this.upstreamCursor);
    if (batch.skipped) this.log.warn({ skipped: batch.skipped }, "upstream rows with unusable values skipped");

    // Rows come oldest first, so future-dated ones form the tail; the cursor stops before them
    // and they are fetched again once the clock has caught up.
    const usable = batch.samples.filter((s) => !this.isAheadOfClock(s.ts));
    const deferred = batch.samples.length - usable.length;
    if (deferred) this.log.warn({ deferred }, "upstream rows ahead of the engine clock deferred");

    const last = usable[usable.length - 1];
    if (last) this.upstreamCursor = last.ts;
    const out = await this.appendMany(usable);
    if (out.accepted) this.log.info({ accepted: out.accepted, duplicates: out.duplicates }, "upstream samples ingested");
    return out;
  }

  evaluate(): Promise<EventStatusV1> {
    return this.lock.run(() => this.evaluateCycle());
  }

  private async evaluateCycle(): Promise<EventStatusV1> {
    const now = this.clock();
    const snapshot = this.history.snapshot();
    const clarity = await readClarityWithTimeout(this.clarity, this.cfg.runtime.clarity_timeout_ms, this.log);

    let result: EvaluationResult;
    let audit: EventAuditV1 | null;
    try {
      const recent = this.cfg.runtime.estimate_log ? this.store.recentEtaDays(this.cfg.confidence.dispersion_window) : [];
      result = evaluateConvergence(this.cfg, this.trigger.current(), { snapshot, now, clarity, recent_eta_days: recent });
      audit = this.buildAudit(result);
      this.persist(result, audit);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.log.error({ err }, "evaluation cycle skipped; event state unchanged");
      const skipped: EventStatusV1 = {
        ...(this.lastStatus ?? this.emptyStatus(now)),
        cycle: "SKIPPED",
        skip_reason: `STORE_UNAVAILABLE: ${message}`,
      };
      this.lastStatus = skipped;
      return skipped;
    }

    this.trigger.commit(result.outcome);
    this.lastStatus = result.status;
    this.lastProjection = result.projection;

    if (audit) {
      this.log.info(
        {
          transition: audit.transition,
          reasons: audit.reasons,
          phase_gap_deg: result.phase_gap_deg,
          confidence: result.confidence,
        },
        "event state transition"
      );
    }

    if (audit && result.outcome.alert_emitted) {
      try {
        await this.alerts.emit({
          audit_id: audit.audit_id,
          as_of_utc: result.status.as_of_utc,
          phase_gap_deg: result.phase_gap_deg,
          gti: result.clarity,
          confidence: result.confidence,
          eta_days: result.projection.eta_days,
        });
      } catch (err) {
        this.log.error({ err, audit_id: audit.audit_id }, "alert sink failed");
      }
    }

    return result.status;
  }

  private buildAudit(result: EvaluationResult): EventAuditV1 | null {
    const { outcome } = result;
    if (outcome.transition === "HOLD") return null;
    return {
      audit_id: newId("audit"),
      evaluated_at_ts: result.now,
      transition: outcome.transition,
      alert_emitted: outcome.alert_emitted,
      state_before: outcome.previous,
      state_after: outcome.state,
      inputs: {
        phase_gap_deg: result.phase_gap_deg,
        slope_rad_per_day: result.trend.ok ? result.trend.estimate.slope_per_day : null,
        clarity: result.clarity,
        data_fresh_hours: result.data_fresh_hours,
        window_size: result.window_size,
        samples_confirmed: result.validation.samples_confirmed,
      },
      reasons: [...outcome.reasons],
      config_hash: this.config_hash,
    };
  }

  private persist(result: EvaluationResult, audit: EventAuditV1 | null): void {
    this.store.transaction(() => {
      this.store.saveEventState(result.outcome.state, result.now);
      if (audit) this.store.insertAudit(audit);
      if (this.cfg.runtime.estimate_log && result.trend.ok) {
        const est = result.trend.estimate;
        this.store.insertEstimate({
          evaluated_at_ts: result.now,
          window_start: est.window_start,
          window_end: est.window_end,
          n_used: est.n_used,
          slope_per_day: est.slope_per_day,
          phi_now: est.phi_now,
          eta_days: result.projection.closing ? result.projection.eta_days : null,
          status: result.projection.status,
        });
      }
    });
  }

  private emptyStatus(now: number): EventStatusV1 {
    return {
      as_of_utc: toIsoUtc(now),
      is_triggered: this.trigger.current().is_triggered,
      phase_gap_deg: null,
      gti: null,
      confidence: 0,
      evidence: {
        closing_rate_deg_per_day: null,
        samples_confirmed: this.trigger.current().samples_confirmed,
        data_fresh_hours: null,
      },
      data_status: "INSUFFICIENT_DATA",
      cycle: "EVALUATED",
      skip_reason: null,
    };
  }
}
