import path from "node:path";
import fs from "node:fs";
import Database from "better-sqlite3";
import { z } from "zod";

import { EventAuditV1Z, EventStateV1Z, type EventAuditV1, type EventStateV1, type PhaseSampleV1 } from "@gapwatch/contracts";
import type { EtaEstimatePoint } from "@gapwatch/convergence-kernel";

export type EngineStoreConfig = {
  // ":memory:" keeps everything in process (tests)
  filePath: string;
};

export type TrendEstimateRow = {
  evaluated_at_ts: number;
  window_start: number;
  window_end: number;
  n_used: number;
  slope_per_day: number;
  phi_now: number;
  eta_days: number | null;
  status: string;
};

const SampleRowZ = z.object({ ts: z.number().int(), phase_deg: z.number() });
const RecordRowZ = z.object({ record_json: z.string() });
const StateRowZ = z.object({ state_json: z.string() });
const EtaRowZ = z.object({ eta_days: z.number() });
const EstimatePointRowZ = z.object({
  evaluated_at_ts: z.number().int(),
  slope_per_day: z.number(),
  eta_days: z.number().nullable(),
});
const CountRowZ = z.object({ n: z.number().int() });
const MaxTsRowZ = z.object({ ts: z.number().int().nullable() });

export class EngineSqliteStore {
  private db: Database.Database;

  constructor(cfg: EngineStoreConfig) {
    if (cfg.filePath !== ":memory:") {
      fs.mkdirSync(path.dirname(cfg.filePath), { recursive: true });
    }
    this.db = new Database(cfg.filePath);
    this.db.pragma("journal_mode = WAL");
    this.init();
  }

  private init(): void {
    // append-only tables, except the single event_state row
    this.db.exec(`
      create table if not exists phase_samples (
        ts integer primary key,
        phase_deg real not null,
        received_at_ts integer not null
      );

      create table if not exists event_state (
        id integer primary key check (id = 1),
        state_json text not null,
        updated_at_ts integer not null
      );

      create table if not exists event_audit (
        audit_id text primary key,
        evaluated_at_ts integer not null,
        transition text not null,
        record_json text not null
      );

      create table if not exists trend_estimates (
        estimate_id integer primary key autoincrement,
        evaluated_at_ts integer not null,
        window_start integer not null,
        window_end integer not null,
        n_used integer not null,
        slope_per_day real not null,
        phi_now real not null,
        eta_days real,
        status text not null
      );

      create index if not exists idx_audit_evaluated on event_audit(evaluated_at_ts);
      create index if not exists idx_estimates_evaluated on trend_estimates(evaluated_at_ts);
    `);
  }

  /** Runs `fn` inside one SQLite transaction; any throw rolls the whole cycle back. */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  /** False when a sample already exists at that timestamp (duplicates are rejected, never replaced). */
  insertSample(sample: PhaseSampleV1, received_at_ts: number): boolean {
    const stmt = this.db.prepare(`insert or ignore into phase_samples (ts, phase_deg, received_at_ts) values (?, ?, ?)`);
    return stmt.run(sample.ts, sample.phase_deg, received_at_ts).changes === 1;
  }

  countSamples(): number {
    return CountRowZ.parse(this.db.prepare(`select count(*) as n from phase_samples`).get()).n;
  }

  latestSampleTs(): number | null {
    return MaxTsRowZ.parse(this.db.prepare(`select max(ts) as ts from phase_samples`).get()).ts;
  }

  /** The newest `limit` samples, oldest first. */
  loadRecentSamples(limit: number): PhaseSampleV1[] {
    const rows = this.db.prepare(`select ts, phase_deg from phase_samples order by ts desc limit ?`).all(limit);
    return rows.map((r) => SampleRowZ.parse(r)).reverse();
  }

  loadEventState(): EventStateV1 | null {
    const row = this.db.prepare(`select state_json from event_state where id = 1`).get();
    if (!row) return null;
    return EventStateV1Z.parse(JSON.parse(StateRowZ.parse(row).state_json));
  }

  saveEventState(state: EventStateV1, updated_at_ts: number): void {
    const stmt = this.db.prepare(
      `insert into event_state (id, state_json, updated_at_ts) values (1, ?, ?)
       on conflict(id) do update set state_json = excluded.state_json, updated_at_ts = excluded.updated_at_ts`
    );
    stmt.run(JSON.stringify(state), updated_at_ts);
  }

  insertAudit(record: EventAuditV1): void {
    const stmt = this.db.prepare(
      `insert into event_audit (audit_id, evaluated_at_ts, transition, record_json) values (?, ?, ?, ?)`
    );
    stmt.run(record.audit_id, record.evaluated_at_ts, record.transition, JSON.stringify(record));
  }

  listAudit(limit: number): EventAuditV1[] {
    const stmt = this.db.prepare(`select record_json from event_audit order by evaluated_at_ts desc, rowid desc limit ?`);
    return stmt.all(limit).map((r) => EventAuditV1Z.parse(JSON.parse(RecordRowZ.parse(r).record_json)));
  }

  insertEstimate(row: TrendEstimateRow): void {
    const stmt = this.db.prepare(
      `insert into trend_estimates (evaluated_at_ts, window_start, window_end, n_used, slope_per_day, phi_now, eta_days, status)
       values (?, ?, ?, ?, ?, ?, ?, ?)`
    );
    stmt.run(
      row.evaluated_at_ts,
      row.window_start,
      row.window_end,
      row.n_used,
      row.slope_per_day,
      row.phi_now,
      row.eta_days,
      row.status
    );
  }

  /** ETA values from the newest `limit` closing estimates, oldest first. */
  recentEtaDays(limit: number): number[] {
    const rows = this.db
      .prepare(`select eta_days from trend_estimates where eta_days is not null order by estimate_id desc limit ?`)
      .all(limit);
    return rows.map((r) => EtaRowZ.parse(r).eta_days).reverse();
  }

  /** The newest `limit` logged estimates as stability points, oldest first. */
  recentEstimates(limit: number): EtaEstimatePoint[] {
    const rows = this.db
      .prepare(
        `select evaluated_at_ts, slope_per_day, eta_days from trend_estimates order by estimate_id desc limit ?`
      )
      .all(limit);
    return rows
      .map((r) => {
        const row = EstimatePointRowZ.parse(r);
        return { ts: row.evaluated_at_ts, slope_per_day: row.slope_per_day, eta_days: row.eta_days };
      })
      .reverse();
  }

  close(): void {
    this.db.close();
  }
}
