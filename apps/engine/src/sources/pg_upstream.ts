// apps/engine/src/sources/pg_upstream.ts
//
// Upstream Postgres readers (read-only).
//   phase_gap_history(as_of_utc timestamptz, phase_gap_rad double precision)
//   gti_calculation(timestamp timestamptz, gti_value double precision, ...)
//
// Queries go through the narrow `Queryable` seam so tests can substitute an in-process fake.

import { Pool } from "pg";

import type { PhaseSampleV1 } from "@gapwatch/contracts";
import type { ClarityObservation } from "@gapwatch/convergence-kernel";
import type { ClaritySource } from "./clarity";

export type QueryRows = { rows: Record<string, unknown>[] };

export interface Queryable {
  query(text: string, values?: unknown[]): Promise<QueryRows>;
}

export function poolQueryable(pool: Pool): Queryable {
  return {
    async query(text, values) {
      const r = await pool.query(text, values);
      return { rows: r.rows };
    },
  };
}

export function createUpstreamPool(databaseUrl: string): Pool {
  return new Pool({ connectionString: databaseUrl });
}

function toEpochMs(v: unknown): number | null {
  if (v instanceof Date) return Number.isFinite(v.getTime()) ? v.getTime() : null;
  if (typeof v === "string") {
    const t = Date.parse(v);
    return Number.isFinite(t) ? t : null;
  }
  return null;
}

// node-postgres returns double precision as number and numeric as string
function toFiniteNumber(v: unknown): number | null {
  const n = typeof v === "number" ? v : typeof v === "string" && v.trim() !== "" ? Number(v) : NaN;
  return Number.isFinite(n) ? n : null;
}

export type UpstreamBatch = {
  samples: PhaseSampleV1[];
  skipped: number; // rows with an unusable timestamp or phase
};

export class PgPhaseSource {
  constructor(private readonly db: Queryable, private readonly batchSize = 1000) {}

  async ping(): Promise<void> {
    const r = await this.db.query("select 1 as ok");
    if (!r.rows.length) throw new Error("pg ping failed");
  }

  /** Rows strictly after `afterTs` (all rows when null), oldest first, converted to degrees. */
  async fetchSince(afterTs: number | null): Promise<UpstreamBatch> {
    const values: unknown[] = [];
    let where = "";
    if (afterTs !== null) {
      values.push(new Date(afterTs).toISOString());
      where = ` where as_of_utc > $1::timestamptz`;
    }
    values.push(this.batchSize);
    const sql = `select as_of_utc, phase_gap_rad from phase_gap_history${where} order by as_of_utc asc limit $${values.length}`;

    const r = await this.db.query(sql, values);
    const samples: PhaseSampleV1[] = [];
    let skipped = 0;
    for (const row of r.rows) {
      const ts = toEpochMs(row.as_of_utc);
      const rad = toFiniteNumber(row.phase_gap_rad);
      if (ts === null || rad === null) {
        skipped++;
        continue;
      }
      samples.push({ ts, phase_deg: (rad * 180) / Math.PI });
    }
    return { samples, skipped };
  }
}

export class PgClaritySource implements ClaritySource {
  constructor(private readonly db: Queryable) {}

  async latest(): Promise<ClarityObservation | null> {
    const r = await this.db.query(
      `select "timestamp", gti_value from gti_calculation where gti_value is not null order by "timestamp" desc limit 1`
    );
    const row = r.rows[0];
    if (!row) return null;
    const ts = toEpochMs(row.timestamp);
    const value = toFiniteNumber(row.gti_value);
    if (ts === null || value === null) return null;
    return { ts, value };
  }
}
