#!/usr/bin/env node
/**
 * Phase history importer.
 *
 * Contract:
 * - Input: legacy JSON history file ({ "history": [{ "as_of_utc", "phase_deg" }] }).
 * - Append-only: existing timestamps are left untouched (duplicates are counted, never replaced).
 * - Writes to the engine's SQLite archive; the engine reloads the newest samples on start.
 *
 * Usage:
 *   npx tsx scripts/load_phase_history.ts --file ./artifacts/phase_gap_history.json [--db ./apps/engine/data/engine.sqlite]
 */

import fs from "node:fs";
import path from "node:path";

import { parseLegacyHistory } from "../apps/engine/src/legacy_history";
import { EngineSqliteStore } from "../apps/engine/src/store/sqlite_store";

function arg(name: string, fallback: string | null = null): string | null {
  const i = process.argv.indexOf(name);
  if (i === -1) return fallback;
  const v = process.argv[i + 1];
  return v == null ? fallback : String(v);
}

function die(msg: string): never {
  console.error(msg);
  process.exit(1);
}

function main(): void {
  const file = arg("--file") ?? die("missing --file <history.json>");
  const dbPath =
    arg("--db") ?? process.env.ENGINE_DB_PATH ?? path.join(process.cwd(), "apps", "engine", "data", "engine.sqlite");

  if (!fs.existsSync(file)) die(`file not found: ${file}`);
  const { samples, skipped } = parseLegacyHistory(JSON.parse(fs.readFileSync(file, "utf8")));

  const store = new EngineSqliteStore({ filePath: dbPath });
  const receivedAt = Date.now();
  let inserted = 0;
  let duplicates = 0;
  try {
    store.transaction(() => {
      for (const s of samples) {
        if (store.insertSample(s, receivedAt)) inserted++;
        else duplicates++;
      }
    });
  } finally {
    store.close();
  }

  console.log(JSON.stringify({ file, db: dbPath, inserted, duplicates, skipped }));
}

main();
