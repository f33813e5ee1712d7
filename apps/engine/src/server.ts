import Fastify from "fastify";
import path from "node:path";

import { loadEngineConfig, resolveRepoRoot } from "./config";
import { applyDotEnvFile } from "./config/dotenv";
import { EngineSqliteStore } from "./store/sqlite_store";
import { ManualClaritySource, type ClaritySource } from "./sources/clarity";
import { PgClaritySource, PgPhaseSource, createUpstreamPool, poolQueryable } from "./sources/pg_upstream";
import { LogAlertSink } from "./alerts";
import { EngineRuntime } from "./runtime";
import { registerCorsHook, registerEngineRoutes } from "./routes";

const REPO_ROOT = resolveRepoRoot();

// Repo root .env first, then app-local .env
applyDotEnvFile(path.join(REPO_ROOT, ".env"));
applyDotEnvFile(path.join(REPO_ROOT, "apps", "engine", ".env"));

const app = Fastify({ logger: true });
registerCorsHook(app);

async function main(): Promise<void> {
  const config = loadEngineConfig();
  app.log.info({ source: config.source, config_hash: config.config_hash }, "engine config loaded");

  const filePath = process.env.ENGINE_DB_PATH ?? path.join(REPO_ROOT, "apps", "engine", "data", "engine.sqlite");
  const store = new EngineSqliteStore({ filePath });

  const databaseUrl = process.env.DATABASE_URL;
  const pool = databaseUrl ? createUpstreamPool(databaseUrl) : null;
  const upstream = pool ? new PgPhaseSource(poolQueryable(pool)) : null;
  let clarity: ClaritySource;
  let manualClarity: ManualClaritySource | undefined;
  if (pool) {
    clarity = new PgClaritySource(poolQueryable(pool));
  } else {
    manualClarity = new ManualClaritySource();
    clarity = manualClarity;
  }

  const runtime = new EngineRuntime({
    config,
    store,
    clarity,
    alerts: new LogAlertSink(app.log),
    log: app.log,
  });
  registerEngineRoutes(app, runtime, { manualClarity });

  const timers: NodeJS.Timeout[] = [];
  if (upstream) {
    await upstream.ping();
    await runtime.pollUpstream(upstream);
    const poll = setInterval(() => {
      runtime.pollUpstream(upstream).catch((err: unknown) => app.log.error({ err }, "upstream poll failed"));
    }, config.cfg.runtime.upstream_poll_ms);
    poll.unref();
    timers.push(poll);
  }

  await runtime.evaluate();
  const tick = setInterval(() => {
    runtime.evaluate().catch((err: unknown) => app.log.error({ err }, "scheduled evaluation failed"));
  }, config.cfg.runtime.interval_ms);
  tick.unref();
  timers.push(tick);

  app.addHook("onClose", async () => {
    for (const t of timers) clearInterval(t);
    store.close();
    if (pool) await pool.end();
  });

  const port = Number(process.env.PORT ?? 3110);
  const host = process.env.HOST ?? "0.0.0.0";
  await app.listen({ port, host });
}

main().catch((err) => {
  app.log.error(err);
  process.exit(1);
});
