import type { FastifyInstance, FastifyReply } from "fastify";

import { ClarityReadingV1Schema } from "@gapwatch/contracts";

import type { EngineRuntime } from "./runtime";
import type { ManualClaritySource } from "./sources/clarity";
import { EngineInputRejected, issuesToErrors } from "./errors";
import { assertInt } from "./util";

export type EngineRouteOptions = {
  // present when clarity is pushed over HTTP rather than read from upstream
  manualClarity?: ManualClaritySource;
};

function queryRecord(q: unknown): Record<string, unknown> {
  return q && typeof q === "object" ? Object.fromEntries(Object.entries(q)) : {};
}

function intParam(q: Record<string, unknown>, name: string, fallback: number): number {
  if (typeof q[name] === "undefined") return fallback;
  try {
    return assertInt(q[name], name);
  } catch (e) {
    throw new EngineInputRejected(400, [
      { code: "INVALID_QUERY", path: name, message: e instanceof Error ? e.message : String(e) },
    ]);
  }
}

function sendRejected(reply: FastifyReply, e: EngineInputRejected) {
  return reply.code(e.status).send({ ok: false, errors: e.errors });
}

/** Open read access for dashboards served from another origin. */
export function registerCorsHook(app: FastifyInstance): void {
  app.addHook("onRequest", async (req, reply) => {
    reply.header("Access-Control-Allow-Origin", "*");
    reply.header("Access-Control-Allow-Headers", "content-type");
    reply.header("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
    if (req.method === "OPTIONS") return reply.code(204).send();
  });
}

export function registerEngineRoutes(app: FastifyInstance, runtime: EngineRuntime, opts: EngineRouteOptions = {}): void {
  app.setErrorHandler((err, _req, reply) => {
    if (err instanceof EngineInputRejected) return sendRejected(reply, err);
    app.log.error({ err }, "request failed");
    return reply.code(err.statusCode ?? 500).send({ ok: false, error: err.message });
  });

  app.post("/api/samples", async (req, reply) => {
    const out = await runtime.appendSample(req.body);
    return reply.code(201).send({ ok: true, ...out });
  });

  app.post("/api/clarity", async (req, reply) => {
    if (!opts.manualClarity) {
      return reply.code(409).send({ ok: false, error: "clarity is read from the upstream database" });
    }
    const parsed = ClarityReadingV1Schema.safeParse(req.body);
    if (!parsed.success) {
      throw new EngineInputRejected(400, issuesToErrors("INVALID_BODY", parsed.error.issues));
    }
    const ts = Date.parse(parsed.data.as_of_utc);
    if (runtime.isAheadOfClock(ts)) {
      throw new EngineInputRejected(400, [
        { code: "INVALID_BODY", path: "as_of_utc", message: "clarity reading is ahead of the engine clock" },
      ]);
    }
    opts.manualClarity.set({ value: parsed.data.value, ts });
    return reply.code(202).send({ ok: true });
  });

  app.post("/api/evaluate", async (_req, reply) => {
    return reply.send(await runtime.evaluate());
  });

  app.get("/api/event_status", async (_req, reply) => {
    return reply.send(runtime.latestStatus() ?? (await runtime.evaluate()));
  });

  app.get("/api/eta", async (_req, reply) => {
    if (!runtime.latestProjection()) await runtime.evaluate();
    const projection = runtime.latestProjection();
    if (!projection) return reply.code(503).send({ ok: false, error: "no evaluation has completed yet" });
    return reply.send(projection);
  });

  app.get("/api/eta/stability", async (_req, reply) => {
    const r = runtime.etaStability();
    if (!r.ok) return reply.send({ ok: false, code: r.code, n_points: r.n_points, message: r.message });
    return reply.send({ ok: true, stability: r.stability });
  });

  app.get("/api/zero_reset", async (_req, reply) => {
    return reply.send(runtime.zeroReset());
  });

  app.get("/api/audit", async (req, reply) => {
    const q = queryRecord(req.query);
    const limit = intParam(q, "limit", 100);
    return reply.send({ audit: runtime.listAudit(Math.max(1, Math.min(limit, 500))) });
  });

  app.get("/api/history", async (req, reply) => {
    const q = queryRecord(req.query);
    const startTs = intParam(q, "startTs", 0);
    const endTs = intParam(q, "endTs", Number.MAX_SAFE_INTEGER);
    if (endTs <= startTs) {
      throw new EngineInputRejected(400, [{ code: "INVALID_QUERY", path: "endTs", message: "endTs must be after startTs" }]);
    }
    return reply.send({ samples: runtime.historyWindow(startTs, endTs) });
  });

  app.get("/api/config", async (_req, reply) => {
    return reply.send(runtime.effectiveConfig());
  });
}
