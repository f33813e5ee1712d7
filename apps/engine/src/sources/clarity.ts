import type { FastifyBaseLogger } from "fastify";

import type { ClarityObservation } from "@gapwatch/convergence-kernel";

/** Latest clarity reading (GTI in [0,1]) with its own timestamp; null when none exists. */
export interface ClaritySource {
  latest(): Promise<ClarityObservation | null>;
}

/** Clarity pushed in over HTTP (POST /api/clarity) or set directly by tests. */
export class ManualClaritySource implements ClaritySource {
  private current: ClarityObservation | null = null;

  set(obs: ClarityObservation): void {
    this.current = { ...obs };
  }

  async latest(): Promise<ClarityObservation | null> {
    return this.current;
  }
}

/**
 * Bounded read. A timeout or a failing source yields null, which the trigger treats as stale
 * clarity (never as a passing value).
 */
export async function readClarityWithTimeout(
  source: ClaritySource,
  timeoutMs: number,
  log: FastifyBaseLogger
): Promise<ClarityObservation | null> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<"timeout">((resolve) => {
    timer = setTimeout(() => resolve("timeout"), timeoutMs);
  });

  try {
    const r = await Promise.race([source.latest(), timeout]);
    if (r === "timeout") {
      log.warn({ timeout_ms: timeoutMs }, "clarity read timed out; treating clarity as stale");
      return null;
    }
    if (r && !(Number.isFinite(r.value) && r.value >= 0 && r.value <= 1 && Number.isFinite(r.ts))) {
      log.warn({ clarity: r }, "clarity reading out of range; treating clarity as stale");
      return null;
    }
    return r;
  } catch (err) {
    log.warn({ err }, "clarity read failed; treating clarity as stale");
    return null;
  } finally {
    if (timer) clearTimeout(timer);
  }
}
