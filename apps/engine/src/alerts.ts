import type { FastifyBaseLogger } from "fastify";

export type ConvergenceAlert = {
  audit_id: string;
  as_of_utc: string;
  phase_gap_deg: number | null;
  gti: number | null;
  confidence: number;
  eta_days: number | null;
};

export interface AlertSink {
  emit(alert: ConvergenceAlert): Promise<void>;
}

export class LogAlertSink implements AlertSink {
  constructor(private readonly log: FastifyBaseLogger) {}

  async emit(alert: ConvergenceAlert): Promise<void> {
    this.log.warn({ alert }, "phase gap convergence detected");
  }
}
