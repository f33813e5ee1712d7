// packages/convergence-kernel/src/trigger/convergence_trigger.ts
//
// Convergence Trigger: two-state hysteresis (OPEN <-> CLOSING) with a one-shot alert latch.
//
// Contract:
// - stepTrigger is pure: (config, prior state, inputs) -> outcome. ConvergenceTrigger holds the
//   single mutable state; the runtime commits an outcome only after the cycle is persisted.
// - theta_exit_deg > theta_enter_deg (enforced at config load), so a gap in between never flips.
// - OPEN -> CLOSING needs every condition at once; any single exit condition returns to OPEN.
// - The alert fires at most once per CLOSING episode; the latch clears only on return to OPEN.

import type { EventStateV1, TriggerConfigV1 } from "@gapwatch/contracts";

const HOUR_MS = 3_600_000;

export type TriggerReason =
  | "PHASE_GAP_UNAVAILABLE"
  | "PHASE_GAP_ABOVE_ENTER"
  | "PHASE_GAP_ABOVE_EXIT"
  | "CLARITY_BELOW_TAU"
  | "CLARITY_BELOW_TAU_SUSTAINED"
  | "CLOSING_TREND_UNCONFIRMED"
  | "STALE_DATA";

export type TriggerInputs = {
  now: number;
  phase_gap_deg: number | null;
  clarity: number | null;
  validation: { samples_confirmed: number; confirmed: boolean };
  data_fresh_hours: number | null;
};

export type TriggerTransition = "ENTER" | "EXIT" | "HOLD";

export type TriggerOutcome = {
  previous: EventStateV1;
  state: EventStateV1;
  transition: TriggerTransition;
  alert_emitted: boolean;
  fresh: boolean;
  // ENTER/EXIT: the conditions that caused the transition. HOLD in OPEN: the unmet entry conditions.
  reasons: TriggerReason[];
};

export function initialEventState(now: number): EventStateV1 {
  return {
    is_triggered: false,
    since: now,
    samples_confirmed: 0,
    alert_emitted: false,
    clarity_low_streak: 0,
  };
}

/** Age in hours of a reading at `ts`; null when it is stamped beyond the allowed clock skew. */
export function ageHours(cfg: TriggerConfigV1, now: number, ts: number): number | null {
  const age = now - ts;
  return age < -cfg.max_future_skew_ms ? null : age / HOUR_MS;
}

export function isFresh(cfg: TriggerConfigV1, inputs: Pick<TriggerInputs, "clarity" | "data_fresh_hours">): boolean {
  const h = inputs.data_fresh_hours;
  if (h === null || inputs.clarity === null) return false;
  return h >= -cfg.max_future_skew_ms / HOUR_MS && h <= cfg.freshness_hours;
}

function stepOpen(cfg: TriggerConfigV1, prev: EventStateV1, inputs: TriggerInputs, fresh: boolean): TriggerOutcome {
  const reasons: TriggerReason[] = [];
  const gap = inputs.phase_gap_deg;
  if (gap === null) reasons.push("PHASE_GAP_UNAVAILABLE");
  else if (Math.abs(gap) > cfg.theta_enter_deg) reasons.push("PHASE_GAP_ABOVE_ENTER");
  if (inputs.clarity === null || inputs.clarity < cfg.clarity_tau) reasons.push("CLARITY_BELOW_TAU");
  if (!inputs.validation.confirmed) reasons.push("CLOSING_TREND_UNCONFIRMED");
  if (!fresh) reasons.push("STALE_DATA");

  if (reasons.length) {
    return {
      previous: prev,
      state: { ...prev, samples_confirmed: inputs.validation.samples_confirmed },
      transition: "HOLD",
      alert_emitted: false,
      fresh,
      reasons,
    };
  }

  const alert = !prev.alert_emitted;
  return {
    previous: prev,
    state: {
      is_triggered: true,
      since: inputs.now,
      samples_confirmed: inputs.validation.samples_confirmed,
      alert_emitted: true,
      clarity_low_streak: 0,
    },
    transition: "ENTER",
    alert_emitted: alert,
    fresh,
    reasons: [],
  };
}

function stepClosing(cfg: TriggerConfigV1, prev: EventStateV1, inputs: TriggerInputs, fresh: boolean): TriggerOutcome {
  const clarityLow = inputs.clarity === null || inputs.clarity < cfg.clarity_tau;
  const streak = clarityLow ? prev.clarity_low_streak + 1 : 0;

  const reasons: TriggerReason[] = [];
  const gap = inputs.phase_gap_deg;
  if (gap === null) reasons.push("PHASE_GAP_UNAVAILABLE");
  else if (Math.abs(gap) > cfg.theta_exit_deg) reasons.push("PHASE_GAP_ABOVE_EXIT");
  if (!fresh) reasons.push("STALE_DATA");
  if (streak >= cfg.clarity_exit_persistence) reasons.push("CLARITY_BELOW_TAU_SUSTAINED");

  if (reasons.length) {
    return {
      previous: prev,
      state: {
        is_triggered: false,
        since: inputs.now,
        samples_confirmed: inputs.validation.samples_confirmed,
        alert_emitted: false,
        clarity_low_streak: 0,
      },
      transition: "EXIT",
      alert_emitted: false,
      fresh,
      reasons,
    };
  }

  return {
    previous: prev,
    state: { ...prev, samples_confirmed: inputs.validation.samples_confirmed, clarity_low_streak: streak },
    transition: "HOLD",
    alert_emitted: false,
    fresh,
    reasons: [],
  };
}

export function stepTrigger(cfg: TriggerConfigV1, prev: EventStateV1, inputs: TriggerInputs): TriggerOutcome {
  const fresh = isFresh(cfg, inputs);
  return prev.is_triggered ? stepClosing(cfg, prev, inputs, fresh) : stepOpen(cfg, prev, inputs, fresh);
}

/**
 * Single owner of the EventState.
 * `preview` is side-effect free; `commit` publishes an outcome computed from the current state.
 * `evaluate` does both for callers that have nothing to persist in between.
 */
export class ConvergenceTrigger {
  private state: Readonly<EventStateV1>;

  constructor(private readonly cfg: TriggerConfigV1, initial: EventStateV1) {
    this.state = Object.freeze({ ...initial });
  }

  read(): EventStateV1 {
    return { ...this.state };
  }

  /** The committed state itself (frozen); outcomes computed from it can be committed. */
  current(): Readonly<EventStateV1> {
    return this.state;
  }

  preview(inputs: TriggerInputs): TriggerOutcome {
    return stepTrigger(this.cfg, this.state, inputs);
  }

  commit(outcome: TriggerOutcome): void {
    if (outcome.previous !== this.state) {
      throw new Error("trigger outcome was computed from a stale state");
    }
    this.state = Object.freeze(outcome.state);
  }

  evaluate(inputs: TriggerInputs): TriggerOutcome {
    const outcome = this.preview(inputs);
    this.commit(outcome);
    return outcome;
  }
}
