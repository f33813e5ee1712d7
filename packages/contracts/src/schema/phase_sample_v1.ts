// packages/contracts/src/schema/phase_sample_v1.ts
import { z } from "zod";

/**
 * PhaseSampleInputV1Schema
 *
 * Wire shape of one phase-gap observation as delivered by the ingestion pipeline.
 * `phase_deg` is a bounded angle; wrapping at ±180° is expected and handled downstream.
 */
export const PhaseSampleInputV1Schema = z
  .object({
    as_of_utc: z.string().datetime({ offset: true }),
    phase_deg: z.number().finite(),
  })
  .strict();

export type PhaseSampleInputV1 = z.infer<typeof PhaseSampleInputV1Schema>;

/** Internal, time-indexed form used by the history store (ts = unix ms). */
export const PhaseSampleV1Schema = z
  .object({
    ts: z.number().int().finite(),
    phase_deg: z.number().finite(),
  })
  .strict();

export type PhaseSampleV1 = z.infer<typeof PhaseSampleV1Schema>;

export const ClarityReadingV1Schema = z
  .object({
    as_of_utc: z.string().datetime({ offset: true }),
    value: z.number().finite().min(0).max(1),
  })
  .strict();

export type ClarityReadingV1 = z.infer<typeof ClarityReadingV1Schema>;

export function toPhaseSample(input: PhaseSampleInputV1): PhaseSampleV1 {
  return { ts: Date.parse(input.as_of_utc), phase_deg: input.phase_deg };
}

export function toIsoUtc(ts: number): string {
  return new Date(ts).toISOString();
}
