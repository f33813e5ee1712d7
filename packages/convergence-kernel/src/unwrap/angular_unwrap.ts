// packages/convergence-kernel/src/unwrap/angular_unwrap.ts
//
// Bounded angles -> continuous phase. Input order is the caller's responsibility
// (strictly increasing timestamps); there is no gap detection here.

const TWO_PI = 2 * Math.PI;

export function degToRad(deg: number): number {
  return (deg * Math.PI) / 180;
}

export function radToDeg(rad: number): number {
  return (rad * 180) / Math.PI;
}

/** Maps any angle into (-180, 180]. */
export function wrapDegrees(deg: number): number {
  if (deg > -180 && deg <= 180) return deg;
  let w = ((deg % 360) + 360) % 360;
  if (w > 180) w -= 360;
  return w;
}

/** Reduces a phase difference into (-π, π]. */
export function wrapDeltaRad(delta: number): number {
  if (delta > -Math.PI && delta <= Math.PI) return delta;
  let w = ((((delta + Math.PI) % TWO_PI) + TWO_PI) % TWO_PI) - Math.PI;
  if (w <= -Math.PI) w += TWO_PI;
  return w;
}

export function unwrapDegreesToRadians(anglesDeg: readonly number[]): number[] {
  const out: number[] = [];
  let prevRaw = 0;
  for (let i = 0; i < anglesDeg.length; i++) {
    const raw = degToRad(anglesDeg[i]);
    if (i === 0) {
      out.push(raw);
    } else {
      out.push(out[i - 1] + wrapDeltaRad(raw - prevRaw));
    }
    prevRaw = raw;
  }
  return out;
}
