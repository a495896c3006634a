/**
 * Cubic polynomial helpers
 *
 * @module geometry/polynomial
 */

import type { Cubic, OffsetCubic } from '../model/types.js';

export const ZERO_CUBIC: Cubic = { a: 0, b: 0, c: 0, d: 0 };

export function evalCubic(p: Cubic, x: number): number {
  return p.a + x * (p.b + x * (p.c + x * p.d));
}

export function derivCubic(p: Cubic, x: number): number {
  return p.b + x * (2 * p.c + x * 3 * p.d);
}

export function secondDerivCubic(p: Cubic, x: number): number {
  return 2 * p.c + 6 * p.d * x;
}

/**
 * Re-centre a cubic: returns q with q(x) = p(x + delta)
 */
export function shiftCubic(p: Cubic, delta: number): Cubic {
  return {
    a: evalCubic(p, delta),
    b: derivCubic(p, delta),
    c: p.c + 3 * p.d * delta,
    d: p.d,
  };
}

export function subtractCubic(p: Cubic, q: Cubic): Cubic {
  return { a: p.a - q.a, b: p.b - q.b, c: p.c - q.c, d: p.d - q.d };
}

/**
 * Whether two offset records describe the same function of the global
 * coordinate, i.e. the second record is redundant.
 */
export function isSameEquation(
  first: OffsetCubic,
  second: OffsetCubic,
  epsilon: number
): boolean {
  const p = shiftCubic(first.poly, -first.sOffset);
  const q = shiftCubic(second.poly, -second.sOffset);
  const diff = subtractCubic(p, q);
  return (
    Math.abs(diff.a) < epsilon &&
    Math.abs(diff.b) < epsilon &&
    Math.abs(diff.c) < epsilon &&
    Math.abs(diff.d) < epsilon
  );
}

/**
 * Real roots of the first derivative (local extrema of the cubic)
 */
export function criticalPoints(p: Cubic): number[] {
  const qa = 3 * p.d;
  const qb = 2 * p.c;
  const qc = p.b;

  if (qa === 0) {
    return qb === 0 ? [] : [-qc / qb];
  }

  const disc = qb * qb - 4 * qa * qc;
  if (disc < 0) return [];
  if (disc === 0) return [-qb / (2 * qa)];

  const root = Math.sqrt(disc);
  return [(-qb - root) / (2 * qa), (-qb + root) / (2 * qa)];
}

/**
 * Minimum of a cubic over the closed interval [lo, hi]
 */
export function minOnInterval(p: Cubic, lo: number, hi: number): { x: number; value: number } {
  const candidates = [lo, hi, ...criticalPoints(p).filter((x) => x > lo && x < hi)];
  let best = { x: lo, value: evalCubic(p, lo) };
  for (const x of candidates) {
    const value = evalCubic(p, x);
    if (value < best.value) best = { x, value };
  }
  return best;
}
