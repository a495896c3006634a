/**
 * Adaptive Simpson quadrature
 *
 * Pure and reentrant: all state lives on the call stack.
 *
 * @module geometry/quadrature
 */

export interface QuadratureOptions {
  /** Absolute error target for the whole interval */
  readonly tolerance?: number;
  /** Maximum recursion depth per branch */
  readonly maxDepth?: number;
}

const DEFAULT_TOLERANCE = 1e-10;
const DEFAULT_MAX_DEPTH = 40;

function simpson(fa: number, fm: number, fb: number, a: number, b: number): number {
  return ((b - a) / 6) * (fa + 4 * fm + fb);
}

function refine(
  f: (x: number) => number,
  a: number,
  b: number,
  fa: number,
  fm: number,
  fb: number,
  whole: number,
  tolerance: number,
  depth: number
): number {
  const m = (a + b) / 2;
  const lm = (a + m) / 2;
  const rm = (m + b) / 2;
  const flm = f(lm);
  const frm = f(rm);
  const left = simpson(fa, flm, fm, a, m);
  const right = simpson(fm, frm, fb, m, b);
  const delta = left + right - whole;

  if (depth <= 0 || Math.abs(delta) <= 15 * tolerance) {
    return left + right + delta / 15;
  }

  return (
    refine(f, a, m, fa, flm, fm, left, tolerance / 2, depth - 1) +
    refine(f, m, b, fm, frm, fb, right, tolerance / 2, depth - 1)
  );
}

/**
 * Integrate `f` over [a, b]
 */
export function integrate(
  f: (x: number) => number,
  a: number,
  b: number,
  options: QuadratureOptions = {}
): number {
  if (a === b) return 0;
  if (b < a) return -integrate(f, b, a, options);

  const tolerance = options.tolerance ?? DEFAULT_TOLERANCE;
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;

  // Split once so that symmetric integrands cannot fool the first estimate
  const m = (a + b) / 2;
  return integrateOnce(f, a, m, tolerance / 2, maxDepth) + integrateOnce(f, m, b, tolerance / 2, maxDepth);
}

function integrateOnce(
  f: (x: number) => number,
  a: number,
  b: number,
  tolerance: number,
  maxDepth: number
): number {
  const fa = f(a);
  const fb = f(b);
  const fm = f((a + b) / 2);
  return refine(f, a, b, fa, fm, fb, simpson(fa, fm, fb, a, b), tolerance, maxDepth);
}
