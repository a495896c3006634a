/**
 * Reference-line geometry evaluator
 *
 * Position, heading and curvature of every plan-view geometry variant, plus
 * integrated arc lengths. Exhaustive over {@link GeometrySegment}.
 *
 * @module geometry/evaluator
 */

import { EVALUATION_SLACK } from '../core/constants.js';
import { OutOfRangeError } from '../core/errors.js';
import type {
  ArcSegment,
  GeometrySegment,
  ParamPoly3Segment,
  Poly3Segment,
  Road,
  SpiralSegment,
} from '../model/types.js';
import { derivCubic, evalCubic, secondDerivCubic } from './polynomial.js';
import { integrate } from './quadrature.js';

export interface Pose {
  readonly x: number;
  readonly y: number;
  readonly heading: number;
  readonly curvature: number;
}

/** Curvature rates below this are treated as a constant-curvature spiral */
const SPIRAL_DEGENERATE = 1e-12;

// ============================================================================
// Variant evaluation
// ============================================================================

function evaluateLine(seg: GeometrySegment, ds: number): Pose {
  return {
    x: seg.x0 + ds * Math.cos(seg.hdg0),
    y: seg.y0 + ds * Math.sin(seg.hdg0),
    heading: seg.hdg0,
    curvature: 0,
  };
}

function evaluateArcLike(seg: GeometrySegment, curvature: number, ds: number): Pose {
  if (Math.abs(curvature) < SPIRAL_DEGENERATE) {
    return evaluateLine(seg, ds);
  }
  const heading = seg.hdg0 + curvature * ds;
  return {
    x: seg.x0 + (Math.sin(heading) - Math.sin(seg.hdg0)) / curvature,
    y: seg.y0 + (Math.cos(seg.hdg0) - Math.cos(heading)) / curvature,
    heading,
    curvature,
  };
}

function evaluateArc(seg: ArcSegment, ds: number): Pose {
  return evaluateArcLike(seg, seg.curvature, ds);
}

function evaluateSpiral(seg: SpiralSegment, ds: number): Pose {
  const delta = seg.curvEnd - seg.curvStart;
  if (Math.abs(delta) < SPIRAL_DEGENERATE || seg.length === 0) {
    return evaluateArcLike(seg, seg.curvStart, ds);
  }

  const rate = delta / seg.length;
  const theta = (u: number): number => seg.hdg0 + seg.curvStart * u + (rate * u * u) / 2;

  return {
    x: seg.x0 + integrate((u) => Math.cos(theta(u)), 0, ds),
    y: seg.y0 + integrate((u) => Math.sin(theta(u)), 0, ds),
    heading: theta(ds),
    curvature: seg.curvStart + rate * ds,
  };
}

function localToGlobal(seg: GeometrySegment, u: number, v: number): { x: number; y: number } {
  const cos = Math.cos(seg.hdg0);
  const sin = Math.sin(seg.hdg0);
  return {
    x: seg.x0 + u * cos - v * sin,
    y: seg.y0 + u * sin + v * cos,
  };
}

function evaluatePoly3(seg: Poly3Segment, ds: number): Pose {
  const v = evalCubic(seg.poly, ds);
  const dv = derivCubic(seg.poly, ds);
  const ddv = secondDerivCubic(seg.poly, ds);
  const { x, y } = localToGlobal(seg, ds, v);
  return {
    x,
    y,
    heading: seg.hdg0 + Math.atan(dv),
    curvature: ddv / Math.pow(1 + dv * dv, 1.5),
  };
}

/**
 * Parameter value of a ParamPoly3 at distance `ds` from its start
 */
export function paramAt(seg: ParamPoly3Segment, ds: number): number {
  if (seg.pRange === 'arcLength') return ds;
  return seg.length > 0 ? ds / seg.length : 0;
}

function evaluateParamPoly3(seg: ParamPoly3Segment, ds: number): Pose {
  const p = paramAt(seg, ds);
  const u = evalCubic(seg.u, p);
  const v = evalCubic(seg.v, p);
  const du = derivCubic(seg.u, p);
  const dv = derivCubic(seg.v, p);
  const ddu = secondDerivCubic(seg.u, p);
  const ddv = secondDerivCubic(seg.v, p);
  const speed2 = du * du + dv * dv;
  const { x, y } = localToGlobal(seg, u, v);
  return {
    x,
    y,
    heading: seg.hdg0 + Math.atan2(dv, du),
    curvature: speed2 > 0 ? (du * ddv - dv * ddu) / Math.pow(speed2, 1.5) : 0,
  };
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Pose on the segment at road coordinate `s`
 *
 * @throws OutOfRangeError when `s` lies outside `[s0, s0 + length]`
 */
export function evaluate(seg: GeometrySegment, s: number): Pose {
  const end = seg.s0 + seg.length;
  if (s < seg.s0 - EVALUATION_SLACK || s > end + EVALUATION_SLACK) {
    throw new OutOfRangeError(s, seg.s0, end);
  }
  const ds = Math.min(Math.max(s - seg.s0, 0), seg.length);

  switch (seg.kind) {
    case 'line':
      return evaluateLine(seg, ds);
    case 'arc':
      return evaluateArc(seg, ds);
    case 'spiral':
      return evaluateSpiral(seg, ds);
    case 'poly3':
      return evaluatePoly3(seg, ds);
    case 'paramPoly3':
      return evaluateParamPoly3(seg, ds);
  }
}

/**
 * Integrated length of a ParamPoly3 over parameter range [0, pMax]
 */
export function paramPoly3Length(seg: ParamPoly3Segment, pMax: number): number {
  return integrate(
    (p) => Math.hypot(derivCubic(seg.u, p), derivCubic(seg.v, p)),
    0,
    pMax
  );
}

/**
 * Arc length of the segment
 *
 * Closed form for lines, arcs and spirals; numerically integrated for the
 * cubic variants.
 */
export function computeLength(seg: GeometrySegment): number {
  switch (seg.kind) {
    case 'line':
    case 'arc':
    case 'spiral':
      // parametrised by arc length
      return seg.length;
    case 'poly3':
      return integrate((u) => Math.hypot(1, derivCubic(seg.poly, u)), 0, seg.length);
    case 'paramPoly3':
      return paramPoly3Length(seg, seg.pRange === 'arcLength' ? seg.length : 1);
  }
}

// ============================================================================
// Reference line
// ============================================================================

const sortedCache = new WeakMap<Road, readonly GeometrySegment[]>();

/**
 * Plan view sorted by `s0` (declared order is kept on the road itself)
 */
export function sortedPlanView(road: Road): readonly GeometrySegment[] {
  const cached = sortedCache.get(road);
  if (cached !== undefined) return cached;
  const sorted = [...road.planView].sort((p, q) => p.s0 - q.s0);
  sortedCache.set(road, sorted);
  return sorted;
}

/**
 * Geometry active at `s`: the last one whose `s0` does not exceed it
 */
export function segmentAt(road: Road, s: number): GeometrySegment | undefined {
  const sorted = sortedPlanView(road);
  let active = sorted[0];
  for (const seg of sorted) {
    if (seg.s0 <= s) active = seg;
    else break;
  }
  return active;
}

/**
 * Reference-line pose at `s`, clamped to the active geometry
 */
export function referencePose(road: Road, s: number): Pose | undefined {
  const seg = segmentAt(road, s);
  if (seg === undefined) return undefined;
  const clamped = Math.min(Math.max(s, seg.s0), seg.s0 + seg.length);
  return evaluate(seg, clamped);
}
