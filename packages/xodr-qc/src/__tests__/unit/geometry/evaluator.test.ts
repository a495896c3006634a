/**
 * Tests for the reference-line geometry evaluator
 */

import { describe, it, expect } from 'vitest';
import { computeLength, evaluate, referencePose } from '../../../geometry/evaluator.js';
import { integrate } from '../../../geometry/quadrature.js';
import { OutOfRangeError } from '../../../core/errors.js';
import type {
  ArcSegment,
  LineSegment,
  ParamPoly3Segment,
  SpiralSegment,
} from '../../../model/types.js';
import { createDocument, createStraightRoad } from '../../utils/index.js';

const line: LineSegment = { kind: 'line', s0: 10, x0: 1, y0: 2, hdg0: Math.PI / 4, length: 20 };

describe('Geometry Evaluator - Line', () => {
  it('should return the declared start and end coordinates', () => {
    const start = evaluate(line, 10);
    const end = evaluate(line, 30);

    expect(start.x).toBeCloseTo(1, 12);
    expect(start.y).toBeCloseTo(2, 12);
    expect(end.x).toBeCloseTo(1 + 20 * Math.SQRT1_2, 12);
    expect(end.y).toBeCloseTo(2 + 20 * Math.SQRT1_2, 12);
    expect(end.heading).toBe(Math.PI / 4);
  });

  it('should reject positions outside the segment', () => {
    expect(() => evaluate(line, 30.001)).toThrow(OutOfRangeError);
    expect(() => evaluate(line, 9)).toThrow(OutOfRangeError);
  });

  it('should accept positions within the evaluation slack', () => {
    expect(() => evaluate(line, 30 + 1e-10)).not.toThrow();
  });
});

describe('Geometry Evaluator - Arc', () => {
  it('should trace a quarter circle', () => {
    const radius = 10;
    const arc: ArcSegment = {
      kind: 'arc',
      s0: 0,
      x0: 0,
      y0: 0,
      hdg0: 0,
      length: (Math.PI / 2) * radius,
      curvature: 1 / radius,
    };

    const end = evaluate(arc, arc.length);
    expect(end.x).toBeCloseTo(10, 9);
    expect(end.y).toBeCloseTo(10, 9);
    expect(end.heading).toBeCloseTo(Math.PI / 2, 12);
  });
});

describe('Geometry Evaluator - Spiral', () => {
  it('should fall back to a line when both curvatures are zero', () => {
    const spiral: SpiralSegment = { kind: 'spiral', s0: 0, x0: 0, y0: 0, hdg0: 0, length: 50, curvStart: 0, curvEnd: 0 };
    const end = evaluate(spiral, 50);
    expect(end.x).toBeCloseTo(50, 12);
    expect(end.y).toBeCloseTo(0, 12);
  });

  it('should fall back to an arc when the curvature is constant', () => {
    const spiral: SpiralSegment = { kind: 'spiral', s0: 0, x0: 0, y0: 0, hdg0: 0, length: Math.PI * 5, curvStart: 0.1, curvEnd: 0.1 };
    const end = evaluate(spiral, spiral.length);
    expect(end.x).toBeCloseTo(10, 9);
    expect(end.y).toBeCloseTo(10, 9);
  });

  it('should reach the heading given by the integrated curvature', () => {
    const spiral: SpiralSegment = { kind: 'spiral', s0: 0, x0: 0, y0: 0, hdg0: 0, length: 100, curvStart: 0, curvEnd: 0.02 };
    const end = evaluate(spiral, 100);

    // heading = (k0 + k1) / 2 * L
    expect(end.heading).toBeCloseTo(1, 12);
    expect(end.curvature).toBeCloseTo(0.02, 12);
    // A curve that bends left stays shorter than its length in x and turns to +y
    expect(end.x).toBeLessThan(100);
    expect(end.y).toBeGreaterThan(0);
  });

  it('should be symmetric to a mirrored spiral', () => {
    const left: SpiralSegment = { kind: 'spiral', s0: 0, x0: 0, y0: 0, hdg0: 0, length: 80, curvStart: 0, curvEnd: 0.01 };
    const right: SpiralSegment = { ...left, curvEnd: -0.01 };

    const a = evaluate(left, 80);
    const b = evaluate(right, 80);
    expect(b.x).toBeCloseTo(a.x, 9);
    expect(b.y).toBeCloseTo(-a.y, 9);
  });
});

describe('Geometry Evaluator - ParamPoly3', () => {
  // Straight line of length 10 along u
  const normalized: ParamPoly3Segment = {
    kind: 'paramPoly3',
    s0: 0,
    x0: 0,
    y0: 0,
    hdg0: 0,
    length: 10,
    u: { a: 0, b: 10, c: 0, d: 0 },
    v: { a: 0, b: 0, c: 0, d: 0 },
    pRange: 'normalized',
  };

  const arcLength: ParamPoly3Segment = {
    ...normalized,
    u: { a: 0, b: 1, c: 0, d: 0 },
    pRange: 'arcLength',
  };

  it('should give the same length for both parameter ranges of one curve', () => {
    expect(computeLength(normalized)).toBeCloseTo(10, 9);
    expect(computeLength(arcLength)).toBeCloseTo(computeLength(normalized), 9);
  });

  it('should give the same length for a curved parameterisation rescaled to arc length', () => {
    // p in [0, 1] with u = 10p, v = 5p^2, and the same curve with p' = 10p
    const curved: ParamPoly3Segment = {
      ...normalized,
      u: { a: 0, b: 10, c: 0, d: 0 },
      v: { a: 0, b: 0, c: 5, d: 0 },
    };
    const rescaled: ParamPoly3Segment = {
      ...curved,
      u: { a: 0, b: 1, c: 0, d: 0 },
      v: { a: 0, b: 0, c: 0.05, d: 0 },
      pRange: 'arcLength',
    };

    expect(computeLength(rescaled)).toBeCloseTo(computeLength(curved), 9);
  });

  it('should evaluate the end point of a normalized curve at p = 1', () => {
    const end = evaluate(normalized, 10);
    expect(end.x).toBeCloseTo(10, 12);
    expect(end.y).toBeCloseTo(0, 12);
  });
});

describe('Geometry Evaluator - Reference Line', () => {
  it('should match the declared road length with the summed segment lengths', () => {
    const doc = createDocument([
      createStraightRoad(
        { id: '1', length: 30 },
        {
          planView: [
            { type: 'line', s: 0, x: 0, y: 0, hdg: 0, length: 10 },
            { type: 'arc', s: 10, x: 10, y: 0, hdg: 0, length: 20, curvature: 0.01 },
          ],
        }
      ),
    ]);
    const road = doc.roads.get('1');
    expect(road).toBeDefined();
    if (road === undefined) return;

    const total = road.planView.reduce((sum, seg) => sum + computeLength(seg), 0);
    expect(total).toBeCloseTo(road.length, 9);
  });

  it('should clamp queries past the last geometry to its end', () => {
    const doc = createDocument([createStraightRoad({ id: '1', length: 100 })]);
    const road = doc.roads.get('1');
    if (road === undefined) throw new Error('road missing');

    expect(referencePose(road, 100.5)?.x).toBeCloseTo(100, 12);
  });
});

describe('Quadrature', () => {
  it('should integrate a polynomial exactly', () => {
    expect(integrate((x) => 3 * x * x, 0, 2)).toBeCloseTo(8, 10);
  });

  it('should integrate a symmetric oscillating function', () => {
    expect(integrate((x) => Math.sin(x), 0, 2 * Math.PI)).toBeCloseTo(0, 10);
    expect(integrate((x) => Math.cos(x) ** 2, 0, Math.PI)).toBeCloseTo(Math.PI / 2, 10);
  });

  it('should swap the sign for reversed bounds', () => {
    expect(integrate((x) => x, 2, 0)).toBeCloseTo(-2, 12);
  });
});
