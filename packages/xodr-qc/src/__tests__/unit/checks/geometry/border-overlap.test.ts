/**
 * Tests for the lane border overlap checker
 */

import { describe, it, expect } from 'vitest';
import {
  borderIntervals,
  borderOverlapWithInnerLanes,
} from '../../../../checks/geometry/border-overlap-with-inner-lanes.js';
import {
  createCheckContext,
  createDocument,
  createLane,
  createLaneSection,
  createStraightRoad,
  createWidth,
} from '../../../utils/index.js';
import type { LaneTreeInput } from '../../../../model/schema.js';

function borderLane(id: number, a: number, b = 0): LaneTreeInput {
  return createLane(id, { width: [], border: [createWidth(a, 0, b)] });
}

describe('Border Overlap - Intervals', () => {
  it('should split the section at every record of either lane', () => {
    const outer = [
      { sOffset: 0, poly: { a: 5, b: 0, c: 0, d: 0 } },
      { sOffset: 40, poly: { a: 6, b: 0, c: 0, d: 0 } },
    ];
    const inner = [{ sOffset: 0, poly: { a: 3, b: 0.01, c: 0, d: 0 } }];

    const intervals = borderIntervals(outer, inner, 100, 1, 1e-6);

    expect(intervals.map((i) => [i.start, i.length])).toEqual([
      [0, 40],
      [40, 60],
    ]);
    // 6 - (3 + 0.01 * 40) at the start of the second interval
    expect(intervals[1]?.gap.a).toBeCloseTo(2.6, 12);
    expect(intervals[1]?.gap.b).toBeCloseTo(-0.01, 12);
  });

  it('should skip positions before the first record of a lane', () => {
    const outer = [{ sOffset: 20, poly: { a: 1, b: 0, c: 0, d: 0 } }];
    const inner = [{ sOffset: 0, poly: { a: 3, b: 0, c: 0, d: 0 } }];

    const intervals = borderIntervals(outer, inner, 100, 1, 1e-6);

    expect(intervals.map((i) => [i.start, i.length])).toEqual([[20, 80]]);
    expect(intervals[0]?.gap.a).toBe(-2);
  });
});

describe('Border Overlap - Checker', () => {
  it('should report an outer right lane crossing its inner lane', () => {
    // Lane -2 rises from t=-5 and crosses lane -1 (t=-3) at s=26.67
    const doc = createDocument([
      createStraightRoad({
        laneSections: [createLaneSection(0, [], [borderLane(-1, -3), borderLane(-2, -5, 0.075)])],
      }),
    ]);

    const findings = borderOverlapWithInnerLanes.check(createCheckContext(doc));

    expect(findings).toHaveLength(1);
    expect(findings[0]?.location.laneId).toBe(-2);
    expect(findings[0]?.related?.[0]?.laneId).toBe(-1);
    expect(findings[0]?.point?.x).toBeCloseTo(80 / 3, 3);
    expect(findings[0]?.point?.y).toBeCloseTo(-3, 3);
  });

  it('should accept nested borders on the left side', () => {
    const doc = createDocument([
      createStraightRoad({
        laneSections: [createLaneSection(0, [borderLane(1, 3), borderLane(2, 6, 0.01)], [])],
      }),
    ]);

    expect(borderOverlapWithInnerLanes.check(createCheckContext(doc))).toEqual([]);
  });

  it('should report an outer left lane inside its inner lane', () => {
    const doc = createDocument([
      createStraightRoad({
        laneSections: [createLaneSection(0, [borderLane(1, 3), borderLane(2, 2.5)], [])],
      }),
    ]);

    expect(borderOverlapWithInnerLanes.check(createCheckContext(doc))).toHaveLength(1);
  });

  it('should ignore lanes described by widths', () => {
    const doc = createDocument([
      createStraightRoad({
        laneSections: [createLaneSection(0, [], [createLane(-1), createLane(-2, { width: [createWidth(0.5)] })])],
      }),
    ]);

    expect(borderOverlapWithInnerLanes.check(createCheckContext(doc))).toEqual([]);
  });
});
