/**
 * road.lane.border.overlap_with_inner_lanes
 *
 * A lane described by border records must stay outside every inner lane on
 * the same side. The comparison is exact: on each interval where both lanes
 * keep the same border record, the difference of the two cubics is itself a
 * cubic whose minimum is found from its critical points.
 *
 * @module checks/geometry/border-overlap-with-inner-lanes
 */

import { minOnInterval, shiftCubic, subtractCubic, ZERO_CUBIC } from '../../geometry/polynomial.js';
import { laneMidpoint } from '../../model/queries.js';
import type { Cubic, Lane, LaneSection, OffsetCubic, Road } from '../../model/types.js';
import { findCrossing, sampleOuterBorder } from '../../topology/lane-outline.js';
import { defineChecker, laneLocation } from '../issues.js';
import type { CheckContext, Finding } from '../types.js';

const MESSAGE = 'Outer lane border intersects or stays within inner lane border.';

interface BorderInterval {
  readonly start: number;
  readonly length: number;
  /** Outer minus inner border, relative to `start`, oriented away from the center */
  readonly gap: Cubic;
}

function activeRecord(records: readonly OffsetCubic[], ds: number, epsilon: number): OffsetCubic | undefined {
  let found: OffsetCubic | undefined;
  for (const record of records) {
    if (record.sOffset > ds + epsilon) break;
    found = record;
  }
  return found;
}

/**
 * Split the section at every border record of either lane
 */
export function borderIntervals(
  outer: readonly OffsetCubic[],
  inner: readonly OffsetCubic[],
  sectionLength: number,
  direction: 1 | -1,
  epsilon: number
): BorderInterval[] {
  if (outer.length === 0 || inner.length === 0) return [];

  const cuts = [...new Set([0, ...outer.map((r) => r.sOffset), ...inner.map((r) => r.sOffset)])]
    .filter((ds) => ds >= 0 && ds < sectionLength)
    .sort((a, b) => a - b);

  const intervals: BorderInterval[] = [];
  cuts.forEach((start, i) => {
    const end = cuts[i + 1] ?? sectionLength;
    if (end - start <= epsilon && i + 1 < cuts.length) return;
    const o = activeRecord(outer, start, epsilon);
    const n = activeRecord(inner, start, epsilon);
    if (o === undefined || n === undefined) return;

    const diff = subtractCubic(shiftCubic(o.poly, start - o.sOffset), shiftCubic(n.poly, start - n.sOffset));
    const gap = direction === 1 ? diff : subtractCubic(ZERO_CUBIC, diff);
    intervals.push({ start, length: end - start, gap });
  });

  return intervals;
}

export function bordersOverlap(
  outer: Lane,
  inner: Lane,
  sectionLength: number,
  direction: 1 | -1,
  epsilon: number
): boolean {
  return borderIntervals(outer.borders, inner.borders, sectionLength, direction, epsilon).some(
    (interval) => minOnInterval(interval.gap, 0, interval.length).value < -epsilon
  );
}

function checkSide(
  ctx: CheckContext,
  road: Road,
  section: LaneSection,
  lanes: readonly Lane[],
  direction: 1 | -1,
  findings: Finding[]
): void {
  const { tolerances } = ctx;
  const bordered = lanes.filter((lane) => lane.borders.length > 0);

  bordered.forEach((inner, i) => {
    for (const outer of bordered.slice(i + 1)) {
      if (!bordersOverlap(outer, inner, section.length, direction, tolerances.floatEpsilon)) continue;

      const s = section.s + section.length / 2;
      const crossing = findCrossing(
        sampleOuterBorder(road, section, outer, tolerances.sampleStep),
        sampleOuterBorder(road, section, inner, tolerances.sampleStep)
      );
      findings.push({
        severity: 'error',
        message: MESSAGE,
        location: laneLocation(road.id, section.s, outer.id, MESSAGE),
        related: [laneLocation(road.id, section.s, inner.id, MESSAGE)],
        point: crossing ?? laneMidpoint(road, section, outer, s),
      });
    }
  });
}

function check(ctx: CheckContext): Finding[] {
  const findings: Finding[] = [];

  for (const road of ctx.document.roads.values()) {
    for (const section of road.laneSections) {
      // Lanes are ordered from the center outwards on both sides
      checkSide(ctx, road, section, section.left, 1, findings);
      checkSide(ctx, road, section, section.right, -1, findings);
    }
  }

  return findings;
}

export const borderOverlapWithInnerLanes = defineChecker({
  ruleUid: 'asam.net:xodr:1.4.0:road.lane.border.overlap_with_inner_lanes',
  description: 'Lane borders shall not intersect inner lanes.',
  check,
});
