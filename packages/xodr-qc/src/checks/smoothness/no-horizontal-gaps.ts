/**
 * lane_smoothness.contact_point_no_horizontal_gaps
 *
 * Two connected drivable lanes shall have no horizontal gaps, and the plan
 * view shall have no gaps between consecutive geometries.
 *
 * Lane contact is judged on the x/y positions of the inner and outer borders
 * of both lanes at the shared boundary. A link is reported once, whichever
 * side declares it.
 *
 * @module checks/smoothness/no-horizontal-gaps
 */

import { DRIVABLE_LANE_TYPES } from '../../core/constants.js';
import { evaluate, sortedPlanView } from '../../geometry/evaluator.js';
import {
  connectionsBetweenRoadAndJunction,
  contactSection,
  laneById,
  linkedContactSection,
  linkedJunctionId,
  linkedLaneIds,
  outerBorderTs,
  roadLinkage,
  sideLanes,
  type LinkageTag,
} from '../../model/queries.js';
import type { Connection, Lane, LaneSection, Road } from '../../model/types.js';
import { distance2D, elevationAt, laneOffsetAt, worldPoint, type Point3D } from '../../transform/road-to-world.js';
import { defineChecker, laneKey } from '../issues.js';
import type { CheckContext, Finding } from '../types.js';

const LANE_GAP_MESSAGE = 'The transition between lane elements should be defined with no gaps.';

// ============================================================================
// Lane boundaries
// ============================================================================

/**
 * Lane borders of one section, evaluated at a road boundary
 */
interface Boundary {
  readonly road: Road;
  readonly section: LaneSection;
  readonly s: number;
  readonly ts: ReadonlyMap<number, number>;
}

function boundaryAt(road: Road, section: LaneSection, s: number): Boundary {
  return {
    road,
    section,
    s,
    ts: outerBorderTs(sideLanes(section), laneOffsetAt(road, s), s - section.s),
  };
}

function outerPoint(boundary: Boundary, laneId: number): Point3D | undefined {
  const t = boundary.ts.get(laneId);
  return t === undefined ? undefined : worldPoint(boundary.road, boundary.s, t);
}

function innerPoint(boundary: Boundary, laneId: number): Point3D | undefined {
  const t = boundary.ts.get(laneId - Math.sign(laneId));
  return t === undefined ? undefined : worldPoint(boundary.road, boundary.s, t);
}

function middlePoint(boundary: Boundary, laneId: number): Point3D | undefined {
  const inner = innerPoint(boundary, laneId);
  const outer = outerPoint(boundary, laneId);
  if (inner === undefined || outer === undefined) return undefined;
  return { x: (inner.x + outer.x) / 2, y: (inner.y + outer.y) / 2, z: (inner.z + outer.z) / 2 };
}

function close(p: Point3D | undefined, q: Point3D | undefined, tolerance: number): boolean {
  return p !== undefined && q !== undefined && distance2D(p, q) <= tolerance;
}

function isDrivable(lane: Lane): boolean {
  return DRIVABLE_LANE_TYPES.has(lane.type);
}

/** Order lane ids from the center outwards */
function byDistanceFromCenter(ids: readonly number[]): number[] {
  return [...ids].sort((a, b) => Math.abs(a) - Math.abs(b));
}

// ============================================================================
// Reporting
// ============================================================================

interface LaneEnd {
  readonly boundary: Boundary;
  readonly lane: Lane;
}

class GapReporter {
  private readonly reported = new Set<string>();
  readonly findings: Finding[] = [];

  /**
   * Report the link between `first` and `next`; the pair is reported once
   */
  report(first: LaneEnd, next: LaneEnd, point: Point3D | undefined): void {
    const keys = [
      laneKey(first.boundary.road.id, first.boundary.section.index, first.lane.id),
      laneKey(next.boundary.road.id, next.boundary.section.index, next.lane.id),
    ].sort();
    const key = keys.join('|');
    if (this.reported.has(key)) return;
    this.reported.add(key);

    this.findings.push({
      severity: 'error',
      message: LANE_GAP_MESSAGE,
      location: {
        roadId: first.boundary.road.id,
        s: first.boundary.s,
        laneId: first.lane.id,
        description: 'First lane element',
      },
      related: [
        {
          roadId: next.boundary.road.id,
          s: next.boundary.s,
          laneId: next.lane.id,
          description: 'Next lane element',
        },
      ],
      point,
    });
  }
}

// ============================================================================
// Plan view
// ============================================================================

function checkPlanView(road: Road, tolerance: number, findings: Finding[]): void {
  const geometries = sortedPlanView(road);

  for (let i = 0; i + 1 < geometries.length; i++) {
    const previous = geometries[i];
    const current = geometries[i + 1];
    if (previous === undefined || current === undefined) continue;

    const end = evaluate(previous, previous.s0 + previous.length);
    const gap = Math.hypot(end.x - current.x0, end.y - current.y0);
    if (gap <= tolerance) continue;

    findings.push({
      severity: 'error',
      message: `The transition between geometry elements should be defined with no gaps. A gap of ${gap} meters has been found.`,
      location: { roadId: road.id, s: previous.s0, description: 'First geometry element' },
      related: [{ roadId: road.id, s: current.s0, description: 'Second geometry element' }],
      point: { x: current.x0, y: current.y0, z: elevationAt(road, current.s0) },
    });
  }
}

// ============================================================================
// Consecutive lane sections
// ============================================================================

function checkSuccessors(
  current: Boundary,
  next: Boundary,
  lane: Lane,
  tolerance: number,
  reporter: GapReporter
): void {
  const successors = byDistanceFromCenter(lane.successors);
  const from: LaneEnd = { boundary: current, lane };

  const flag = (id: number): void => {
    const target = laneById(next.section, id);
    if (target === undefined) return;
    reporter.report(from, { boundary: next, lane: target }, middlePoint(next, id));
  };

  const only = successors.length === 1 ? successors[0] : undefined;
  if (only !== undefined) {
    const outerMatch = close(outerPoint(current, lane.id), outerPoint(next, only), tolerance);
    const innerMatch = close(innerPoint(current, lane.id), innerPoint(next, only), tolerance);
    if (!outerMatch || !innerMatch) flag(only);
    return;
  }

  const innermost = successors[0];
  const outermost = successors[successors.length - 1];
  if (successors.length === 2 && innermost !== undefined && outermost !== undefined) {
    if (!close(outerPoint(current, lane.id), outerPoint(next, outermost), tolerance)) flag(outermost);
    if (!close(innerPoint(current, lane.id), innerPoint(next, innermost), tolerance)) flag(innermost);
    return;
  }

  // A lane splitting into three or more cannot touch the middle ones
  for (const id of successors.slice(1, -1)) flag(id);
}

function checkPredecessors(
  previous: Boundary,
  current: Boundary,
  lane: Lane,
  tolerance: number,
  reporter: GapReporter
): void {
  const predecessors = byDistanceFromCenter(lane.predecessors);
  const to: LaneEnd = { boundary: current, lane };

  const flag = (id: number): void => {
    const source = laneById(previous.section, id);
    if (source === undefined) return;
    reporter.report({ boundary: previous, lane: source }, to, middlePoint(current, lane.id));
  };

  const only = predecessors.length === 1 ? predecessors[0] : undefined;
  if (only !== undefined) {
    const outerMatch = close(outerPoint(previous, only), outerPoint(current, lane.id), tolerance);
    const innerMatch = close(innerPoint(previous, only), innerPoint(current, lane.id), tolerance);
    if (!outerMatch || !innerMatch) flag(only);
    return;
  }

  const innermost = predecessors[0];
  const outermost = predecessors[predecessors.length - 1];
  if (predecessors.length === 2 && innermost !== undefined && outermost !== undefined) {
    if (!close(outerPoint(previous, outermost), outerPoint(current, lane.id), tolerance)) flag(outermost);
    if (!close(innerPoint(previous, innermost), innerPoint(current, lane.id), tolerance)) flag(innermost);
    return;
  }

  for (const id of predecessors.slice(1, -1)) flag(id);
}

function checkLaneSections(road: Road, tolerance: number, reporter: GapReporter): void {
  road.laneSections.forEach((section, i) => {
    const following = road.laneSections[i + 1];
    if (following === undefined) return;

    const current = boundaryAt(road, section, section.s + section.length);
    const next = boundaryAt(road, following, following.s);

    for (const lane of sideLanes(section)) {
      if (isDrivable(lane)) checkSuccessors(current, next, lane, tolerance, reporter);
    }
    for (const lane of sideLanes(following)) {
      if (isDrivable(lane)) checkPredecessors(current, next, lane, tolerance, reporter);
    }
  });
}

// ============================================================================
// Linked roads and junction connections
// ============================================================================

/**
 * Number of coinciding border points between two lane ends (0 to 4)
 */
function contactMatches(own: Boundary, ownId: number, other: Boundary, otherId: number, tolerance: number): number | undefined {
  const c0 = innerPoint(own, ownId);
  const c1 = outerPoint(own, ownId);
  const t0 = innerPoint(other, otherId);
  const t1 = outerPoint(other, otherId);
  if (c0 === undefined || c1 === undefined || t0 === undefined || t1 === undefined) return undefined;

  const pairs: [Point3D, Point3D][] = [
    [c0, t0],
    [c0, t1],
    [c1, t0],
    [c1, t1],
  ];
  return pairs.filter(([p, q]) => distance2D(p, q) < tolerance).length;
}

function checkLinkedRoad(ctx: CheckContext, road: Road, tag: LinkageTag, reporter: GapReporter): void {
  const tolerance = ctx.tolerances.contactGap;
  const section = contactSection(road, tag === 'predecessor' ? 'start' : 'end');
  const linkage = roadLinkage(road, tag);
  if (section === undefined || linkage === undefined) return;
  const target = linkedContactSection(ctx.document, linkage);
  if (target === undefined) return;

  const own = boundaryAt(road, section, tag === 'predecessor' ? 0 : road.length);
  const other = boundaryAt(target.road, target.section, linkage.contactPoint === 'start' ? 0 : target.road.length);

  for (const lane of sideLanes(section)) {
    if (!isDrivable(lane)) continue;
    const linked = linkedLaneIds(lane, tag);
    // A split or merge only shares one border with each linked lane
    const required = linked.length > 1 ? 1 : 2;

    for (const id of linked) {
      const matches = contactMatches(own, lane.id, other, id, tolerance);
      if (matches === undefined || matches >= required) continue;
      const targetLane = laneById(target.section, id);
      if (targetLane === undefined) continue;

      const ownEnd: LaneEnd = { boundary: own, lane };
      const otherEnd: LaneEnd = { boundary: other, lane: targetLane };
      if (tag === 'predecessor') {
        reporter.report(otherEnd, ownEnd, middlePoint(own, lane.id));
      } else {
        reporter.report(ownEnd, otherEnd, middlePoint(other, id));
      }
    }
  }
}

function checkConnection(
  ctx: CheckContext,
  road: Road,
  section: LaneSection,
  tag: LinkageTag,
  connection: Connection,
  reporter: GapReporter
): void {
  if (connection.connectingRoad === undefined || connection.contactPoint === undefined) return;
  const connectingRoad = ctx.document.roads.get(connection.connectingRoad);
  if (connectingRoad === undefined) return;
  const targetSection = contactSection(connectingRoad, connection.contactPoint);
  if (targetSection === undefined) return;

  const own = boundaryAt(road, section, tag === 'predecessor' ? 0 : road.length);
  const other = boundaryAt(
    connectingRoad,
    targetSection,
    connection.contactPoint === 'start' ? 0 : connectingRoad.length
  );

  for (const link of connection.laneLinks) {
    const fromLane = laneById(section, link.from);
    const toLane = laneById(targetSection, link.to);
    if (fromLane === undefined || toLane === undefined || !isDrivable(fromLane)) continue;

    const matches = contactMatches(own, link.from, other, link.to, ctx.tolerances.contactGap);
    if (matches === undefined || matches >= 2) continue;

    const point = tag === 'predecessor' ? middlePoint(own, link.from) : middlePoint(other, link.to);
    reporter.report({ boundary: own, lane: fromLane }, { boundary: other, lane: toLane }, point);
  }
}

function checkJunction(ctx: CheckContext, road: Road, tag: LinkageTag, reporter: GapReporter): void {
  const junctionId = linkedJunctionId(road, tag);
  if (junctionId === undefined) return;
  const contact = tag === 'predecessor' ? 'start' : 'end';
  const section = contactSection(road, contact);
  if (section === undefined) return;

  for (const connection of connectionsBetweenRoadAndJunction(ctx.document, road.id, junctionId, contact)) {
    checkConnection(ctx, road, section, tag, connection, reporter);
  }
}

function check(ctx: CheckContext): Finding[] {
  const { document, tolerances } = ctx;
  const geometryFindings: Finding[] = [];
  const reporter = new GapReporter();

  for (const road of document.roads.values()) {
    checkPlanView(road, tolerances.contactGap, geometryFindings);
    checkLaneSections(road, tolerances.contactGap, reporter);
  }

  for (const road of document.roads.values()) {
    for (const tag of ['successor', 'predecessor'] as const) {
      checkLinkedRoad(ctx, road, tag, reporter);
      checkJunction(ctx, road, tag, reporter);
    }
  }

  return [...geometryFindings, ...reporter.findings];
}

export const noHorizontalGaps = defineChecker({
  ruleUid: 'asam.net:xodr:1.7.0:lane_smoothness.contact_point_no_horizontal_gaps',
  description: 'Two connected drivable lanes shall have no horizontal gaps.',
  check,
});
