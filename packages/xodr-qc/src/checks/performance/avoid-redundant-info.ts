/**
 * performance.avoid_redundant_info
 *
 * Flags a record that repeats the equation of the record before it, and a
 * line that continues the previous line with the same heading.
 *
 * @module checks/performance/avoid-redundant-info
 */

import { evalCubic, isSameEquation } from '../../geometry/polynomial.js';
import { laneMidpoint, sideLanes } from '../../model/queries.js';
import type { Lane, LaneSection, OffsetCubic, Road } from '../../model/types.js';
import { worldPoint, type Point3D } from '../../transform/road-to-world.js';
import { defineChecker, laneLocation } from '../issues.js';
import type { CheckContext, Finding, IssueLocation } from '../types.js';

type RecordKind = 'elevation' | 'superelevation' | 'lane offset' | 'lane width' | 'lane border';

function redundantPairs(records: readonly OffsetCubic[], epsilon: number): [OffsetCubic, OffsetCubic][] {
  const pairs: [OffsetCubic, OffsetCubic][] = [];
  for (let i = 0; i + 1 < records.length; i++) {
    const current = records[i];
    const next = records[i + 1];
    if (current === undefined || next === undefined) continue;
    if (isSameEquation(current, next, epsilon)) pairs.push([current, next]);
  }
  return pairs;
}

function finding(kind: RecordKind | 'line geometry', location: IssueLocation, related: IssueLocation, point: Point3D | undefined): Finding {
  const message = `Redundant ${kind} declaration.`;
  return {
    severity: 'warning',
    message,
    location: { ...location, description: message },
    related: [{ ...related, description: message }],
    point,
  };
}

function checkRoadProfiles(road: Road, epsilon: number, findings: Finding[]): void {
  const profiles: [RecordKind, readonly OffsetCubic[]][] = [
    ['elevation', road.elevations],
    ['superelevation', road.superelevations],
  ];
  for (const [kind, records] of profiles) {
    for (const [current, next] of redundantPairs(records, epsilon)) {
      findings.push(
        finding(kind, { roadId: road.id, s: current.sOffset }, { roadId: road.id, s: next.sOffset }, worldPoint(road, next.sOffset))
      );
    }
  }

  for (const [current, next] of redundantPairs(road.laneOffsets, epsilon)) {
    findings.push(
      finding(
        'lane offset',
        { roadId: road.id, s: current.sOffset },
        { roadId: road.id, s: next.sOffset },
        worldPoint(road, next.sOffset, evalCubic(next.poly, 0))
      )
    );
  }
}

function checkLane(road: Road, section: LaneSection, lane: Lane, epsilon: number, findings: Finding[]): void {
  const records: [RecordKind, readonly OffsetCubic[]][] = [
    ['lane width', lane.widths],
    ['lane border', lane.borders],
  ];
  for (const [kind, list] of records) {
    for (const [current, next] of redundantPairs(list, epsilon)) {
      const s = section.s + next.sOffset;
      findings.push(
        finding(
          kind,
          laneLocation(road.id, section.s + current.sOffset, lane.id),
          laneLocation(road.id, s, lane.id),
          laneMidpoint(road, section, lane, s)
        )
      );
    }
  }
}

function checkPlanView(road: Road, epsilon: number, findings: Finding[]): void {
  for (let i = 0; i + 1 < road.planView.length; i++) {
    const current = road.planView[i];
    const next = road.planView[i + 1];
    if (current === undefined || next === undefined) continue;
    if (current.kind !== 'line' || next.kind !== 'line') continue;
    if (Math.abs(current.hdg0 - next.hdg0) >= epsilon) continue;

    findings.push(
      finding('line geometry', { roadId: road.id, s: current.s0 }, { roadId: road.id, s: next.s0 }, worldPoint(road, next.s0))
    );
  }
}

function check({ document, tolerances }: CheckContext): Finding[] {
  const findings: Finding[] = [];
  const epsilon = tolerances.floatEpsilon;

  for (const road of document.roads.values()) {
    checkRoadProfiles(road, epsilon, findings);
    checkPlanView(road, epsilon, findings);
    for (const section of road.laneSections) {
      for (const lane of sideLanes(section)) {
        checkLane(road, section, lane, epsilon, findings);
      }
    }
  }

  return findings;
}

export const avoidRedundantInfo = defineChecker({
  ruleUid: 'asam.net:xodr:1.7.0:performance.avoid_redundant_info',
  description: 'Redundant elements should be avoided.',
  check,
});
