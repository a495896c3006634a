/**
 * road.lane.link.lanes_across_lane_sections
 *
 * Lanes continuing across a lane section boundary must be linked in both
 * directions. Outside junctions this also covers the boundary to the
 * directly linked road.
 *
 * @module checks/semantic/lanes-across-lane-sections
 */

import {
  contactSection,
  laneById,
  linkedContactSection,
  linkedLaneIds,
  roadBelongsToJunction,
  roadLinkage,
  sideLanes,
  type LinkageTag,
} from '../../model/queries.js';
import type { Lane, LaneSection, Road } from '../../model/types.js';
import type { LaneRef, LaneTopology, TravelDirection } from '../../topology/lane-topology.js';
import { defineChecker, laneKey, laneLocation } from '../issues.js';
import type { CheckContext, Finding } from '../types.js';

/** A section together with the link direction that points out of it */
interface ContactingSection {
  readonly road: Road;
  readonly section: LaneSection;
  readonly tag: LinkageTag;
}

type Report = (first: ContactingSection, lane: Lane, second: ContactingSection, other: Lane) => void;

function reporter(reported: Set<string>, findings: Finding[]): Report {
  return (first, lane, second, other) => {
    const key = `${laneKey(second.road.id, second.section.index, other.id)}>${laneKey(first.road.id, first.section.index, lane.id)}`;
    if (reported.has(key)) return;
    reported.add(key);

    findings.push({
      severity: 'error',
      message: 'Missing lane link.',
      location: laneLocation(second.road.id, second.section.s, other.id, `Lane ${other.id} has no ${second.tag} link back to lane ${lane.id}`),
      related: [laneLocation(first.road.id, first.section.s, lane.id)],
    });
  };
}

function travelDirection(tag: LinkageTag): TravelDirection {
  return tag === 'successor' ? 'forward' : 'backward';
}

/**
 * Boundary between two consecutive sections of one road
 */
function checkSectionBoundary(topology: LaneTopology, first: ContactingSection, second: ContactingSection, report: Report): void {
  for (const lane of sideLanes(first.section)) {
    const ref: LaneRef = { roadId: first.road.id, sectionIndex: first.section.index, laneId: lane.id };
    for (const next of topology.nextLanes(ref, travelDirection(first.tag))) {
      if (topology.isLaneReachable(next, ref, travelDirection(second.tag))) continue;
      const other = laneById(second.section, next.laneId);
      if (other !== undefined) report(first, lane, second, other);
    }
  }
}

/**
 * Boundary to the contact section of a directly linked road
 */
function checkRoadBoundary(first: ContactingSection, second: ContactingSection, report: Report): void {
  for (const lane of sideLanes(first.section)) {
    for (const id of linkedLaneIds(lane, first.tag)) {
      const other = laneById(second.section, id);
      if (other === undefined) continue;
      if (!linkedLaneIds(other, second.tag).includes(lane.id)) report(first, lane, second, other);
    }
  }
}

function check({ document, topology }: CheckContext): Finding[] {
  const findings: Finding[] = [];
  const report = reporter(new Set<string>(), findings);

  for (const road of document.roads.values()) {
    road.laneSections.forEach((current, i) => {
      const previous = road.laneSections[i - 1];
      if (previous === undefined) return;
      const before: ContactingSection = { road, section: previous, tag: 'successor' };
      const after: ContactingSection = { road, section: current, tag: 'predecessor' };
      checkSectionBoundary(topology, before, after, report);
      checkSectionBoundary(topology, after, before, report);
    });

    if (roadBelongsToJunction(road)) continue;

    for (const tag of ['predecessor', 'successor'] as const) {
      const section = contactSection(road, tag === 'predecessor' ? 'start' : 'end');
      const linkage = roadLinkage(road, tag);
      if (section === undefined || linkage === undefined) continue;
      const target = linkedContactSection(document, linkage);
      if (target === undefined) continue;
      checkRoadBoundary({ road, section, tag }, target, report);
      checkRoadBoundary(target, { road, section, tag }, report);
    }
  }

  return findings;
}

export const lanesAcrossLaneSections = defineChecker({
  ruleUid: 'asam.net:xodr:1.4.0:road.lane.link.lanes_across_lane_sections',
  description: 'Lanes that continue across lane sections shall be connected in both directions.',
  check,
});
