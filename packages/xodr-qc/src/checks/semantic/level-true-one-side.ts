/**
 * road.lane.level_true_one_side
 *
 * Once a lane on one side is kept on level, every lane further out must be
 * as well. Level changes along lane links are reported as warnings.
 *
 * @module checks/semantic/level-true-one-side
 */

import {
  contactSection,
  incomingAndConnectingSections,
  laneById,
  laneMidpoint,
  linkedContactSection,
  linkedLaneIds,
  roadLinkage,
  sideLanes,
} from '../../model/queries.js';
import type { Lane, LaneSection, Road } from '../../model/types.js';
import { defineChecker, laneKey, laneLocation } from '../issues.js';
import type { CheckContext, Finding } from '../types.js';

const SECTION_WARNING = 'Lane levels are not the same in two consecutive lane sections.';
const ROAD_WARNING = 'Lane levels are not the same between two connected roads.';
const JUNCTION_WARNING = 'Lane levels are not the same between incoming road and junction.';

function checkSide(road: Road, section: LaneSection, lanes: readonly Lane[], findings: Finding[]): void {
  let foundTrue = false;
  for (const lane of lanes) {
    if (lane.level) {
      foundTrue = true;
    } else if (foundTrue) {
      findings.push({
        severity: 'error',
        message: 'Lane level False encountered on same side after True set.',
        location: laneLocation(road.id, section.s, lane.id, `Lane ${lane.id} @level=false outside a lane with @level=true`),
        point: laneMidpoint(road, section, lane, section.s + section.length / 2),
      });
    }
  }
}

function hasLevelMismatch(lane: Lane, linkedIds: readonly number[], target: LaneSection): boolean {
  return linkedIds.some((id) => {
    const other = laneById(target, id);
    return other !== undefined && other.level !== lane.level;
  });
}

function check({ document }: CheckContext): Finding[] {
  const findings: Finding[] = [];
  const warned = new Set<string>();

  const warn = (finding: Finding, key: string): void => {
    if (warned.has(key)) return;
    warned.add(key);
    findings.push(finding);
  };

  for (const road of document.roads.values()) {
    for (const section of road.laneSections) {
      checkSide(road, section, section.left, findings);
      checkSide(road, section, section.right, findings);
    }
  }

  // Consecutive lane sections
  for (const road of document.roads.values()) {
    const mismatched: { section: LaneSection; lane: Lane }[] = [];
    road.laneSections.forEach((current, i) => {
      const previous = road.laneSections[i - 1];
      if (previous === undefined) return;
      for (const lane of sideLanes(current)) {
        if (hasLevelMismatch(lane, lane.predecessors, previous)) {
          mismatched.push({ section: current, lane });
        }
      }
      for (const lane of sideLanes(previous)) {
        if (hasLevelMismatch(lane, lane.successors, current)) {
          mismatched.push({ section: previous, lane });
        }
      }
    });
    for (const { section, lane } of mismatched) {
      warn(
        {
          severity: 'warning',
          message: SECTION_WARNING,
          location: laneLocation(road.id, section.s, lane.id, SECTION_WARNING),
        },
        laneKey(road.id, section.index, lane.id)
      );
    }
  }

  // Directly linked roads
  for (const road of document.roads.values()) {
    for (const tag of ['predecessor', 'successor'] as const) {
      const section = contactSection(road, tag === 'predecessor' ? 'start' : 'end');
      const linkage = roadLinkage(road, tag);
      if (section === undefined || linkage === undefined) continue;
      const target = linkedContactSection(document, linkage);
      if (target === undefined) continue;

      for (const lane of sideLanes(section)) {
        for (const id of linkedLaneIds(lane, tag)) {
          const other = laneById(target.section, id);
          if (other === undefined || other.level === lane.level) continue;
          const s = tag === 'predecessor' ? 0 : road.length;
          warn(
            {
              severity: 'warning',
              message: ROAD_WARNING,
              location: laneLocation(road.id, section.s, lane.id, ROAD_WARNING),
              related: [laneLocation(target.road.id, target.section.s, other.id, ROAD_WARNING)],
              point: laneMidpoint(road, section, lane, s),
            },
            laneKey(road.id, section.index, lane.id)
          );
        }
      }
    }
  }

  // Junction lane links
  for (const junction of document.junctions.values()) {
    for (const connection of junction.connections) {
      const sections = incomingAndConnectingSections(document, connection);
      if (sections === undefined) continue;
      for (const link of connection.laneLinks) {
        const incoming = laneById(sections.incoming, link.from);
        const connecting = laneById(sections.connecting, link.to);
        if (incoming === undefined || connecting === undefined) continue;
        if (incoming.level === connecting.level) continue;
        warn(
          {
            severity: 'warning',
            message: JUNCTION_WARNING,
            location: laneLocation(sections.incomingRoad.id, sections.incoming.s, incoming.id, JUNCTION_WARNING),
            related: [
              {
                ...laneLocation(sections.connectingRoad.id, sections.connecting.s, connecting.id, JUNCTION_WARNING),
                junctionId: junction.id,
                connectionId: connection.id,
              },
            ],
          },
          laneKey(sections.incomingRoad.id, sections.incoming.index, incoming.id)
        );
      }
    }
  }

  return findings;
}

export const levelTrueOneSide = defineChecker({
  ruleUid: 'asam.net:xodr:1.7.0:road.lane.level_true_one_side',
  description: 'Check if there is any @level=false after being true until the lane border.',
  check,
});
