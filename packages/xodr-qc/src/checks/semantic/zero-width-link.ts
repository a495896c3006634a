/**
 * Shared logic of the zero-width lane link rules
 *
 * A lane whose width is zero where its section begins (ends) must not have a
 * predecessor (successor), neither declared on the lane nor through a
 * junction lane link. The center lane is exempt and only warned about.
 *
 * @module checks/semantic/zero-width-link
 */

import {
  connectionsBetweenRoadAndJunction,
  connectionsOfConnectingRoad,
  contactSection,
  laneMidpoint,
  linkedJunctionId,
  linkedLaneIds,
  recordValue,
  roadBelongsToJunction,
  type LinkageTag,
} from '../../model/queries.js';
import type { ContactPoint, Lane, LaneSection, Road } from '../../model/types.js';
import { laneKey, laneLocation } from '../issues.js';
import type { CheckContext, Finding } from '../types.js';

interface ZeroWidthRule {
  readonly tag: LinkageTag;
  readonly end: ContactPoint;
  readonly message: string;
}

/** Section-relative offset of the end being checked */
function edgeOffset(rule: ZeroWidthRule, section: LaneSection): number {
  return rule.end === 'start' ? 0 : section.length;
}

function isZeroAtEdge(rule: ZeroWidthRule, section: LaneSection, lane: Lane, epsilon: number): boolean {
  const width = recordValue(lane.widths, edgeOffset(rule, section));
  return width !== undefined && Math.abs(width) < epsilon;
}

function finding(rule: ZeroWidthRule, road: Road, section: LaneSection, lane: Lane): Finding {
  return {
    severity: lane.id === 0 ? 'warning' : 'error',
    message: rule.message,
    location: laneLocation(road.id, section.s, lane.id, `Lane with width zero and ${rule.tag}s.`),
    point: laneMidpoint(road, section, lane, section.s + edgeOffset(rule, section)),
  };
}

/**
 * Lanes of the boundary section linked through junction lane links
 */
function junctionLinkedLanes(ctx: CheckContext, rule: ZeroWidthRule, road: Road): Set<number> {
  const ids = new Set<number>();

  if (roadBelongsToJunction(road)) {
    const junction = road.junction === null ? undefined : ctx.document.junctions.get(road.junction);
    if (junction === undefined) return ids;
    for (const connection of connectionsOfConnectingRoad(junction, road.id, rule.end)) {
      for (const link of connection.laneLinks) ids.add(link.to);
    }
    return ids;
  }

  const junctionId = linkedJunctionId(road, rule.tag);
  if (junctionId === undefined) return ids;
  for (const connection of connectionsBetweenRoadAndJunction(ctx.document, road.id, junctionId, rule.end)) {
    for (const link of connection.laneLinks) ids.add(link.from);
  }
  return ids;
}

export function checkZeroWidthLinks(ctx: CheckContext, rule: ZeroWidthRule): Finding[] {
  const findings: Finding[] = [];
  const reported = new Set<string>();
  const epsilon = ctx.tolerances.floatEpsilon;

  const report = (road: Road, section: LaneSection, lane: Lane): void => {
    const key = laneKey(road.id, section.index, lane.id);
    if (reported.has(key)) return;
    reported.add(key);
    findings.push(finding(rule, road, section, lane));
  };

  for (const road of ctx.document.roads.values()) {
    for (const section of road.laneSections) {
      for (const lane of [...section.left, ...section.center, ...section.right]) {
        if (linkedLaneIds(lane, rule.tag).length === 0) continue;
        if (isZeroAtEdge(rule, section, lane, epsilon)) report(road, section, lane);
      }
    }
  }

  for (const road of ctx.document.roads.values()) {
    const section = contactSection(road, rule.end);
    if (section === undefined) continue;
    const linked = junctionLinkedLanes(ctx, rule, road);
    for (const lane of [...section.left, ...section.right]) {
      if (linked.has(lane.id) && isZeroAtEdge(rule, section, lane, epsilon)) report(road, section, lane);
    }
  }

  return findings;
}
