/**
 * road.lane.link.new_lane_appear
 *
 * When a new lane appears beside a continuing one, only the continuing lane
 * may be linked to the original lane. An appearing lane is recognised by its
 * zero width at the contact.
 *
 * @module checks/semantic/new-lane-appear
 */

import {
  connectionsBetweenRoadAndJunction,
  contactSection,
  incomingAndConnectingSections,
  laneById,
  laneWidthAt,
  linkedContactSection,
  linkedJunctionId,
  linkedLaneIds,
  roadLinkage,
  sideLanes,
  type LinkageTag,
} from '../../model/queries.js';
import type { ContactPoint, Lane, LaneSection, Road } from '../../model/types.js';
import { defineChecker, laneLocation } from '../issues.js';
import type { CheckContext, Finding } from '../types.js';

const MESSAGE =
  'If a new lane appears besides, only the continuing lane shall be connected to the original lane, not the appearing lane.';

interface SectionRef {
  readonly road: Road;
  readonly section: LaneSection;
}

function isZeroAtContact(section: LaneSection, lane: Lane, contact: ContactPoint, epsilon: number): boolean {
  const width = laneWidthAt(lane, contact === 'start' ? 0 : section.length);
  return width !== undefined && Math.abs(width) < epsilon;
}

function finding(from: SectionRef, lane: Lane, to: SectionRef, zeroLane: Lane, tag: LinkageTag): Finding {
  return {
    severity: 'error',
    message: MESSAGE,
    location: laneLocation(from.road.id, from.section.s, lane.id, `Lane with ${tag} with width zero.`),
    related: [laneLocation(to.road.id, to.section.s, zeroLane.id, `${tag === 'successor' ? 'Successor' : 'Predecessor'} lane with width zero.`)],
  };
}

/**
 * Lanes of `from` linked (by `tag`) to a zero-width lane of `to`
 */
function checkLinkedSections(
  from: SectionRef,
  to: SectionRef,
  tag: LinkageTag,
  contact: ContactPoint,
  epsilon: number,
  findings: Finding[]
): void {
  for (const lane of sideLanes(from.section)) {
    for (const id of linkedLaneIds(lane, tag)) {
      const target = laneById(to.section, id);
      if (target !== undefined && isZeroAtContact(to.section, target, contact, epsilon)) {
        findings.push(finding(from, lane, to, target, tag));
      }
    }
  }
}

function checkJunction(ctx: CheckContext, road: Road, tag: LinkageTag, findings: Finding[]): void {
  const junctionId = linkedJunctionId(road, tag);
  if (junctionId === undefined) return;
  const roadEnd: ContactPoint = tag === 'predecessor' ? 'start' : 'end';

  for (const connection of connectionsBetweenRoadAndJunction(ctx.document, road.id, junctionId, roadEnd)) {
    const sections = incomingAndConnectingSections(ctx.document, connection);
    if (sections === undefined) continue;
    for (const link of connection.laneLinks) {
      const connectingLane = laneById(sections.connecting, link.to);
      if (connectingLane === undefined) continue;
      if (!isZeroAtContact(sections.connecting, connectingLane, sections.connectingContact, ctx.tolerances.floatEpsilon)) {
        continue;
      }
      const incomingLane = laneById(sections.incoming, link.from);
      if (incomingLane === undefined) continue;
      findings.push(
        finding(
          { road: sections.incomingRoad, section: sections.incoming },
          incomingLane,
          { road: sections.connectingRoad, section: sections.connecting },
          connectingLane,
          tag
        )
      );
    }
  }
}

function check(ctx: CheckContext): Finding[] {
  const findings: Finding[] = [];
  const epsilon = ctx.tolerances.floatEpsilon;

  for (const road of ctx.document.roads.values()) {
    road.laneSections.forEach((section, i) => {
      const next = road.laneSections[i + 1];
      if (next === undefined) return;
      checkLinkedSections({ road, section }, { road, section: next }, 'successor', 'start', epsilon, findings);
    });

    for (const tag of ['successor', 'predecessor'] as const) {
      const linkage = roadLinkage(road, tag);
      const own = contactSection(road, tag === 'predecessor' ? 'start' : 'end');
      if (linkage === undefined || own === undefined) continue;
      const target = linkedContactSection(ctx.document, linkage);
      if (target === undefined) continue;
      checkLinkedSections(
        { road, section: own },
        { road: target.road, section: target.section },
        tag,
        linkage.contactPoint,
        epsilon,
        findings
      );
    }

    checkJunction(ctx, road, 'successor', findings);
    checkJunction(ctx, road, 'predecessor', findings);
  }

  return findings;
}

export const newLaneAppear = defineChecker({
  ruleUid: 'asam.net:xodr:1.4.0:road.lane.link.new_lane_appear',
  description: 'If a new lane appears besides, only the continuing lane shall be connected to the original lane.',
  check,
});
