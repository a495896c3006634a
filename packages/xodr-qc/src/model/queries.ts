/**
 * Read-only queries over the Document Model
 *
 * Lane lookups, lane widths and borders, contact sections of linked roads
 * and junction connection lookups shared by the checkers.
 *
 * @module model/queries
 */

import { evalCubic } from '../geometry/polynomial.js';
import { laneOffsetAt, worldPoint, type Point3D } from '../transform/road-to-world.js';
import type {
  Connection,
  ContactPoint,
  Junction,
  Lane,
  LaneSection,
  OffsetCubic,
  OpenDriveDocument,
  Road,
} from './types.js';

export type LinkageTag = 'predecessor' | 'successor';

/** A direct road-to-road link with a declared contact point */
export interface RoadLinkage {
  readonly roadId: string;
  readonly contactPoint: ContactPoint;
}

// ============================================================================
// Lanes and sections
// ============================================================================

export function allLanes(section: LaneSection): readonly Lane[] {
  return [...section.left, ...section.center, ...section.right];
}

export function sideLanes(section: LaneSection): readonly Lane[] {
  return [...section.left, ...section.right];
}

export function laneById(section: LaneSection, id: number): Lane | undefined {
  return allLanes(section).find((lane) => lane.id === id);
}

export function firstSection(road: Road): LaneSection | undefined {
  return road.laneSections[0];
}

export function lastSection(road: Road): LaneSection | undefined {
  return road.laneSections[road.laneSections.length - 1];
}

/** Section touching the given end of the road */
export function contactSection(road: Road, contact: ContactPoint): LaneSection | undefined {
  return contact === 'start' ? firstSection(road) : lastSection(road);
}

export function linkedLaneIds(lane: Lane, tag: LinkageTag): readonly number[] {
  return tag === 'predecessor' ? lane.predecessors : lane.successors;
}

/**
 * Value of the last record whose offset does not exceed `ds`
 */
export function recordValue(records: readonly OffsetCubic[], ds: number): number | undefined {
  let found: OffsetCubic | undefined;
  for (const record of records) {
    if (record.sOffset > ds) break;
    found = record;
  }
  return found === undefined ? undefined : evalCubic(found.poly, ds - found.sOffset);
}

/** Lane width at section-relative `ds`; the center lane has none */
export function laneWidthAt(lane: Lane, ds: number): number | undefined {
  if (lane.id === 0) return 0;
  return recordValue(lane.widths, ds);
}

/**
 * Outer border `t` of every lane on one side at road coordinate `s`
 *
 * Widths take precedence over borders. Key 0 holds the lane offset so that
 * the inner border of lane `id` is always `map.get(id - sign(id))`.
 */
export function outerBorderTs(
  lanes: readonly Lane[],
  laneOffset: number,
  ds: number
): Map<number, number> {
  const widths = new Map<number, number>();
  const borders = new Map<number, number>();

  for (const lane of lanes) {
    if (lane.id === 0) continue;
    const width = recordValue(lane.widths, ds);
    if (width !== undefined) {
      widths.set(lane.id, width);
      continue;
    }
    const border = recordValue(lane.borders, ds);
    if (border !== undefined) borders.set(lane.id, border);
  }

  const result = new Map<number, number>([[0, laneOffset]]);

  if (widths.size === 0) {
    for (const [id, t] of borders) result.set(id, t);
    return result;
  }

  for (const id of widths.keys()) {
    const sign = id > 0 ? 1 : -1;
    let t = laneOffset;
    for (let i = sign; Math.abs(i) <= Math.abs(id); i += sign) {
      t += sign * (widths.get(i) ?? 0);
    }
    result.set(id, t);
  }
  return result;
}

/**
 * Outer border map for the side of `laneId`, evaluated at road `s`
 */
export function sideBorderTs(road: Road, section: LaneSection, laneId: number, s: number): Map<number, number> {
  const lanes = laneId >= 0 ? section.left : section.right;
  return outerBorderTs(lanes, laneOffsetAt(road, s), s - section.s);
}

/** Lateral position of the middle of a lane at road `s` */
export function laneMidT(road: Road, section: LaneSection, lane: Lane, s: number): number | undefined {
  if (lane.id === 0) return 0;
  const borders = sideBorderTs(road, section, lane.id, s);
  const outer = borders.get(lane.id);
  const inner = borders.get(lane.id - Math.sign(lane.id));
  if (outer === undefined || inner === undefined) return undefined;
  return (outer + inner) / 2;
}

/** World position of the middle of a lane at height zero */
export function laneMidpoint(road: Road, section: LaneSection, lane: Lane, s: number): Point3D | undefined {
  const t = laneMidT(road, section, lane, s);
  if (t === undefined) return undefined;
  return worldPoint(road, s, t, 0);
}

// ============================================================================
// Road linkage
// ============================================================================

export function roadBelongsToJunction(road: Road): boolean {
  return road.junction !== null && road.junction !== '-1';
}

/**
 * Direct road linkage, only when it names a road and a contact point
 */
export function roadLinkage(road: Road, tag: LinkageTag): RoadLinkage | undefined {
  const link = tag === 'predecessor' ? road.predecessor : road.successor;
  if (link === undefined || link.elementType !== 'road' || link.contactPoint === undefined) {
    return undefined;
  }
  return { roadId: link.elementId, contactPoint: link.contactPoint };
}

export function linkedJunctionId(road: Road, tag: LinkageTag): string | undefined {
  const link = tag === 'predecessor' ? road.predecessor : road.successor;
  return link?.elementType === 'junction' ? link.elementId : undefined;
}

/**
 * Section of the linked road that touches the linkage
 */
export function linkedContactSection(
  doc: OpenDriveDocument,
  linkage: RoadLinkage
): { readonly road: Road; readonly section: LaneSection; readonly tag: LinkageTag } | undefined {
  const road = doc.roads.get(linkage.roadId);
  if (road === undefined) return undefined;
  const section = contactSection(road, linkage.contactPoint);
  if (section === undefined) return undefined;
  return {
    road,
    section,
    tag: linkage.contactPoint === 'start' ? 'predecessor' : 'successor',
  };
}

// ============================================================================
// Junction connections
// ============================================================================

/**
 * Linkage of the connecting road towards the incoming road, chosen by the
 * connection's contact point
 */
export function connectingRoadLinkage(connectingRoad: Road, contact: ContactPoint): RoadLinkage | undefined {
  return roadLinkage(connectingRoad, contact === 'start' ? 'predecessor' : 'successor');
}

export interface ContactingSections {
  readonly incomingRoad: Road;
  readonly incoming: LaneSection;
  readonly connectingRoad: Road;
  readonly connecting: LaneSection;
  readonly incomingContact: ContactPoint;
  readonly connectingContact: ContactPoint;
}

/**
 * Sections of the incoming and connecting roads that meet in a connection
 */
export function incomingAndConnectingSections(
  doc: OpenDriveDocument,
  connection: Connection
): ContactingSections | undefined {
  if (
    connection.incomingRoad === undefined ||
    connection.connectingRoad === undefined ||
    connection.contactPoint === undefined
  ) {
    return undefined;
  }
  const incomingRoad = doc.roads.get(connection.incomingRoad);
  const connectingRoad = doc.roads.get(connection.connectingRoad);
  if (incomingRoad === undefined || connectingRoad === undefined) return undefined;

  const connecting = contactSection(connectingRoad, connection.contactPoint);
  const linkage = connectingRoadLinkage(connectingRoad, connection.contactPoint);
  if (connecting === undefined || linkage === undefined) return undefined;

  const incoming = contactSection(incomingRoad, linkage.contactPoint);
  if (incoming === undefined) return undefined;

  return {
    incomingRoad,
    incoming,
    connectingRoad,
    connecting,
    incomingContact: linkage.contactPoint,
    connectingContact: connection.contactPoint,
  };
}

/**
 * Connections of a junction whose incoming road is `roadId`, attached at the
 * given end of that road
 */
export function connectionsBetweenRoadAndJunction(
  doc: OpenDriveDocument,
  roadId: string,
  junctionId: string,
  roadContact: ContactPoint
): Connection[] {
  const junction = doc.junctions.get(junctionId);
  if (junction === undefined) return [];

  return junction.connections.filter((connection) => {
    if (connection.incomingRoad !== roadId || connection.connectingRoad === undefined) return false;
    if (connection.contactPoint === undefined) return false;
    const connectingRoad = doc.roads.get(connection.connectingRoad);
    if (connectingRoad === undefined) return false;
    return connectingRoadLinkage(connectingRoad, connection.contactPoint)?.contactPoint === roadContact;
  });
}

/**
 * Connections that use `roadId` as connecting road at the given end
 */
export function connectionsOfConnectingRoad(
  junction: Junction,
  roadId: string,
  contact: ContactPoint
): Connection[] {
  return junction.connections.filter(
    (connection) => connection.connectingRoad === roadId && connection.contactPoint === contact
  );
}
