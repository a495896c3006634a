/**
 * Lane topology
 *
 * Directed multigraph over road ends: direct road-to-road links and junction
 * connections, each annotated with its contact point. Built once per run and
 * shared read-only by the checkers.
 *
 * @module topology/lane-topology
 */

import type { Connection, ContactPoint, LaneLink, OpenDriveDocument } from '../model/types.js';
import {
  contactSection,
  laneById,
  linkedContactSection,
  roadBelongsToJunction,
  roadLinkage,
  type LinkageTag,
} from '../model/queries.js';

// ============================================================================
// Types
// ============================================================================

/** Direct link declared on `fromRoad`, pointing at an end of `toRoad` */
export interface RoadEdge {
  readonly kind: 'road';
  readonly fromRoad: string;
  readonly tag: LinkageTag;
  readonly toRoad: string;
  readonly toContact: ContactPoint;
}

export interface ConnectionEdge {
  readonly kind: 'connection';
  readonly junctionId: string;
  readonly connection: Connection;
  readonly incomingRoad: string;
  readonly connectingRoad: string;
  readonly contactPoint?: ContactPoint;
  readonly laneLinks: readonly LaneLink[];
}

export type TopologyEdge = RoadEdge | ConnectionEdge;

export type TravelDirection = 'forward' | 'backward';

export interface LaneRef {
  readonly roadId: string;
  readonly sectionIndex: number;
  readonly laneId: number;
}

export interface LaneTopology {
  readonly edges: readonly TopologyEdge[];
  /** Direct links from non-junction roads targeting the given road end */
  endReferences(roadId: string, end: ContactPoint): readonly RoadEdge[];
  endDegree(roadId: string, end: ContactPoint): number;
  incomingConnections(roadId: string): readonly ConnectionEdge[];
  connectionsOfConnectingRoad(roadId: string): readonly ConnectionEdge[];
  /** Lanes reached from a lane across its section boundary */
  nextLanes(ref: LaneRef, direction: TravelDirection): LaneRef[];
  /** Whether `to` is among the lanes `from` links to in the given direction */
  isLaneReachable(from: LaneRef, to: LaneRef, direction: TravelDirection): boolean;
}

// ============================================================================
// Construction
// ============================================================================

function endKey(roadId: string, end: ContactPoint): string {
  return `${roadId}-${end}`;
}

function push<K, V>(map: Map<K, V[]>, key: K, value: V): void {
  const list = map.get(key);
  if (list === undefined) map.set(key, [value]);
  else list.push(value);
}

export function buildTopology(doc: OpenDriveDocument): LaneTopology {
  const edges: TopologyEdge[] = [];
  const byEnd = new Map<string, RoadEdge[]>();
  const byIncoming = new Map<string, ConnectionEdge[]>();
  const byConnecting = new Map<string, ConnectionEdge[]>();

  for (const road of doc.roads.values()) {
    for (const tag of ['predecessor', 'successor'] as const) {
      const linkage = roadLinkage(road, tag);
      if (linkage === undefined) continue;
      const edge: RoadEdge = {
        kind: 'road',
        fromRoad: road.id,
        tag,
        toRoad: linkage.roadId,
        toContact: linkage.contactPoint,
      };
      edges.push(edge);
      if (!roadBelongsToJunction(road)) {
        push(byEnd, endKey(edge.toRoad, edge.toContact), edge);
      }
    }
  }

  for (const junction of doc.junctions.values()) {
    for (const connection of junction.connections) {
      if (connection.incomingRoad === undefined || connection.connectingRoad === undefined) continue;
      const edge: ConnectionEdge = {
        kind: 'connection',
        junctionId: junction.id,
        connection,
        incomingRoad: connection.incomingRoad,
        connectingRoad: connection.connectingRoad,
        contactPoint: connection.contactPoint,
        laneLinks: connection.laneLinks,
      };
      edges.push(edge);
      push(byIncoming, edge.incomingRoad, edge);
      push(byConnecting, edge.connectingRoad, edge);
    }
  }

  const nextLanes = (ref: LaneRef, direction: TravelDirection): LaneRef[] => {
    const road = doc.roads.get(ref.roadId);
    const section = road?.laneSections[ref.sectionIndex];
    if (road === undefined || section === undefined) return [];
    const lane = laneById(section, ref.laneId);
    if (lane === undefined) return [];

    const tag: LinkageTag = direction === 'forward' ? 'successor' : 'predecessor';
    const ids = tag === 'successor' ? lane.successors : lane.predecessors;
    const neighbourIndex = ref.sectionIndex + (direction === 'forward' ? 1 : -1);
    const neighbour = road.laneSections[neighbourIndex];

    if (neighbour !== undefined) {
      return ids
        .filter((id) => laneById(neighbour, id) !== undefined)
        .map((id) => ({ roadId: road.id, sectionIndex: neighbourIndex, laneId: id }));
    }

    const reached: LaneRef[] = [];
    const linkage = roadLinkage(road, tag);
    if (linkage !== undefined) {
      const target = linkedContactSection(doc, linkage);
      if (target !== undefined) {
        for (const id of ids) {
          if (laneById(target.section, id) !== undefined) {
            reached.push({ roadId: target.road.id, sectionIndex: target.section.index, laneId: id });
          }
        }
      }
    }

    // Junction lane links leaving this road end
    const roadEnd: ContactPoint = direction === 'forward' ? 'end' : 'start';
    for (const edge of byIncoming.get(road.id) ?? []) {
      const connecting = doc.roads.get(edge.connectingRoad);
      if (connecting === undefined || edge.contactPoint === undefined) continue;
      const back = roadLinkage(connecting, edge.contactPoint === 'start' ? 'predecessor' : 'successor');
      if (back?.contactPoint !== roadEnd) continue;
      const target = contactSection(connecting, edge.contactPoint);
      if (target === undefined) continue;
      for (const link of edge.laneLinks) {
        if (link.from === ref.laneId && laneById(target, link.to) !== undefined) {
          reached.push({ roadId: connecting.id, sectionIndex: target.index, laneId: link.to });
        }
      }
    }

    return reached;
  };

  return {
    edges,
    endReferences: (roadId, end) => byEnd.get(endKey(roadId, end)) ?? [],
    endDegree: (roadId, end) => (byEnd.get(endKey(roadId, end)) ?? []).length,
    incomingConnections: (roadId) => byIncoming.get(roadId) ?? [],
    connectionsOfConnectingRoad: (roadId) => byConnecting.get(roadId) ?? [],
    nextLanes,
    isLaneReachable: (from, to, direction) =>
      nextLanes(from, direction).some(
        (ref) => ref.roadId === to.roadId && ref.sectionIndex === to.sectionIndex && ref.laneId === to.laneId
      ),
  };
}
