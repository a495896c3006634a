/**
 * junctions.connection.one_link_to_incoming
 *
 * Each connecting road is associated with at most one connection per
 * incoming road, and its lane links only follow the driving direction.
 *
 * @module checks/semantic/one-link-to-incoming
 */

import { incomingAndConnectingSections, laneById, laneMidpoint } from '../../model/queries.js';
import type { Connection, ContactPoint, Lane, TrafficRule } from '../../model/types.js';
import type { ConnectionEdge } from '../../topology/lane-topology.js';
import { worldPoint } from '../../transform/road-to-world.js';
import { defineChecker, laneLocation } from '../issues.js';
import type { CheckContext, Finding } from '../types.js';

interface LinkEnd {
  readonly lane: Lane;
  readonly rule: TrafficRule;
  readonly contact: ContactPoint;
}

function signedId(lane: Lane): number {
  return lane.direction === 'reversed' ? -lane.id : lane.id;
}

type Side = 'left' | 'right';

interface SideRule {
  /** Side of the connecting lane closed to an incoming lane driven both ways */
  readonly fromBoth: Side;
  /** Closed sides of both lanes, keyed by the incoming road's contact point */
  readonly linked: Readonly<Record<ContactPoint, { readonly from: Side; readonly to: Side }>>;
}

/**
 * Closed lane sides keyed by `connecting rule:incoming rule`, then by the
 * connection's contact point on the connecting road
 */
const CLOSED_SIDES: Readonly<Record<`${TrafficRule}:${TrafficRule}`, Readonly<Record<ContactPoint, SideRule>>>> = {
  'RHT:RHT': {
    start: { fromBoth: 'right', linked: { end: { from: 'left', to: 'left' }, start: { from: 'right', to: 'left' } } },
    end: { fromBoth: 'left', linked: { end: { from: 'left', to: 'right' }, start: { from: 'right', to: 'right' } } },
  },
  'LHT:LHT': {
    start: { fromBoth: 'right', linked: { end: { from: 'right', to: 'right' }, start: { from: 'left', to: 'right' } } },
    end: { fromBoth: 'left', linked: { end: { from: 'right', to: 'left' }, start: { from: 'left', to: 'left' } } },
  },
  'RHT:LHT': {
    start: { fromBoth: 'left', linked: { end: { from: 'right', to: 'left' }, start: { from: 'left', to: 'left' } } },
    end: { fromBoth: 'right', linked: { end: { from: 'right', to: 'right' }, start: { from: 'left', to: 'right' } } },
  },
  'LHT:RHT': {
    start: { fromBoth: 'right', linked: { end: { from: 'left', to: 'right' }, start: { from: 'right', to: 'right' } } },
    end: { fromBoth: 'left', linked: { end: { from: 'left', to: 'left' }, start: { from: 'right', to: 'left' } } },
  },
};

function onSide(id: number, side: Side): boolean {
  return side === 'left' ? id > 0 : id < 0;
}

/**
 * Whether a lane link runs with the traffic of both roads
 *
 * `from` is the incoming lane, with the contact point of the incoming road as
 * referenced by the connecting road. `to` is the connecting lane, with the
 * connection's contact point. Reversed lanes count as lanes of the opposite
 * side; a lane driven both ways only opens its own side.
 */
export function isLaneLinkDirectionValid(from: LinkEnd, to: LinkEnd): boolean {
  const fromBoth = from.lane.direction === 'both';
  if (fromBoth && to.lane.direction === 'both') return true;

  const rule = CLOSED_SIDES[`${to.rule}:${from.rule}`][to.contact];
  const toId = signedId(to.lane);
  if (fromBoth) return !onSide(toId, rule.fromBoth);

  const closed = rule.linked[from.contact];
  return !onSide(signedId(from.lane), closed.from) && !onSide(toId, closed.to);
}

function checkConnection(ctx: CheckContext, junctionId: string, connection: Connection, findings: Finding[]): void {
  const sections = incomingAndConnectingSections(ctx.document, connection);
  if (sections === undefined) return;

  const fromSeen = new Set<number>();

  for (const link of connection.laneLinks) {
    if (fromSeen.has(link.from)) {
      findings.push({
        severity: 'error',
        message: `Incoming lane ${link.from} has more than one <laneLink> in the same connection.`,
        location: { junctionId, connectionId: connection.id, laneId: link.from },
      });
    }
    fromSeen.add(link.from);

    const fromLane = laneById(sections.incoming, link.from);
    const toLane = laneById(sections.connecting, link.to);
    if (fromLane === undefined || toLane === undefined) continue;

    const valid = isLaneLinkDirectionValid(
      { lane: fromLane, rule: sections.incomingRoad.rule, contact: sections.incomingContact },
      { lane: toLane, rule: sections.connectingRoad.rule, contact: sections.connectingContact }
    );
    if (valid) continue;

    const s = sections.connectingContact === 'start' ? 0 : sections.connectingRoad.length;
    findings.push({
      severity: 'error',
      message: 'A connecting road shall only have the <laneLink> element for that direction.',
      location: {
        ...laneLocation(sections.connectingRoad.id, sections.connecting.s, toLane.id, 'Lane link in opposite direction.'),
        junctionId,
        connectionId: connection.id,
      },
      related: [laneLocation(sections.incomingRoad.id, sections.incoming.s, fromLane.id)],
      point: laneMidpoint(sections.connectingRoad, sections.connecting, toLane, s),
    });
  }
}

function check(ctx: CheckContext): Finding[] {
  const findings: Finding[] = [];
  const incomingRoads = new Set<string>();

  for (const edge of ctx.topology.edges) {
    if (edge.kind !== 'connection') continue;
    incomingRoads.add(edge.incomingRoad);
    checkConnection(ctx, edge.junctionId, edge.connection, findings);
  }

  for (const incoming of incomingRoads) {
    const byConnecting = new Map<string, ConnectionEdge[]>();
    for (const edge of ctx.topology.incomingConnections(incoming)) {
      byConnecting.set(edge.connectingRoad, [...(byConnecting.get(edge.connectingRoad) ?? []), edge]);
    }

    for (const [connecting, edges] of byConnecting) {
      if (edges.length <= 1) continue;
      const road = ctx.document.roads.get(connecting);
      const atStart = edges.some((edge) => edge.contactPoint === 'start');
      findings.push({
        severity: 'error',
        message: `Connecting road ${connecting} shall be represented by at most one <connection> element per incoming road id.`,
        location: { roadId: connecting, description: `Reused (incoming, connecting) pair (${incoming}, ${connecting})` },
        related: edges.map((edge) => ({ junctionId: edge.junctionId, connectionId: edge.connection.id })),
        point: road === undefined ? undefined : worldPoint(road, atStart ? 0 : road.length),
      });
    }
  }

  return findings;
}

export const oneLinkToIncoming = defineChecker({
  ruleUid: 'asam.net:xodr:1.8.0:junctions.connection.one_link_to_incoming',
  description: 'Each connecting road shall be associated with at most one connection element per incoming road.',
  check,
});
