/**
 * junctions.connection.one_connection_element
 *
 * Up to and including 1.7.0 each connecting road is represented by exactly
 * one connection element.
 *
 * @module checks/semantic/one-connection-element
 */

import { worldPoint } from '../../transform/road-to-world.js';
import { defineChecker } from '../issues.js';
import type { CheckContext, Finding } from '../types.js';

function check({ document, topology }: CheckContext): Finding[] {
  const findings: Finding[] = [];
  const seen = new Set<string>();

  for (const edge of topology.edges) {
    if (edge.kind !== 'connection' || seen.has(edge.connectingRoad)) continue;
    seen.add(edge.connectingRoad);

    const uses = topology.connectionsOfConnectingRoad(edge.connectingRoad);
    if (uses.length <= 1) continue;

    const road = document.roads.get(edge.connectingRoad);
    findings.push({
      severity: 'error',
      message: `Connecting road ${edge.connectingRoad} shall be represented by only one <connection> element.`,
      location: { roadId: edge.connectingRoad, description: 'Connecting road being reused.' },
      related: uses.map((use) => ({
        junctionId: use.junctionId,
        connectionId: use.connection.id,
        description: 'Connection with reused connecting road id.',
      })),
      point: road === undefined ? undefined : worldPoint(road, road.length / 2),
    });
  }

  return findings;
}

export const oneConnectionElement = defineChecker({
  ruleUid: 'asam.net:xodr:1.7.0:junctions.connection.one_connection_element',
  description: 'Each connecting road shall be represented by exactly one connection element.',
  applicableVersion: '<=1.7.0',
  check,
});
