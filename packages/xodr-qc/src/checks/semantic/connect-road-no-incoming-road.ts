/**
 * junctions.connection.connect_road_no_incoming_road
 *
 * @module checks/semantic/connect-road-no-incoming-road
 */

import { linkedJunctionId, roadBelongsToJunction } from '../../model/queries.js';
import { worldPoint } from '../../transform/road-to-world.js';
import { defineChecker } from '../issues.js';
import type { CheckContext, Finding } from '../types.js';

function check({ document }: CheckContext): Finding[] {
  const findings: Finding[] = [];

  for (const junction of document.junctions.values()) {
    for (const connection of junction.connections) {
      if (connection.incomingRoad === undefined) continue;
      const incoming = document.roads.get(connection.incomingRoad);
      if (incoming === undefined || !roadBelongsToJunction(incoming)) continue;

      let s = incoming.length / 2;
      if (linkedJunctionId(incoming, 'successor') === junction.id) s = incoming.length;
      else if (linkedJunctionId(incoming, 'predecessor') === junction.id) s = 0;

      findings.push({
        severity: 'error',
        message: 'Connecting roads shall not be incoming roads.',
        location: {
          junctionId: junction.id,
          connectionId: connection.id,
          description: 'Connection with connecting road found as incoming road.',
        },
        related: [{ roadId: incoming.id, s }],
        point: worldPoint(incoming, s),
      });
    }
  }

  return findings;
}

export const connectRoadNoIncomingRoad = defineChecker({
  ruleUid: 'asam.net:xodr:1.4.0:junctions.connection.connect_road_no_incoming_road',
  description: 'Connecting roads shall not be incoming roads.',
  check,
});
