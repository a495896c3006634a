/**
 * road.linkage.is_junction_needed
 *
 * A road end referenced by more than one direct road link is ambiguous and
 * needs a junction.
 *
 * @module checks/semantic/is-junction-needed
 */

import { worldPoint } from '../../transform/road-to-world.js';
import { defineChecker } from '../issues.js';
import type { CheckContext, Finding } from '../types.js';

function check({ document, topology }: CheckContext): Finding[] {
  if (document.roads.size < 2) return [];

  const findings: Finding[] = [];

  for (const road of document.roads.values()) {
    for (const end of ['start', 'end'] as const) {
      if (topology.endDegree(road.id, end) <= 1) continue;

      const s = end === 'start' ? 0 : road.length;
      findings.push({
        severity: 'error',
        message: 'Road linkage is ambiguous: more than one road is linked to the same road end, a junction is needed.',
        location: { roadId: road.id, s, description: `Road ${road.id} ${end} is linked by more than one road` },
        related: topology.endReferences(road.id, end).map((edge) => ({
          roadId: edge.fromRoad,
          description: `${edge.tag} of road ${edge.fromRoad}`,
        })),
        point: worldPoint(road, s),
      });
    }
  }

  return findings;
}

export const isJunctionNeeded = defineChecker({
  ruleUid: 'asam.net:xodr:1.4.0:road.linkage.is_junction_needed',
  description: 'Two roads shall only be linked directly if the linkage is unambiguous.',
  check,
});
