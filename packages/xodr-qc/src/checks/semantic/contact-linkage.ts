/**
 * Shared logic of the connection contact-point direction rules
 *
 * @module checks/semantic/contact-linkage
 */

import { roadLinkage } from '../../model/queries.js';
import type { ContactPoint } from '../../model/types.js';
import type { CheckContext, Finding } from '../types.js';

/**
 * Connections with the given contact point whose connecting road does not
 * link back to the incoming road through the expected linkage
 */
export function checkContactLinkage(ctx: CheckContext, contact: ContactPoint, message: string): Finding[] {
  const findings: Finding[] = [];
  const tag = contact === 'start' ? 'predecessor' : 'successor';

  for (const junction of ctx.document.junctions.values()) {
    for (const connection of junction.connections) {
      if (connection.contactPoint !== contact) continue;
      if (connection.connectingRoad === undefined || connection.incomingRoad === undefined) continue;
      const connecting = ctx.document.roads.get(connection.connectingRoad);
      if (connecting === undefined) continue;
      const linkage = roadLinkage(connecting, tag);
      if (linkage === undefined || linkage.roadId === connection.incomingRoad) continue;

      findings.push({
        severity: 'error',
        message,
        location: {
          junctionId: junction.id,
          connectionId: connection.id,
          description: `Contact point '${contact}' not used on ${tag} road connection.`,
        },
        related: [{ roadId: connecting.id, description: `${tag} is road ${linkage.roadId}` }],
      });
    }
  }

  return findings;
}
