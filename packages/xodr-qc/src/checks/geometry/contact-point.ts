/**
 * road.geometry.contact_point
 *
 * Two roads linked without a junction meet at the declared contact point.
 *
 * @module checks/geometry/contact-point
 */

import { roadBelongsToJunction } from '../../model/queries.js';
import { worldPoint, type Point3D } from '../../transform/road-to-world.js';
import { defineChecker } from '../issues.js';
import type { CheckContext, Finding } from '../types.js';

function differs(p: Point3D, q: Point3D, tolerance: number): boolean {
  return Math.abs(p.x - q.x) > tolerance || Math.abs(p.y - q.y) > tolerance || Math.abs(p.z - q.z) > tolerance;
}

function check({ document, tolerances }: CheckContext): Finding[] {
  const findings: Finding[] = [];

  for (const road of document.roads.values()) {
    if (roadBelongsToJunction(road)) continue;

    for (const tag of ['predecessor', 'successor'] as const) {
      const link = tag === 'predecessor' ? road.predecessor : road.successor;
      if (link === undefined || link.elementType !== 'road' || link.contactPoint === undefined) continue;
      const other = document.roads.get(link.elementId);
      if (other === undefined) continue;

      const s = tag === 'predecessor' ? 0 : road.length;
      const own = worldPoint(road, s);
      const contact = worldPoint(other, link.contactPoint === 'start' ? 0 : other.length);
      if (own === undefined || contact === undefined) continue;
      if (!differs(own, contact, tolerances.contactPoint)) continue;

      findings.push({
        severity: 'error',
        message: `The road reference line does not meet the contact point '${link.contactPoint}' of its ${tag} road ${other.id}.`,
        location: { roadId: road.id, s },
        related: [{ roadId: other.id, s: link.contactPoint === 'start' ? 0 : other.length }],
        point: contact,
      });
    }
  }

  return findings;
}

export const contactPoint = defineChecker({
  ruleUid: 'asam.net:xodr:1.7.0:road.geometry.contact_point',
  description: 'Roads connected without a junction shall begin at the contact point of their predecessor or successor.',
  check,
});
