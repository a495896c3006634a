/**
 * road.geometry.elem_asc_order
 *
 * Plan-view geometries are declared in strictly ascending `s`, the first
 * one at 0, each one starting where the previous ends (in `s` and in
 * position), the last one ending at the road length.
 *
 * @module checks/geometry/elem-asc-order
 */

import { evaluate } from '../../geometry/evaluator.js';
import { defineChecker } from '../issues.js';
import type { CheckContext, Finding } from '../types.js';

function check({ document, tolerances }: CheckContext): Finding[] {
  const findings: Finding[] = [];

  for (const road of document.roads.values()) {
    const geometries = road.planView;
    const first = geometries[0];
    if (first === undefined) continue;

    if (Math.abs(first.s0) > tolerances.floatEpsilon) {
      findings.push({
        severity: 'error',
        message: 'The first <geometry> element shall start at s=0.',
        location: { roadId: road.id, s: first.s0 },
      });
    }

    geometries.forEach((seg, i) => {
      const next = geometries[i + 1];
      const end = seg.s0 + seg.length;

      if (next === undefined) {
        if (Math.abs(end - road.length) > tolerances.lengthMatch * road.length) {
          findings.push({
            severity: 'error',
            message: `The last <geometry> element ends at s=${end}, not at the road length ${road.length}.`,
            location: { roadId: road.id, s: seg.s0 },
          });
        }
        return;
      }

      if (next.s0 <= seg.s0) {
        findings.push({
          severity: 'error',
          message: '<geometry> elements shall be defined in ascending order along the road reference line according to the s-coordinate.',
          location: { roadId: road.id, s: next.s0, description: `s=${next.s0} follows s=${seg.s0}` },
        });
        return;
      }

      if (Math.abs(end - next.s0) > tolerances.lengthMatch * Math.max(seg.length, 1)) {
        findings.push({
          severity: 'error',
          message: `<geometry> at s=${seg.s0} ends at s=${end} but the next one starts at s=${next.s0}.`,
          location: { roadId: road.id, s: next.s0 },
        });
        return;
      }

      const p = evaluate(seg, end);
      const q = evaluate(next, next.s0);
      const gap = Math.hypot(p.x - q.x, p.y - q.y);
      if (gap > tolerances.contactGap) {
        findings.push({
          severity: 'error',
          message: `<geometry> at s=${seg.s0} does not end where the next one begins (gap ${gap.toFixed(4)} m).`,
          location: { roadId: road.id, s: next.s0 },
          point: { x: q.x, y: q.y, z: 0 },
        });
      }
    });
  }

  return findings;
}

export const elemAscOrder = defineChecker({
  ruleUid: 'asam.net:xodr:1.4.0:road.geometry.elem_asc_order',
  description: '<geometry> elements shall be defined in ascending order along the road reference line according to the s-coordinate.',
  check,
});
