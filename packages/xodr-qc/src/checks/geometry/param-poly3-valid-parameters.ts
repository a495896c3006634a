/**
 * road.geometry.paramPoly3.valid_parameters
 *
 * The local u/v frame must start at the geometry's origin, aligned with its
 * heading: aU = aV = bV = 0 and bU > 0.
 *
 * @module checks/geometry/param-poly3-valid-parameters
 */

import { defineChecker } from '../issues.js';
import type { CheckContext, Finding } from '../types.js';

function check({ document, tolerances }: CheckContext): Finding[] {
  const eps = tolerances.floatEpsilon;
  const findings: Finding[] = [];

  for (const road of document.roads.values()) {
    for (const seg of road.planView) {
      if (seg.kind !== 'paramPoly3') continue;
      const valid =
        Math.abs(seg.u.a) <= eps && Math.abs(seg.v.a) <= eps && Math.abs(seg.v.b) <= eps && seg.u.b > eps;
      if (valid) continue;

      findings.push({
        severity: 'error',
        message: 'ParamPoly3 coefficients must satisfy @aU=@aV=@bV=0 and @bU>0.',
        location: {
          roadId: road.id,
          s: seg.s0,
          description: `aU=${seg.u.a} aV=${seg.v.a} bV=${seg.v.b} bU=${seg.u.b}`,
        },
      });
    }
  }

  return findings;
}

export const paramPoly3ValidParameters = defineChecker({
  ruleUid: 'asam.net:xodr:1.7.0:road.geometry.paramPoly3.valid_parameters',
  description: 'The local u/v coordinate system should be aligned with the s/t coordinate system of the start point.',
  check,
});
