/**
 * Shared ParamPoly3 integral length comparison
 *
 * @module checks/geometry/param-poly3-length
 */

import { paramPoly3Length } from '../../geometry/evaluator.js';
import type { ParamRange } from '../../model/types.js';
import { worldPoint } from '../../transform/road-to-world.js';
import type { CheckContext, Finding, Severity } from '../types.js';

interface LengthRule {
  readonly pRange: ParamRange;
  readonly severity: Severity;
  readonly message: string;
}

/**
 * Whether an integrated length differs from the declared one by more than
 * the relative tolerance
 */
export function lengthMismatch(integral: number, declared: number, relativeTolerance: number): boolean {
  return Math.abs(integral - declared) > relativeTolerance * declared;
}

export function checkParamPoly3Lengths(ctx: CheckContext, rule: LengthRule): Finding[] {
  const findings: Finding[] = [];

  for (const road of ctx.document.roads.values()) {
    for (const seg of road.planView) {
      if (seg.kind !== 'paramPoly3' || seg.pRange !== rule.pRange) continue;

      const pMax = seg.pRange === 'arcLength' ? seg.length : 1;
      const integral = paramPoly3Length(seg, pMax);
      if (!lengthMismatch(integral, seg.length, ctx.tolerances.lengthMatch)) continue;

      findings.push({
        severity: rule.severity,
        message: `${rule.message} Integrated length ${integral.toFixed(6)}, declared ${seg.length}.`,
        location: { roadId: road.id, s: seg.s0, description: 'Geometry where length does not match.' },
        point: worldPoint(road, seg.s0 + seg.length / 2),
      });
    }
  }

  return findings;
}
