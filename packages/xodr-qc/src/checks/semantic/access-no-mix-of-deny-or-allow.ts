/**
 * road.lane.access.no_mix_of_deny_or_allow
 *
 * @module checks/semantic/access-no-mix-of-deny-or-allow
 */

import { laneMidpoint, sideLanes } from '../../model/queries.js';
import type { AccessRule } from '../../model/types.js';
import { defineChecker, laneLocation } from '../issues.js';
import type { CheckContext, Finding } from '../types.js';

function check({ document, tolerances }: CheckContext): Finding[] {
  const findings: Finding[] = [];

  for (const road of document.roads.values()) {
    for (const section of road.laneSections) {
      for (const lane of sideLanes(section)) {
        const seen: { sOffset: number; rule: AccessRule }[] = [];

        for (const access of lane.access) {
          const rule = access.rule;
          if (rule === undefined) continue;

          for (const earlier of seen) {
            if (Math.abs(earlier.sOffset - access.sOffset) > tolerances.floatEpsilon || earlier.rule === rule) {
              continue;
            }
            const s = section.s + access.sOffset;
            findings.push({
              severity: 'error',
              message: 'At a given s-position, either only deny or only allow values shall be given, not mixed.',
              location: laneLocation(road.id, s, lane.id, `First encounter of ${rule} having ${earlier.rule} before.`),
              point: laneMidpoint(road, section, lane, s + (section.length - access.sOffset) / 2),
            });
          }

          seen.push({ sOffset: access.sOffset, rule });
        }
      }
    }
  }

  return findings;
}

export const accessNoMixOfDenyOrAllow = defineChecker({
  ruleUid: 'asam.net:xodr:1.7.0:road.lane.access.no_mix_of_deny_or_allow',
  description: 'Check that deny and allow access rules are not mixed at the same s-position.',
  check,
});
