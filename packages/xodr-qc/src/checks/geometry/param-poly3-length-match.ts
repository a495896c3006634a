/**
 * road.geometry.parampoly3.length_match
 *
 * @module checks/geometry/param-poly3-length-match
 */

import { defineChecker } from '../issues.js';
import { checkParamPoly3Lengths } from './param-poly3-length.js';

export const paramPoly3LengthMatch = defineChecker({
  ruleUid: 'asam.net:xodr:1.7.0:road.geometry.parampoly3.length_match',
  description: "The actual curve length, as determined by numerical integration over the parameter range, should match '@length'.",
  check: (ctx) =>
    checkParamPoly3Lengths(ctx, {
      pRange: 'normalized',
      severity: 'warning',
      message: 'Length does not match the actual curve length.',
    }),
});
