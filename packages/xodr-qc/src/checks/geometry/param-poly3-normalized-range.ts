/**
 * road.geometry.parampoly3.normalized_range
 *
 * @module checks/geometry/param-poly3-normalized-range
 */

import { defineChecker } from '../issues.js';
import { checkParamPoly3Lengths } from './param-poly3-length.js';

export const paramPoly3NormalizedRange = defineChecker({
  ruleUid: 'asam.net:xodr:1.7.0:road.geometry.parampoly3.normalized_range',
  description: "If @pRange='normalized', p shall be chosen in [0, 1].",
  check: (ctx) =>
    checkParamPoly3Lengths(ctx, {
      pRange: 'normalized',
      severity: 'error',
      message: 'Parameter range [0, 1] does not cover the curve length.',
    }),
});
