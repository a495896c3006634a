/**
 * road.geometry.parampoly3.arclength_range
 *
 * @module checks/geometry/param-poly3-arclength-range
 */

import { defineChecker } from '../issues.js';
import { checkParamPoly3Lengths } from './param-poly3-length.js';

export const paramPoly3ArclengthRange = defineChecker({
  ruleUid: 'asam.net:xodr:1.7.0:road.geometry.parampoly3.arclength_range',
  description: "If @pRange='arcLength', p shall be chosen in [0, @length].",
  check: (ctx) =>
    checkParamPoly3Lengths(ctx, {
      pRange: 'arcLength',
      severity: 'error',
      message: 'Parameter range [0, @length] does not cover the curve length.',
    }),
});
