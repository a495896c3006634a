/**
 * road.lane.link.zero_width_at_start
 *
 * @module checks/semantic/zero-width-at-start
 */

import { defineChecker } from '../issues.js';
import { checkZeroWidthLinks } from './zero-width-link.js';

export const zeroWidthAtStart = defineChecker({
  ruleUid: 'asam.net:xodr:1.7.0:road.lane.link.zero_width_at_start',
  description: 'Lanes that have a width of zero at the beginning of the lane section shall have no predecessor element.',
  check: (ctx) =>
    checkZeroWidthLinks(ctx, {
      tag: 'predecessor',
      end: 'start',
      message: 'Lanes that have a width of zero at the beginning of the lane section shall have no predecessor element.',
    }),
});
