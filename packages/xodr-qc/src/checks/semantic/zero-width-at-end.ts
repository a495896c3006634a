/**
 * road.lane.link.zero_width_at_end
 *
 * @module checks/semantic/zero-width-at-end
 */

import { defineChecker } from '../issues.js';
import { checkZeroWidthLinks } from './zero-width-link.js';

export const zeroWidthAtEnd = defineChecker({
  ruleUid: 'asam.net:xodr:1.7.0:road.lane.link.zero_width_at_end',
  description: 'Lanes that have a width of zero at the end of the lane section shall have no successor element.',
  check: (ctx) =>
    checkZeroWidthLinks(ctx, {
      tag: 'successor',
      end: 'end',
      message: 'Lanes that have a width of zero at the end of the lane section shall have no successor element.',
    }),
});
