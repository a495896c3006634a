/**
 * junctions.connection.end_opposite_linkage
 *
 * @module checks/semantic/end-opposite-linkage
 */

import { defineChecker } from '../issues.js';
import { checkContactLinkage } from './contact-linkage.js';

export const endOppositeLinkage = defineChecker({
  ruleUid: 'asam.net:xodr:1.7.0:junctions.connection.end_opposite_linkage',
  description: "The value 'end' shall be used to indicate that the connecting road runs opposite to the linkage.",
  check: (ctx) =>
    checkContactLinkage(
      ctx,
      'end',
      "The value 'end' shall be used to indicate that the connecting road runs along the opposite direction of the linkage indicated in the element."
    ),
});
