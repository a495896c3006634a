/**
 * junctions.connection.start_along_linkage
 *
 * @module checks/semantic/start-along-linkage
 */

import { defineChecker } from '../issues.js';
import { checkContactLinkage } from './contact-linkage.js';

export const startAlongLinkage = defineChecker({
  ruleUid: 'asam.net:xodr:1.7.0:junctions.connection.start_along_linkage',
  description: "The value 'start' shall be used to indicate that the connecting road runs along the linkage.",
  check: (ctx) =>
    checkContactLinkage(
      ctx,
      'start',
      "The value 'start' shall be used to indicate that the connecting road runs along the linkage indicated in the element."
    ),
});
