/**
 * The document declares a file header
 *
 * @module checks/basic/fileheader-is-present
 */

import { defineChecker } from '../issues.js';
import type { Finding } from '../types.js';

export const fileheaderIsPresent = defineChecker({
  ruleUid: 'asam.net:xodr:1.0.0:xml.fileheader_is_present',
  description: 'Root element contains exactly one header element.',
  preconditions: new Set(),
  versionGated: false,
  check: ({ document }): Finding[] => {
    if (document.header !== null) return [];
    return [
      {
        severity: 'error',
        message: 'The document has no header.',
        location: { description: 'Missing header' },
      },
    ];
  },
});
