/**
 * The header declares revMajor and revMinor as unsigned shorts
 *
 * @module checks/basic/version-is-defined
 */

import { toUnsignedShort } from '../../version/version.js';
import { FILEHEADER_CHECKER_ID, defineChecker } from '../issues.js';
import type { Finding } from '../types.js';

export const versionIsDefined = defineChecker({
  ruleUid: 'asam.net:xodr:1.0.0:xml.version_is_defined',
  description: 'The header declares revMajor and revMinor as unsigned short values.',
  preconditions: new Set([FILEHEADER_CHECKER_ID]),
  versionGated: false,
  check: ({ document }): Finding[] => {
    const header = document.header;
    if (header === null) return [];

    const findings: Finding[] = [];
    for (const key of ['revMajor', 'revMinor'] as const) {
      const raw = header[key];
      if (raw === undefined) {
        findings.push({
          severity: 'error',
          message: `Header attribute ${key} is not defined.`,
          location: { description: key },
        });
      } else if (toUnsignedShort(raw) === undefined) {
        findings.push({
          severity: 'error',
          message: `Header attribute ${key}="${raw}" is not an unsigned short.`,
          location: { description: key },
        });
      }
    }
    return findings;
  },
});
