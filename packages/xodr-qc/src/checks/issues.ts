/**
 * Helpers for building checker descriptors and findings
 *
 * @module checks/issues
 */

import { ruleFullName } from '../version/version.js';
import type { CheckContext, CheckerDescriptor, Finding, IssueLocation } from './types.js';

export const FILEHEADER_CHECKER_ID = 'check_asam_xodr_xml_fileheader_is_present';
export const VERSION_CHECKER_ID = 'check_asam_xodr_xml_version_is_defined';

/** Preconditions shared by every non-basic checker */
export const BASIC_PRECONDITIONS: ReadonlySet<string> = new Set([
  FILEHEADER_CHECKER_ID,
  VERSION_CHECKER_ID,
]);

/**
 * Checker id derived from its rule: `check_asam_xodr_` + rule name with dots
 * replaced by underscores
 */
export function checkerIdForRule(ruleUid: string): string {
  return `check_asam_xodr_${ruleFullName(ruleUid).replace(/\./g, '_')}`;
}

export interface DefineCheckerOptions {
  readonly ruleUid: string;
  readonly description: string;
  readonly preconditions?: ReadonlySet<string>;
  readonly applicableVersion?: string;
  readonly versionGated?: boolean;
  readonly check: (ctx: CheckContext) => Finding[];
}

export function defineChecker(options: DefineCheckerOptions): CheckerDescriptor {
  return {
    id: checkerIdForRule(options.ruleUid),
    description: options.description,
    ruleUid: options.ruleUid,
    preconditions: options.preconditions ?? BASIC_PRECONDITIONS,
    applicableVersion: options.applicableVersion,
    versionGated: options.versionGated ?? true,
    check: options.check,
  };
}

/**
 * Location of a lane at the start of its section
 */
export function laneLocation(
  roadId: string,
  sectionS: number,
  laneId: number,
  description?: string
): IssueLocation {
  return { roadId, s: sectionS, laneId, description };
}

export function laneKey(roadId: string, sectionIndex: number, laneId: number): string {
  return `${roadId}/${sectionIndex}/${laneId}`;
}
