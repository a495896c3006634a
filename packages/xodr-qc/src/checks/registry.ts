/**
 * Checker registry
 *
 * Static, ordered list of every checker. Declaration order is the execution
 * order and the order of the reported issues.
 *
 * @module checks/registry
 */

import { RegistryError } from '../core/errors.js';
import { ruleDefinitionVersion, type Version } from '../version/version.js';
import { parseVersionSpec, type VersionSpec } from '../version/version-spec.js';
import { fileheaderIsPresent } from './basic/fileheader-is-present.js';
import { versionIsDefined } from './basic/version-is-defined.js';
import { borderOverlapWithInnerLanes } from './geometry/border-overlap-with-inner-lanes.js';
import { contactPoint } from './geometry/contact-point.js';
import { elemAscOrder } from './geometry/elem-asc-order.js';
import { paramPoly3ArclengthRange } from './geometry/param-poly3-arclength-range.js';
import { paramPoly3LengthMatch } from './geometry/param-poly3-length-match.js';
import { paramPoly3NormalizedRange } from './geometry/param-poly3-normalized-range.js';
import { paramPoly3ValidParameters } from './geometry/param-poly3-valid-parameters.js';
import { avoidRedundantInfo } from './performance/avoid-redundant-info.js';
import { accessNoMixOfDenyOrAllow } from './semantic/access-no-mix-of-deny-or-allow.js';
import { connectRoadNoIncomingRoad } from './semantic/connect-road-no-incoming-road.js';
import { endOppositeLinkage } from './semantic/end-opposite-linkage.js';
import { isJunctionNeeded } from './semantic/is-junction-needed.js';
import { lanesAcrossLaneSections } from './semantic/lanes-across-lane-sections.js';
import { levelTrueOneSide } from './semantic/level-true-one-side.js';
import { newLaneAppear } from './semantic/new-lane-appear.js';
import { oneConnectionElement } from './semantic/one-connection-element.js';
import { oneLinkToIncoming } from './semantic/one-link-to-incoming.js';
import { startAlongLinkage } from './semantic/start-along-linkage.js';
import { zeroWidthAtEnd } from './semantic/zero-width-at-end.js';
import { zeroWidthAtStart } from './semantic/zero-width-at-start.js';
import { noHorizontalGaps } from './smoothness/no-horizontal-gaps.js';
import type { CheckerDescriptor } from './types.js';

export const CHECKERS: readonly CheckerDescriptor[] = [
  fileheaderIsPresent,
  versionIsDefined,
  levelTrueOneSide,
  accessNoMixOfDenyOrAllow,
  lanesAcrossLaneSections,
  isJunctionNeeded,
  zeroWidthAtStart,
  zeroWidthAtEnd,
  newLaneAppear,
  connectRoadNoIncomingRoad,
  oneConnectionElement,
  oneLinkToIncoming,
  startAlongLinkage,
  endOppositeLinkage,
  elemAscOrder,
  contactPoint,
  paramPoly3LengthMatch,
  borderOverlapWithInnerLanes,
  paramPoly3ArclengthRange,
  paramPoly3NormalizedRange,
  paramPoly3ValidParameters,
  avoidRedundantInfo,
  noHorizontalGaps,
];

/**
 * A checker with its version data parsed once
 */
export interface RegisteredChecker {
  readonly descriptor: CheckerDescriptor;
  readonly definitionVersion: Version;
  readonly spec?: VersionSpec;
}

/**
 * Validate a checker list and resolve its version data
 *
 * @throws RegistryError for duplicate ids or unknown/forward preconditions
 * @throws VersionSpecError for unparsable rule UIDs or applicable versions
 */
export function validateRegistry(checkers: readonly CheckerDescriptor[] = CHECKERS): RegisteredChecker[] {
  const seen = new Set<string>();

  return checkers.map((descriptor) => {
    if (seen.has(descriptor.id)) {
      throw new RegistryError('Duplicate checker id', descriptor.id);
    }
    for (const precondition of descriptor.preconditions) {
      if (!seen.has(precondition)) {
        throw new RegistryError(`Precondition '${precondition}' is not declared before the checker`, descriptor.id);
      }
    }
    seen.add(descriptor.id);

    return {
      descriptor,
      definitionVersion: ruleDefinitionVersion(descriptor.ruleUid),
      spec: descriptor.applicableVersion === undefined ? undefined : parseVersionSpec(descriptor.applicableVersion),
    };
  });
}
