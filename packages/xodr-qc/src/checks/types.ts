/**
 * Checker contract
 *
 * @module checks/types
 */

import type { Tolerances } from '../core/constants.js';
import type { StructuredLogger } from '../core/utils/logger.js';
import type { OpenDriveDocument } from '../model/types.js';
import type { LaneTopology } from '../topology/lane-topology.js';
import type { Point3D } from '../transform/road-to-world.js';

export type Severity = 'error' | 'warning' | 'information';

export interface IssueLocation {
  readonly roadId?: string;
  readonly junctionId?: string;
  readonly connectionId?: string;
  readonly s?: number;
  readonly laneId?: number;
  readonly description?: string;
}

/** What a checker reports; the orchestrator stamps checker and rule ids */
export interface Finding {
  readonly severity: Severity;
  readonly message: string;
  readonly location: IssueLocation;
  readonly related?: readonly IssueLocation[];
  /** Inertial (world) position of the problem */
  readonly point?: Point3D;
}

export interface Issue extends Finding {
  readonly checkerId: string;
  readonly ruleUid: string;
}

export interface CheckContext {
  readonly document: OpenDriveDocument;
  readonly topology: LaneTopology;
  readonly tolerances: Tolerances;
  readonly logger: StructuredLogger;
}

export interface CheckerDescriptor {
  readonly id: string;
  readonly description: string;
  readonly ruleUid: string;
  readonly preconditions: ReadonlySet<string>;
  /** Applicable-version specification, e.g. `<=1.7.0` */
  readonly applicableVersion?: string;
  /** Basic checkers run whatever the file version */
  readonly versionGated: boolean;
  check(ctx: CheckContext): Finding[];
}
