/**
 * xodr-qc - OpenDRIVE quality checks
 *
 * Geometry evaluation, coordinate transforms, lane topology and the
 * semantic/geometric rule checkers that run over an OpenDRIVE Document
 * Model.
 *
 * @packageDocumentation
 */

// Orchestration
export {
  runChecks,
  runCheckers,
  documentErrorResult,
  type RunResult,
  type RunOptions,
  type CheckerResult,
  type CheckerStatus,
  type SkipReason,
} from './orchestrator/run-checks.js';

// Checkers
export { CHECKERS, validateRegistry, type RegisteredChecker } from './checks/registry.js';
export { checkerIdForRule, defineChecker, BASIC_PRECONDITIONS } from './checks/issues.js';
export type {
  CheckContext,
  CheckerDescriptor,
  Finding,
  Issue,
  IssueLocation,
  Severity,
} from './checks/types.js';

// Document Model
export { buildDocument } from './model/builder.js';
export { DocumentTreeSchema, type DocumentTree, type DocumentTreeInput } from './model/schema.js';
export type * from './model/types.js';

// Geometry and transforms
export { evaluate, computeLength, referencePose, type Pose } from './geometry/evaluator.js';
export { integrate, type QuadratureOptions } from './geometry/quadrature.js';
export { roadToWorld, worldPoint, type Point3D, type WorldPose } from './transform/road-to-world.js';

// Topology
export { buildTopology, type LaneRef, type LaneTopology, type TravelDirection } from './topology/lane-topology.js';

// Versions
export { parseVersion, compareVersions, formatVersion, type Version } from './version/version.js';
export { parseVersionSpec, matchesSpec, isApplicable, canonicalSpec, type VersionSpec } from './version/version-spec.js';

// Ambient
export { DEFAULT_TOLERANCES, type Tolerances } from './core/constants.js';
export {
  DocumentBuildError,
  OutOfRangeError,
  VersionSpecError,
  RegistryError,
  ConfigError,
  type DocumentProblem,
} from './core/errors.js';
export { createLogger, silentLogger, type StructuredLogger } from './core/utils/logger.js';
