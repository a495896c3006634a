/**
 * Shared constants for the OpenDRIVE quality checker
 *
 * @module core/constants
 */

/**
 * Numeric tolerances used throughout the checks.
 *
 * All values are provisional defaults; every one of them can be overridden
 * from the configuration file, the environment or the command line.
 */
export interface Tolerances {
  /** Zero tests on widths, coefficients and offsets */
  readonly floatEpsilon: number;
  /** Relative tolerance between integrated and declared lengths */
  readonly lengthMatch: number;
  /** Planar distance (m) below which two boundary points coincide */
  readonly contactGap: number;
  /** Per-axis distance (m) for road-to-road contact point comparison */
  readonly contactPoint: number;
  /** Sampling step (m) of lane outlines */
  readonly sampleStep: number;
}

export const DEFAULT_TOLERANCES: Tolerances = {
  floatEpsilon: 1e-6,
  lengthMatch: 1e-3,
  contactGap: 0.01,
  contactPoint: 1e-6,
  sampleStep: 0.5,
};

/** Slack accepted by the geometry evaluator at segment boundaries */
export const EVALUATION_SLACK = 1e-9;

/** Rule reported when the document model cannot be built */
export const DOCUMENT_RULE_UID = 'asam.net:xodr:1.0.0:xml.valid_schema';

/** Checker id stamped on the fatal document issue */
export const DOCUMENT_CHECKER_ID = 'document_model';

/** Upper bound of an xsd:unsignedShort */
export const MAX_UNSIGNED_SHORT = 65535;

/**
 * Lane types that carry traffic and therefore must not show horizontal
 * gaps at their contact points.
 */
export const DRIVABLE_LANE_TYPES: ReadonlySet<string> = new Set([
  'driving',
  'entry',
  'exit',
  'onRamp',
  'offRamp',
  'connectingRamp',
  'slipLane',
  'parking',
  'biking',
  'border',
  'stop',
  'restricted',
]);
