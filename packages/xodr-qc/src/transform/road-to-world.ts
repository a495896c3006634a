/**
 * Road-local to world coordinate transform
 *
 * Composes the reference-line pose with elevation, pitch and superelevation.
 * Rotation order is yaw, then pitch, then roll, applied to the local offset
 * `(0, t, h)`.
 *
 * @module transform/road-to-world
 */

import { referencePose } from '../geometry/evaluator.js';
import { derivCubic, evalCubic } from '../geometry/polynomial.js';
import type { OffsetCubic, Road } from '../model/types.js';

export interface Point3D {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

export interface WorldPose extends Point3D {
  readonly heading: number;
  readonly pitch: number;
  readonly roll: number;
}

// ============================================================================
// Profile records
// ============================================================================

/**
 * Last record whose offset does not exceed `s`
 */
export function recordAt(records: readonly OffsetCubic[], s: number): OffsetCubic | undefined {
  let found: OffsetCubic | undefined;
  for (const record of records) {
    if (record.sOffset <= s) found = record;
    else break;
  }
  return found;
}

/** Profile value at `s`; zero before the first record */
export function profileValue(records: readonly OffsetCubic[], s: number): number {
  const record = recordAt(records, s);
  return record === undefined ? 0 : evalCubic(record.poly, s - record.sOffset);
}

export function profileSlope(records: readonly OffsetCubic[], s: number): number {
  const record = recordAt(records, s);
  return record === undefined ? 0 : derivCubic(record.poly, s - record.sOffset);
}

export function elevationAt(road: Road, s: number): number {
  return profileValue(road.elevations, s);
}

export function laneOffsetAt(road: Road, s: number): number {
  return profileValue(road.laneOffsets, s);
}

// ============================================================================
// Transform
// ============================================================================

/**
 * World pose of the road-local point `(s, t, h)`
 *
 * Returns undefined only for a road without geometry.
 */
export function roadToWorld(road: Road, s: number, t: number, h = 0): WorldPose | undefined {
  const ref = referencePose(road, s);
  if (ref === undefined) return undefined;

  const yaw = ref.heading;
  const pitch = -Math.atan(profileSlope(road.elevations, s));
  const roll = profileValue(road.superelevations, s);

  // Rx(roll) * (0, t, h)
  const y1 = t * Math.cos(roll) - h * Math.sin(roll);
  const z1 = t * Math.sin(roll) + h * Math.cos(roll);
  // Ry(pitch)
  const x2 = z1 * Math.sin(pitch);
  const z2 = z1 * Math.cos(pitch);
  // Rz(yaw)
  const dx = x2 * Math.cos(yaw) - y1 * Math.sin(yaw);
  const dy = x2 * Math.sin(yaw) + y1 * Math.cos(yaw);

  return {
    x: ref.x + dx,
    y: ref.y + dy,
    z: elevationAt(road, s) + z2,
    heading: yaw,
    pitch,
    roll,
  };
}

export function distance2D(p: Point3D, q: Point3D): number {
  return Math.hypot(p.x - q.x, p.y - q.y);
}

/** Position only, for issue locations */
export function worldPoint(road: Road, s: number, t = 0, h = 0): Point3D | undefined {
  const pose = roadToWorld(road, s, t, h);
  return pose === undefined ? undefined : { x: pose.x, y: pose.y, z: pose.z };
}
