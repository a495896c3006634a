/**
 * Sampled world-space lane boundaries
 *
 * Used to locate the place where two lane borders cross. The decision whether
 * they cross is made analytically by the checkers; the outline only supplies
 * a representative point.
 *
 * @module topology/lane-outline
 */

import { polygon as turfPolygon } from '@turf/helpers';
import kinks from '@turf/kinks';
import type { Position } from 'geojson';
import type { Lane, LaneSection, Road } from '../model/types.js';
import { sideBorderTs } from '../model/queries.js';
import { roadToWorld, type Point3D } from '../transform/road-to-world.js';
import { logger } from '../core/utils/logger.js';

/**
 * Sample the outer border of a lane over its section every `step` metres
 *
 * Points where the border is undefined are skipped.
 */
export function sampleOuterBorder(
  road: Road,
  section: LaneSection,
  lane: Lane,
  step: number
): Position[] {
  const positions: Position[] = [];
  const count = Math.max(1, Math.ceil(section.length / step));

  for (let i = 0; i <= count; i++) {
    const s = section.s + Math.min(i * step, section.length);
    const t = sideBorderTs(road, section, lane.id, s).get(lane.id);
    if (t === undefined) continue;
    const pose = roadToWorld(road, s, t);
    if (pose !== undefined) positions.push([pose.x, pose.y]);
  }

  return positions;
}

/**
 * First crossing between two sampled borders, if any
 *
 * The borders are closed into a ring (first border forward, second border
 * backwards); a crossing shows up as a self-intersection of that ring.
 */
export function findCrossing(first: readonly Position[], second: readonly Position[]): Point3D | undefined {
  if (first.length < 2 || second.length < 2) return undefined;

  const start = first[0];
  if (start === undefined) return undefined;
  const ring: Position[] = [...first, ...[...second].reverse(), start];

  try {
    const result = kinks(turfPolygon([ring]));
    const kink = result.features[0];
    if (kink === undefined) return undefined;
    const [x, y] = kink.geometry.coordinates;
    if (x === undefined || y === undefined) return undefined;
    return { x, y, z: 0 };
  } catch (error) {
    logger.debug('Lane outline could not be analysed', {
      error: error instanceof Error ? error.message : String(error),
    });
    return undefined;
  }
}
