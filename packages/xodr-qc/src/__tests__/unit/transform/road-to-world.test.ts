/**
 * Tests for the road-local to world transform
 */

import { describe, it, expect } from 'vitest';
import { distance2D, profileValue, roadToWorld } from '../../../transform/road-to-world.js';
import type { Road } from '../../../model/types.js';
import { createDocument, createStraightRoad } from '../../utils/index.js';
import type { RoadTreeInput } from '../../../model/schema.js';

function buildRoad(overrides: Partial<RoadTreeInput> = {}, hdg = 0): Road {
  const doc = createDocument([createStraightRoad({ id: '1', hdg }, overrides)]);
  const road = doc.roads.get('1');
  if (road === undefined) throw new Error('road missing');
  return road;
}

describe('Road To World - Flat Road', () => {
  it('should place a lateral offset to the left of the heading', () => {
    const pose = roadToWorld(buildRoad(), 20, 3);
    expect(pose?.x).toBeCloseTo(20, 12);
    expect(pose?.y).toBeCloseTo(3, 12);
    expect(pose?.z).toBeCloseTo(0, 12);
  });

  it('should rotate the offset with the road heading', () => {
    const pose = roadToWorld(buildRoad({}, Math.PI / 2), 10, 2);
    expect(pose?.x).toBeCloseTo(-2, 12);
    expect(pose?.y).toBeCloseTo(10, 12);
  });
});

describe('Road To World - Profiles', () => {
  it('should add the elevation and derive pitch from its slope', () => {
    const road = buildRoad({ elevationProfile: [{ s: 0, a: 2, b: 0.1, c: 0, d: 0 }] });
    const pose = roadToWorld(road, 10, 0);

    expect(pose?.z).toBeCloseTo(3, 12);
    expect(pose?.pitch).toBeCloseTo(-Math.atan(0.1), 12);
  });

  it('should tilt a lateral offset by the superelevation', () => {
    const roll = 0.1;
    const road = buildRoad({ lateralProfile: { superelevation: [{ s: 0, a: roll, b: 0, c: 0, d: 0 }] } });
    const pose = roadToWorld(road, 50, 3);

    expect(pose?.roll).toBe(roll);
    expect(pose?.y).toBeCloseTo(3 * Math.cos(roll), 12);
    expect(pose?.z).toBeCloseTo(3 * Math.sin(roll), 12);
  });

  it('should evaluate profile records relative to their own start', () => {
    const road = buildRoad({
      elevationProfile: [
        { s: 0, a: 0, b: 0, c: 0, d: 0 },
        { s: 40, a: 1, b: 0.5, c: 0, d: 0 },
      ],
    });

    expect(profileValue(road.elevations, 30)).toBe(0);
    expect(profileValue(road.elevations, 42)).toBe(2);
  });
});

describe('Road To World - Distances', () => {
  it('should ignore height in planar distances', () => {
    expect(distance2D({ x: 0, y: 0, z: 0 }, { x: 3, y: 4, z: 10 })).toBe(5);
  });
});
