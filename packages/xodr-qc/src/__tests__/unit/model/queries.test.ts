/**
 * Tests for Document Model queries
 */

import { describe, it, expect } from 'vitest';
import {
  connectionsBetweenRoadAndJunction,
  incomingAndConnectingSections,
  laneMidT,
  laneWidthAt,
  outerBorderTs,
  recordValue,
} from '../../../model/queries.js';
import type { Lane } from '../../../model/types.js';
import {
  createDocument,
  createLane,
  createLaneSection,
  createStraightRoad,
  createWidth,
} from '../../utils/index.js';

function lane(id: number, widths: readonly number[], borders: readonly number[] = []): Lane {
  return {
    id,
    type: 'driving',
    level: false,
    predecessors: [],
    successors: [],
    widths: widths.map((a) => ({ sOffset: 0, poly: { a, b: 0, c: 0, d: 0 } })),
    borders: borders.map((a) => ({ sOffset: 0, poly: { a, b: 0, c: 0, d: 0 } })),
    access: [],
  };
}

describe('Queries - Records', () => {
  it('should use the last record whose offset does not exceed ds', () => {
    const records = [
      { sOffset: 0, poly: { a: 3, b: 0, c: 0, d: 0 } },
      { sOffset: 10, poly: { a: 3, b: 0.1, c: 0, d: 0 } },
    ];
    expect(recordValue(records, 5)).toBe(3);
    expect(recordValue(records, 20)).toBe(4);
    expect(recordValue([{ sOffset: 5, poly: { a: 1, b: 0, c: 0, d: 0 } }], 2)).toBeUndefined();
  });

  it('should give the center lane zero width', () => {
    expect(laneWidthAt(lane(0, [3]), 0)).toBe(0);
    expect(laneWidthAt(lane(-1, [3]), 0)).toBe(3);
  });
});

describe('Queries - Lane Borders', () => {
  it('should accumulate widths outwards from the lane offset', () => {
    const borders = outerBorderTs([lane(1, [3]), lane(2, [2])], 0.5, 0);
    expect([...borders.entries()]).toEqual([
      [0, 0.5],
      [1, 3.5],
      [2, 5.5],
    ]);
  });

  it('should accumulate right-side widths towards negative t', () => {
    const borders = outerBorderTs([lane(-1, [3]), lane(-2, [2])], 0, 0);
    expect(borders.get(-1)).toBe(-3);
    expect(borders.get(-2)).toBe(-5);
  });

  it('should use borders only when no lane has a width', () => {
    expect(outerBorderTs([lane(1, [], [4])], 0, 0).get(1)).toBe(4);
    expect(outerBorderTs([lane(1, [3]), lane(2, [], [9])], 0, 0).has(2)).toBe(false);
  });

  it('should place a lane midpoint halfway between its borders', () => {
    const doc = createDocument([
      createStraightRoad({
        laneSections: [createLaneSection(0, [createLane(1), createLane(2, { width: [createWidth(2)] })])],
      }),
    ]);
    const road = doc.roads.get('1');
    const section = road?.laneSections[0];
    const outer = section?.left[1];
    if (road === undefined || section === undefined || outer === undefined) throw new Error('fixture');

    expect(laneMidT(road, section, outer, 10)).toBe(4.5);
  });
});

describe('Queries - Junction Connections', () => {
  // Road 1 ends at junction 10; connecting road 2 starts at the end of road 1
  const doc = createDocument(
    [
      createStraightRoad({ id: '1' }, { link: { successor: { elementType: 'junction', elementId: '10' } } }),
      createStraightRoad(
        { id: '2', x: 100, length: 20 },
        {
          junction: '10',
          link: { predecessor: { elementType: 'road', elementId: '1', contactPoint: 'end' } },
        }
      ),
    ],
    [
      {
        id: '10',
        connections: [
          { id: '0', incomingRoad: '1', connectingRoad: '2', contactPoint: 'start', laneLinks: [{ from: -1, to: -1 }] },
        ],
      },
    ]
  );

  it('should find connections attached at the matching road end', () => {
    expect(connectionsBetweenRoadAndJunction(doc, '1', '10', 'end').map((c) => c.id)).toEqual(['0']);
    expect(connectionsBetweenRoadAndJunction(doc, '1', '10', 'start')).toEqual([]);
  });

  it('should resolve the contacting sections of a connection', () => {
    const connection = doc.junctions.get('10')?.connections[0];
    if (connection === undefined) throw new Error('fixture');
    const sections = incomingAndConnectingSections(doc, connection);

    expect(sections?.incomingRoad.id).toBe('1');
    expect(sections?.incomingContact).toBe('end');
    expect(sections?.connectingRoad.id).toBe('2');
    expect(sections?.connectingContact).toBe('start');
  });
});
