/**
 * Tests for the junction and connection checkers
 */

import { describe, it, expect } from 'vitest';
import { connectRoadNoIncomingRoad } from '../../../../checks/semantic/connect-road-no-incoming-road.js';
import { endOppositeLinkage } from '../../../../checks/semantic/end-opposite-linkage.js';
import { oneConnectionElement } from '../../../../checks/semantic/one-connection-element.js';
import { isLaneLinkDirectionValid, oneLinkToIncoming } from '../../../../checks/semantic/one-link-to-incoming.js';
import { startAlongLinkage } from '../../../../checks/semantic/start-along-linkage.js';
import type { JunctionTreeInput, LaneSectionTreeInput } from '../../../../model/schema.js';
import type { ContactPoint, Lane, LaneDirection, OpenDriveDocument, TrafficRule } from '../../../../model/types.js';
import {
  createCheckContext,
  createDocument,
  createLane,
  createLaneSection,
  createStraightRoad,
} from '../../../utils/index.js';

type ConnectionInput = NonNullable<JunctionTreeInput['connections']>[number];

/**
 * Road 1 enters junction 10, connecting road 2 runs from the end of road 1
 * to the start of road 3
 */
function createJunctionDocument(
  connections: readonly ConnectionInput[],
  connectingSection: LaneSectionTreeInput = createLaneSection(0)
): OpenDriveDocument {
  return createDocument(
    [
      createStraightRoad({ id: '1' }, { link: { successor: { elementType: 'junction', elementId: '10' } } }),
      createStraightRoad(
        { id: '2', x: 100, length: 20, laneSections: [connectingSection] },
        {
          junction: '10',
          link: {
            predecessor: { elementType: 'road', elementId: '1', contactPoint: 'end' },
            successor: { elementType: 'road', elementId: '3', contactPoint: 'start' },
          },
        }
      ),
      createStraightRoad({ id: '3', x: 120 }, { link: { predecessor: { elementType: 'junction', elementId: '10' } } }),
    ],
    [{ id: '10', connections: [...connections] }]
  );
}

const forward: ConnectionInput = {
  id: '0',
  incomingRoad: '1',
  connectingRoad: '2',
  contactPoint: 'start',
  laneLinks: [{ from: -1, to: -1 }],
};

describe('Junction Checks - Connecting Road As Incoming Road', () => {
  it('should report a connection whose incoming road is a junction road', () => {
    const doc = createJunctionDocument([forward, { id: '5', incomingRoad: '2', connectingRoad: '2', contactPoint: 'start' }]);

    const findings = connectRoadNoIncomingRoad.check(createCheckContext(doc));

    expect(findings).toHaveLength(1);
    expect(findings[0]?.location.connectionId).toBe('5');
    expect(findings[0]?.related).toEqual([{ roadId: '2', s: 10 }]);
  });

  it('should accept ordinary incoming roads', () => {
    expect(connectRoadNoIncomingRoad.check(createCheckContext(createJunctionDocument([forward])))).toEqual([]);
  });
});

describe('Junction Checks - One Connection Element', () => {
  it('should report a connecting road used by two connections', () => {
    const doc = createJunctionDocument([
      forward,
      { id: '1', incomingRoad: '3', connectingRoad: '2', contactPoint: 'end' },
    ]);

    const findings = oneConnectionElement.check(createCheckContext(doc));

    expect(findings).toHaveLength(1);
    expect(findings[0]?.location.roadId).toBe('2');
    expect(findings[0]?.related?.map((r) => r.connectionId)).toEqual(['0', '1']);
  });

  it('should only apply up to version 1.7.0', () => {
    expect(oneConnectionElement.applicableVersion).toBe('<=1.7.0');
  });
});

describe('Junction Checks - One Link To Incoming', () => {
  it('should accept a lane link that follows the driving direction', () => {
    expect(oneLinkToIncoming.check(createCheckContext(createJunctionDocument([forward])))).toEqual([]);
  });

  it('should report a lane link into the opposite direction', () => {
    const doc = createJunctionDocument(
      [{ ...forward, laneLinks: [{ from: -1, to: 1 }] }],
      createLaneSection(0, [createLane(1)], [createLane(-1)])
    );

    const findings = oneLinkToIncoming.check(createCheckContext(doc));

    expect(findings).toHaveLength(1);
    expect(findings[0]?.message).toBe('A connecting road shall only have the <laneLink> element for that direction.');
    expect(findings[0]?.location).toEqual({
      roadId: '2',
      s: 0,
      laneId: 1,
      description: 'Lane link in opposite direction.',
      junctionId: '10',
      connectionId: '0',
    });
  });

  it('should report an incoming lane linked twice in one connection', () => {
    const doc = createJunctionDocument([
      { ...forward, laneLinks: [{ from: -1, to: -1 }, { from: -1, to: -1 }] },
    ]);

    const messages = oneLinkToIncoming.check(createCheckContext(doc)).map((f) => f.message);

    expect(messages).toEqual(['Incoming lane -1 has more than one <laneLink> in the same connection.']);
  });

  it('should report two connections for the same incoming and connecting road', () => {
    const doc = createJunctionDocument([forward, { ...forward, id: '1' }]);

    const findings = oneLinkToIncoming.check(createCheckContext(doc));

    expect(findings).toHaveLength(1);
    expect(findings[0]?.message).toBe(
      'Connecting road 2 shall be represented by at most one <connection> element per incoming road id.'
    );
    expect(findings[0]?.related).toEqual([
      { junctionId: '10', connectionId: '0' },
      { junctionId: '10', connectionId: '1' },
    ]);
  });
});

function createLinkEnd(
  id: number,
  direction: LaneDirection,
  rule: TrafficRule,
  contact: ContactPoint
): { lane: Lane; rule: TrafficRule; contact: ContactPoint } {
  return {
    lane: { id, type: 'driving', level: false, direction, predecessors: [], successors: [], widths: [], borders: [], access: [] },
    rule,
    contact,
  };
}

describe('Junction Checks - Lane Link Direction', () => {
  it('should accept a link between two lanes driven in both directions', () => {
    expect(
      isLaneLinkDirectionValid(createLinkEnd(1, 'both', 'RHT', 'end'), createLinkEnd(2, 'both', 'RHT', 'start'))
    ).toBe(true);
  });

  it('should still close the left side of the connecting road to a lane driven both ways', () => {
    const from = createLinkEnd(-1, 'standard', 'RHT', 'end');

    expect(isLaneLinkDirectionValid(from, createLinkEnd(1, 'both', 'RHT', 'start'))).toBe(false);
    expect(isLaneLinkDirectionValid(from, createLinkEnd(-1, 'both', 'RHT', 'start'))).toBe(true);
  });

  it('should only open the incoming side for an incoming lane driven both ways', () => {
    const from = createLinkEnd(1, 'both', 'RHT', 'end');

    expect(isLaneLinkDirectionValid(from, createLinkEnd(-1, 'standard', 'RHT', 'start'))).toBe(false);
    expect(isLaneLinkDirectionValid(from, createLinkEnd(1, 'standard', 'RHT', 'start'))).toBe(true);
    expect(isLaneLinkDirectionValid(from, createLinkEnd(-1, 'standard', 'RHT', 'end'))).toBe(true);
  });

  it('should treat a reversed lane as a lane of the opposite side', () => {
    const to = createLinkEnd(-1, 'standard', 'RHT', 'start');

    expect(isLaneLinkDirectionValid(createLinkEnd(-1, 'standard', 'RHT', 'end'), to)).toBe(true);
    expect(isLaneLinkDirectionValid(createLinkEnd(-1, 'reversed', 'RHT', 'end'), to)).toBe(false);
  });

  it('should mirror the open sides for left-hand traffic', () => {
    expect(
      isLaneLinkDirectionValid(createLinkEnd(1, 'standard', 'LHT', 'end'), createLinkEnd(1, 'standard', 'LHT', 'start'))
    ).toBe(true);
    expect(
      isLaneLinkDirectionValid(createLinkEnd(-1, 'standard', 'LHT', 'end'), createLinkEnd(-1, 'standard', 'LHT', 'start'))
    ).toBe(false);
  });

  it('should use the mixed-traffic sides when the roads drive on different hands', () => {
    expect(
      isLaneLinkDirectionValid(createLinkEnd(1, 'standard', 'LHT', 'end'), createLinkEnd(-1, 'standard', 'RHT', 'start'))
    ).toBe(true);
    expect(
      isLaneLinkDirectionValid(createLinkEnd(-1, 'standard', 'RHT', 'end'), createLinkEnd(1, 'standard', 'LHT', 'start'))
    ).toBe(true);
    expect(
      isLaneLinkDirectionValid(createLinkEnd(-1, 'standard', 'RHT', 'end'), createLinkEnd(-1, 'standard', 'LHT', 'start'))
    ).toBe(false);
  });
});

describe('Junction Checks - Contact Point Linkage', () => {
  it("should accept 'start' when the connecting road's predecessor is the incoming road", () => {
    expect(startAlongLinkage.check(createCheckContext(createJunctionDocument([forward])))).toEqual([]);
  });

  it("should report 'start' when the predecessor is another road", () => {
    const doc = createJunctionDocument([{ id: '4', incomingRoad: '3', connectingRoad: '2', contactPoint: 'start' }]);

    const findings = startAlongLinkage.check(createCheckContext(doc));

    expect(findings).toHaveLength(1);
    expect(findings[0]?.location.description).toBe("Contact point 'start' not used on predecessor road connection.");
    expect(findings[0]?.related).toEqual([{ roadId: '2', description: 'predecessor is road 1' }]);
  });

  it("should accept 'end' when the connecting road's successor is the incoming road", () => {
    const doc = createJunctionDocument([{ id: '4', incomingRoad: '3', connectingRoad: '2', contactPoint: 'end' }]);
    expect(endOppositeLinkage.check(createCheckContext(doc))).toEqual([]);
  });

  it("should report 'end' when the successor is another road", () => {
    const doc = createJunctionDocument([{ id: '4', incomingRoad: '1', connectingRoad: '2', contactPoint: 'end' }]);
    expect(endOppositeLinkage.check(createCheckContext(doc))).toHaveLength(1);
  });
});
