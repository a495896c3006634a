/**
 * Tests for the plan-view geometry checkers
 */

import { describe, it, expect } from 'vitest';
import { contactPoint } from '../../../../checks/geometry/contact-point.js';
import { elemAscOrder } from '../../../../checks/geometry/elem-asc-order.js';
import { paramPoly3ArclengthRange } from '../../../../checks/geometry/param-poly3-arclength-range.js';
import { lengthMismatch } from '../../../../checks/geometry/param-poly3-length.js';
import { paramPoly3NormalizedRange } from '../../../../checks/geometry/param-poly3-normalized-range.js';
import { paramPoly3ValidParameters } from '../../../../checks/geometry/param-poly3-valid-parameters.js';
import type { GeometryTreeInput } from '../../../../model/schema.js';
import {
  createCheckContext,
  createDocument,
  createLineGeometry,
  createStraightRoad,
} from '../../../utils/index.js';

/** Straight ParamPoly3 along u with the given declared length */
function createParamPoly3(overrides: Partial<Extract<GeometryTreeInput, { type: 'paramPoly3' }>> = {}): GeometryTreeInput {
  return {
    type: 'paramPoly3',
    s: 0,
    x: 0,
    y: 0,
    hdg: 0,
    length: 10,
    aU: 0,
    bU: 10,
    cU: 0,
    dU: 0,
    aV: 0,
    bV: 0,
    cV: 0,
    dV: 0,
    pRange: 'normalized',
    ...overrides,
  };
}

describe('Geometry Checks - Ascending Order', () => {
  it('should accept contiguous geometries', () => {
    const doc = createDocument([
      createStraightRoad(
        {},
        { planView: [createLineGeometry({ length: 50 }), createLineGeometry({ s: 50, x: 50, length: 50 })] }
      ),
    ]);

    expect(elemAscOrder.check(createCheckContext(doc))).toEqual([]);
  });

  it('should report a geometry that does not start where the previous one ends', () => {
    const doc = createDocument([
      createStraightRoad(
        {},
        { planView: [createLineGeometry({ length: 50 }), createLineGeometry({ s: 60, x: 60, length: 40 })] }
      ),
    ]);

    const findings = elemAscOrder.check(createCheckContext(doc));

    expect(findings).toHaveLength(1);
    expect(findings[0]?.message).toBe('<geometry> at s=0 ends at s=50 but the next one starts at s=60.');
  });

  it('should report geometries declared out of order', () => {
    const doc = createDocument([
      createStraightRoad(
        {},
        { planView: [createLineGeometry({ s: 50, x: 50, length: 50 }), createLineGeometry({ length: 50 })] }
      ),
    ]);

    const messages = elemAscOrder.check(createCheckContext(doc)).map((f) => f.message);

    expect(messages).toEqual([
      'The first <geometry> element shall start at s=0.',
      '<geometry> elements shall be defined in ascending order along the road reference line according to the s-coordinate.',
      'The last <geometry> element ends at s=50, not at the road length 100.',
    ]);
  });
});

describe('Geometry Checks - Contact Point', () => {
  it('should report a successor that does not start at the end of the road', () => {
    const doc = createDocument([
      createStraightRoad({ id: '1' }, { link: { successor: { elementType: 'road', elementId: '2', contactPoint: 'start' } } }),
      createStraightRoad({ id: '2', x: 100.5 }),
    ]);

    const findings = contactPoint.check(createCheckContext(doc));

    expect(findings).toHaveLength(1);
    expect(findings[0]?.message).toBe(
      "The road reference line does not meet the contact point 'start' of its successor road 2."
    );
    expect(findings[0]?.location).toEqual({ roadId: '1', s: 100 });
  });

  it('should accept roads that meet', () => {
    const doc = createDocument([
      createStraightRoad({ id: '1' }, { link: { successor: { elementType: 'road', elementId: '2', contactPoint: 'start' } } }),
      createStraightRoad({ id: '2', x: 100 }),
    ]);

    expect(contactPoint.check(createCheckContext(doc))).toEqual([]);
  });
});

describe('Geometry Checks - ParamPoly3', () => {
  it('should compare lengths relative to the declared length', () => {
    expect(lengthMismatch(100.05, 100, 1e-3)).toBe(false);
    expect(lengthMismatch(100.2, 100, 1e-3)).toBe(true);
  });

  it('should accept a normalized curve whose length matches', () => {
    const doc = createDocument([createStraightRoad({ length: 10 }, { planView: [createParamPoly3()] })]);
    expect(paramPoly3NormalizedRange.check(createCheckContext(doc))).toEqual([]);
  });

  it('should report a normalized curve shorter than declared', () => {
    const doc = createDocument([createStraightRoad({ length: 12 }, { planView: [createParamPoly3({ length: 12 })] })]);

    const findings = paramPoly3NormalizedRange.check(createCheckContext(doc));

    expect(findings).toHaveLength(1);
    expect(findings[0]?.message).toBe(
      'Parameter range [0, 1] does not cover the curve length. Integrated length 10.000000, declared 12.'
    );
  });

  it('should integrate arc-length curves up to their declared length', () => {
    const doc = createDocument([
      createStraightRoad({ length: 10 }, { planView: [createParamPoly3({ bU: 1, pRange: 'arcLength' })] }),
    ]);
    expect(paramPoly3ArclengthRange.check(createCheckContext(doc))).toEqual([]);

    const stretched = createDocument([
      createStraightRoad({ length: 10 }, { planView: [createParamPoly3({ bU: 2, pRange: 'arcLength' })] }),
    ]);
    expect(paramPoly3ArclengthRange.check(createCheckContext(stretched))).toHaveLength(1);
  });

  it('should report a local frame that is not aligned with the start point', () => {
    const doc = createDocument([
      createStraightRoad({ length: 10 }, { planView: [createParamPoly3({ aU: 0.2 })] }),
    ]);

    const findings = paramPoly3ValidParameters.check(createCheckContext(doc));

    expect(findings).toHaveLength(1);
    expect(findings[0]?.location.description).toBe('aU=0.2 aV=0 bV=0 bU=10');
  });
});
